/**
 * Console output with consistent styling.
 * All log lines go to stderr so stdout stays reserved for structured output.
 */
export const logger = {
  info: (message: string) => console.error(`[INFO] ${message}`),
  success: (message: string) => console.error(`[SUCCESS] ${message}`),
  warn: (message: string) => console.error(`[WARN] ${message}`),
  error: (message: string) => console.error(`[ERROR] ${message}`),
  debug: (message: string) => console.error(`[DEBUG] ${message}`),
  divider: () => console.error('─'.repeat(60)),
};

export type Logger = typeof logger;
