import { describeError } from '../errors.js';
import { logger } from '../logger.js';

/**
 * Print a failure the same way for every command: kind, parameter, target, hint
 */
export function reportError(title: string, error: unknown, verbose?: boolean): void {
  const details = describeError(error);

  logger.divider();
  logger.error(title);
  logger.error(`${details.kind}: ${details.message}`);
  if (details.target) {
    logger.error(`  Target: ${details.target}`);
  }
  if (details.parameter) {
    logger.error(`  Parameter: ${details.parameter}`);
  }
  if (details.hint) {
    logger.info(`Hint: ${details.hint}`);
  }
  if (verbose && error instanceof Error && error.stack) {
    logger.debug('Stack trace:');
    console.error(error.stack);
  }
  logger.divider();
}
