#!/usr/bin/env node

/**
 * bringup-composer - Main Entry Point
 *
 * Runs the CLI program defined in cli.ts.
 */

import { run } from './cli.js';

// .env files are loaded per command in context.ts (cwd > composition dir > project root)

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason, promise) => {
  console.error('[FATAL] Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  console.error('[FATAL] Uncaught Exception:', error);
  process.exit(1);
});

// Execute the CLI program
run().catch((error) => {
  console.error('[FATAL] Failed to run bringup:', error);
  process.exit(1);
});
