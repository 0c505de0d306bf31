import { existsSync } from 'node:fs';
import path from 'node:path';
import * as dotenv from 'dotenv';

/**
 * Find the project root directory by searching upward for a .git directory
 * @param startDir - Directory to start searching from
 * @returns Path to project root, or null if not found
 */
export function findProjectRoot(startDir: string): string | null {
  let current = startDir;
  const root = path.parse(current).root;

  while (current !== root) {
    // Check if current directory contains .git
    if (existsSync(path.join(current, '.git'))) {
      return current;
    }

    // Move up one directory
    current = path.dirname(current);
  }

  return null;
}

/**
 * Load .env files in cascading order (local overrides global)
 * Priority: process.env > cwd/.env > composition dir/.env > project root/.env
 *
 * dotenv runs with override: false, so the first file to set a variable wins
 * and variables already in the environment are never replaced.
 *
 * @param cwd - Current working directory
 * @param compositionDir - Directory of the composition file, if one is used
 * @returns Array of loaded .env file paths
 */
export function loadEnvFiles(cwd: string, compositionDir?: string): string[] {
  const loadedFiles: string[] = [];

  // Collect potential .env file paths (from most local to most global)
  const envFilePaths = [path.join(cwd, '.env')];
  if (compositionDir) {
    envFilePaths.push(path.join(compositionDir, '.env'));   // Beside the composition file
  }

  // Add project root .env if found
  const projectRoot = findProjectRoot(cwd);
  if (projectRoot) {
    envFilePaths.push(path.join(projectRoot, '.env'));
  }

  // cwd may be the project root or the composition dir; load each file once
  for (const envPath of new Set(envFilePaths)) {
    if (!existsSync(envPath)) continue;

    const result = dotenv.config({ path: envPath, override: false });
    if (result.error) {
      // Unreadable file: report it and keep going with the rest
      console.error(`[WARN] Failed to load ${envPath}: ${result.error.message}`);
      continue;
    }
    loadedFiles.push(envPath);
  }

  return loadedFiles;
}
