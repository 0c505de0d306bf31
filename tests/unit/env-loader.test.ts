#!/usr/bin/env node

/**
 * Unit tests for env-loader.ts
 *
 * Cascading .env loading: most local file wins, existing variables are kept
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import { findProjectRoot, loadEnvFiles } from '../../src/env-loader.js';

describe('env-loader', () => {
  let tempDir: string;
  let workDir: string;
  let compositionDir: string;

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `bringup-env-test-${uuidv4()}`);
    workDir = path.join(tempDir, 'project', 'work');
    compositionDir = path.join(tempDir, 'project', 'compositions');
    await fs.mkdir(workDir, { recursive: true });
    await fs.mkdir(compositionDir, { recursive: true });
  });

  afterEach(async () => {
    delete process.env.BRINGUP_TEST_LOCAL;
    delete process.env.BRINGUP_TEST_SHARED;
    delete process.env.BRINGUP_TEST_ROOT;
    delete process.env.BRINGUP_TEST_PRESET;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should find the nearest directory containing .git', async () => {
    const projectRoot = path.join(tempDir, 'project');
    await fs.mkdir(path.join(projectRoot, '.git'));

    expect(findProjectRoot(workDir)).toBe(projectRoot);
  });

  it('should let the most local .env file win', async () => {
    const projectRoot = path.join(tempDir, 'project');
    await fs.mkdir(path.join(projectRoot, '.git'));
    await fs.writeFile(path.join(workDir, '.env'), 'BRINGUP_TEST_LOCAL=work\nBRINGUP_TEST_SHARED=work\n');
    await fs.writeFile(path.join(compositionDir, '.env'), 'BRINGUP_TEST_SHARED=composition\n');
    await fs.writeFile(path.join(projectRoot, '.env'), 'BRINGUP_TEST_SHARED=root\nBRINGUP_TEST_ROOT=root\n');

    const loaded = loadEnvFiles(workDir, compositionDir);

    expect(loaded).toEqual([
      path.join(workDir, '.env'),
      path.join(compositionDir, '.env'),
      path.join(projectRoot, '.env'),
    ]);
    expect(process.env.BRINGUP_TEST_LOCAL).toBe('work');
    expect(process.env.BRINGUP_TEST_SHARED).toBe('work');
    expect(process.env.BRINGUP_TEST_ROOT).toBe('root');
  });

  it('should never replace variables already in the environment', async () => {
    process.env.BRINGUP_TEST_PRESET = 'shell';
    await fs.writeFile(path.join(workDir, '.env'), 'BRINGUP_TEST_PRESET=file\n');

    loadEnvFiles(workDir);

    expect(process.env.BRINGUP_TEST_PRESET).toBe('shell');
  });

  it('should skip missing files', () => {
    expect(loadEnvFiles(workDir, compositionDir)).toEqual([]);
  });
});
