#!/usr/bin/env node

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { gen3Bringup } from './compositions/index.js';
import { handleComposeCommand } from './commands/compose.js';
import { handleLaunchCommand } from './commands/launch.js';
import { handleParamsCommand, renderParameterHelp } from './commands/params.js';
import { CompositionCommandOptions, LaunchCommandOptions } from './types.js';

function readVersion(): string {
  const packageJsonPath = path.join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch {
    // Fall through: running from an unpacked tree without package.json
  }
  return '0.0.0';
}

const formatOption = () =>
  new Option('--format <format>', 'Output format').choices(['text', 'json', 'raw']).default('text');

/**
 * Options shared by commands that assemble a composition.
 * Remaining tokens after `--` (or any unrecognized token) are overrides.
 */
function withCompositionOptions(command: Command): Command {
  return command
    .option(
      '-c, --composition <file|name>',
      'Composition YAML file or built-in composition name (defaults to BRINGUP_COMPOSITION or gen3-bringup)'
    )
    .option(
      '--allow-unknown',
      'Ignore override keys that no target declares instead of failing',
      false
    )
    .option('-v, --verbose', 'Enable verbose output', false)
    .allowUnknownOption(true)
    .allowExcessArguments(true)
    .argument('[overrides...]', 'Parameter overrides: --name=value or name:=value');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();
  const parameterHelp = () => renderParameterHelp(gen3Bringup);

  program
    .name('bringup')
    .description('Compose and launch multi-subsystem robot bringups from shared parameter declarations')
    .version(readVersion())
    .addHelpText('after', parameterHelp);

  // launch: assemble, then start every target
  withCompositionOptions(
    program
      .command('launch')
      .description('Assemble every target and launch them')
      .option('--dry-run', 'Print the launch commands instead of running them', false)
      .addOption(formatOption())
  )
    .addHelpText('after', parameterHelp)
    .action(async (overrides: string[], options: LaunchCommandOptions) => {
      process.exitCode = await handleLaunchCommand(overrides, options);
    });

  // compose: assemble and print, start nothing
  withCompositionOptions(
    program
      .command('compose')
      .description('Assemble every target and print the argument bindings')
      .addOption(formatOption())
  )
    .addHelpText('after', parameterHelp)
    .action(async (overrides: string[], options: CompositionCommandOptions) => {
      process.exitCode = await handleComposeCommand(overrides, options);
    });

  program
    .command('params')
    .description('List every declared parameter with its description and default')
    .option('-c, --composition <file|name>', 'Composition YAML file or built-in composition name')
    .addOption(new Option('--format <format>', 'Output format').choices(['text', 'json']).default('text'))
    .action(async (options: { composition?: string; format?: string }) => {
      process.exitCode = await handleParamsCommand(options);
    });

  return program;
}

/**
 * Parse command line arguments and execute
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
