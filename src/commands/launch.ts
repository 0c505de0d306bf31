/**
 * bringup launch
 *
 * Assembles every target and starts them in declaration order. Nothing is
 * started unless every target assembles. The started targets are printed
 * to stdout in the requested format. Waits for the launched processes
 * and stops them all on SIGINT/SIGTERM.
 */

import { launchAll } from '../assembler.js';
import { initializeContext } from '../context.js';
import { DryRunLaunchInvoker, LaunchInvoker, ProcessLaunchInvoker } from '../launcher.js';
import { logger } from '../logger.js';
import { buildLaunchResult, formatLaunchResult, parseOutputFormat } from '../output-formatter.js';
import { LaunchCommandOptions, LaunchHandle } from '../types.js';
import { reportError } from './report-error.js';

async function waitForHandles(handles: LaunchHandle[]): Promise<number> {
  let interrupted = false;

  const handleInterrupt = () => {
    if (interrupted) return;
    interrupted = true;
    logger.divider();
    logger.info('Received interrupt signal, stopping all targets...');
    for (const handle of handles) {
      handle.stop();
    }
  };

  // Ctrl+C stops every target, then we wait for them to exit
  process.on('SIGINT', handleInterrupt);
  process.on('SIGTERM', handleInterrupt);

  try {
    const exits = await Promise.all(handles.map(handle => handle.exited));
    const failed = exits.filter(exit => !exit.success);

    for (const exit of failed) {
      logger.error(`Target '${exit.target}' exited with code ${exit.exitCode}`);
    }

    if (interrupted) return 130; // Standard exit code for SIGINT
    return failed.length > 0 ? 1 : 0;
  } finally {
    process.off('SIGINT', handleInterrupt);
    process.off('SIGTERM', handleInterrupt);
  }
}

/**
 * Usage: bringup launch [--dry-run] [--format text|json|raw] [-- <overrides...>]
 * @returns Process exit code
 */
export async function handleLaunchCommand(
  overrideTokens: readonly string[],
  options: LaunchCommandOptions,
  invoker?: LaunchInvoker
): Promise<number> {
  try {
    const format = parseOutputFormat(options.format);
    const context = await initializeContext(options, overrideTokens);

    logger.divider();
    logger.info(`Composition: ${context.composition.name}`);
    logger.info(`Targets: ${context.composition.targets.map(target => target.name).join(', ')}`);
    if (context.loadedEnvFiles.length > 0) {
      logger.info('Environment files loaded:');
      context.loadedEnvFiles.forEach(file => logger.info(`  ✓ ${file}`));
    }
    logger.divider();

    // Assemble everything, then start the targets in order
    const launcher = invoker ?? (options.dryRun ? new DryRunLaunchInvoker() : new ProcessLaunchInvoker());
    const handles = await launchAll(
      context.composition.targets,
      context.overrides,
      launcher,
      context.assembleOptions
    );

    for (const handle of handles) {
      logger.success(`Started ${handle.target}${handle.pid !== undefined ? ` (pid ${handle.pid})` : ''}`);
    }

    // What was started goes to stdout; progress stays on stderr
    const dryRun = options.dryRun ?? false;
    console.log(formatLaunchResult(buildLaunchResult(context.composition, handles, dryRun), format));

    return await waitForHandles(handles);
  } catch (error) {
    reportError('Launch failed', error, options.verbose);
    return 1;
  }
}
