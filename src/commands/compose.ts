/**
 * bringup compose
 *
 * Assembles every target of a composition and prints the bindings,
 * without launching anything.
 *
 * Usage: bringup compose [--format text|json|raw] [-- <overrides...>]
 */

import { assemble } from '../assembler.js';
import { initializeContext } from '../context.js';
import { logger } from '../logger.js';
import { buildComposeResult, formatComposeResult, parseOutputFormat } from '../output-formatter.js';
import { CompositionCommandOptions } from '../types.js';
import { reportError } from './report-error.js';

/**
 * @returns Process exit code
 */
export async function handleComposeCommand(
  overrideTokens: readonly string[],
  options: CompositionCommandOptions
): Promise<number> {
  try {
    const format = parseOutputFormat(options.format);
    const context = await initializeContext(options, overrideTokens);

    if (options.verbose) {
      for (const file of context.loadedEnvFiles) {
        logger.debug(`Loaded ${file}`);
      }
      logger.debug(`Composition: ${context.composition.name}`);
      logger.debug(`Overrides: ${[...context.overrides.keys()].join(', ') || '(none)'}`);
    }

    const bindings = assemble(context.composition.targets, context.overrides, context.assembleOptions);

    console.log(formatComposeResult(buildComposeResult(context.composition, bindings), format));
    return 0;
  } catch (error) {
    reportError('Composition failed', error, options.verbose);
    return 1;
  }
}
