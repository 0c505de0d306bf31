import path from 'node:path';
import { AssembleOptions, describeParameters } from './assembler.js';
import { loadComposition, resolveSettings, Settings } from './config.js';
import { loadEnvFiles } from './env-loader.js';
import { logger } from './logger.js';
import { buildOverrideMap, overridesFromEnv, parseOverrideArgs } from './overrides.js';
import { Composition, CompositionCommandOptions, OverrideMap, ParameterDeclaration } from './types.js';

export interface CompositionContext {
  settings: Settings;
  composition: Composition;
  overrides: OverrideMap;
  assembleOptions: AssembleOptions;
  loadedEnvFiles: string[];
}

/**
 * Load everything a compose or launch run needs: .env files, settings,
 * the composition, and the caller's overrides (environment first, then
 * command line, so the command line wins).
 *
 * @param overrideTokens - Override tokens left over after option parsing
 */
export async function initializeContext(
  options: CompositionCommandOptions,
  overrideTokens: readonly string[],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<CompositionContext> {
  // Load .env files before reading settings from the environment
  const compositionDir = options.composition ? path.dirname(path.resolve(cwd, options.composition)) : undefined;
  const loadedEnvFiles = loadEnvFiles(cwd, compositionDir);

  const settings = resolveSettings(env, { composition: options.composition });
  const composition = await loadComposition(settings.composition, cwd);

  // Declarations decide how override strings are coerced
  const declarations = new Map<string, ParameterDeclaration>(
    describeParameters(composition.targets).map(usage => [usage.declaration.name, usage.declaration])
  );

  const overrides = buildOverrideMap(
    [overridesFromEnv(env, settings.envPrefix), parseOverrideArgs(overrideTokens)],
    name => declarations.get(name)
  );

  return {
    settings,
    composition,
    overrides,
    assembleOptions: {
      unknownKeys: options.allowUnknown ? 'ignore' : 'reject',
      onIgnoredKey: name => logger.warn(`Ignoring unknown parameter '${name}'`),
    },
    loadedEnvFiles,
  };
}
