import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { builtinCompositions, DEFAULT_COMPOSITION } from './compositions/index.js';
import { CompositionFileError } from './errors.js';
import { ParameterSchema } from './parameter-schema.js';
import {
  Composition,
  CompositionFile,
  CompositionFileSchema,
  ParameterDeclaration,
  REQUIRED,
  TargetSpec,
} from './types.js';

// ============================================
// Settings
// ============================================

export interface Settings {
  /** Composition file path, or the name of a built-in composition */
  composition: string;
  /** Prefix of environment variables read as overrides */
  envPrefix: string;
}

export const DEFAULT_ENV_PREFIX = 'BRINGUP_ARG_';

/**
 * Read settings from the environment; explicit CLI values win
 */
export function resolveSettings(
  env: NodeJS.ProcessEnv,
  cli: { composition?: string } = {}
): Settings {
  return {
    composition: cli.composition ?? env.BRINGUP_COMPOSITION ?? DEFAULT_COMPOSITION,
    envPrefix: env.BRINGUP_ENV_PREFIX ?? DEFAULT_ENV_PREFIX,
  };
}

// ============================================
// Composition Files
// ============================================

function formatZodError(error: z.ZodError): string {
  return error.errors
    .map(err => {
      const issuePath = err.path.join('.');
      return `  - ${issuePath}: ${err.message}`;
    })
    .join('\n');
}

/**
 * Turn a validated composition file into schemas and targets
 * @param file - Path used in error messages
 */
export function buildComposition(parsed: CompositionFile, file: string): Composition {
  const schemas = new Map<string, ParameterSchema>();

  // A missing default marks the parameter as required
  for (const [label, entries] of Object.entries(parsed.schemas)) {
    const declarations: ParameterDeclaration[] = entries.map(entry => ({
      name: entry.name,
      default: entry.default === undefined ? REQUIRED : entry.default,
      description: entry.description,
    }));
    schemas.set(label, ParameterSchema.declare(declarations, label));
  }

  // Targets refer to schemas by label
  const targets: TargetSpec[] = parsed.targets.map(target => ({
    name: target.name,
    description: target.description,
    schemas: target.schemas.map(label => {
      const schema = schemas.get(label);
      if (!schema) {
        throw new CompositionFileError(
          `Target '${target.name}' references unknown schema '${label}' in ${path.basename(file)}`,
          file
        );
      }
      return schema;
    }),
    forced: new Map(Object.entries(target.forced)),
    launch: target.launch,
  }));

  return { name: parsed.name, description: parsed.description, targets };
}

/**
 * Load and validate a YAML composition file
 * @throws CompositionFileError if the file is missing, unparsable or invalid
 */
export async function loadCompositionFile(file: string): Promise<Composition> {
  // Read and parse YAML
  let rawComposition: unknown;
  try {
    const content = await fs.readFile(file, 'utf-8');
    rawComposition = parseYaml(content);
  } catch (error) {
    throw new CompositionFileError(
      `Failed to parse ${path.basename(file)}: ${error instanceof Error ? error.message : String(error)}`,
      file
    );
  }

  // Validate with Zod
  const result = CompositionFileSchema.safeParse(rawComposition);
  if (!result.success) {
    throw new CompositionFileError(
      `Composition validation failed for ${path.basename(file)}:\n${formatZodError(result.error)}`,
      file
    );
  }

  return buildComposition(result.data, file);
}

/**
 * Resolve a built-in composition by name, or load it from a file
 */
export async function loadComposition(reference: string, cwd: string): Promise<Composition> {
  const builtin = builtinCompositions.get(reference);
  if (builtin) {
    return builtin;
  }

  // Anything that is not a built-in name must be a YAML file
  if (!/\.ya?ml$/i.test(reference)) {
    throw new CompositionFileError(
      `Unknown composition '${reference}'. Built-in compositions: ${[...builtinCompositions.keys()].join(', ')}`,
      reference
    );
  }

  return loadCompositionFile(path.resolve(cwd, reference));
}
