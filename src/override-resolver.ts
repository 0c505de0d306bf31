import { MissingRequiredParameterError, UnknownParameterError } from './errors.js';
import { ParameterSchema } from './parameter-schema.js';
import {
  ArgumentBinding,
  ForcedOverrideMap,
  OverrideMap,
  ParameterValue,
  REQUIRED,
  ResolveOptions,
} from './types.js';

/**
 * Keys of `values` that no declaration in `schema` matches, in map order
 */
export function findUnknownKeys(
  schema: ParameterSchema,
  values: ReadonlyMap<string, unknown>
): string[] {
  return [...values.keys()].filter(name => !schema.has(name));
}

/**
 * Compute the effective value of every parameter in `schema`.
 *
 * Precedence per declaration: forced value, then caller override, then the
 * declared default. A required declaration with neither override fails.
 * The binding keeps schema order and holds exactly the schema's names.
 *
 * Keys in `overrides` or `forced` that match no declaration fail with
 * UnknownParameterError unless `options.unknownKeys` is 'ignore'.
 */
export function resolve(
  schema: ParameterSchema,
  overrides: OverrideMap,
  forced: ForcedOverrideMap,
  options: ResolveOptions = {}
): ArgumentBinding {
  if ((options.unknownKeys ?? 'reject') === 'reject') {
    // Forced keys are checked before caller keys
    const [unknownForced] = findUnknownKeys(schema, forced);
    if (unknownForced !== undefined) {
      throw new UnknownParameterError(unknownForced, 'forced');
    }
    const [unknownOverride] = findUnknownKeys(schema, overrides);
    if (unknownOverride !== undefined) {
      throw new UnknownParameterError(unknownOverride, 'override');
    }
  }

  const binding = new Map<string, ParameterValue>();

  for (const decl of schema.declarations) {
    // 1. Forced by the target
    const forcedValue = forced.get(decl.name);
    if (forcedValue !== undefined) {
      binding.set(decl.name, forcedValue);
      continue;
    }

    // 2. Caller override
    const override = overrides.get(decl.name);
    if (override !== undefined) {
      binding.set(decl.name, override);
      continue;
    }

    // 3. Declared default
    if (decl.default === REQUIRED) {
      throw new MissingRequiredParameterError(decl.name);
    }
    binding.set(decl.name, decl.default);
  }

  return binding;
}
