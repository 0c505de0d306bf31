import {
  CompositionError,
  LaunchError,
  UnknownParameterError,
} from './errors.js';
import type { LaunchInvoker } from './launcher.js';
import { findUnknownKeys, resolve } from './override-resolver.js';
import { ParameterSchema } from './parameter-schema.js';
import { mergeSchemas } from './schema-merger.js';
import {
  ArgumentBinding,
  LaunchHandle,
  OverrideMap,
  ParameterUsage,
  ParameterValue,
  ResolveOptions,
  TargetSpec,
} from './types.js';

export interface AssembleOptions extends ResolveOptions {
  /** Called for every caller override that no target declares (only when unknownKeys is 'ignore') */
  onIgnoredKey?: (name: string) => void;
}

function mergeTarget(target: TargetSpec): ParameterSchema {
  try {
    return mergeSchemas(target.schemas, target.name);
  } catch (error) {
    throw new CompositionError(target.name, asError(error));
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Produce one ArgumentBinding per target.
 *
 * Each target's schemas are merged independently, so two targets may both
 * use the same schema. The caller overrides are shared by the whole run:
 * every target receives the subset it declares, and a key that no target
 * declares is rejected up front (or ignored, per options.unknownKeys).
 * Forced overrides are checked per target.
 *
 * The first failing target aborts the run with a CompositionError; nothing
 * is returned for the other targets.
 */
export function assemble(
  targets: readonly TargetSpec[],
  callerOverrides: OverrideMap,
  options: AssembleOptions = {}
): ReadonlyMap<string, ArgumentBinding> {
  const seen = new Set<string>();
  const merged: Array<{ target: TargetSpec; schema: ParameterSchema }> = [];

  // Phase 1: merge each target's schemas, rejecting duplicate target names
  for (const target of targets) {
    if (seen.has(target.name)) {
      throw new CompositionError(
        target.name,
        new Error(`Target '${target.name}' is declared more than once`)
      );
    }
    seen.add(target.name);
    merged.push({ target, schema: mergeTarget(target) });
  }

  // Caller keys are checked against the union of all targets
  const declaredAnywhere = new Set(merged.flatMap(({ schema }) => [...schema.names()]));
  for (const name of callerOverrides.keys()) {
    if (declaredAnywhere.has(name)) continue;

    if ((options.unknownKeys ?? 'reject') === 'reject') {
      throw new UnknownParameterError(name, 'override');
    }
    options.onIgnoredKey?.(name);
  }

  const bindings = new Map<string, ArgumentBinding>();

  // Phase 2: resolve each target against the overrides it declares
  for (const { target, schema } of merged) {
    const scoped = new Map(
      [...callerOverrides].filter(([name]) => schema.has(name))
    );

    try {
      bindings.set(target.name, resolve(schema, scoped, target.forced, options));
    } catch (error) {
      throw new CompositionError(target.name, asError(error));
    }
  }

  return bindings;
}

/**
 * List every declaration used by any target, first declaration first.
 * Declarations repeated across targets appear once, with all their targets.
 */
export function describeParameters(targets: readonly TargetSpec[]): ParameterUsage[] {
  const usages = new Map<string, ParameterUsage>();

  for (const target of targets) {
    for (const schema of target.schemas) {
      for (const declaration of schema.declarations) {
        let usage = usages.get(declaration.name);
        if (!usage) {
          usage = { declaration, targets: [], forced: [] };
          usages.set(declaration.name, usage);
        }
        if (usage.targets.includes(target.name)) continue;

        usage.targets.push(target.name);
        const forcedValue = target.forced.get(declaration.name);
        if (forcedValue !== undefined) {
          usage.forced.push({ target: target.name, value: forcedValue });
        }
      }
    }
  }

  return [...usages.values()];
}

/**
 * Assemble every target, then start them in declaration order.
 *
 * Nothing is launched unless every target assembles. If the invoker fails
 * for one target, the targets already started are stopped and the failure
 * is raised as a CompositionError for that target.
 */
export async function launchAll(
  targets: readonly TargetSpec[],
  callerOverrides: OverrideMap,
  invoker: LaunchInvoker,
  options: AssembleOptions = {}
): Promise<LaunchHandle[]> {
  const bindings = assemble(targets, callerOverrides, options);
  const handles: LaunchHandle[] = [];

  for (const target of targets) {
    const binding = bindings.get(target.name);
    if (!binding) {
      throw new CompositionError(target.name, new Error('No binding was assembled'));
    }

    try {
      handles.push(await invoker.invoke(target, binding));
    } catch (error) {
      // Stop the targets already started before reporting the failure
      for (const handle of handles) {
        handle.stop();
      }
      const cause = error instanceof LaunchError
        ? error
        : new LaunchError(asError(error).message, target.name);
      throw new CompositionError(target.name, cause);
    }
  }

  return handles;
}

/** Plain-object view of a binding, in binding order */
export function bindingToRecord(binding: ArgumentBinding): Record<string, ParameterValue> {
  return Object.fromEntries(binding);
}
