/**
 * Output formatting for assembled bindings and parameter listings.
 * Everything returned here is meant for stdout.
 */

import { bindingToRecord } from './assembler.js';
import { buildLaunchArguments, formatLaunchValue } from './launcher.js';
import {
  ArgumentBinding,
  ComposeResult,
  Composition,
  LaunchHandle,
  LaunchResult,
  OutputFormat,
  ParameterUsage,
  REQUIRED,
} from './types.js';

export function parseOutputFormat(value: string | undefined): OutputFormat {
  switch (value ?? OutputFormat.Text) {
    case OutputFormat.Text:
      return OutputFormat.Text;
    case OutputFormat.Json:
      return OutputFormat.Json;
    case OutputFormat.Raw:
      return OutputFormat.Raw;
    default:
      throw new Error(`Unknown output format '${value}' (expected text, json or raw)`);
  }
}

/**
 * Build the structured result of one composition run
 */
export function buildComposeResult(
  composition: Composition,
  bindings: ReadonlyMap<string, ArgumentBinding>
): ComposeResult {
  return {
    schema_version: '1.0',
    composition: composition.name,
    targets: composition.targets.flatMap(target => {
      const binding = bindings.get(target.name);
      if (!binding) return [];
      return [{
        name: target.name,
        command: target.launch ? [...target.launch.command] : undefined,
        arguments: bindingToRecord(binding),
      }];
    }),
  };
}

function formatText(result: ComposeResult): string {
  const lines: string[] = [`Composition: ${result.composition}`];

  for (const target of result.targets) {
    lines.push('');
    lines.push(`[${target.name}]`);
    const entries = Object.entries(target.arguments);
    const width = Math.max(0, ...entries.map(([name]) => name.length));
    for (const [name, value] of entries) {
      lines.push(`  ${name.padEnd(width)} = ${formatLaunchValue(value)}`);
    }
  }

  return lines.join('\n');
}

function formatRaw(result: ComposeResult): string {
  return result.targets
    .map(target => {
      const args = buildLaunchArguments(new Map(Object.entries(target.arguments)));
      return [...(target.command ?? [target.name]), ...args].join(' ');
    })
    .join('\n');
}

/**
 * Format a compose result for stdout
 */
export function formatComposeResult(result: ComposeResult, format: OutputFormat): string {
  switch (format) {
    case OutputFormat.Json:
      return JSON.stringify(result, null, 2);
    case OutputFormat.Raw:
      return formatRaw(result);
    case OutputFormat.Text:
      return formatText(result);
  }
}

/**
 * Build the structured result of a launch, one entry per started target
 */
export function buildLaunchResult(
  composition: Composition,
  handles: readonly LaunchHandle[],
  dryRun: boolean
): LaunchResult {
  return {
    schema_version: '1.0',
    composition: composition.name,
    dry_run: dryRun,
    targets: handles.map(handle => ({
      name: handle.target,
      id: handle.id,
      pid: handle.pid,
      command: [...handle.command],
    })),
  };
}

/**
 * Format a launch result for stdout
 */
export function formatLaunchResult(result: LaunchResult, format: OutputFormat): string {
  switch (format) {
    case OutputFormat.Json:
      return JSON.stringify(result, null, 2);
    case OutputFormat.Raw:
      return result.targets.map(target => target.command.join(' ')).join('\n');
    case OutputFormat.Text: {
      const lines: string[] = [`Composition: ${result.composition}${result.dry_run ? ' (dry run)' : ''}`];
      for (const target of result.targets) {
        lines.push('');
        lines.push(target.pid !== undefined ? `[${target.name}] pid ${target.pid}` : `[${target.name}]`);
        lines.push(`  ${target.command.join(' ')}`);
      }
      return lines.join('\n');
    }
  }
}

function describeDefault(usage: ParameterUsage): string {
  const value = usage.declaration.default;
  return value === REQUIRED ? '<required>' : formatLaunchValue(value);
}

/**
 * Parameter listing for `--help` and the `params` command
 */
export function formatParameterUsage(usages: readonly ParameterUsage[]): string {
  const lines: string[] = ['Parameters (--name=value or name:=value):'];

  for (const usage of usages) {
    const { declaration } = usage;
    lines.push('');
    lines.push(`  ${declaration.name}  (default: ${describeDefault(usage)})`);
    if (declaration.description) {
      lines.push(`      ${declaration.description}`);
    }
    lines.push(`      targets: ${usage.targets.join(', ')}`);
    for (const { target, value } of usage.forced) {
      lines.push(`      fixed to ${formatLaunchValue(value)} for ${target}`);
    }
  }

  return lines.join('\n');
}

/**
 * JSON view of the parameter listing
 */
export function parameterUsageToJson(usages: readonly ParameterUsage[]): string {
  return JSON.stringify(
    usages.map(({ declaration, targets, forced }) => ({
      name: declaration.name,
      description: declaration.description,
      required: declaration.default === REQUIRED,
      default: declaration.default === REQUIRED ? null : declaration.default,
      targets,
      forced: Object.fromEntries(forced.map(({ target, value }) => [target, value])),
    })),
    null,
    2
  );
}
