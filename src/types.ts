import { z } from 'zod';

// ============================================
// Parameter Values and Declarations
// ============================================

export type ParameterValue = string | number | boolean;

/**
 * Marks a declaration without a default: the caller (or the composition)
 * must supply a value.
 */
export const REQUIRED: unique symbol = Symbol('REQUIRED');

export type RequiredMarker = typeof REQUIRED;

export interface ParameterDeclaration {
  readonly name: string;
  readonly default: ParameterValue | RequiredMarker;
  readonly description: string;
}

export function isRequired(declaration: ParameterDeclaration): boolean {
  return declaration.default === REQUIRED;
}

/**
 * Shorthand for the static declaration tables.
 * Omitting `default` declares a required parameter.
 */
export function param(
  name: string,
  description: string,
  defaultValue?: ParameterValue
): ParameterDeclaration {
  return Object.freeze({
    name,
    default: defaultValue === undefined ? REQUIRED : defaultValue,
    description,
  });
}

// ============================================
// Overrides and Bindings
// ============================================

/** Caller-supplied values, shared by every target of one run */
export type OverrideMap = ReadonlyMap<string, ParameterValue>;

/** Values a composition fixes for one target; beats OverrideMap */
export type ForcedOverrideMap = ReadonlyMap<string, ParameterValue>;

/** Effective value for every parameter of one target, in schema order */
export type ArgumentBinding = ReadonlyMap<string, ParameterValue>;

export type UnknownKeyPolicy = 'reject' | 'ignore';

export interface ResolveOptions {
  unknownKeys?: UnknownKeyPolicy;
}

// ============================================
// Targets and Compositions
// ============================================

export interface LaunchSpec {
  command: readonly string[];
}

export interface TargetSpec {
  name: string;
  description?: string;
  schemas: ReadonlyArray<import('./parameter-schema.js').ParameterSchema>;
  forced: ForcedOverrideMap;
  launch?: LaunchSpec;
}

export interface Composition {
  name: string;
  description?: string;
  targets: readonly TargetSpec[];
}

/**
 * One row of the parameter listing shown by `--help` and `params`
 */
export interface ParameterUsage {
  declaration: ParameterDeclaration;
  targets: string[];
  forced: Array<{ target: string; value: ParameterValue }>;
}

// ============================================
// Launching
// ============================================

export interface LaunchExit {
  target: string;
  exitCode: number;
  success: boolean;
}

export interface LaunchHandle {
  id: string;
  target: string;
  pid?: number;
  command: string[];
  exited: Promise<LaunchExit>;
  stop(): void;
}

// ============================================
// Composition File Schemas (YAML)
// ============================================

export const ParameterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const ParameterDeclarationFileSchema = z.object({
  name: z.string().min(1),
  default: ParameterValueSchema.optional(), // absent = required
  description: z.string().default(''),
});

export type ParameterDeclarationFile = z.infer<typeof ParameterDeclarationFileSchema>;

export const TargetFileSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  schemas: z.array(z.string()).min(1),
  forced: z.record(ParameterValueSchema).default({}),
  launch: z.object({
    command: z.array(z.string()).min(1),
  }).optional(),
});

export type TargetFile = z.infer<typeof TargetFileSchema>;

export const CompositionFileSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  schemas: z.record(z.array(ParameterDeclarationFileSchema)),
  targets: z.array(TargetFileSchema).min(1),
});

export type CompositionFile = z.infer<typeof CompositionFileSchema>;

// ============================================
// CLI Output
// ============================================

export enum OutputFormat {
  Text = 'text',    // Human-readable summary (default)
  Json = 'json',    // Structured JSON
  Raw = 'raw',      // One launch command line per target
}

export interface ComposeResult {
  schema_version: '1.0';
  composition: string;
  targets: Array<{
    name: string;
    command?: string[];
    arguments: Record<string, ParameterValue>;
  }>;
}

export interface LaunchResult {
  schema_version: '1.0';
  composition: string;
  dry_run: boolean;
  targets: Array<{
    name: string;
    id: string;
    pid?: number;
    command: string[];
  }>;
}

// ============================================
// CLI Options Types
// ============================================

export interface CompositionCommandOptions {
  composition?: string;
  allowUnknown?: boolean;
  format?: string;
  verbose?: boolean;
}

export interface LaunchCommandOptions extends CompositionCommandOptions {
  dryRun?: boolean;
}
