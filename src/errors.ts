/**
 * Error taxonomy for the composition engine.
 *
 * DuplicateParameterError and InvalidDeclarationError point at a static
 * configuration bug. MissingRequiredParameterError and UnknownParameterError
 * are raised while resolving and are fixed by the caller's overrides.
 * CompositionError attributes any of them to the target being assembled.
 */

export type ErrorKind =
  | 'DuplicateParameter'
  | 'InvalidDeclaration'
  | 'MissingRequiredParameter'
  | 'UnknownParameter'
  | 'InvalidOverride'
  | 'Composition'
  | 'Launch'
  | 'CompositionFile';

export abstract class CompositionEngineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public hint?: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateParameterError extends CompositionEngineError {
  readonly kind = 'DuplicateParameter' as const;

  constructor(
    public readonly parameter: string,
    public readonly sourceSchemas: string[]
  ) {
    super(
      sourceSchemas.length > 1
        ? `Parameter '${parameter}' is declared by more than one schema: ${sourceSchemas.join(', ')}`
        : `Parameter '${parameter}' is declared twice in schema '${sourceSchemas[0] ?? '<anonymous>'}'`,
      'Rename one declaration; use forced overrides to change a value instead of redeclaring it'
    );
  }
}

export class InvalidDeclarationError extends CompositionEngineError {
  readonly kind = 'InvalidDeclaration' as const;

  constructor(message: string, public readonly schema?: string) {
    super(schema ? `${message} (schema '${schema}')` : message);
  }
}

export class MissingRequiredParameterError extends CompositionEngineError {
  readonly kind = 'MissingRequiredParameter' as const;

  constructor(public readonly parameter: string) {
    super(
      `Required parameter '${parameter}' has no value`,
      `Pass --${parameter}=<value>`
    );
  }
}

export type UnknownKeySource = 'override' | 'forced';

export class UnknownParameterError extends CompositionEngineError {
  readonly kind = 'UnknownParameter' as const;

  constructor(
    public readonly parameter: string,
    public readonly source: UnknownKeySource
  ) {
    super(
      source === 'forced'
        ? `Forced override '${parameter}' does not match any declared parameter`
        : `Unknown parameter '${parameter}'`,
      source === 'forced'
        ? 'Declare the parameter in one of the target\'s schemas'
        : 'Run with --help to list declared parameters, or pass --allow-unknown to ignore it'
    );
  }
}

export class InvalidOverrideError extends CompositionEngineError {
  readonly kind = 'InvalidOverride' as const;

  constructor(
    public readonly parameter: string,
    public readonly raw: string,
    expected: string
  ) {
    super(`Invalid value '${raw}' for parameter '${parameter}': expected ${expected}`);
  }
}

export class CompositionError extends CompositionEngineError {
  readonly kind = 'Composition' as const;

  constructor(
    public readonly target: string,
    public readonly cause: Error
  ) {
    super(
      `Target '${target}' failed: ${cause.message}`,
      cause instanceof CompositionEngineError ? cause.hint : undefined
    );
  }
}

export class LaunchError extends CompositionEngineError {
  readonly kind = 'Launch' as const;

  constructor(message: string, public readonly target: string) {
    super(message);
  }
}

export class CompositionFileError extends CompositionEngineError {
  readonly kind = 'CompositionFile' as const;

  constructor(message: string, public readonly file: string) {
    super(message);
  }
}

/**
 * Flatten an error into the fields the CLI prints
 */
export function describeError(error: unknown): {
  kind: string;
  message: string;
  parameter?: string;
  target?: string;
  hint?: string;
} {
  if (error instanceof CompositionError) {
    const inner = describeError(error.cause);
    return {
      ...inner,
      target: error.target,
      hint: error.hint ?? inner.hint,
    };
  }

  if (error instanceof CompositionEngineError) {
    const parameter =
      error instanceof DuplicateParameterError ||
      error instanceof MissingRequiredParameterError ||
      error instanceof UnknownParameterError ||
      error instanceof InvalidOverrideError
        ? error.parameter
        : undefined;

    return {
      kind: error.kind,
      message: error.message,
      parameter,
      target: error instanceof LaunchError ? error.target : undefined,
      hint: error.hint,
    };
  }

  if (error instanceof Error) {
    return { kind: error.name, message: error.message };
  }

  return { kind: 'Error', message: String(error) };
}
