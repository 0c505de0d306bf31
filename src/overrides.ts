import { InvalidOverrideError } from './errors.js';
import { OverrideMap, ParameterDeclaration, ParameterValue, REQUIRED } from './types.js';

/**
 * Override as typed by the user, before coercion
 */
export interface RawOverride {
  name: string;
  value: string;
  origin: 'cli' | 'env';
}

const NAME_PATTERN = /^[A-Za-z_][\w.-]*$/;

/**
 * Parse override tokens from the command line.
 *
 * Accepted forms:
 *   --name=value   --name value   name:=value   name=value
 *
 * A bare `--` separator is skipped.
 *
 * @throws Error for a token in none of these forms
 */
export function parseOverrideArgs(tokens: readonly string[]): RawOverride[] {
  const overrides: RawOverride[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';

    // Option parsing may hand the `--` separator through with the overrides
    if (token === '--') continue;

    // --name=value or --name value
    if (token.startsWith('--')) {
      const body = token.slice(2);
      const eq = body.indexOf('=');

      if (eq >= 0) {
        overrides.push({ name: checkName(body.slice(0, eq), token), value: body.slice(eq + 1), origin: 'cli' });
        continue;
      }

      const next = tokens[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`Missing value for override '${token}'`);
      }
      overrides.push({ name: checkName(body, token), value: next, origin: 'cli' });
      i++;
      continue;
    }

    // name:=value, as launch files take it
    const assign = token.indexOf(':=');
    if (assign > 0) {
      overrides.push({ name: checkName(token.slice(0, assign), token), value: token.slice(assign + 2), origin: 'cli' });
      continue;
    }

    // name=value
    const eq = token.indexOf('=');
    if (eq > 0) {
      overrides.push({ name: checkName(token.slice(0, eq), token), value: token.slice(eq + 1), origin: 'cli' });
      continue;
    }

    throw new Error(`Unrecognized override '${token}' (expected --name=value or name:=value)`);
  }

  return overrides;
}

function checkName(name: string, token: string): string {
  if (!NAME_PATTERN.test(name)) {
    throw new Error(`Invalid parameter name in '${token}'`);
  }
  return name;
}

/**
 * Read overrides from `<prefix><NAME>` environment variables.
 * BRINGUP_ARG_ROBOT_IP=192.0.2.5 sets `robot_ip`.
 */
export function overridesFromEnv(
  env: NodeJS.ProcessEnv,
  prefix: string
): RawOverride[] {
  const overrides: RawOverride[] = [];

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(prefix) || key.length === prefix.length || value === undefined) {
      continue;
    }
    overrides.push({ name: key.slice(prefix.length).toLowerCase(), value, origin: 'env' });
  }

  return overrides;
}

/**
 * Convert a raw string to the type of the declaration's default.
 * Required declarations and string defaults keep the string.
 */
export function coerceValue(
  raw: string,
  declaration: ParameterDeclaration | undefined
): ParameterValue {
  const sample = declaration?.default;
  if (declaration === undefined || sample === REQUIRED || typeof sample === 'string') {
    return raw;
  }

  if (typeof sample === 'boolean') {
    const lowered = raw.toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
    throw new InvalidOverrideError(declaration.name, raw, 'true or false');
  }

  const parsed = Number(raw);
  if (raw.trim().length === 0 || Number.isNaN(parsed)) {
    throw new InvalidOverrideError(declaration.name, raw, 'a number');
  }
  return parsed;
}

/**
 * Build the OverrideMap for a run. Later sources win, so pass the
 * environment before the command line.
 *
 * @param lookup - Finds the declaration a name refers to (undefined for unknown names)
 */
export function buildOverrideMap(
  sources: ReadonlyArray<readonly RawOverride[]>,
  lookup: (name: string) => ParameterDeclaration | undefined
): OverrideMap {
  const overrides = new Map<string, ParameterValue>();

  for (const source of sources) {
    for (const { name, value } of source) {
      overrides.set(name, coerceValue(value, lookup(name)));
    }
  }

  return overrides;
}
