import { DuplicateParameterError } from './errors.js';
import { ParameterSchema } from './parameter-schema.js';
import { ParameterDeclaration } from './types.js';

/**
 * Combine schemas into one, in input order.
 *
 * Merging composes disjoint namespaces: a name declared by more than one
 * input is always a DuplicateParameterError, never a shadowing. Changing an
 * effective value is the job of overrides.
 *
 * @param schemas - Schemas to concatenate
 * @param label - Label of the merged schema (used in later error messages)
 */
export function mergeSchemas(
  schemas: readonly ParameterSchema[],
  label?: string
): ParameterSchema {
  const owners = new Map<string, string>();
  const declarations: ParameterDeclaration[] = [];

  schemas.forEach((schema, position) => {
    const source = schema.label ?? `schema #${position}`;

    for (const decl of schema.declarations) {
      const owner = owners.get(decl.name);
      if (owner !== undefined) {
        throw new DuplicateParameterError(decl.name, [owner, source]);
      }
      owners.set(decl.name, source);
      declarations.push(decl);
    }
  });

  return ParameterSchema.declare(
    declarations,
    label ?? schemas.map((schema, position) => schema.label ?? `schema #${position}`).join('+')
  );
}
