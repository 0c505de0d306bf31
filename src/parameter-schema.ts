import { DuplicateParameterError, InvalidDeclarationError } from './errors.js';
import { ParameterDeclaration } from './types.js';

/**
 * Ordered, name-unique collection of parameter declarations.
 *
 * Instances are immutable: `declare` always builds a fresh schema and the
 * declarations it holds are frozen.
 */
export class ParameterSchema {
  readonly declarations: readonly ParameterDeclaration[];
  private readonly index: ReadonlyMap<string, ParameterDeclaration>;

  private constructor(
    declarations: ParameterDeclaration[],
    index: Map<string, ParameterDeclaration>,
    readonly label?: string
  ) {
    this.declarations = Object.freeze(declarations);
    this.index = index;
  }

  /**
   * Build a schema from a declaration table
   * @throws DuplicateParameterError if two declarations share a name (case-sensitive)
   * @throws InvalidDeclarationError if a name is empty
   */
  static declare(decls: Iterable<ParameterDeclaration>, label?: string): ParameterSchema {
    const declarations: ParameterDeclaration[] = [];
    const index = new Map<string, ParameterDeclaration>();

    for (const decl of decls) {
      if (decl.name.length === 0) {
        throw new InvalidDeclarationError('Parameter name must not be empty', label);
      }
      if (index.has(decl.name)) {
        throw new DuplicateParameterError(decl.name, [label ?? '<anonymous>']);
      }

      const frozen = Object.isFrozen(decl) ? decl : Object.freeze({ ...decl });
      declarations.push(frozen);
      index.set(frozen.name, frozen);
    }

    return new ParameterSchema(declarations, index, label);
  }

  /** Parameter names in declaration order */
  names(): ReadonlySet<string> {
    return new Set(this.index.keys());
  }

  lookup(name: string): ParameterDeclaration | undefined {
    return this.index.get(name);
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  get size(): number {
    return this.declarations.length;
  }
}
