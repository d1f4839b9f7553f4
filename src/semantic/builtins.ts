import { TypeTag } from './symbol-table';

/**
 * Signature of a built-in invocation. `arity` is null for variadic
 * built-ins; `entityArgs` requires every argument to be an entity.
 */
export interface BuiltinSignature {
  name: string;
  arity: number | null;
  entityArgs: boolean;
  returns: TypeTag;
  /** Bare identifier arguments must resolve to a declaration. */
  checksDeclared: boolean;
}

/**
 * Built-ins available in every program without declaration, keyed by
 * their lower-cased name (`Comparar(` and `comparar(` are the same call).
 */
export const BUILTINS: ReadonlyMap<string, BuiltinSignature> = new Map<string, BuiltinSignature>([
  ['comparar', { name: 'comparar', arity: 2, entityArgs: true, returns: 'int', checksDeclared: false }],
  ['narrar', { name: 'narrar', arity: null, entityArgs: false, returns: 'void', checksDeclared: true }],
  ['input', { name: 'input', arity: 1, entityArgs: false, returns: 'void', checksDeclared: false }],
]);

export function lookupBuiltin(callee: string): BuiltinSignature | undefined {
  return BUILTINS.get(callee.toLowerCase());
}

