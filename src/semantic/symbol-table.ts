import * as AST from '../parser/ast';

/**
 * Type tags carried by symbols and decorations. Entities and lists are
 * parameterised by their category (`entity:Deportista`, `list:Deportista`).
 */
export type TypeTag = 'int' | 'string' | 'void' | 'unknown' | `entity:${string}` | `list:${string}`;

export interface SymbolEntry {
  name: string;
  type: TypeTag;
  node: AST.Node;
  line: number;
  scopeLevel: number;
}

export interface SymbolRecord {
  name: string;
  type: TypeTag;
  line: number;
  scopeLevel: number;
}

/** `scope_<level>` → name → record, in declaration order. */
export type TableSnapshot = Record<string, Record<string, SymbolRecord>>;

export function isEntityType(type: TypeTag): type is `entity:${string}` {
  return type.startsWith('entity:');
}

export function isListType(type: TypeTag): type is `list:${string}` {
  return type.startsWith('list:');
}

/**
 * Stack of lexical scopes. The global scope (level 0) is created with the
 * table and can never be exited.
 */
export class SymbolTable {
  private scopes: Map<string, SymbolEntry>[] = [new Map()];

  enterScope(): number {
    this.scopes.push(new Map());
    return this.currentLevel();
  }

  exitScope(): number {
    if (this.scopes.length > 1) this.scopes.pop();
    return this.currentLevel();
  }

  currentLevel(): number {
    return this.scopes.length - 1;
  }

  /**
   * Declare `name` in the innermost scope. Returns an error message when
   * the name already exists in that same scope; shadowing is allowed.
   */
  declare(name: string, type: TypeTag, node: AST.Node, line: number): string | null {
    const scope = this.scopes[this.scopes.length - 1];
    if (scope.has(name)) {
      return `Duplicate declaration: '${name}' already exists in the current scope (level ${this.currentLevel()})`;
    }
    scope.set(name, { name, type, node, line, scopeLevel: this.currentLevel() });
    return null;
  }

  lookup(name: string): SymbolEntry | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const entry = this.scopes[i].get(name);
      if (entry) return entry;
    }
    return undefined;
  }

  snapshot(): TableSnapshot {
    const result: TableSnapshot = {};
    this.scopes.forEach((scope, level) => {
      const records: Record<string, SymbolRecord> = {};
      for (const entry of scope.values()) {
        records[entry.name] = {
          name: entry.name,
          type: entry.type,
          line: entry.line,
          scopeLevel: entry.scopeLevel,
        };
      }
      result[`scope_${level}`] = records;
    });
    return result;
  }

  toString(): string {
    const lines: string[] = [];
    this.scopes.forEach((scope, level) => {
      lines.push(`Scope ${level}:`);
      if (scope.size === 0) {
        lines.push('  (empty)');
        return;
      }
      for (const entry of scope.values()) {
        lines.push(`  ${entry.name}: ${entry.type} (line ${entry.line})`);
      }
    });
    return lines.join('\n');
  }
}
