import { TypeTag, SymbolRecord } from './symbol-table';

/**
 * Per-node semantic annotations. `type` is always present; the other
 * fields depend on the node kind.
 */
export interface Decoration {
  type: TypeTag;
  /** Name introduced by a declaration. */
  definition?: string;
  /** The declaration a name resolves to. */
  ref?: SymbolRecord;
  /** Set on a method name read off a list (`roster.agregar`). */
  methodOf?: string;
  callee?: string;
  argTypes?: TypeTag[];
  operator?: string;
  left?: TypeTag;
  right?: TypeTag;
  count?: number;
  complete?: boolean;
  scopeLevel?: number;
}

/**
 * Decorations stored in a flat array indexed by node id.
 * A node is decorated at most once per verification pass.
 */
export class DecorationTable {
  private slots: (Decoration | undefined)[] = [];

  set(id: number, decoration: Decoration): void {
    this.slots[id] = decoration;
  }

  get(id: number): Decoration | undefined {
    return this.slots[id];
  }

  has(id: number): boolean {
    return this.slots[id] !== undefined;
  }

  typeOf(id: number): TypeTag {
    return this.slots[id]?.type ?? 'unknown';
  }

  get size(): number {
    return this.entries().length;
  }

  entries(): [number, Decoration][] {
    const result: [number, Decoration][] = [];
    this.slots.forEach((decoration, id) => {
      if (decoration) result.push([id, decoration]);
    });
    return result;
  }

  toJSON(): Record<string, Decoration> {
    const out: Record<string, Decoration> = {};
    for (const [id, decoration] of this.entries()) {
      out[String(id)] = decoration;
    }
    return out;
  }
}
