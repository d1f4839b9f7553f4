import { Diagnostic } from '../diagnostics';

export type Node =
  | Program
  | Comment
  | AthleteDecl
  | ListDecl
  | BulkLoad
  | Conditional
  | Condition
  | Else
  | Loop
  | LoopUntil
  | Close
  | Invocation
  | Narrate
  | Direct
  | BinaryOp
  | UnaryOp
  | NumberLiteral
  | TextLiteral
  | Name
  | Identifier
  | SymbolNode
  | Match
  | Race
  | Routine
  | Combat
  | Result
  | ResultExtra
  | Tie
  | ActionStub
  | SyntaxErrorNode
  | Unknown;

export type NodeType = Node['type'];

export interface Position {
  line: number;
  column: number;
}

/**
 * Fields shared by every node. `id` is the node's index in creation order
 * within one parse, so side tables can be plain arrays indexed by it.
 * `children` are owned exclusively by the node.
 */
export interface BaseNode {
  id: number;
  content: string;
  position: Position;
  children: Node[];
}

export interface Program extends BaseNode {
  type: 'Program';
  attributes: Record<string, never>;
  diagnostics: Diagnostic[];
  nodeCount: number;
}

export interface Comment extends BaseNode {
  type: 'Comment';
  attributes: { text: string };
}

export type AthleteRecord = {
  name: string;
  stats: number[];
  sport: string;
  country: string;
};

export interface AthleteDecl extends BaseNode {
  type: 'AthleteDecl';
  attributes: AthleteRecord;
}

export interface ListDecl extends BaseNode {
  type: 'ListDecl';
  attributes: { elementType: string | null; name: string | null };
}

export interface BulkLoad extends BaseNode {
  type: 'BulkLoad';
  attributes: { elementType: string; athletes: AthleteRecord[]; count: number };
}

/** Children: the `Condition` (when one was parsed), the body, then an optional `Else`. */
export interface Conditional extends BaseNode {
  type: 'Conditional';
  attributes: { hasElse: boolean };
}

export interface Condition extends BaseNode {
  type: 'Condition';
  attributes: Record<string, never>;
}

export interface Else extends BaseNode {
  type: 'Else';
  attributes: Record<string, never>;
}

export interface Loop extends BaseNode {
  type: 'Loop';
  attributes: { count: number | null };
}

export interface LoopUntil extends BaseNode {
  type: 'LoopUntil';
  attributes: Record<string, never>;
}

/** A block closer or competition terminator found with nothing to close. */
export interface Close extends BaseNode {
  type: 'Close';
  attributes: { keyword: string };
}

export type ArgKind = 'identifier' | 'integer' | 'string' | 'call' | 'other';

export type InvocationArg = {
  text: string;
  kind: ArgKind;
};

export type CallAttributes = {
  callee: string;
  args: InvocationArg[];
  closed: boolean;
};

export interface Invocation extends BaseNode {
  type: 'Invocation';
  attributes: CallAttributes;
}

export interface Narrate extends BaseNode {
  type: 'Narrate';
  attributes: CallAttributes;
}

export interface Direct extends BaseNode {
  type: 'Direct';
  attributes: CallAttributes;
}

export type CallNode = Invocation | Narrate | Direct;

export interface BinaryOp extends BaseNode {
  type: 'BinaryOp';
  attributes: { operator: string };
}

export interface UnaryOp extends BaseNode {
  type: 'UnaryOp';
  attributes: { operator: string };
}

export interface NumberLiteral extends BaseNode {
  type: 'Number';
  attributes: { value: number };
}

export interface TextLiteral extends BaseNode {
  type: 'Text';
  attributes: { value: string };
}

/** A name read inside an expression. */
export interface Name extends BaseNode {
  type: 'Name';
  attributes: { name: string };
}

/** A bare identifier standing on its own as a command. */
export interface Identifier extends BaseNode {
  type: 'Identifier';
  attributes: { name: string };
}

export interface SymbolNode extends BaseNode {
  type: 'Symbol';
  attributes: { symbol: string };
}

export type CompetitionAttributes = {
  opener: string;
  terminator: string;
  closed: boolean;
  tie: boolean;
};

export interface Match extends BaseNode {
  type: 'Match';
  attributes: CompetitionAttributes & { home: string; away: string | null };
}

export interface Race extends BaseNode {
  type: 'Race';
  attributes: CompetitionAttributes;
}

export interface Routine extends BaseNode {
  type: 'Routine';
  attributes: CompetitionAttributes;
}

export interface Combat extends BaseNode {
  type: 'Combat';
  attributes: CompetitionAttributes;
}

export type Competition = Match | Race | Routine | Combat;

export interface Result extends BaseNode {
  type: 'Result';
  attributes: { first: number | null; second: number | null };
}

export interface ResultExtra extends BaseNode {
  type: 'ResultExtra';
  attributes: { marker: string };
}

export interface Tie extends BaseNode {
  type: 'Tie';
  attributes: Record<string, never>;
}

/** A domain keyword without dedicated grammar, holding the commands it swallowed. */
export interface ActionStub extends BaseNode {
  type: 'ActionStub';
  attributes: { keyword: string; terminatedBy: string | null };
}

export interface SyntaxErrorNode extends BaseNode {
  type: 'SyntaxErrorNode';
  attributes: { construct: string; reason: string };
}

export interface Unknown extends BaseNode {
  type: 'Unknown';
  attributes: { tokenType: string };
}

/**
 * Visit `node` and its descendants in pre-order. Iterative, so a long
 * operator chain cannot exhaust the call stack.
 */
export function walk(node: Node, visit: (node: Node, depth: number) => void): void {
  const pending: [Node, number][] = [[node, 0]];
  for (let item = pending.pop(); item; item = pending.pop()) {
    const [current, depth] = item;
    visit(current, depth);
    for (let i = current.children.length - 1; i >= 0; i--) {
      pending.push([current.children[i], depth + 1]);
    }
  }
}

/**
 * The operator nodes along the left edge of a chain such as `a + b - c`,
 * innermost first, and the operand the chain starts from.
 */
export function leftSpine(node: BinaryOp): { operators: BinaryOp[]; first: Node | undefined } {
  const operators: BinaryOp[] = [];
  let current: Node | undefined = node;
  while (current && current.type === 'BinaryOp') {
    operators.push(current);
    current = current.children[0];
  }
  return { operators: operators.reverse(), first: current };
}

/**
 * Render an expression subtree back to source-like text.
 */
export function renderExpression(node: Node): string {
  switch (node.type) {
    case 'Number':
      return String(node.attributes.value);
    case 'Name':
      return node.attributes.name;
    case 'Text':
      return node.content;
    case 'BinaryOp': {
      const { operators, first } = leftSpine(node);
      const parts = first ? [renderExpression(first)] : [];
      for (const op of operators) {
        const right = op.children[1];
        parts.push(op.attributes.operator);
        if (right) parts.push(renderExpression(right));
      }
      return parts.join(' ');
    }
    case 'UnaryOp':
      return node.attributes.operator + node.children.map(renderExpression).join('');
    case 'Invocation':
    case 'Narrate':
    case 'Direct':
      return `${node.content}${node.attributes.args.map(a => a.text).join(', ')}${node.attributes.closed ? ')' : ''}`;
    default:
      return node.content;
  }
}
