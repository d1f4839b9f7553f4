import * as AST from '../parser/ast';
import { Diagnostic, DiagnosticSink } from '../diagnostics';
import { SymbolTable, SymbolEntry, SymbolRecord, TableSnapshot, TypeTag, isEntityType, isListType } from './symbol-table';
import { DecorationTable, Decoration } from './decorations';
import { lookupBuiltin } from './builtins';

export interface VerifierOptions {
  trace?: boolean;
}

/** The symbol table as it stood right after one declaration. */
export interface TableStep {
  step: number;
  node: AST.NodeType;
  line: number;
  table: TableSnapshot;
}

export interface VerificationResult {
  decorations: DecorationTable;
  errors: Diagnostic[];
  table: SymbolTable;
  snapshots: TableStep[];
  trace: string[];
}

const ARITHMETIC = new Set(['+', '-', '*', '/', '%']);

/**
 * Resolve the type of a raw invocation argument: quoted text is a string,
 * digits are an int, a nested built-in call has its return type, and
 * anything else is looked up by name.
 */
export function resolveArgType(text: string, table: SymbolTable): TypeTag {
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) return 'string';
  if (/^[0-9]+$/.test(text)) return 'int';
  const call = /^([^\s(]+)\(/.exec(text);
  if (call) return lookupBuiltin(call[1])?.returns ?? 'unknown';
  return table.lookup(text)?.type ?? 'unknown';
}

function toRecord(entry: SymbolEntry): SymbolRecord {
  return { name: entry.name, type: entry.type, line: entry.line, scopeLevel: entry.scopeLevel };
}

/**
 * Mutable state of one verification pass.
 */
class VerifierContext {
  readonly table = new SymbolTable();
  readonly sink = new DiagnosticSink('semantic');
  readonly decorations = new DecorationTable();
  readonly snapshots: TableStep[] = [];
  readonly traceLog: string[] = [];
  /** Depth of enclosing syntax-error nodes; undeclared names are not reported inside them. */
  suppressed = 0;

  constructor(readonly traceEnabled: boolean) {}

  decorate(node: AST.Node, decoration: Decoration): void {
    this.decorations.set(node.id, decoration);
  }

  error(message: string, node: AST.Node): void {
    this.sink.report(message, node.position.line, node.position.column);
  }

  trace(message: string): void {
    if (this.traceEnabled) this.traceLog.push(message);
  }
}

export class Verifier {
  private ctx = new VerifierContext(false);

  constructor(private options: VerifierOptions = {}) {}

  verify(program: AST.Program): VerificationResult {
    this.ctx = new VerifierContext(this.options.trace ?? false);
    this.visit(program, [], 0);
    return {
      decorations: this.ctx.decorations,
      errors: this.ctx.sink.toArray(),
      table: this.ctx.table,
      snapshots: this.ctx.snapshots,
      trace: [...this.ctx.traceLog],
    };
  }

  // ─── Dispatch ──────────────────────────────────────────

  private visit(node: AST.Node, siblings: readonly AST.Node[], index: number): void {
    switch (node.type) {
      case 'Program':
      case 'Else':
        this.visitChildren(node);
        return;

      case 'Comment':
      case 'Close':
      case 'Symbol':
      case 'Tie':
      case 'ResultExtra':
      case 'Unknown':
        return;

      case 'AthleteDecl':
        this.verifyAthleteDecl(node);
        return;
      case 'ListDecl':
        this.verifyListDecl(node);
        return;
      case 'BulkLoad':
        this.ctx.decorate(node, { type: `list:${node.attributes.elementType}`, count: node.attributes.count });
        this.recordSnapshot(node);
        return;

      case 'Conditional':
      case 'Loop':
      case 'LoopUntil':
        this.verifyScoped(node);
        return;

      case 'Condition': {
        this.visitChildren(node);
        const expr = node.children[0];
        this.ctx.decorate(node, { type: expr ? this.ctx.decorations.typeOf(expr.id) : 'unknown' });
        return;
      }

      case 'Invocation':
      case 'Narrate':
      case 'Direct':
        this.verifyCall(node);
        return;

      case 'BinaryOp':
        this.verifyBinary(node);
        return;
      case 'UnaryOp': {
        this.visitChildren(node);
        const operand = node.children[0];
        const type = operand && this.ctx.decorations.typeOf(operand.id) === 'int' ? 'int' : 'unknown';
        this.ctx.decorate(node, { type, operator: node.attributes.operator });
        return;
      }

      case 'Number':
        this.ctx.decorate(node, { type: 'int' });
        return;
      case 'Text':
        this.ctx.decorate(node, { type: 'string' });
        return;

      case 'Name':
        this.resolveName(node, node.attributes.name);
        return;
      case 'Identifier':
        if (this.resolveMethod(node, siblings, index)) return;
        this.resolveName(node, node.attributes.name);
        return;

      case 'Match':
      case 'Race':
      case 'Routine':
      case 'Combat':
        this.verifyCompetition(node);
        return;

      case 'Result':
        this.verifyResult(node, null);
        return;

      case 'ActionStub':
        this.visitChildren(node);
        this.ctx.decorate(node, { type: 'void' });
        return;

      case 'SyntaxErrorNode':
        this.ctx.suppressed++;
        this.visitChildren(node);
        this.ctx.suppressed--;
        return;

      default: {
        const unhandled: never = node;
        throw new Error(`Unhandled node kind: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private visitChildren(node: AST.Node): void {
    node.children.forEach((child, i) => this.visit(child, node.children, i));
  }

  // ─── Declarations ──────────────────────────────────────

  private verifyAthleteDecl(node: AST.AthleteDecl): void {
    const { name } = node.attributes;
    this.declare(node, name, 'entity:Deportista');
    this.ctx.decorate(node, { type: 'entity:Deportista', definition: name });
    this.recordSnapshot(node);
  }

  private verifyListDecl(node: AST.ListDecl): void {
    const { name, elementType } = node.attributes;
    const type: TypeTag = `list:${elementType ?? 'unknown'}`;
    if (name) {
      this.declare(node, name, type);
      this.ctx.decorate(node, { type, definition: name });
    } else {
      this.ctx.decorate(node, { type });
    }
    this.recordSnapshot(node);
  }

  private declare(node: AST.Node, name: string, type: TypeTag): void {
    const error = this.ctx.table.declare(name, type, node, node.position.line);
    if (error) {
      this.ctx.error(error, node);
      return;
    }
    this.ctx.trace(`Declare '${name}' as ${type} at level ${this.ctx.table.currentLevel()}`);
  }

  private recordSnapshot(node: AST.Node): void {
    this.ctx.snapshots.push({
      step: this.ctx.snapshots.length + 1,
      node: node.type,
      line: node.position.line,
      table: this.ctx.table.snapshot(),
    });
  }

  // ─── Scopes ────────────────────────────────────────────

  private verifyScoped(node: AST.Conditional | AST.Loop | AST.LoopUntil): void {
    const level = this.ctx.table.enterScope();
    this.ctx.trace(`Enter scope -> level ${level} (${node.type} at line ${node.position.line})`);

    this.visitChildren(node);

    const decoration: Decoration = { type: 'void', scopeLevel: level };
    if (node.type === 'Loop' && node.attributes.count !== null) decoration.count = node.attributes.count;
    this.ctx.decorate(node, decoration);

    const back = this.ctx.table.exitScope();
    this.ctx.trace(`Exit scope -> level ${back}`);
  }

  // ─── Names ─────────────────────────────────────────────

  private resolveName(node: AST.Name | AST.Identifier, name: string): void {
    const entry = this.ctx.table.lookup(name);
    if (entry) {
      this.ctx.decorate(node, { type: entry.type, ref: toRecord(entry) });
      return;
    }
    if (this.ctx.suppressed === 0) {
      this.ctx.error(`Identifier '${name}' used before being declared`, node);
    }
    this.ctx.decorate(node, { type: 'unknown' });
  }

  /**
   * `roster . agregar`: a name read off a list is a method reference,
   * not a variable.
   */
  private resolveMethod(node: AST.Identifier, siblings: readonly AST.Node[], index: number): boolean {
    const dot = siblings[index - 1];
    const target = siblings[index - 2];
    if (!dot || !target || dot.type !== 'Symbol' || dot.content !== '.' || target.type !== 'Identifier') {
      return false;
    }
    const entry = this.ctx.table.lookup(target.attributes.name);
    if (!entry || !isListType(entry.type)) return false;

    this.ctx.decorate(node, { type: 'unknown', methodOf: entry.name, ref: toRecord(entry) });
    return true;
  }

  // ─── Invocations ───────────────────────────────────────

  private verifyCall(node: AST.CallNode): void {
    const { callee, args } = node.attributes;
    const builtin = lookupBuiltin(callee);
    const argTypes = args.map(arg => resolveArgType(arg.text, this.ctx.table));

    if (builtin && builtin.arity !== null && args.length !== builtin.arity) {
      const noun = builtin.arity === 1 ? 'argument' : 'arguments';
      this.ctx.error(`${builtin.name} expects ${builtin.arity} ${noun} but got ${args.length}`, node);
    }

    if (builtin && builtin.entityArgs) {
      argTypes.forEach((type, i) => {
        if (!isEntityType(type)) {
          this.ctx.error(`Argument ${i + 1} of ${builtin.name} must be an entity, found '${type}'`, node);
        }
      });
    }

    // Unknown callees get the same declare-before-use check as narrar
    if ((!builtin || builtin.checksDeclared) && this.ctx.suppressed === 0) {
      args.forEach((arg, i) => {
        if (arg.kind === 'identifier' && argTypes[i] === 'unknown') {
          this.ctx.error(`Identifier '${arg.text}' used before being declared`, node);
        }
      });
    }

    this.ctx.decorate(node, { type: builtin ? builtin.returns : 'unknown', callee, argTypes });
  }

  // ─── Expressions ───────────────────────────────────────

  /** Types a whole left-leaning chain in one loop, innermost operator first. */
  private verifyBinary(node: AST.BinaryOp): void {
    const { operators, first } = AST.leftSpine(node);
    const innermost = operators[0];
    if (first && innermost) this.visit(first, innermost.children, 0);

    for (const op of operators) {
      const [left, right] = op.children;
      if (right) this.visit(right, op.children, 1);
      this.typeBinary(op, left, right);
    }
  }

  private typeBinary(node: AST.BinaryOp, left: AST.Node | undefined, right: AST.Node | undefined): void {
    const l = left ? this.ctx.decorations.typeOf(left.id) : 'unknown';
    const r = right ? this.ctx.decorations.typeOf(right.id) : 'unknown';
    const op = node.attributes.operator;

    let type: TypeTag = 'unknown';
    if (ARITHMETIC.has(op) && l === 'int' && r === 'int') {
      type = 'int';
    } else if (op === '+' && l === 'string' && r === 'string') {
      type = 'string';
    } else if (op === '+' && ((l === 'string' && r === 'int') || (l === 'int' && r === 'string'))) {
      this.ctx.error('Cannot add text and number', node);
    }

    this.ctx.decorate(node, { type, operator: op, left: l, right: r });
  }

  // ─── Competitions ──────────────────────────────────────

  private verifyCompetition(node: AST.Competition): void {
    const label = node.type;
    let endpoints = true;

    if (node.type === 'Match') {
      if (!node.attributes.home) {
        this.ctx.error('Match is missing its first country', node);
        endpoints = false;
      }
      if (!node.attributes.away) {
        this.ctx.error('Match is missing its second country', node);
        endpoints = false;
      }
    }

    let results = 0;
    let complete = true;
    node.children.forEach((child, i) => {
      if (child.type === 'Result') {
        results++;
        complete = this.verifyResult(child, label) && complete;
      } else {
        this.visit(child, node.children, i);
      }
    });

    if (results === 0) {
      this.ctx.error(`${label} has no result`, node);
    } else if (results > 1) {
      this.ctx.error(`${label} has more than one result`, node);
    }

    if (!node.attributes.closed) {
      this.ctx.error(`${label} is missing its closing keyword '${node.attributes.terminator}'`, node);
    }

    this.ctx.decorate(node, {
      type: 'void',
      complete: endpoints && results === 1 && complete && node.attributes.closed,
    });
  }

  /** Returns whether both scores are present. */
  private verifyResult(node: AST.Result, competition: string | null): boolean {
    const slots: [string, number | null][] = [
      ['first', node.attributes.first],
      ['second', node.attributes.second],
    ];
    let complete = true;
    for (const [slot, value] of slots) {
      if (value !== null) continue;
      complete = false;
      this.ctx.error(
        competition
          ? `Incomplete result in ${competition}: missing ${slot} number`
          : `Result is missing its ${slot} number`,
        node,
      );
    }
    this.ctx.decorate(node, { type: 'void', complete });
    return complete;
  }
}
