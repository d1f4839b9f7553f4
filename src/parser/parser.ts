import { Token, TokenType } from '../lexer/tokens';
import { DiagnosticSink, Severity } from '../diagnostics';
import { TokenCursor } from './cursor';
import * as AST from './ast';

/** Hard bound on tokens skipped by one `synchronize()` before the rest of the stream is dropped. */
export const DEFAULT_MAX_RECOVERY_STEPS = 500;

/** Blocks, parentheses, signs and nested calls one inside another before the parser stops descending. */
export const DEFAULT_MAX_DEPTH = 200;

export interface ParserOptions {
  maxRecoverySteps?: number;
  maxDepth?: number;
  trace?: boolean;
}

type CompetitionType = 'Race' | 'Routine' | 'Combat';

interface CompetitionForm {
  type: CompetitionType;
  terminator: string;
}

const COMPETITION_OPENERS = new Map<string, CompetitionForm>([
  ['iniciocarrera', { type: 'Race', terminator: 'finCarr' }],
  ['iniciorutina', { type: 'Routine', terminator: 'finRuti' }],
  ['iniciocombate', { type: 'Combat', terminator: 'finComb' }],
]);

const MATCH_TERMINATOR = 'finact';

const TERMINATORS = new Set(['finact', 'fincarr', 'finruti', 'fincomb', 'finprep']);

/** Stubs that close themselves with a keyword of their own. */
const STUB_TERMINATORS = new Map<string, string>([['preparacion', 'finprep']]);

const BLOCK_END_WORDS = new Set(['sino', 'endif', 'finrep', 'finrephasta', 'finrephast']);
const LOOP_UNTIL_TERMINATORS = ['FinRepHasta', 'FinRepHast'];
const OPENERS = new Set(['{', '[', '(']);
const CLOSERS = new Set(['}', ']', ')']);
/** Keywords that close a skipped construct right after its last bracket. */
const SKIP_TRAILERS = new Set(['endif', 'finrep', 'finrephasta', 'finrephast']);
const BOUNDARY_WORDS = new Set(['resultado', 'listares', 'empate']);

export class Parser {
  private cursor = new TokenCursor([]);
  private diagnostics = new DiagnosticSink('syntax', true);
  private nextId = 0;
  private depth = 0;
  private maxRecoverySteps: number;
  private maxDepth: number;
  private traceEnabled: boolean;
  private traceLog: string[] = [];

  constructor(options: ParserOptions = {}) {
    this.maxRecoverySteps = options.maxRecoverySteps ?? DEFAULT_MAX_RECOVERY_STEPS;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.traceEnabled = options.trace ?? false;
  }

  parse(tokens: readonly Token[]): AST.Program {
    this.cursor = new TokenCursor(tokens);
    this.diagnostics = new DiagnosticSink('syntax', true);
    this.nextId = 0;
    this.depth = 0;
    this.traceLog = [];

    const program: AST.Program = {
      type: 'Program',
      id: this.newId(),
      content: 'root',
      position: { line: 1, column: 1 },
      children: [],
      attributes: {},
      diagnostics: [],
      nodeCount: 0,
    };

    while (!this.cursor.atEnd()) {
      const start = this.cursor.position;
      const node = this.parseCommand();
      if (node) program.children.push(node);
      if (this.cursor.position === start) this.cursor.advance();
    }

    program.diagnostics = this.diagnostics.toArray();
    program.nodeCount = this.nextId;
    return program;
  }

  /** Trace lines from the last `parse()` call (empty unless tracing is on). */
  getTrace(): string[] {
    return [...this.traceLog];
  }

  // ─── Commands ──────────────────────────────────────────

  private parseCommand(): AST.Node | null {
    const tok = this.cursor.peek();
    if (!tok) return null;
    const word = lower(tok);

    switch (tok.type) {
      case TokenType.COMMENT:
        this.cursor.advance();
        return { type: 'Comment', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: { text: tok.value } };

      case TokenType.ENTITY_DECLARATION:
        return word === 'deportista' ? this.parseAthleteDecl() : this.parseListOrBulkLoad();

      case TokenType.CONTROL_FLOW:
        if (word === 'si') return this.nested(() => this.parseConditional());
        if (word === 'repetir') return this.nested(() => this.parseLoop());
        if (word === 'repetirhasta') return this.nested(() => this.parseLoopUntil());
        return this.parseStrayClose();

      case TokenType.FUNCTION_INVOCATION:
        return this.parseCall();

      case TokenType.DOMAIN_KEYWORD: {
        const form = COMPETITION_OPENERS.get(word);
        if (form) return this.nested(() => this.parseCompetition(form));
        if (TERMINATORS.has(word)) return this.parseStrayClose();
        return this.nested(() => this.parseActionStub());
      }

      case TokenType.DOMAIN_TYPE:
        if (word === 'resultado') return this.parseResult();
        return this.parseUnknown();

      case TokenType.RESULT_MARKER:
        return this.parseResultExtra();

      case TokenType.TIE_MARKER:
        return this.parseTie();

      case TokenType.IDENTIFIER:
        if (this.startsMatch()) return this.nested(() => this.parseMatch());
        this.cursor.advance();
        return this.identifierNode(tok);

      case TokenType.PUNCTUATION:
        this.cursor.advance();
        return { type: 'Symbol', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: { symbol: tok.value } };

      default:
        return this.parseUnknown();
    }
  }

  private parseCommands(): AST.Node[] {
    const body: AST.Node[] = [];
    for (let tok = this.cursor.peek(); tok && !this.isBlockEnd(tok); tok = this.cursor.peek()) {
      const start = this.cursor.position;
      const node = this.parseCommand();
      if (node) body.push(node);
      if (this.cursor.position === start) break;
    }
    return body;
  }

  private parseStrayClose(): AST.Close {
    const tok = this.advance();
    this.report(`Unexpected '${tok.value}' with nothing to close`, tok);
    return { type: 'Close', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: { keyword: tok.value } };
  }

  private parseUnknown(): AST.Unknown {
    const tok = this.advance();
    return { type: 'Unknown', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: { tokenType: tok.type } };
  }

  // ─── Declarations ──────────────────────────────────────

  private parseAthleteDecl(): AST.AthleteDecl | AST.SyntaxErrorNode {
    const declTok = this.advance();
    const consumed: Token[] = [];
    let missing: string | null = null;

    const name = this.take(TokenType.IDENTIFIER);
    if (name) consumed.push(name);
    else missing = 'an athlete name';

    const stats: number[] = [];
    for (let i = 0; i < 3 && missing === null; i++) {
      const stat = this.take(TokenType.INTEGER);
      if (stat) {
        consumed.push(stat);
        stats.push(parseInt(stat.value, 10));
      } else {
        missing = `statistic ${i + 1} as an integer`;
      }
    }

    const sport = missing === null ? this.take(TokenType.IDENTIFIER) : undefined;
    if (sport) consumed.push(sport);
    else if (missing === null) missing = 'a sport';

    const country = missing === null ? this.take(TokenType.IDENTIFIER) : undefined;
    if (country) consumed.push(country);
    else if (missing === null) missing = 'a country';

    if (name && sport && country && stats.length === 3) {
      return {
        type: 'AthleteDecl',
        id: this.newId(),
        content: name.value,
        position: at(declTok),
        children: [],
        attributes: { name: name.value, stats, sport: sport.value, country: country.value },
      };
    }

    const reason = this.describeFound(`Incomplete athlete declaration: expected ${missing ?? 'more fields'}`);
    this.reportHere(reason);

    // Whatever is left of the declaration line belongs to the broken declaration
    for (let tok = this.cursor.peek(); tok && tok.line === declTok.line; tok = this.cursor.peek()) {
      if (tok.type !== TokenType.IDENTIFIER && tok.type !== TokenType.INTEGER) break;
      consumed.push(this.advance());
    }

    return {
      type: 'SyntaxErrorNode',
      id: this.newId(),
      content: name ? name.value : declTok.value,
      position: at(declTok),
      children: consumed.map(tok => (tok.type === TokenType.INTEGER ? this.numberNode(tok) : this.identifierNode(tok))),
      attributes: { construct: 'AthleteDecl', reason },
    };
  }

  private parseListOrBulkLoad(): AST.ListDecl | AST.BulkLoad {
    const listTok = this.advance();
    const next = this.cursor.peek();

    if (next && next.type === TokenType.ENTITY_DECLARATION && lower(next) === 'deportista') {
      const typeMark = this.cursor.mark();
      this.cursor.advance();

      // A bulk load is recognised by a name followed by exactly three integers
      if (this.looksLikeAthleteTuple()) {
        const athletes: AST.AthleteRecord[] = [];
        while (this.check(TokenType.IDENTIFIER)) {
          const tupleMark = this.cursor.mark();
          const athlete = this.tryAthleteTuple();
          if (!athlete) {
            this.cursor.reset(tupleMark);
            break;
          }
          athletes.push(athlete);
        }

        if (athletes.length > 0) {
          return {
            type: 'BulkLoad',
            id: this.newId(),
            content: `${listTok.value} ${next.value}`,
            position: at(listTok),
            children: [],
            attributes: { elementType: next.value, athletes, count: athletes.length },
          };
        }

        this.trace(`Bulk load at line ${listTok.line} has no complete athlete; reading it as a list declaration`);
      }
      this.cursor.reset(typeMark);
    }

    const elementType = this.take(TokenType.IDENTIFIER) ?? this.take(TokenType.ENTITY_DECLARATION);
    if (!elementType) this.reportExpected('a list element type');
    const name = elementType ? this.take(TokenType.IDENTIFIER) : undefined;
    if (elementType && !name) this.reportExpected('a list name');

    return {
      type: 'ListDecl',
      id: this.newId(),
      content: name ? name.value : '',
      position: at(listTok),
      children: [],
      attributes: { elementType: elementType ? elementType.value : null, name: name ? name.value : null },
    };
  }

  private looksLikeAthleteTuple(): boolean {
    if (!this.check(TokenType.IDENTIFIER)) return false;
    for (let offset = 1; offset <= 3; offset++) {
      if (this.cursor.peekAhead(offset)?.type !== TokenType.INTEGER) return false;
    }
    return true;
  }

  /** Speculatively read `Name Int Int Int Sport Country`; reports nothing. */
  private tryAthleteTuple(): AST.AthleteRecord | null {
    const name = this.take(TokenType.IDENTIFIER);
    if (!name) return null;
    const stats: number[] = [];
    for (let i = 0; i < 3; i++) {
      const stat = this.take(TokenType.INTEGER);
      if (!stat) return null;
      stats.push(parseInt(stat.value, 10));
    }
    const sport = this.take(TokenType.IDENTIFIER);
    if (!sport) return null;
    const country = this.take(TokenType.IDENTIFIER);
    if (!country) return null;
    return { name: name.value, stats, sport: sport.value, country: country.value };
  }

  // ─── Control Flow ──────────────────────────────────────

  private parseConditional(): AST.Conditional {
    const siTok = this.advance();
    const children: AST.Node[] = [];

    const condition = this.parseCondition();
    if (condition) children.push(condition);

    if (!this.expectText('entonces')) this.recover(tok => isText(tok, '{'));
    if (!this.expectText('{')) this.recover(tok => !isText(tok, ')'));

    children.push(...this.parseCommands());

    // Both `{ A sino { B } } endif` and `{ A } sino { B } endif` are accepted
    let closed = false;
    const afterBrace = this.cursor.peekAhead(1);
    if (this.checkText('}') && afterBrace && isText(afterBrace, 'sino')) {
      this.cursor.advance();
      closed = true;
    }

    let hasElse = false;
    if (this.checkText('sino')) {
      const sinoTok = this.advance();
      if (!this.expectText('{')) this.recover(tok => !isText(tok, ')'));
      children.push({
        type: 'Else',
        id: this.newId(),
        content: sinoTok.value,
        position: at(sinoTok),
        children: this.parseCommands(),
        attributes: {},
      });
      hasElse = true;
      if (!this.expectText('}')) this.recover(tok => isText(tok, '}') || isText(tok, 'endif'));
    }

    if (!closed && !this.expectText('}')) this.recover(tok => isText(tok, 'endif'));
    this.expectText('endif');

    return {
      type: 'Conditional',
      id: this.newId(),
      content: siTok.value,
      position: at(siTok),
      children,
      attributes: { hasElse },
    };
  }

  private parseLoop(): AST.Loop {
    const loopTok = this.advance();

    if (!this.expectText('(')) this.recover(tok => tok.type === TokenType.INTEGER || isText(tok, ')') || isText(tok, '['));
    const countTok = this.take(TokenType.INTEGER);
    if (!countTok) {
      this.reportExpected('a repetition count');
      this.recover(tok => isText(tok, ')') || isText(tok, '['));
    }
    if (!this.expectText(')')) this.recover(tok => isText(tok, '['));
    if (!this.expectText('[')) this.recover(tok => !isText(tok, ')'));

    const body = this.parseCommands();

    if (!this.expectText(']')) this.recover(tok => isText(tok, 'finrep'));
    this.expectText('FinRep');

    return {
      type: 'Loop',
      id: this.newId(),
      content: countTok ? countTok.value : '',
      position: at(loopTok),
      children: body,
      attributes: { count: countTok ? parseInt(countTok.value, 10) : null },
    };
  }

  private parseLoopUntil(): AST.LoopUntil {
    const loopTok = this.advance();
    const children: AST.Node[] = [];

    if (!this.expectText('(')) this.recover(tok => !isText(tok, ']'));
    const condition = this.parseCondition();
    if (condition) children.push(condition);
    if (!this.expectText(')')) this.recover(tok => isText(tok, '['));
    if (!this.expectText('[')) this.recover(tok => !isText(tok, ')'));

    children.push(...this.parseCommands());

    if (!this.expectText(']')) this.recover(tok => LOOP_UNTIL_TERMINATORS.some(t => isText(tok, t)));
    if (!this.matchText(...LOOP_UNTIL_TERMINATORS)) this.reportExpected(`'${LOOP_UNTIL_TERMINATORS[0]}'`);

    return {
      type: 'LoopUntil',
      id: this.newId(),
      content: condition ? condition.content : '',
      position: at(loopTok),
      children,
      attributes: {},
    };
  }

  private parseCondition(): AST.Condition | null {
    const expr = this.parseExpression();
    if (!expr) return null;
    return {
      type: 'Condition',
      id: this.newId(),
      content: AST.renderExpression(expr),
      position: expr.position,
      children: [expr],
      attributes: {},
    };
  }

  // ─── Expressions ───────────────────────────────────────

  private parseExpression(): AST.Node | null {
    return this.parseComparison();
  }

  private parseComparison(): AST.Node | null {
    let left = this.parseAdd();
    if (!left) return null;
    for (let op = this.cursor.peek(); op && op.type === TokenType.COMPARISON_OPERATOR; op = this.cursor.peek()) {
      this.cursor.advance();
      const right = this.parseAdd();
      if (!right) return left;
      left = this.binary(op, left, right);
    }
    return left;
  }

  private parseAdd(): AST.Node | null {
    let left = this.parseMul();
    if (!left) return null;
    for (let op = this.cursor.peek(); op && isArithmetic(op, '+', '-'); op = this.cursor.peek()) {
      this.cursor.advance();
      const right = this.parseMul();
      if (!right) return left;
      left = this.binary(op, left, right);
    }
    return left;
  }

  private parseMul(): AST.Node | null {
    let left = this.parseUnary();
    if (!left) return null;
    for (let op = this.cursor.peek(); op && isArithmetic(op, '*', '/', '%'); op = this.cursor.peek()) {
      this.cursor.advance();
      const right = this.parseUnary();
      if (!right) return left;
      left = this.binary(op, left, right);
    }
    return left;
  }

  private parseUnary(): AST.Node | null {
    const op = this.cursor.peek();
    if (op && isArithmetic(op, '+', '-')) {
      if (this.depth >= this.maxDepth) {
        // Drop the remaining signs and keep their operand
        this.reportTooDeep(op);
        for (let next = this.cursor.peek(); next && isArithmetic(next, '+', '-'); next = this.cursor.peek()) {
          this.cursor.advance();
        }
        return this.parsePrimary();
      }
      this.cursor.advance();
      this.depth++;
      const operand = this.parseUnary();
      this.depth--;
      if (!operand) return null;
      return {
        type: 'UnaryOp',
        id: this.newId(),
        content: op.value,
        position: at(op),
        children: [operand],
        attributes: { operator: op.value },
      };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): AST.Node | null {
    const tok = this.cursor.peek();
    if (!tok) {
      this.reportExpected('an expression');
      return null;
    }

    switch (tok.type) {
      case TokenType.INTEGER:
        this.cursor.advance();
        return this.numberNode(tok);
      case TokenType.IDENTIFIER:
        this.cursor.advance();
        return { type: 'Name', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: { name: tok.value } };
      case TokenType.STRING:
        this.cursor.advance();
        return { type: 'Text', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: { value: unquote(tok.value) } };
      case TokenType.FUNCTION_INVOCATION:
        return this.parseCall();
      default:
        break;
    }

    if (isText(tok, '(')) {
      if (this.depth >= this.maxDepth) {
        this.reportTooDeep(tok);
        this.skipNested('expression');
        return null;
      }
      this.cursor.advance();
      this.depth++;
      const inner = this.parseExpression();
      this.depth--;
      this.expectText(')');
      return inner;
    }

    this.reportExpected('an expression');
    return null;
  }

  private binary(op: Token, left: AST.Node, right: AST.Node): AST.BinaryOp {
    return {
      type: 'BinaryOp',
      id: this.newId(),
      content: op.value,
      position: at(op),
      children: [left, right],
      attributes: { operator: op.value },
    };
  }

  // ─── Invocations ───────────────────────────────────────

  private parseCall(): AST.CallNode {
    const tok = this.advance();
    const callee = tok.value.endsWith('(') ? tok.value.slice(0, -1) : tok.value;
    const { args, closed } = this.parseArgs(tok);
    const base = {
      id: this.newId(),
      content: tok.value,
      position: at(tok),
      children: [],
      attributes: { callee, args, closed },
    };

    switch (callee.toLowerCase()) {
      case 'narrar':
        if (args.length !== 1) {
          this.report(`narrar expects exactly 1 argument but got ${args.length}`, tok);
        }
        return { type: 'Narrate', ...base };
      case 'input':
        return { type: 'Direct', ...base };
      default:
        return { type: 'Invocation', ...base };
    }
  }

  /** Arguments run to `)` on the invocation's own line; commas only separate. */
  private parseArgs(open: Token): { args: AST.InvocationArg[]; closed: boolean } {
    const args: AST.InvocationArg[] = [];
    for (let tok = this.cursor.peek(); tok && tok.line === open.line; tok = this.cursor.peek()) {
      if (isText(tok, ')')) {
        this.cursor.advance();
        return { args, closed: true };
      }
      if (tok.type === TokenType.COMMENT) break;
      if (tok.type === TokenType.FUNCTION_INVOCATION && this.depth >= this.maxDepth) {
        this.reportTooDeep(tok);
        this.skipNested('expression');
        args.push({ text: tok.value, kind: 'call' });
        continue;
      }
      this.cursor.advance();
      if (isText(tok, ',')) continue;
      if (tok.type === TokenType.FUNCTION_INVOCATION) {
        this.depth++;
        const nested = this.parseArgs(tok);
        this.depth--;
        const text = tok.value + nested.args.map(a => a.text).join(', ') + (nested.closed ? ')' : '');
        args.push({ text, kind: 'call' });
        continue;
      }
      args.push({ text: tok.value, kind: argKind(tok) });
    }
    this.reportExpected(`')' to close ${open.value}`);
    return { args, closed: false };
  }

  // ─── Competitions ──────────────────────────────────────

  private startsMatch(): boolean {
    const tok = this.cursor.peek();
    const next = this.cursor.peekAhead(1);
    return Boolean(
      tok && tok.type === TokenType.IDENTIFIER &&
      next && next.type === TokenType.SPECIAL_OPERATOR && lower(next) === 'vs',
    );
  }

  private parseMatch(): AST.Match {
    const homeTok = this.advance();
    const vsTok = this.advance();
    const awayTok = this.take(TokenType.IDENTIFIER);
    if (!awayTok) this.reportExpected(`a country after '${vsTok.value}'`);

    const body = this.parseCompetitionBody('Match', MATCH_TERMINATOR);
    return {
      type: 'Match',
      id: this.newId(),
      content: `${homeTok.value} ${vsTok.value} ${awayTok ? awayTok.value : '?'}`,
      position: at(homeTok),
      children: body.children,
      attributes: {
        opener: vsTok.value,
        terminator: MATCH_TERMINATOR,
        closed: body.closed,
        tie: body.tie,
        home: homeTok.value,
        away: awayTok ? awayTok.value : null,
      },
    };
  }

  private parseCompetition(form: CompetitionForm): AST.Race | AST.Routine | AST.Combat {
    const openTok = this.advance();
    const body = this.parseCompetitionBody(form.type, form.terminator);
    const base = {
      id: this.newId(),
      content: openTok.value,
      position: at(openTok),
      children: body.children,
      attributes: { opener: openTok.value, terminator: form.terminator, closed: body.closed, tie: body.tie },
    };
    switch (form.type) {
      case 'Race':
        return { type: 'Race', ...base };
      case 'Routine':
        return { type: 'Routine', ...base };
      case 'Combat':
        return { type: 'Combat', ...base };
    }
  }

  /**
   * Actions, an optional tie, the result, result extras and the terminator.
   * Whatever is missing is reported and the fields gathered so far are kept.
   */
  private parseCompetitionBody(label: string, terminator: string): { children: AST.Node[]; tie: boolean; closed: boolean } {
    const children: AST.Node[] = [];
    let tie: AST.Tie | null = null;

    for (let tok = this.cursor.peek(); tok; tok = this.cursor.peek()) {
      const word = lower(tok);
      if (TERMINATORS.has(word) || word === 'resultado' || tok.type === TokenType.RESULT_MARKER) break;
      if (this.isBlockEnd(tok) || this.startsMatch() || COMPETITION_OPENERS.has(word)) break;

      if (tok.type === TokenType.TIE_MARKER) {
        if (tie) {
          this.cursor.advance();
          this.report(`Duplicate '${tok.value}' in ${label}; keeping the first`, tok, 'warning');
        } else {
          tie = this.parseTie();
        }
        continue;
      }

      const start = this.cursor.position;
      const node = this.parseCommand();
      if (node) children.push(node);
      if (this.cursor.position === start) break;
    }

    if (tie) children.push(tie);

    if (this.checkText('resultado')) {
      children.push(this.parseResult());
    } else {
      this.reportExpected(`'Resultado' in ${label}`);
    }

    while (this.check(TokenType.RESULT_MARKER)) {
      children.push(this.parseResultExtra());
    }

    const closed = this.expectText(terminator, `to close ${label}`) !== null;
    return { children, tie: tie !== null, closed };
  }

  private parseResult(): AST.Result {
    const tok = this.advance();
    const first = this.take(TokenType.INTEGER);
    let dash = false;
    if (this.checkText('-')) {
      this.cursor.advance();
      dash = true;
    } else if (first) {
      this.reportExpected(`'-' between the two scores`);
    }
    const second = dash || first ? this.take(TokenType.INTEGER) : undefined;

    return {
      type: 'Result',
      id: this.newId(),
      content: `${first ? first.value : '?'} - ${second ? second.value : '?'}`,
      position: at(tok),
      children: [],
      attributes: {
        first: first ? parseInt(first.value, 10) : null,
        second: second ? parseInt(second.value, 10) : null,
      },
    };
  }

  private parseResultExtra(): AST.ResultExtra {
    const tok = this.advance();
    return { type: 'ResultExtra', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: { marker: tok.value } };
  }

  private parseTie(): AST.Tie {
    const tok = this.advance();
    return { type: 'Tie', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: {} };
  }

  /**
   * Unknown domain keywords swallow the commands that follow them up to a
   * terminator or result boundary, so new keywords parse without breaking
   * the constructs around them.
   */
  private parseActionStub(): AST.ActionStub {
    const tok = this.advance();
    const own = STUB_TERMINATORS.get(lower(tok));
    const children: AST.Node[] = [];
    let terminatedBy: string | null = null;

    for (let next = this.cursor.peek(); next; next = this.cursor.peek()) {
      const word = lower(next);
      if (own && word === own) {
        this.cursor.advance();
        terminatedBy = next.value;
        break;
      }
      if (TERMINATORS.has(word) || BOUNDARY_WORDS.has(word) || this.isBlockEnd(next) || next.value === ')') break;

      const start = this.cursor.position;
      const node = this.parseCommand();
      if (node) children.push(node);
      if (this.cursor.position === start) break;
    }

    if (own && !terminatedBy) this.reportExpected(`'${own}' to close ${tok.value}`);

    return {
      type: 'ActionStub',
      id: this.newId(),
      content: tok.value,
      position: at(tok),
      children,
      attributes: { keyword: tok.value, terminatedBy },
    };
  }

  // ─── Recovery ──────────────────────────────────────────

  /** Continue in place when the current token is usable, otherwise resynchronize. */
  private recover(usable: (tok: Token) => boolean): void {
    const tok = this.cursor.peek();
    if (tok && usable(tok)) return;
    this.synchronize();
  }

  /**
   * Skip tokens up to the next stable anchor. Gives up after
   * `maxRecoverySteps` tokens and discards the rest of the stream.
   */
  private synchronize(): void {
    let steps = 0;
    for (let tok = this.cursor.peek(); tok; tok = this.cursor.peek()) {
      if (this.isAnchor(tok)) break;
      if (steps >= this.maxRecoverySteps) {
        const dropped = this.cursor.discardRest();
        this.trace(`Recovery limit of ${this.maxRecoverySteps} reached at line ${tok.line}; discarded ${dropped} token(s)`);
        return;
      }
      this.cursor.advance();
      steps++;
    }
    if (steps > 0) this.trace(`Recovery skipped ${steps} token(s)`);
  }

  /** Parse a construct one level deeper, or skip it once the depth bound is reached. */
  private nested<T extends AST.Node>(parse: () => T): T | AST.SyntaxErrorNode {
    if (this.depth < this.maxDepth) {
      this.depth++;
      const node = parse();
      this.depth--;
      return node;
    }

    const tok = this.cursor.peek();
    if (!tok) throw new Error('Nested construct requested at the end of the token stream');
    const reason = this.reportTooDeep(tok);
    this.skipNested('command');
    return {
      type: 'SyntaxErrorNode',
      id: this.newId(),
      content: tok.value,
      position: at(tok),
      children: [],
      attributes: { construct: 'Nesting', reason },
    };
  }

  private reportTooDeep(tok: Token): string {
    const message = `Nested too deeply: more than ${this.maxDepth} levels`;
    this.report(message, tok);
    return message;
  }

  /**
   * Consume the construct at the cursor without building it, keeping
   * brackets balanced. An expression ends with its outermost group. A
   * command runs through its last block, taking an `else` branch and its
   * closing keyword along. A closer or terminator of the enclosing construct
   * is left in place.
   */
  private skipNested(kind: 'command' | 'expression'): void {
    const start = this.cursor.position;
    let open = 0;
    for (let tok = this.cursor.peek(); tok; tok = this.cursor.peek()) {
      const enclosingEnd = TERMINATORS.has(lower(tok)) || this.isBlockEnd(tok);
      if (open === 0 && this.cursor.position > start && enclosingEnd) break;
      if (opensGroup(tok)) {
        open++;
      } else if (CLOSERS.has(tok.value)) {
        if (open === 0) break;
        open--;
      }
      this.cursor.advance();
      if (open > 0 || !CLOSERS.has(tok.value)) continue;
      if (kind === 'expression') break;
      if (tok.value === ')') continue;

      const next = this.cursor.peek();
      if (next && isText(next, 'sino')) {
        this.cursor.advance();
        continue;
      }
      if (next && (isText(next, '{') || isText(next, '['))) continue;
      if (next && SKIP_TRAILERS.has(lower(next))) this.cursor.advance();
      break;
    }
    this.trace(`Skipped ${this.cursor.position - start} token(s) nested deeper than ${this.maxDepth} levels`);
  }

  private isAnchor(tok: Token): boolean {
    const prev = this.cursor.previous();
    const startsLine = !prev || prev.line < tok.line;

    switch (tok.type) {
      case TokenType.ENTITY_DECLARATION:
      case TokenType.CONTROL_FLOW:
      case TokenType.DOMAIN_KEYWORD:
        return true;
      case TokenType.FUNCTION_INVOCATION:
        return startsLine;
      case TokenType.PUNCTUATION:
        return CLOSERS.has(tok.value);
      default:
        return startsLine && BOUNDARY_WORDS.has(lower(tok));
    }
  }

  private isBlockEnd(tok: Token): boolean {
    if (tok.type === TokenType.PUNCTUATION) return tok.value === '}' || tok.value === ']';
    return tok.type === TokenType.CONTROL_FLOW && BLOCK_END_WORDS.has(lower(tok));
  }

  // ─── Helpers ───────────────────────────────────────────

  private newId(): number {
    return this.nextId++;
  }

  /** Consume a token the caller has already peeked at. */
  private advance(): Token {
    const tok = this.cursor.advance();
    if (!tok) throw new Error('Parser advanced past the end of the token stream');
    return tok;
  }

  private take(type: TokenType): Token | undefined {
    return this.check(type) ? this.cursor.advance() : undefined;
  }

  private check(type: TokenType): boolean {
    return this.cursor.peek()?.type === type;
  }

  private checkText(text: string): boolean {
    const tok = this.cursor.peek();
    return tok !== undefined && isText(tok, text);
  }

  private matchText(...texts: string[]): Token | undefined {
    const tok = this.cursor.peek();
    if (tok && texts.some(text => isText(tok, text))) return this.cursor.advance();
    return undefined;
  }

  /** Consume `text` or report it missing; never consumes on failure. */
  private expectText(text: string, context?: string): Token | null {
    const tok = this.matchText(text);
    if (tok) return tok;
    this.reportExpected(context ? `'${text}' ${context}` : `'${text}'`);
    return null;
  }

  private describeFound(prefix: string): string {
    const tok = this.cursor.peek();
    return tok ? `${prefix} but found '${tok.value}'` : `${prefix} but reached end of input`;
  }

  private reportExpected(what: string): void {
    this.reportHere(this.describeFound(`Expected ${what}`));
  }

  /** Report at the current token, or just past the last token at end of input. */
  private reportHere(message: string, severity: Severity = 'error'): void {
    const tok = this.cursor.peek();
    if (tok) {
      this.diagnostics.report(message, tok.line, tok.column, severity);
      return;
    }
    const last = this.cursor.last();
    this.diagnostics.report(message, last ? last.line : 1, last ? last.column + last.value.length : 1, severity);
  }

  private report(message: string, tok: Token, severity: Severity = 'error'): void {
    this.diagnostics.report(message, tok.line, tok.column, severity);
  }

  private numberNode(tok: Token): AST.NumberLiteral {
    return { type: 'Number', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: { value: parseInt(tok.value, 10) } };
  }

  private identifierNode(tok: Token): AST.Identifier {
    return { type: 'Identifier', id: this.newId(), content: tok.value, position: at(tok), children: [], attributes: { name: tok.value } };
  }

  private trace(message: string): void {
    if (this.traceEnabled) this.traceLog.push(message);
  }
}

function at(tok: Token): AST.Position {
  return { line: tok.line, column: tok.column };
}

function lower(tok: Token): string {
  return tok.value.toLowerCase();
}

function isText(tok: Token, text: string): boolean {
  return tok.value.toLowerCase() === text.toLowerCase();
}

function opensGroup(tok: Token): boolean {
  return tok.type === TokenType.FUNCTION_INVOCATION || (tok.type === TokenType.PUNCTUATION && OPENERS.has(tok.value));
}

function isArithmetic(tok: Token, ...ops: string[]): boolean {
  return tok.type === TokenType.ARITHMETIC_OPERATOR && ops.includes(tok.value);
}

function argKind(tok: Token): AST.ArgKind {
  switch (tok.type) {
    case TokenType.IDENTIFIER:
      return 'identifier';
    case TokenType.INTEGER:
      return 'integer';
    case TokenType.STRING:
      return 'string';
    default:
      return 'other';
  }
}

function unquote(text: string): string {
  return text.length >= 2 && text.startsWith('"') && text.endsWith('"') ? text.slice(1, -1) : text;
}
