import { Token } from '../lexer/tokens';

/**
 * Forward cursor over a frozen token stream. Looking ahead never consumes;
 * `mark()`/`reset()` exist only for bounded speculative parses.
 */
export class TokenCursor {
  private pos = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.tokens.length - this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  peekAhead(offset: number): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  /** The most recently consumed token. */
  previous(): Token | undefined {
    return this.pos > 0 ? this.tokens[this.pos - 1] : undefined;
  }

  /** The final token of the stream, used to place end-of-input diagnostics. */
  last(): Token | undefined {
    return this.tokens[this.tokens.length - 1];
  }

  advance(): Token | undefined {
    const tok = this.tokens[this.pos];
    if (tok) this.pos++;
    return tok;
  }

  mark(): number {
    return this.pos;
  }

  reset(mark: number): void {
    if (mark < 0 || mark > this.pos) {
      throw new Error(`Cannot reset cursor to ${mark} from ${this.pos}`);
    }
    this.pos = mark;
  }

  /** Drop everything left in the stream; returns how many tokens were discarded. */
  discardRest(): number {
    const dropped = this.remaining;
    this.pos = this.tokens.length;
    return dropped;
  }
}
