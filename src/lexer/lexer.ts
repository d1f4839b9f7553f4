import {
  Token,
  TokenType,
  LexerError,
  KEYWORDS,
  FUNCTION_NAMES,
  COMPARISON_OPERATORS,
  ARITHMETIC_OPERATORS,
  PUNCTUATION,
} from './tokens';

const LETTER = /\p{L}/u;

export class Lexer {
  private source: string;
  private tokens: Token[] = [];
  private errors: LexerError[] = [];
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.errors = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (this.pos < this.source.length) {
      const ch = this.current();

      if (ch === ' ' || ch === '\t') {
        this.advance();
        continue;
      }

      if (ch === '\n') {
        this.newline();
        continue;
      }

      if (ch === '\r') {
        this.advance();
        if (this.pos < this.source.length && this.source[this.pos] === '\n') {
          this.pos++;
        }
        this.line++;
        this.column = 1;
        continue;
      }

      if (ch === ';') {
        this.readComment();
        continue;
      }

      if (ch === '"') {
        this.readString();
        continue;
      }

      if (this.isDigit(ch)) {
        this.readInteger();
        continue;
      }

      if (this.isAlpha(ch)) {
        this.readWord();
        continue;
      }

      this.readOperator();
    }

    return this.tokens;
  }

  /** Lexical errors found by the last `tokenize()` call. */
  getErrors(): LexerError[] {
    return [...this.errors];
  }

  private readComment(): void {
    const startCol = this.column;
    let text = '';
    while (this.pos < this.source.length && !this.atLineEnd()) {
      text += this.current();
      this.advance();
    }
    this.addTokenAt(TokenType.COMMENT, text.trimEnd(), startCol);
  }

  private readString(): void {
    const startCol = this.column;
    let text = '"';
    this.advance(); // skip opening quote
    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      if (this.atLineEnd()) {
        this.error(`Unterminated string starting at column ${startCol}`, startCol);
        return;
      }
      if (this.source[this.pos] === '\\' && this.pos + 1 < this.source.length && !this.atLineEnd(this.pos + 1)) {
        text += this.source[this.pos];
        this.advance();
      }
      text += this.current();
      this.advance();
    }
    if (this.pos >= this.source.length) {
      this.error(`Unterminated string starting at column ${startCol}`, startCol);
      return;
    }
    text += '"';
    this.advance(); // skip closing quote
    this.addTokenAt(TokenType.STRING, text, startCol);
  }

  private readInteger(): void {
    const startCol = this.column;
    let num = '';
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      num += this.source[this.pos];
      this.advance();
    }
    this.addTokenAt(TokenType.INTEGER, num, startCol);
  }

  private readWord(): void {
    const startCol = this.column;
    let word = '';
    while (this.pos < this.source.length && this.isAlphaNumeric(this.current())) {
      word += this.current();
      this.advance();
    }

    // narrar( / comparar( / input( are one token, parenthesis included
    if (FUNCTION_NAMES.has(word) && this.source[this.pos] === '(') {
      this.advance();
      this.addTokenAt(TokenType.FUNCTION_INVOCATION, word + '(', startCol);
      return;
    }

    const keyword = Object.prototype.hasOwnProperty.call(KEYWORDS, word) ? KEYWORDS[word] : undefined;
    this.addTokenAt(keyword ?? TokenType.IDENTIFIER, word, startCol);
  }

  private readOperator(): void {
    const ch = this.current();
    const startCol = this.column;

    const twoChars = this.source.slice(this.pos, this.pos + 2);
    const comparison = COMPARISON_OPERATORS.find(op => op === twoChars || op === ch);
    if (comparison) {
      for (let i = 0; i < comparison.length; i++) this.advance();
      this.addTokenAt(TokenType.COMPARISON_OPERATOR, comparison, startCol);
      return;
    }

    if (ARITHMETIC_OPERATORS.has(ch)) {
      this.advance();
      this.addTokenAt(TokenType.ARITHMETIC_OPERATOR, ch, startCol);
      return;
    }

    if (PUNCTUATION.has(ch)) {
      this.advance();
      this.addTokenAt(TokenType.PUNCTUATION, ch, startCol);
      return;
    }

    this.error(`Unrecognized character '${ch}'`, startCol);
    this.advance();
  }

  private newline(): void {
    this.pos++;
    this.line++;
    this.column = 1;
  }

  /** The character at the cursor; a letter outside the BMP is one character, not two. */
  private current(): string {
    const code = this.source.codePointAt(this.pos);
    return code === undefined ? '' : String.fromCodePoint(code);
  }

  private advance(): void {
    this.pos += this.current().length || 1;
    this.column++;
  }

  private atLineEnd(at = this.pos): boolean {
    const ch = this.source[at];
    return ch === '\n' || ch === '\r';
  }

  private addTokenAt(type: TokenType, value: string, column: number): void {
    this.tokens.push({ type, value, line: this.line, column });
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_' || (ch > '\x7f' && LETTER.test(ch));
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private error(message: string, column: number): void {
    this.errors.push({ message, line: this.line, column });
  }
}
