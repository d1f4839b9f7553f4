/**
 * StatusReporter: phase feedback while a program is checked.
 *
 * Lines go to stderr so they never mix with trees, tables or JSON
 * printed on stdout.
 */

/**
 * Interface for status reporters. The CLI calls these methods as each
 * phase (scan, parse, verify, export) starts and finishes.
 */
export interface StatusReporter {
  /** Announce a phase. */
  start(text: string): void;
  /** Replace the current phase text. */
  update(text: string): void;
  /** Finish the phase with a success message. */
  succeed(text: string): void;
  /** Finish the phase with a failure message. */
  fail(text: string): void;
  /** Finish the phase silently. */
  stop(): void;
}

export type Writer = (chunk: string) => void;

/**
 * Terminal reporter. On a TTY the pending phase line is rewritten in place;
 * elsewhere (CI, piped output) every line is printed once.
 */
export class TerminalStatusReporter implements StatusReporter {
  private pending = false;
  private isTTY: boolean;
  private write: Writer;

  constructor(write?: Writer, isTTY?: boolean) {
    this.write = write ?? (chunk => process.stderr.write(chunk));
    this.isTTY = isTTY ?? Boolean(process.stderr.isTTY);
  }

  start(text: string): void {
    this.stop(); // clear any pending line
    this.show(text);
  }

  update(text: string): void {
    this.clearLine();
    this.show(text);
  }

  succeed(text: string): void {
    this.clearLine();
    this.write(`  ✔ ${text}\n`);
  }

  fail(text: string): void {
    this.clearLine();
    this.write(`  ✖ ${text}\n`);
  }

  stop(): void {
    this.clearLine();
  }

  private show(text: string): void {
    if (this.isTTY) {
      this.write(`  ◌ ${text}`);
      this.pending = true;
    } else {
      this.write(`  ◌ ${text}\n`);
    }
  }

  private clearLine(): void {
    if (this.isTTY && this.pending) {
      // \r moves to column 0, \x1b[K clears to end of line
      this.write('\r\x1b[K');
    }
    this.pending = false;
  }
}

/**
 * Silent reporter for testing or when --quiet is used.
 */
export class SilentStatusReporter implements StatusReporter {
  start(_text: string): void {}
  update(_text: string): void {}
  succeed(_text: string): void {}
  fail(_text: string): void {}
  stop(): void {}
}
