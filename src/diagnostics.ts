export type Severity = 'error' | 'warning';

export type Phase = 'lexical' | 'syntax' | 'semantic';

/**
 * A defect found while scanning, parsing or verifying a program.
 * Diagnostics are plain data: they are collected, never thrown.
 */
export interface Diagnostic {
  message: string;
  line: number;
  column: number;
  severity: Severity;
  phase: Phase;
}

/**
 * Ordered collector of diagnostics for one phase.
 * With `dedupe` enabled, a second diagnostic with the same
 * (message, line, column) triple is dropped.
 */
export class DiagnosticSink {
  private items: Diagnostic[] = [];
  private seen = new Set<string>();

  constructor(
    private phase: Phase,
    private dedupe = false,
  ) {}

  report(message: string, line: number, column: number, severity: Severity = 'error'): void {
    if (this.dedupe) {
      const key = `${message}\u0000${line}\u0000${column}`;
      if (this.seen.has(key)) return;
      this.seen.add(key);
    }
    this.items.push({ message, line, column, severity, phase: this.phase });
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): Diagnostic[] {
    return this.items.map(d => ({ ...d }));
  }
}

export function formatDiagnostic(d: Diagnostic): string {
  return `[${d.severity.toUpperCase()}] ${d.line}:${d.column} - ${d.message}`;
}

export function countErrors(diagnostics: readonly Diagnostic[], warningsAsErrors = false): number {
  return diagnostics.filter(d => d.severity === 'error' || warningsAsErrors).length;
}
