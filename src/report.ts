import { Diagnostic } from './diagnostics';
import { Decoration } from './semantic/decorations';
import { TableSnapshot } from './semantic/symbol-table';
import { TableStep, VerificationResult } from './semantic/verifier';
import * as AST from './parser/ast';

/** JSON-serializable summary of one checked program, as written by `--export`. */
export interface Report {
  file: string;
  diagnostics: {
    lexical: Diagnostic[];
    syntax: Diagnostic[];
    semantic: Diagnostic[];
  };
  decorations: Record<string, Decoration>;
  table: TableSnapshot;
  snapshots: TableStep[];
}

export function buildReport(
  file: string,
  lexical: Diagnostic[],
  program: AST.Program,
  verification: VerificationResult,
): Report {
  return {
    file,
    diagnostics: {
      lexical,
      syntax: program.diagnostics,
      semantic: verification.errors,
    },
    decorations: verification.decorations.toJSON(),
    table: verification.table.snapshot(),
    snapshots: verification.snapshots,
  };
}
