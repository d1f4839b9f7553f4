export { Lexer } from './lexer/lexer';
export { Token, TokenType, LexerError } from './lexer/tokens';
export { Parser, ParserOptions, DEFAULT_MAX_RECOVERY_STEPS, DEFAULT_MAX_DEPTH } from './parser/parser';
export { TokenCursor } from './parser/cursor';
export * as AST from './parser/ast';
export { formatTree, formatDecoratedTree } from './parser/format';
export { Diagnostic, Severity, Phase, DiagnosticSink, formatDiagnostic, countErrors } from './diagnostics';
export { SymbolTable, SymbolEntry, SymbolRecord, TableSnapshot, TypeTag } from './semantic/symbol-table';
export { Decoration, DecorationTable } from './semantic/decorations';
export { Verifier, VerifierOptions, VerificationResult, TableStep, resolveArgType } from './semantic/verifier';
export { BUILTINS, BuiltinSignature, lookupBuiltin } from './semantic/builtins';
export { OlympiacError, OlympiacErrorType } from './errors';
export { OlympiacConfig, DEFAULT_CONFIG, loadConfig, loadConfigForScript, validateConfig } from './runtime/config';
export { StatusReporter, TerminalStatusReporter, SilentStatusReporter } from './runtime/status';
export { Report, buildReport } from './report';

import { Lexer } from './lexer/lexer';
import { Token } from './lexer/tokens';
import { Parser, ParserOptions } from './parser/parser';
import * as AST from './parser/ast';
import { Diagnostic } from './diagnostics';
import { Verifier, VerificationResult } from './semantic/verifier';

export interface TokenizeResult {
  tokens: Token[];
  diagnostics: Diagnostic[];
}

export interface Analysis {
  tokens: Token[];
  program: AST.Program;
  verification: VerificationResult;
  /** Lexical, then syntax, then semantic diagnostics. */
  diagnostics: Diagnostic[];
}

export type AnalyzeOptions = ParserOptions;

/**
 * Scan Olympiac source into tokens and lexical diagnostics.
 */
export function tokenize(source: string): TokenizeResult {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  const diagnostics: Diagnostic[] = lexer.getErrors().map(e => ({
    message: e.message,
    line: e.line,
    column: e.column,
    severity: 'error',
    phase: 'lexical',
  }));
  return { tokens, diagnostics };
}

/**
 * Parse Olympiac source into an AST. Syntax diagnostics are on `program.diagnostics`.
 */
export function parse(source: string, options: ParserOptions = {}): AST.Program {
  const { tokens } = tokenize(source);
  return new Parser(options).parse(tokens);
}

/**
 * Scan, parse and verify Olympiac source.
 */
export function analyze(source: string, options: AnalyzeOptions = {}): Analysis {
  const scanned = tokenize(source);
  const program = new Parser(options).parse(scanned.tokens);
  const verification = new Verifier({ trace: options.trace }).verify(program);
  return {
    tokens: scanned.tokens,
    program,
    verification,
    diagnostics: [...scanned.diagnostics, ...program.diagnostics, ...verification.errors],
  };
}
