#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { tokenize } from './index';
import { Parser } from './parser/parser';
import { Verifier } from './semantic/verifier';
import { formatTree, formatDecoratedTree } from './parser/format';
import { Diagnostic, formatDiagnostic, countErrors } from './diagnostics';
import { buildReport } from './report';
import { OlympiacError } from './errors';
import { OlympiacConfig, loadConfig, loadConfigForScript } from './runtime/config';
import {
  TerminalStatusReporter,
  SilentStatusReporter,
  StatusReporter,
  Writer,
} from './runtime/status';

const USAGE = `
olympiac - The Olympiac language checker v0.1.0

Usage:
  olympiac <file.oly>              Scan, parse and verify a program
  olympiac --lex <file.oly>        Tokenize and print tokens
  olympiac --parse <file.oly>      Parse and print the tree
  olympiac --help                  Show this help message

Output Options:
  --decorated          Print the tree with semantic decorations
  --table              Print the final symbol table
  --json               Print the full report as JSON
  --export [path.json] Write the report to a file (default: <file>.report.json)
  --trace              Print parser recovery and scope trace lines

Other Options:
  --quiet              Suppress status lines (for piping / CI)
  --config <path>      Path to olympiac.config.json (auto-detected by default)

Exit codes:
  0  no errors
  1  the program has errors
  2  usage or I/O failure

Examples:
  olympiac examples/torneo.oly
  olympiac --decorated --table examples/torneo.oly
  olympiac --json --quiet examples/torneo.oly > report.json
`;

const BOOLEAN_FLAGS = new Set(['--lex', '--parse', '--decorated', '--table', '--json', '--export', '--trace', '--quiet']);

export interface CliIO {
  stdout: Writer;
  stderr: Writer;
  /** Whether stderr is a terminal; controls in-place status lines. */
  isTTY?: boolean;
}

const processIO: CliIO = {
  stdout: chunk => process.stdout.write(chunk),
  stderr: chunk => process.stderr.write(chunk),
  isTTY: Boolean(process.stderr.isTTY),
};

interface CliOptions {
  flags: Set<string>;
  file: string;
  configPath?: string;
  exportPath?: string;
}

function parseArgs(args: string[]): CliOptions {
  const flags = new Set<string>();
  const files: string[] = [];
  let configPath: string | undefined;
  let exportPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--config') {
      configPath = args[++i];
      if (configPath === undefined) throw new OlympiacError('UsageError', '--config needs a path');
      continue;
    }
    if (arg.startsWith('--')) {
      if (!BOOLEAN_FLAGS.has(arg)) throw new OlympiacError('UsageError', `Unknown option ${arg}`);
      flags.add(arg);
      // --export takes an optional .json path
      const next = args[i + 1];
      if (arg === '--export' && next !== undefined && next.endsWith('.json')) {
        exportPath = next;
        i++;
      }
      continue;
    }
    files.push(arg);
  }

  if (files.length === 0) throw new OlympiacError('UsageError', 'No input file specified.');
  if (files.length > 1) throw new OlympiacError('UsageError', `Expected one input file, got ${files.length}`);

  return { flags, file: files[0], configPath, exportPath };
}

function readSource(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new OlympiacError('IOError', `File not found: ${filePath}`);
  }
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new OlympiacError('IOError', `Cannot read ${filePath}: ${reason}`);
  }
}

function defaultExportPath(filePath: string, config: OlympiacConfig): string {
  if (config.exportPath) return path.resolve(path.dirname(filePath), config.exportPath);
  const base = path.basename(filePath, path.extname(filePath));
  return path.join(path.dirname(filePath), `${base}.report.json`);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Run the checker with command-line `args`. Returns the exit code.
 */
export function runCli(args: string[], io: CliIO = processIO): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  try {
    return check(parseArgs(args), io);
  } catch (error) {
    if (error instanceof OlympiacError) {
      io.stderr(`Error: ${error.message}\n`);
      if (error.errorType === 'UsageError') io.stderr(`Run 'olympiac --help' for usage.\n`);
      return 2;
    }
    throw error;
  }
}

function check(options: CliOptions, io: CliIO): number {
  const { flags } = options;
  const filePath = path.resolve(options.file);
  const source = readSource(filePath);
  const config = options.configPath ? loadConfig(options.configPath) : loadConfigForScript(filePath);
  const trace = flags.has('--trace') || config.trace;

  const status: StatusReporter = flags.has('--quiet')
    ? new SilentStatusReporter()
    : new TerminalStatusReporter(io.stderr, io.isTTY ?? false);

  // ─── Scan ──────────────────────────────────────────────
  status.start(`Scanning ${options.file}`);
  const scanned = tokenize(source);
  status.succeed(`Scanned ${plural(scanned.tokens.length, 'token')}`);

  if (flags.has('--lex')) {
    for (const tok of scanned.tokens) {
      io.stdout(`${tok.line}:${tok.column}\t${tok.type} ${JSON.stringify(tok.value)}\n`);
    }
    printDiagnostics(scanned.diagnostics, io);
    return countErrors(scanned.diagnostics, config.warningsAsErrors) > 0 ? 1 : 0;
  }

  // ─── Parse ─────────────────────────────────────────────
  status.start('Parsing');
  const parser = new Parser({ maxRecoverySteps: config.maxRecoverySteps, trace });
  const program = parser.parse(scanned.tokens);
  status.succeed(`Parsed ${plural(program.nodeCount, 'node')}`);

  // ─── Verify ────────────────────────────────────────────
  status.start('Verifying');
  const verification = new Verifier({ trace }).verify(program);
  status.succeed(`Verified ${plural(verification.decorations.size, 'decorated node')}`);

  const report = buildReport(options.file, scanned.diagnostics, program, verification);

  if (flags.has('--parse')) io.stdout(`${formatTree(program)}\n`);
  if (flags.has('--decorated')) io.stdout(`${formatDecoratedTree(program, verification.decorations)}\n`);
  if (flags.has('--table')) io.stdout(`${verification.table.toString()}\n`);
  if (flags.has('--json')) io.stdout(`${JSON.stringify(report, null, 2)}\n`);
  if (trace) {
    for (const line of [...parser.getTrace(), ...verification.trace]) {
      io.stderr(`[trace] ${line}\n`);
    }
  }

  if (flags.has('--export')) {
    const target = options.exportPath
      ? path.resolve(options.exportPath)
      : defaultExportPath(filePath, config);
    status.start(`Writing report to ${target}`);
    try {
      fs.writeFileSync(target, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
    } catch (error) {
      status.fail(`Could not write ${target}`);
      const reason = error instanceof Error ? error.message : String(error);
      throw new OlympiacError('IOError', `Cannot write report ${target}: ${reason}`);
    }
    status.succeed(`Report written to ${target}`);
  }

  const diagnostics = [...scanned.diagnostics, ...program.diagnostics, ...verification.errors];
  printDiagnostics(diagnostics, io);

  const errors = countErrors(diagnostics, config.warningsAsErrors);
  const warnings = diagnostics.length - countErrors(diagnostics);
  const summary = `${options.file}: ${plural(errors, 'error')}, ${plural(warnings, 'warning')}`;
  if (errors > 0) {
    status.fail(summary);
    return 1;
  }
  status.succeed(summary);
  return 0;
}

function printDiagnostics(diagnostics: Diagnostic[], io: CliIO): void {
  for (const d of diagnostics) {
    io.stderr(`${formatDiagnostic(d)}\n`);
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
