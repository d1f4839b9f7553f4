/**
 * Configuration loader for Olympiac.
 *
 * Loads olympiac.config.json from the program's directory, the working
 * directory, or a specified path.
 */

import * as fs from 'fs';
import * as path from 'path';
import { OlympiacError } from '../errors';
import { DEFAULT_MAX_RECOVERY_STEPS } from '../parser/parser';

const CONFIG_FILENAMES = ['olympiac.config.json', '.olympiacrc.json'];

export interface OlympiacConfig {
  /** Tokens one recovery may skip before the rest of the input is dropped. */
  maxRecoverySteps: number;
  trace: boolean;
  warningsAsErrors: boolean;
  /** Default destination of `--export` when no path is given. */
  exportPath?: string;
}

export const DEFAULT_CONFIG: Readonly<OlympiacConfig> = {
  maxRecoverySteps: DEFAULT_MAX_RECOVERY_STEPS,
  trace: false,
  warningsAsErrors: false,
};

/**
 * Load Olympiac configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. olympiac.config.json in cwd
 * 3. .olympiacrc.json in cwd
 *
 * Returns the defaults if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): OlympiacConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }
  return searchDirectory(process.cwd()) ?? { ...DEFAULT_CONFIG };
}

/**
 * Load config relative to a program file's directory, falling back to cwd.
 * Useful when running `olympiac path/to/program.oly` from elsewhere.
 */
export function loadConfigForScript(scriptPath: string): OlympiacConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));
  return searchDirectory(scriptDir) ?? loadConfig();
}

function searchDirectory(dir: string): OlympiacConfig | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): OlympiacConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new OlympiacError('ConfigError', `Cannot read config file ${filePath}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new OlympiacError('ConfigError', `Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(raw, filePath);
}

/**
 * Validate config structure and fill in defaults. Throws on invalid config.
 */
export function validateConfig(raw: unknown, filePath: string): OlympiacConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new OlympiacError('ConfigError', `Invalid config in ${filePath}: must be an object`);
  }

  const config: OlympiacConfig = { ...DEFAULT_CONFIG };
  const fields = new Map<string, unknown>(Object.entries(raw));

  const steps = fields.get('maxRecoverySteps');
  if (steps !== undefined) {
    if (typeof steps !== 'number' || !Number.isInteger(steps) || steps < 1) {
      throw new OlympiacError('ConfigError', `Invalid "maxRecoverySteps" in ${filePath}: must be a positive integer`);
    }
    config.maxRecoverySteps = steps;
  }

  for (const key of ['trace', 'warningsAsErrors'] as const) {
    const value = fields.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      throw new OlympiacError('ConfigError', `Invalid "${key}" in ${filePath}: must be a boolean`);
    }
    config[key] = value;
  }

  const exportPath = fields.get('exportPath');
  if (exportPath !== undefined) {
    if (typeof exportPath !== 'string' || exportPath.length === 0) {
      throw new OlympiacError('ConfigError', `Invalid "exportPath" in ${filePath}: must be a non-empty string`);
    }
    config.exportPath = exportPath;
  }

  return config;
}
