export type OlympiacErrorType = 'ConfigError' | 'IOError' | 'UsageError';

/**
 * Failure outside the language core: reading files, loading configuration,
 * command-line usage. Program defects are diagnostics, never this.
 */
export class OlympiacError extends Error {
  constructor(
    public errorType: OlympiacErrorType,
    message: string,
  ) {
    super(`${errorType}: ${message}`);
    this.name = 'OlympiacError';
  }
}
