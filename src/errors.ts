/**
 * Error taxonomy for generation runs.
 *
 * ConfigError and WriteError abort the run. ApiError is recovered by the
 * answer provider fallback and never reaches the batch runner.
 */

export class ConfigError extends Error {
  readonly code: 'config_error' | 'not_found' | 'parse_error' = 'config_error';
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export class NotFoundError extends ConfigError {
  readonly code = 'not_found' as const;

  constructor(path: string, what = 'File') {
    super(`${what} not found: ${path}`, path);
    this.name = 'NotFoundError';
  }
}

export class ParseError extends ConfigError {
  readonly code = 'parse_error' as const;

  constructor(path: string, detail: string) {
    super(`Malformed JSON in ${path}: ${detail}`, path);
    this.name = 'ParseError';
  }
}

export class ApiError extends Error {
  readonly code = 'api_error' as const;
  readonly status?: number;
  readonly originalError?: unknown;

  constructor(message: string, options: { status?: number; originalError?: unknown } = {}) {
    super(message);
    this.name = 'ApiError';
    this.status = options.status;
    this.originalError = options.originalError;
  }
}

export class WriteError extends Error {
  readonly code = 'write_error' as const;
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Unable to write output to ${path}: ${detail}`);
    this.name = 'WriteError';
    this.path = path;
  }
}

export class RecordAssemblyError extends Error {
  readonly code = 'record_assembly_failed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'RecordAssemblyError';
  }
}

export const isFatalError = (error: unknown): error is ConfigError | WriteError =>
  error instanceof ConfigError || error instanceof WriteError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
