/**
 * Error classes for the transcript pipeline
 */

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  errorCode: string;
  details?: Record<string, unknown>;

  constructor(message: string, errorCode = 'pipeline_error', details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.errorCode = errorCode;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.message} (code: ${this.errorCode})`;
  }
}

/**
 * A required input file does not exist
 */
export class InputNotFoundError extends PipelineError {
  path: string;

  constructor(path: string, what = 'Input file') {
    super(`${what} not found: ${path}`, 'input_not_found', { path });
    this.name = 'InputNotFoundError';
    this.path = path;
  }
}

/**
 * Input file exists but is not valid JSON or does not match the expected shape
 */
export class InvalidInputError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'invalid_input', details);
    this.name = 'InvalidInputError';
  }
}

/**
 * yt-dlp could not fetch subtitles or metadata
 */
export class DownloadError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'download_failed', details);
    this.name = 'DownloadError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
