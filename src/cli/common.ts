import { PipelineError, errorMessage } from '../pipeline/errors';
import { error, isLogLevel, setLogLevel } from '../pipeline/log';

/** First positional argument, or exit when there is none. */
export function inputArg(positionals: Array<string | number>): string {
  const first = positionals[0];
  if (first === undefined || String(first) === '') {
    error('cli.missingInput', { reason: 'an input path is required' });
    process.exit(1);
  }
  return String(first);
}

export function applyLogLevel(level: string | undefined) {
  if (level && isLogLevel(level)) setLogLevel(level);
}

export function exitWithError(e: unknown): never {
  if (e instanceof PipelineError) {
    error(e.errorCode, { error: e.message, ...(e.details || {}) });
  } else {
    error('cli.failed', { error: errorMessage(e) });
  }
  process.exit(1);
}
