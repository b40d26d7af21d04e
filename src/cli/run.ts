import { PlanDigestError } from '../errors.js';
import { createLogger, type Logger } from './logger.js';

export interface RunOptions {
  logger?: Logger;
  exit?: (code: number) => void;
}

export function describeError(err: unknown): string {
  if (err instanceof PlanDigestError) return `Error: ${err.message}`;
  return `Unexpected error: ${err instanceof Error ? err.message : String(err)}`;
}

/** Runs a command action, reporting any failure on stderr and exiting with 1. */
export async function runAction(action: () => Promise<void>, opts: RunOptions = {}): Promise<void> {
  const log = opts.logger ?? createLogger();
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  try {
    await action();
  } catch (err) {
    log.error(describeError(err));
    exit(1);
  }
}
