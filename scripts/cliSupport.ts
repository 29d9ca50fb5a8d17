// Shared plumbing for the command-line entry points

import { toErrorMessage } from '@/lib/utils/errors';
import { createConsoleLogger, levelFromVerbosity, type Logger } from '@/lib/utils/logger';

export interface VerbosityOptions {
  quiet?: boolean;
  /** cac yields true once, an array for a repeated flag */
  verbose?: boolean | boolean[];
}

export function countFlag(value: boolean | boolean[] | undefined): number {
  if (Array.isArray(value)) return value.filter(Boolean).length;
  return value ? 1 : 0;
}

export function createCliLogger(options: VerbosityOptions): Logger {
  return createConsoleLogger({
    level: levelFromVerbosity(countFlag(options.verbose), Boolean(options.quiet)),
  });
}

export function handleError(error: unknown): void {
  console.error(`[ERROR] ${toErrorMessage(error)}`);
  process.exitCode = 1;
}
