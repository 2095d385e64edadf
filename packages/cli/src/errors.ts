import { ConfigError } from '@docmath/core';
import type { Logger } from './logger';

export class FileProcessingError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to process ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'FileProcessingError';
    this.filePath = filePath;
  }
}

/** Log an error that escaped the run and return the process exit code for it */
export function handleError(err: unknown, logger: Logger): number {
  if (err instanceof ConfigError || err instanceof FileProcessingError) {
    logger.error(err.message);
    return 1;
  }

  logger.error('Unhandled error:', err);
  return 1;
}
