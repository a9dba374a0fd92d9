/**
 * Error handling helpers
 */

import { logger } from './logger.js';

export class LinestatError extends Error {
  constructor(
    message: string,
    public code?: string,
  ) {
    super(message);
    this.name = 'LinestatError';
  }
}

export type ProjectPathErrorCode = 'PATH_NOT_FOUND' | 'NOT_A_DIRECTORY';

/** The scan root is missing or is not a directory. The only fatal scan errors. */
export class ProjectPathError extends LinestatError {
  constructor(
    message: string,
    public readonly path: string,
    code: ProjectPathErrorCode,
  ) {
    super(message, code);
    this.name = 'ProjectPathError';
  }
}

export class ConfigError extends LinestatError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

export function failCommand(message: string, error?: unknown, exitCode: number = 1): void {
  logger.error(message);
  if (error) {
    logger.error(errorMessage(error));
  }
  process.exitCode = exitCode;
}

function extractJsonMode(args: unknown[]): boolean {
  for (let i = args.length - 1; i >= 0; i -= 1) {
    const candidate = args[i];
    if (!candidate || typeof candidate !== 'object') continue;
    if ('json' in candidate && typeof candidate.json === 'boolean') {
      return candidate.json;
    }
  }
  return false;
}

function emitCliJsonError(command: string, error: unknown): void {
  const payload: Record<string, unknown> = {
    success: false,
    error: errorMessage(error),
    command,
    timestamp: new Date().toISOString(),
  };
  if (error instanceof LinestatError && error.code) {
    payload.code = error.code;
  }
  console.log(JSON.stringify(payload, null, 2));
}

/**
 * Wrap a commander action: failures end the command with exit code 1 and a
 * readable message (or a JSON error document under --json) instead of a stack.
 */
export function withCliErrorHandling<TArgs extends unknown[]>(
  command: string,
  handler: (...args: TArgs) => Promise<void> | void,
): (...args: TArgs) => Promise<void> {
  return async (...args: TArgs): Promise<void> => {
    try {
      await handler(...args);
    } catch (error) {
      if (extractJsonMode(args)) {
        emitCliJsonError(command, error);
        process.exitCode = 1;
        return;
      }
      failCommand(`Command "${command}" failed`, error);
    }
  };
}
