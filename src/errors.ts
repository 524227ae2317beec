/**
 * Error taxonomy for cleanup runs.
 *
 * Fatal errors stop a run before anything is classified or mutated.
 * Per-item errors end up in the ActionSummary and the batch carries on.
 */

import { AppError } from './logger.js';

export const FATAL_ERROR_CODES = [
  'SERVICE_UNAVAILABLE',
  'AUTH_ERROR',
  'ROOT_NOT_FOUND',
  'CONFIG_INVALID',
] as const;

export type FatalErrorCode = (typeof FATAL_ERROR_CODES)[number];

export type ItemErrorCode =
  | 'AMBIGUOUS_MATCH'
  | 'RESTORE_CONFLICT'
  | 'MUTATION_FAILED'
  | 'TIMEOUT'
  | 'LINKED_PROTECTED'
  | 'NOT_IN_SCAN'
  | 'NOT_FOUND';

export class ServiceUnavailableError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SERVICE_UNAVAILABLE', 503, context);
    this.name = 'ServiceUnavailableError';
  }
}

export class AuthError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', 401, context);
    this.name = 'AuthError';
  }
}

export class RootNotFoundError extends AppError {
  constructor(rootPath: string) {
    super(`Attachment root not found or not a directory: ${rootPath}`, 'ROOT_NOT_FOUND', 404, { rootPath });
    this.name = 'RootNotFoundError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, errors: string[] = []) {
    super(message, 'CONFIG_INVALID', 400, { errors });
    this.name = 'ConfigError';
  }
}

/**
 * Refuses or fails a single item; the run carries on and the item's
 * outcome carries `itemCode`.
 */
export class ItemError extends AppError {
  constructor(
    message: string,
    public readonly itemCode: ItemErrorCode,
    statusCode: number,
    context?: Record<string, unknown>
  ) {
    super(message, itemCode, statusCode, context);
    this.name = 'ItemError';
  }
}

export class AmbiguousMatchError extends ItemError {
  constructor(filePath: string, itemIds: string[], reason = 'filename matches an attachment elsewhere') {
    super(`${reason} (${itemIds.join(', ')})`, 'AMBIGUOUS_MATCH', 409, { filePath, itemIds });
    this.name = 'AmbiguousMatchError';
  }
}

export class RestoreConflictError extends ItemError {
  constructor(targetPath: string, reason = 'original path is occupied by a different file') {
    super(reason, 'RESTORE_CONFLICT', 409, { targetPath });
    this.name = 'RestoreConflictError';
  }
}

export class MutationFailedError extends ItemError {
  constructor(message: string, code: 'MUTATION_FAILED' | 'TIMEOUT' = 'MUTATION_FAILED', context?: Record<string, unknown>) {
    super(message, code, 500, context);
    this.name = 'MutationFailedError';
  }
}

export function isFatalError(error: unknown): error is AppError {
  return error instanceof AppError && (FATAL_ERROR_CODES as readonly string[]).includes(error.code);
}
