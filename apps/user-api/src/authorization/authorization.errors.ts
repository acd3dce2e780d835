import { RepositoryError } from '../database/repository.errors';
import type { Action, Resource } from './authorization.types';

/**
 * AuthorizationDeniedError - Expected, user-facing denial (HTTP 403)
 */
export class AuthorizationDeniedError extends Error {
  constructor(
    readonly resource: Resource,
    readonly action: Action
  ) {
    super(`Unauthorized: ${action} on ${resource}`);
    this.name = 'AuthorizationDeniedError';
  }
}

/**
 * AclConnectionError - Roles could not be resolved because the role store was unreachable.
 * Treated as "cannot authorize".
 */
export class AclConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AclConnectionError';
  }
}

/**
 * AclUnknownError - Any other role store failure
 */
export class AclUnknownError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AclUnknownError';
  }
}

export type AclResolutionError = AclConnectionError | AclUnknownError;

/**
 * Translate a role store failure into the ACL error taxonomy
 */
export function toAclError(error: unknown): AclResolutionError {
  if (error instanceof AclConnectionError || error instanceof AclUnknownError) return error;

  const detail = error instanceof Error ? error.message : String(error);
  if (error instanceof RepositoryError && error.kind === 'connection') {
    return new AclConnectionError(`Role store unreachable: ${detail}`, { cause: error });
  }
  return new AclUnknownError(`Role resolution failed: ${detail}`, { cause: error });
}
