/**
 * ERROR_CODES - Machine-readable error identifiers returned to API clients
 */
export const ERROR_CODES = {
  /** Missing or invalid bearer token */
  UNAUTHENTICATED: 'UNAUTHENTICATED',

  /** The ACL denied the action */
  FORBIDDEN: 'FORBIDDEN',

  /** Request body or parameters failed validation */
  BAD_REQUEST: 'BAD_REQUEST',

  NOT_FOUND: 'NOT_FOUND',

  /** Write rejected by a uniqueness or reference constraint */
  CONFLICT: 'CONFLICT',

  /** Database or role store unreachable */
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  /** Internal server error or unexpected exception */
  INTERNAL: 'INTERNAL'
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
