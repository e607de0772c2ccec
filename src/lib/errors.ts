export type CoreErrorCode =
  | 'capacity_exceeded'
  | 'evil_character_rejected'
  | 'duplicate_member'
  | 'member_not_found'
  | 'invalid_query'
  | 'embedding_unavailable'
  | 'team_not_found'
  | 'character_not_found'
  | 'team_name_taken'
  | 'concurrent_modification'
  | 'index_closed';

const STATUS_BY_CODE: Record<CoreErrorCode, number> = {
  capacity_exceeded: 422,
  evil_character_rejected: 422,
  duplicate_member: 409,
  member_not_found: 404,
  invalid_query: 400,
  embedding_unavailable: 503,
  team_not_found: 404,
  character_not_found: 404,
  team_name_taken: 409,
  concurrent_modification: 409,
  index_closed: 503,
};

/**
 * Failure raised or returned by the roster core.
 *
 * `transient` marks failures of an external collaborator (the embedding
 * provider) that a caller may retry; every other code is a business-rule
 * outcome meant for display.
 */
export class CoreError extends Error {
  public readonly code: CoreErrorCode;
  public readonly statusCode: number;
  public readonly transient: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(code: CoreErrorCode, message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CoreError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
    this.transient = code === 'embedding_unavailable';
    this.details = options.details;
  }
}

export function isCoreError(err: unknown, code?: CoreErrorCode): err is CoreError {
  return err instanceof CoreError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
