/**
 * Error taxonomy for the relay
 *
 * Every error carries a stable `code` so the handler can log it without
 * inspecting class names. Wrapped SDK failures keep the original error as `cause`.
 */

export type RelayErrorCode =
  | 'MALFORMED_EVENT'
  | 'PERSISTENCE_FAILED'
  | 'NOTIFICATION_FAILED'
  | 'INVALID_CONFIGURATION';

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The event is not shaped like a push event at all.
 * Missing repository or tag never raises this; those default to "unknown".
 */
export class MalformedEventError extends RelayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('MALFORMED_EVENT', `Malformed image push event: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * The log record write failed. No notification was sent.
 */
export class PersistenceError extends RelayError {
  readonly imageTag: string;

  constructor(imageTag: string, cause: unknown) {
    super('PERSISTENCE_FAILED', `Failed to save log record for tag "${imageTag}": ${messageOf(cause)}`, { cause });
    this.imageTag = imageTag;
  }
}

/**
 * Publishing failed after the record was written. The record is not rolled back.
 */
export class NotificationError extends RelayError {
  readonly imageTag: string;

  constructor(imageTag: string, cause: unknown) {
    super('NOTIFICATION_FAILED', `Failed to publish notification for tag "${imageTag}": ${messageOf(cause)}`, { cause });
    this.imageTag = imageTag;
  }
}

export class ConfigurationError extends RelayError {
  readonly variables: string[];

  constructor(variables: string[]) {
    super('INVALID_CONFIGURATION', `Missing or empty environment variables: ${variables.join(', ')}`);
    this.variables = variables;
  }
}

/**
 * Message of a thrown value, which is not always an Error
 */
export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
