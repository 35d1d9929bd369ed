// ---------------------------------------------------------------------------
// RelayError — base for every error a caller of the relay can observe
// ---------------------------------------------------------------------------

export type RelayErrorCode =
  | "persistence_failure"
  | "delivery_attempt_failure"
  | "invalid_cursor"
  | "membership_unavailable"
  | "message_not_found"
  | "conversation_not_found"
  | "validation_error";

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly retryable: boolean;

  constructor(
    code: RelayErrorCode,
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

/** The store rejected a write; nothing from the call is observable. */
export class PersistenceFailure extends RelayError {
  constructor(message: string, cause?: unknown) {
    super("persistence_failure", message, { retryable: true, cause });
  }
}

/** A push did not reach the connection. Recovered by redelivery. */
export class DeliveryAttemptFailure extends RelayError {
  constructor(message: string, cause?: unknown) {
    super("delivery_attempt_failure", message, { retryable: true, cause });
  }
}

export class InvalidCursor extends RelayError {
  constructor(message: string) {
    super("invalid_cursor", message);
  }
}

export class MembershipSnapshotUnavailable extends RelayError {
  constructor(conversationId: string, cause?: unknown) {
    super(
      "membership_unavailable",
      `membership for ${conversationId} is unavailable`,
      { retryable: true, cause },
    );
  }
}

export class MessageNotFound extends RelayError {
  constructor(messageId: string) {
    super("message_not_found", `message ${messageId} not found`);
  }
}

export class ConversationNotFound extends RelayError {
  constructor(conversationId: string) {
    super("conversation_not_found", `conversation ${conversationId} not found`);
  }
}

export class ValidationError extends RelayError {
  constructor(message: string) {
    super("validation_error", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
