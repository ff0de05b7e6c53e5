// Error taxonomy shared by the registry, bridge and protocol layers

export type ErrorKind =
  | "ValidationError"
  | "SessionNotFound"
  | "GenerationError"
  | "GenerationBusy"
  | "ModelError"
  | "InternalError";

export type ChatErrorOptions = ErrorOptions & { sessionId?: string };

export class ChatError extends Error {
  readonly kind: ErrorKind;
  readonly sessionId?: string;

  constructor(kind: ErrorKind, message: string, options: ChatErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.sessionId = options.sessionId;
  }
}

export type ValidationConstraint =
  | "malformed_command"
  | "unsupported_type"
  | "size_exceeded"
  | "undecodable_content";

export class ValidationError extends ChatError {
  readonly constraint: ValidationConstraint;

  constructor(
    message: string,
    constraint: ValidationConstraint = "malformed_command",
    options: ChatErrorOptions = {},
  ) {
    super("ValidationError", message, options);
    this.constraint = constraint;
  }
}

export class SessionNotFoundError extends ChatError {
  constructor(sessionId: string) {
    super("SessionNotFound", `session not found: ${sessionId}`, { sessionId });
  }
}

export class GenerationBusyError extends ChatError {
  constructor(sessionId: string, message = `a generation is already running for ${sessionId}`) {
    super("GenerationBusy", message, { sessionId });
  }
}

export class GenerationError extends ChatError {
  constructor(message: string, options: ChatErrorOptions = {}) {
    super("GenerationError", message, options);
  }
}

export class ModelError extends ChatError {
  constructor(message: string, options: ChatErrorOptions = {}) {
    super("ModelError", message, options);
  }
}

export function toChatError(err: unknown): ChatError {
  if (err instanceof ChatError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ChatError("InternalError", message, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
