export type CompactionErrorKind =
  | "ConfigurationError"
  | "MalformedLogError"
  | "StoreReadError"
  | "StoreWriteError";

export type ErrorKind = CompactionErrorKind | "UnknownError";

export abstract class CompactionError extends Error {
  abstract readonly kind: CompactionErrorKind;
  /** The message without the log id prefix. */
  readonly detail: string;

  constructor(detail: string, options?: { cause?: unknown; logId?: string }) {
    super(
      options?.logId ? `${options.logId}: ${detail}` : detail,
      options && "cause" in options ? { cause: options.cause } : undefined,
    );
    this.name = new.target.name;
    this.detail = detail;
  }
}

/** An invalid tunable. Raised before any log is touched. */
export class ConfigurationError extends CompactionError {
  readonly kind = "ConfigurationError";
}

/** A stored log violates the message model: missing role, broken ordering, unparseable record. */
export class MalformedLogError extends CompactionError {
  readonly kind = "MalformedLogError";

  constructor(
    readonly logId: string | undefined,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, { ...options, logId });
  }
}

export class StoreReadError extends CompactionError {
  readonly kind = "StoreReadError";

  constructor(readonly logId: string, message: string, options?: { cause?: unknown }) {
    super(message, { ...options, logId });
  }
}

/** The store could not swap in a rewritten log. The original stays in place. */
export class StoreWriteError extends CompactionError {
  readonly kind = "StoreWriteError";

  constructor(readonly logId: string, message: string, options?: { cause?: unknown }) {
    super(message, { ...options, logId });
  }
}

export function isCompactionError(error: unknown): error is CompactionError {
  return error instanceof CompactionError;
}

export function errorKind(error: unknown): ErrorKind {
  return isCompactionError(error) ? error.kind : "UnknownError";
}

export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

/** Error text for a report line that already names the log. */
export function describeFailure(error: unknown): string {
  return isCompactionError(error) ? error.detail : describeError(error);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
