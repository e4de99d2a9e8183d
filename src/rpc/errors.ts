/**
 * Outcome classification reported to the transport layer.
 * Mapping to status codes lives in the router.
 */
export type ErrorKind = "BadRequest" | "NotFound" | "Internal";

export class RpcError extends Error {
  override name = "RpcError";

  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Malformed or insufficient encoded input. */
export class DecodeError extends RpcError {
  override name = "DecodeError";

  constructor(message: string, options?: { cause?: unknown }) {
    super("BadRequest", message, options);
  }
}

/** The invoked method or session factory failed. */
export class ApplicationError extends RpcError {
  override name = "ApplicationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super("Internal", message, options);
  }
}

export class UnknownMethodError extends RpcError {
  override name = "UnknownMethodError";

  constructor(readonly method: string) {
    super("NotFound", `Unknown method: ${method}`);
  }
}
