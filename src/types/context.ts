/**
 * Ambient request context handed to methods that declare `@Rpc.context()`.
 *
 * Passed through unmodified; cancellation via `signal` is the method's concern.
 */
export interface CallContext {
  /** Method name as requested by the caller. */
  readonly method: string;
  readonly signal: AbortSignal;
  readonly headers: Readonly<Record<string, string | undefined>>;
  /** Free-form request-scoped values (e.g. set by a session factory's caller). */
  readonly values: ReadonlyMap<string, unknown>;
}

export interface CallContextInit {
  method?: string;
  signal?: AbortSignal;
  headers?: Record<string, string | undefined>;
  values?: Iterable<readonly [string, unknown]>;
}

export function createCallContext(init: CallContextInit = {}): CallContext {
  return Object.freeze({
    method: init.method ?? "",
    signal: init.signal ?? new AbortController().signal,
    headers: Object.freeze({ ...(init.headers ?? {}) }),
    values: new Map(init.values ?? [])
  });
}
