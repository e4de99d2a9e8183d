import { decodeValue, encode, parseJson } from "../codec/json.js";
import { silentLogger, type Logger } from "../internal/logger.js";
import { toErrorMessage } from "../internal/utils.js";
import type { CallContext } from "../types/context.js";
import { ApplicationError, DecodeError, RpcError, UnknownMethodError, type ErrorKind } from "./errors.js";
import type { MethodDescriptor, MethodIndex } from "./method.js";

export type RawArguments = string | Uint8Array | undefined;

export type DispatchResult =
  | { readonly ok: true; readonly body?: string }
  | { readonly ok: false; readonly kind: ErrorKind; readonly message: string };

export interface DispatchOptions {
  logger?: Logger;
}

function isBlank(raw: string | Uint8Array): boolean {
  if (typeof raw === "string") return raw.trim().length === 0;
  return raw.every((b) => b === 0x20 || b === 0x0a || b === 0x0d || b === 0x09);
}

function bindPositional(method: MethodDescriptor, raw: RawArguments): unknown[] {
  const expected = method.args.length;
  if (raw === undefined || isBlank(raw)) {
    if (expected === 0) return [];
    throw new DecodeError(`not enough arguments, expected ${expected}`);
  }

  const parsed = parseJson(raw);
  // `null` stands for an empty argument list.
  if (parsed !== null && !Array.isArray(parsed)) {
    throw new DecodeError("arguments must be a JSON array");
  }
  const elements: unknown[] = Array.isArray(parsed) ? parsed : [];
  if (elements.length < expected) {
    throw new DecodeError(`not enough arguments, expected ${expected}`);
  }

  // Trailing elements beyond the declared arguments are ignored.
  return method.args.map((arg, i) => decodeValue(elements[i], arg.type, `argument ${i} (${arg.name})`));
}

function bindPayload(method: MethodDescriptor, raw: RawArguments): unknown[] {
  const arg = method.args[0];
  if (!arg) return [];
  if (raw === undefined || isBlank(raw)) throw new DecodeError("missing request body");
  return [decodeValue(parseJson(raw), arg.type, arg.name)];
}

function bindArguments(method: MethodDescriptor, raw: RawArguments): unknown[] {
  return method.convention === "positional" ? bindPositional(method, raw) : bindPayload(method, raw);
}

function fail(err: RpcError): DispatchResult {
  return { ok: false, kind: err.kind, message: err.message };
}

async function resolveReceiver(method: MethodDescriptor, ctx: CallContext): Promise<object> {
  const bound = method.boundReceiver;
  if (bound.kind === "instance") return bound.instance;
  try {
    return await bound.factory(ctx);
  } catch (err) {
    throw new ApplicationError(toErrorMessage(err), { cause: err });
  }
}

/**
 * Binds `raw` to the method's arguments, invokes it and encodes the outcome.
 *
 * Never rejects for call-level failures: decode problems come back as
 * `BadRequest`, and failures of the session factory or the method itself as
 * `Internal` carrying the thrown error's message. For session-bound methods the
 * factory runs first; when it fails the method is not invoked.
 */
export async function dispatch(
  method: MethodDescriptor,
  raw: RawArguments,
  ctx: CallContext,
  opts: DispatchOptions = {}
): Promise<DispatchResult> {
  const logger = opts.logger ?? silentLogger;

  let receiver: object;
  let args: unknown[];
  try {
    receiver = await resolveReceiver(method, ctx);
    args = bindArguments(method, raw);
  } catch (err) {
    if (!(err instanceof RpcError)) throw err;
    logger.debug("call rejected", { method: method.name, kind: err.kind, error: err.message });
    return fail(err);
  }

  let value: unknown;
  try {
    value = await method.invoke(receiver, method.acceptsContext ? [ctx, ...args] : args);
  } catch (err) {
    if (!method.producesError) {
      logger.warn("method threw without declaring an error result", { method: method.name });
    }
    return fail(new ApplicationError(toErrorMessage(err), { cause: err }));
  }

  if (!method.producesValue || !method.resultType) return { ok: true };

  try {
    return { ok: true, body: encode(value, method.resultType) };
  } catch (err) {
    logger.error("failed to encode result", { method: method.name, error: toErrorMessage(err) });
    return fail(new ApplicationError(`failed to encode result: ${toErrorMessage(err)}`, { cause: err }));
  }
}

/** Looks `name` up in `index` before dispatching; unknown names are `NotFound`. */
export async function dispatchByName(
  index: MethodIndex,
  name: string,
  raw: RawArguments,
  ctx: CallContext,
  opts: DispatchOptions = {}
): Promise<DispatchResult> {
  const method = index.get(name);
  if (!method) return fail(new UnknownMethodError(name));
  return dispatch(method, raw, ctx, opts);
}
