import { silentLogger, type Logger } from "../internal/logger.js";
import type { ErrorKind } from "../rpc/errors.js";
import { UnknownMethodError } from "../rpc/errors.js";
import { dispatch, type RawArguments } from "../rpc/dispatcher.js";
import {
  caseInsensitiveIndex,
  indexByRoute,
  type Convention,
  type MethodDescriptor,
  type MethodIndex,
  type SessionFactory
} from "../rpc/method.js";
import { scanSession } from "../rpc/scanner.js";
import { generateOpenAPI, renderOpenAPI, type OpenAPIOptions } from "../schema/openapi.js";
import { createCallContext } from "../types/context.js";

export interface RpcRequest {
  /** HTTP verb. */
  method: string;
  /** Request path, optionally with a query string. */
  path: string;
  headers?: Record<string, string | undefined>;
  body?: RawArguments;
  signal?: AbortSignal;
}

export interface RpcResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type Router = (request: RpcRequest) => Promise<RpcResponse>;

export interface RouterOptions {
  /** Path prefix stripped before routing, e.g. `/api`. */
  prefix?: string;
  /** Serve the schema document at `GET <prefix>/openapi.json`. */
  openapi?: boolean | OpenAPIOptions;
  logger?: Logger;
}

export interface SessionRouterOptions extends RouterOptions {
  convention?: Convention;
}

const statusByKind: Record<ErrorKind, number> = {
  BadRequest: 400,
  NotFound: 404,
  Internal: 500
};

const TEXT = { "Content-Type": "text/plain; charset=utf-8" };
const JSON_TYPE = { "Content-Type": "application/json" };

function text(status: number, body: string, extra: Record<string, string> = {}): RpcResponse {
  return { status, headers: { ...TEXT, ...extra }, body };
}

/** Method name addressed by `path`, or undefined when the path is outside the prefix. */
function methodName(path: string, prefix: string): string | undefined {
  const pathname = path.split("?", 1)[0] ?? "";
  const base = prefix.replace(/\/+$/, "");
  if (base && pathname !== base && !pathname.startsWith(base + "/")) return undefined;
  const rest = pathname.slice(base.length).replace(/^\/+/, "");
  try {
    return decodeURIComponent(rest);
  } catch {
    return undefined;
  }
}

function buildRouter(
  index: MethodIndex,
  lookup: (name: string) => MethodDescriptor | undefined,
  convention: Convention,
  opts: RouterOptions
): Router {
  const logger = opts.logger ?? silentLogger;
  const prefix = opts.prefix ?? "";
  let schema: string | undefined;

  const serveSchema = (): RpcResponse => {
    const options = typeof opts.openapi === "object" ? opts.openapi : {};
    schema ??= renderOpenAPI(generateOpenAPI(index, options));
    return { status: 200, headers: JSON_TYPE, body: schema };
  };

  return async (request) => {
    const name = methodName(request.path, prefix);
    if (name === undefined || name === "") return text(404, new UnknownMethodError(name ?? "").message);

    const verb = request.method.toUpperCase();
    if (verb === "GET" && opts.openapi && name === "openapi.json") return serveSchema();
    if (verb !== "POST") return text(405, "Method Not Allowed", { Allow: "POST" });

    const method = lookup(name);
    if (!method) {
      logger.debug("unknown method", { method: name });
      return text(404, new UnknownMethodError(name).message);
    }

    const ctx = createCallContext({ method: name, signal: request.signal, headers: request.headers });
    const result = await dispatch(method, request.body, ctx, { logger });
    if (!result.ok) return text(statusByKind[result.kind], result.message);
    if (result.body !== undefined) return { status: 200, headers: JSON_TYPE, body: result.body };
    return convention === "payload" ? { status: 204, headers: {}, body: "" } : { status: 200, headers: {}, body: "" };
  };
}

/**
 * POST-only router over a scanned index.
 *
 * Positional methods are served under their lower-cased name, payload methods
 * under their exact name. Errors become 400/404/500 with a plain-text body;
 * a method without a value answers 200 with an empty body (positional) or 204 (payload).
 */
export function createRouter(index: MethodIndex, opts: RouterOptions = {}): Router {
  const byRoute = indexByRoute(index);
  const convention = [...index.values()][0]?.convention ?? "positional";
  return buildRouter(
    index,
    (name) => byRoute.get(convention === "positional" ? name.toLowerCase() : name),
    convention,
    opts
  );
}

/**
 * Router whose receiver is built per request by `factory`.
 * Method names are matched case-insensitively; a failing factory answers 500
 * before any method runs.
 */
export function createSessionRouter<T extends object>(
  serviceClass: abstract new (...args: never[]) => T,
  factory: SessionFactory<T>,
  opts: SessionRouterOptions = {}
): Router {
  const convention = opts.convention ?? "positional";
  const index = scanSession(serviceClass, factory, { convention, logger: opts.logger });
  const byName = caseInsensitiveIndex(index);
  return buildRouter(index, (name) => byName.get(name.toLowerCase()), convention, opts);
}
