import { Buffer } from "node:buffer";

import { DEFAULT_MAX_BODY_BYTES } from "../internal/config.js";
import { silentLogger, type Logger } from "../internal/logger.js";
import { toErrorMessage } from "../internal/utils.js";
import type { Router } from "./router.js";

/** The parts of `http.IncomingMessage` the listener reads. */
export interface NodeRequestLike extends AsyncIterable<Uint8Array | string> {
  readonly method?: string;
  readonly url?: string;
  readonly headers: Readonly<Record<string, string | string[] | undefined>>;
}

/** The parts of `http.ServerResponse` the listener writes. */
export interface NodeResponseLike {
  statusCode: number;
  readonly writableFinished: boolean;
  on(event: "close", listener: () => void): unknown;
  setHeader(name: string, value: string): unknown;
  end(chunk: string): unknown;
}

export interface NodeListenerOptions {
  maxBodyBytes?: number;
  logger?: Logger;
}

class BodyTooLargeError extends Error {
  override name = "BodyTooLargeError";
}

async function readBody(req: NodeRequestLike, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk);
    size += buf.length;
    if (size > limit) throw new BodyTooLargeError(`Request body exceeds ${limit} bytes`);
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}

function flattenHeaders(headers: NodeRequestLike["headers"]): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(headers)) out[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
  return out;
}

function send(res: NodeResponseLike, status: number, headers: Record<string, string>, body: string): void {
  res.statusCode = status;
  for (const [k, v] of Object.entries(headers)) res.setHeader(k, v);
  res.end(body);
}

/**
 * Adapts a router to a `node:http` request listener:
 * `http.createServer(toNodeListener(createRouter(scan(service))))`.
 */
export function toNodeListener(router: Router, opts: NodeListenerOptions = {}) {
  const limit = opts.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const logger = opts.logger ?? silentLogger;

  const handle = async (req: NodeRequestLike, res: NodeResponseLike, signal: AbortSignal): Promise<void> => {
    let body: Buffer;
    try {
      body = await readBody(req, limit);
    } catch (err) {
      if (!(err instanceof BodyTooLargeError)) throw err;
      send(res, 413, { "Content-Type": "text/plain; charset=utf-8" }, err.message);
      return;
    }

    const response = await router({
      method: req.method ?? "GET",
      path: req.url ?? "/",
      headers: flattenHeaders(req.headers),
      body: body.length > 0 ? body : undefined,
      signal
    });
    send(res, response.status, response.headers, response.body);
  };

  return (req: NodeRequestLike, res: NodeResponseLike): void => {
    // Closed before the response was written: the client went away.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });
    handle(req, res, controller.signal).catch((err: unknown) => {
      logger.error("request failed", { url: req.url, error: toErrorMessage(err) });
      send(res, 500, { "Content-Type": "text/plain; charset=utf-8" }, "Internal Server Error");
    });
  };
}
