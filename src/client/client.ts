import type { Convention } from "../rpc/method.js";

export class RpcClientError extends Error {
  override name = "RpcClientError";

  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
  }
}

export type RpcMethod = (...args: unknown[]) => Promise<unknown>;

export type RpcClient = Readonly<Record<string, RpcMethod>>;

export interface ClientInit {
  /** Defaults to the global `fetch`. */
  fetch?: typeof fetch;
  /** Defaults to `positional`. */
  convention?: Convention;
  headers?: Record<string, string>;
}

/**
 * Dynamic client: every property is a remote method.
 *
 * `await createClient("http://host/api").add(2, 3)` posts `[2,3]` to `/add`.
 * Under the payload convention the first argument alone is sent, as is.
 * Non-2xx responses throw `RpcClientError` with the response text.
 */
export function createClient(baseUrl: string, init: ClientInit = {}): RpcClient {
  const doFetch = init.fetch ?? fetch;
  const convention = init.convention ?? "positional";
  const base = baseUrl.replace(/\/+$/, "");
  const cache = new Map<string, RpcMethod>();

  const call = async (name: string, args: unknown[]): Promise<unknown> => {
    const route = convention === "positional" ? name.toLowerCase() : name;
    const payload = convention === "positional" ? args : args[0];
    const res = await doFetch(`${base}/${encodeURIComponent(route)}`, {
      method: "POST",
      body: payload === undefined ? undefined : JSON.stringify(payload),
      headers: { "Content-Type": "application/json", ...init.headers }
    });
    const text = await res.text();
    if (!res.ok) throw new RpcClientError(res.status, text);
    if (text.length === 0) return undefined;
    const value: unknown = JSON.parse(text);
    return value;
  };

  const target: Record<string, RpcMethod> = {};
  return new Proxy(target, {
    get(_target, prop) {
      // Not thenable, so the client itself can be awaited or returned from async code.
      if (typeof prop !== "string" || prop === "then") return undefined;
      let method = cache.get(prop);
      if (!method) {
        method = (...args: unknown[]) => call(prop, args);
        cache.set(prop, method);
      }
      return method;
    }
  });
}
