import { getMethodMeta, type ApiMethodMeta } from "../api/registry.js";
import { silentLogger, type Logger } from "../internal/logger.js";
import { compareNames } from "../internal/utils.js";
import type { TypeDescriptor } from "../types/descriptor.js";
import {
  routeFor,
  type ArgumentInfo,
  type BoundReceiver,
  type Convention,
  type MethodDescriptor,
  type SessionFactory
} from "./method.js";

export interface ScanOptions {
  /** Defaults to `positional`. */
  convention?: Convention;
  logger?: Logger;
}

type Candidate = {
  name: string;
  fn: (...args: unknown[]) => unknown;
  meta: ApiMethodMeta | undefined;
};

type Accepted = {
  args: ArgumentInfo[];
  acceptsContext: boolean;
  producesValue: boolean;
  producesError: boolean;
  resultType?: TypeDescriptor;
};

type Verdict = { ok: true; value: Accepted } | { ok: false; reason: string };

function isFunction(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === "function";
}

function findMeta(chain: object[], from: number, name: string): ApiMethodMeta | undefined {
  for (let i = from; i < chain.length; i++) {
    const meta = getMethodMeta(chain[i], name);
    if (meta) return meta;
  }
  return undefined;
}

/** Own object first, then its prototypes, stopping before Object.prototype. */
function prototypeChain(source: object): object[] {
  const chain: object[] = [];
  let cur: object | null = source;
  while (cur && cur !== Object.prototype && cur !== Function.prototype) {
    chain.push(cur);
    cur = Object.getPrototypeOf(cur);
  }
  return chain;
}

function collectCandidates(source: object): Candidate[] {
  const chain = prototypeChain(source);
  const seen = new Set<string>();
  const out: Candidate[] = [];

  chain.forEach((owner, depth) => {
    for (const name of Object.getOwnPropertyNames(owner)) {
      if (name === "constructor" || seen.has(name)) continue;
      seen.add(name);
      const prop = Object.getOwnPropertyDescriptor(owner, name);
      // Accessors are never methods.
      if (!prop || !("value" in prop) || !isFunction(prop.value)) continue;
      out.push({ name, fn: prop.value, meta: findMeta(chain, depth, name) });
    }
  });

  return out.sort((a, b) => compareNames(a.name, b.name));
}

function reject(reason: string): Verdict {
  return { ok: false, reason };
}

function isCapability(type: TypeDescriptor): boolean {
  return type.kind === "context" || type.kind === "error";
}

function checkSignature(candidate: Candidate, convention: Convention): Verdict {
  const { name, fn, meta } = candidate;
  if (name.startsWith("_")) return reject("not public");
  if (!meta || meta.results === undefined) return reject("not declared with @Rpc.method");

  const results = meta.results;
  const out = results.length;
  const producesError = out > 0 && results[out - 1].kind === "error";
  if (out > 2) return reject(`too many results (${out})`);
  if (out === 2 && !producesError) return reject("second result is not an error");

  const producesValue = (out === 1 && !producesError) || out === 2;
  const resultType = producesValue ? results[0] : undefined;
  if (resultType && isCapability(resultType)) return reject(`result of kind "${resultType.kind}"`);

  const params = meta.args;
  for (let i = 0; i < params.length; i++) {
    if (params[i].parameterIndex !== i) return reject(`parameter ${i} is not declared`);
  }
  if (fn.length > params.length) return reject(`parameter ${params.length} is not declared`);

  const acceptsContext = params.length > 0 && params[0].type.kind === "context";
  const data = acceptsContext ? params.slice(1) : params;
  for (const p of data) {
    if (p.type.kind === "context") return reject(`context parameter at position ${p.parameterIndex}`);
    if (p.type.kind === "error") return reject(`error parameter at position ${p.parameterIndex}`);
  }
  if (convention === "payload" && data.length > 1) {
    return reject(`${data.length} data parameters, payload convention accepts at most one`);
  }

  const args: ArgumentInfo[] = data.map((p) => ({
    name: p.name ?? `arg${p.parameterIndex}`,
    type: p.type,
    description: p.description
  }));

  return { ok: true, value: { args, acceptsContext, producesValue, producesError, resultType } };
}

function buildIndex(
  source: object,
  receiver: BoundReceiver,
  opts: ScanOptions
): Map<string, MethodDescriptor> {
  const convention = opts.convention ?? "positional";
  const logger = opts.logger ?? silentLogger;
  const res = new Map<string, MethodDescriptor>();

  for (const candidate of collectCandidates(source)) {
    const verdict = checkSignature(candidate, convention);
    if (!verdict.ok) {
      logger.debug("method skipped", { method: candidate.name, reason: verdict.reason });
      continue;
    }
    const { fn, name } = candidate;
    const accepted = verdict.value;
    const descriptor: MethodDescriptor = {
      name,
      route: routeFor(name, convention),
      convention,
      argumentTypes: Object.freeze(accepted.args.map((a) => a.type)),
      args: Object.freeze(accepted.args.map((a) => Object.freeze(a))),
      acceptsContext: accepted.acceptsContext,
      producesValue: accepted.producesValue,
      producesError: accepted.producesError,
      resultType: accepted.resultType,
      description: candidate.meta?.description,
      boundReceiver: receiver,
      invoke: (target, args) => Reflect.apply(fn, target, args)
    };
    res.set(name, Object.freeze(descriptor));
  }
  return res;
}

/**
 * Indexes the declared methods of `object` (usually a class instance).
 *
 * A method is exposed when it is declared with `@Rpc.method` (or `Rpc.declare`),
 * has 0, 1 or 2 results where a second result must be `t.error()`, and every
 * parameter is declared. An optional `@Rpc.context()` parameter is accepted in
 * first position. Methods failing these rules are skipped silently.
 */
export function scan(object: object, opts: ScanOptions = {}): Map<string, MethodDescriptor> {
  return buildIndex(object, { kind: "instance", instance: object }, opts);
}

/**
 * Indexes the declared methods of a class whose instances are created per call by `factory`.
 */
export function scanSession<T extends object>(
  serviceClass: abstract new (...args: never[]) => T,
  factory: SessionFactory<T>,
  opts: ScanOptions = {}
): Map<string, MethodDescriptor> {
  const prototype: unknown = serviceClass.prototype;
  if (!prototype || typeof prototype !== "object") {
    throw new TypeError("scanSession expects a class with a prototype");
  }
  return buildIndex(prototype, { kind: "factory", factory }, opts);
}
