import type { CallContext } from "../types/context.js";
import type { TypeDescriptor } from "../types/descriptor.js";

/**
 * - `positional`: arguments travel as one JSON array, routed by lower-cased name.
 * - `payload`: at most one argument travels as a single JSON value, routed by exact name.
 */
export type Convention = "positional" | "payload";

export type SessionFactory<T extends object = object> = (ctx: CallContext) => T | Promise<T>;

export type BoundReceiver =
  | { readonly kind: "instance"; readonly instance: object }
  | { readonly kind: "factory"; readonly factory: SessionFactory };

export interface ArgumentInfo {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly description?: string;
}

export type Invoker = (receiver: object, args: readonly unknown[]) => unknown;

/**
 * Validated, callable record for one exposed method.
 * Frozen on construction and shared across concurrent dispatches.
 */
export interface MethodDescriptor {
  readonly name: string;
  /** Transport key: lower-cased name for `positional`, exact name for `payload`. */
  readonly route: string;
  readonly convention: Convention;
  /** Data arguments in declaration order, without the context parameter. */
  readonly argumentTypes: readonly TypeDescriptor[];
  readonly args: readonly ArgumentInfo[];
  readonly acceptsContext: boolean;
  readonly producesValue: boolean;
  readonly producesError: boolean;
  /** Declared value result; present iff `producesValue`. */
  readonly resultType?: TypeDescriptor;
  readonly description?: string;
  readonly boundReceiver: BoundReceiver;
  readonly invoke: Invoker;
}

export type MethodIndex = ReadonlyMap<string, MethodDescriptor>;

export function routeFor(name: string, convention: Convention): string {
  return convention === "positional" ? name.toLowerCase() : name;
}

/** Re-keys an index by route (lower-cased for the positional convention). */
export function indexByRoute(index: MethodIndex): Map<string, MethodDescriptor> {
  const out = new Map<string, MethodDescriptor>();
  for (const method of index.values()) out.set(method.route, method);
  return out;
}

/** Re-keys an index by lower-cased name, for case-insensitive lookup. */
export function caseInsensitiveIndex(index: MethodIndex): Map<string, MethodDescriptor> {
  const out = new Map<string, MethodDescriptor>();
  for (const [name, method] of index) out.set(name.toLowerCase(), method);
  return out;
}
