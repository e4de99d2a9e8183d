import type { TypeDescriptor } from "../types/descriptor.js";

export interface ApiArgOptions {
  /** Parameter name used by generated clients; defaults to `arg<index>`. */
  name?: string;
  type: TypeDescriptor;
  description?: string;
}

export interface ApiArgMeta extends ApiArgOptions {
  parameterIndex: number;
}

export interface ApiMethodOptions {
  /**
   * Declared results, in order. `t.error()` marks the error capability.
   * A single descriptor is shorthand for a one-element list.
   */
  results?: TypeDescriptor | readonly TypeDescriptor[];
  description?: string;
}

export interface ApiMethodMeta {
  args: ApiArgMeta[];
  /** Undefined until the method itself is declared (parameter decorators run first). */
  results?: readonly TypeDescriptor[];
  description?: string;
}

export interface ApiServiceMeta {
  name?: string;
  description?: string;
}

export interface MethodSignature {
  params: readonly (TypeDescriptor | ApiArgOptions)[];
  results?: readonly TypeDescriptor[];
  description?: string;
}

type MethodKey = string | symbol;

const methodsByTarget = new WeakMap<object, Map<MethodKey, ApiMethodMeta>>();
const servicesByClass = new WeakMap<object, ApiServiceMeta>();

function getOrCreateMethodMeta(target: object, methodName: MethodKey): ApiMethodMeta {
  let byMethod = methodsByTarget.get(target);
  if (!byMethod) {
    byMethod = new Map();
    methodsByTarget.set(target, byMethod);
  }
  let meta = byMethod.get(methodName);
  if (!meta) {
    meta = { args: [] };
    byMethod.set(methodName, meta);
  }
  return meta;
}

function toResultList(results: ApiMethodOptions["results"]): readonly TypeDescriptor[] {
  if (results === undefined) return [];
  if (isDescriptorList(results)) return [...results];
  return [results];
}

function isDescriptorList(value: TypeDescriptor | readonly TypeDescriptor[]): value is readonly TypeDescriptor[] {
  return Array.isArray(value);
}

export function registerArg(params: { target: object; methodName: MethodKey; meta: ApiArgMeta }): void {
  const meta = getOrCreateMethodMeta(params.target, params.methodName);
  // Replace if the same parameter index is declared twice.
  const existingIdx = meta.args.findIndex((a) => a.parameterIndex === params.meta.parameterIndex);
  if (existingIdx !== -1) meta.args.splice(existingIdx, 1);
  meta.args.push(params.meta);
}

export function registerMethod(params: { target: object; methodName: MethodKey; options: ApiMethodOptions }): void {
  const meta = getOrCreateMethodMeta(params.target, params.methodName);
  meta.results = toResultList(params.options.results);
  meta.description = params.options.description;
}

export function registerService(target: object, meta: ApiServiceMeta): void {
  servicesByClass.set(target, meta);
}

/**
 * Functional form of the decorators, for classes or plain objects that cannot use them.
 * `target` is the object whose own property holds the method (usually a prototype).
 */
export function declareMethod(target: object, methodName: string, signature: MethodSignature): void {
  signature.params.forEach((param, parameterIndex) => {
    const options: ApiArgOptions = "kind" in param ? { type: param } : param;
    registerArg({ target, methodName, meta: { ...options, parameterIndex } });
  });
  registerMethod({
    target,
    methodName,
    options: { results: signature.results ?? [], description: signature.description }
  });
}

export function getMethodMeta(target: object, methodName: MethodKey): ApiMethodMeta | undefined {
  const meta = methodsByTarget.get(target)?.get(methodName);
  if (!meta) return undefined;
  return {
    args: [...meta.args].sort((a, b) => a.parameterIndex - b.parameterIndex),
    results: meta.results,
    description: meta.description
  };
}

export function getServiceMeta(target: object): ApiServiceMeta | undefined {
  return servicesByClass.get(target);
}
