import { Buffer } from "node:buffer";
import { z } from "zod";

import { isRecord, toErrorMessage } from "../internal/utils.js";
import { DecodeError } from "../rpc/errors.js";
import {
  isByteSequence,
  isDateType,
  serializedNameOf,
  visibleFields,
  type IntegerName,
  type PrimitiveType,
  type StructType,
  type TypeDescriptor
} from "../types/descriptor.js";

/**
 * JSON codec driven by type descriptors.
 *
 * Decoding validates with zod schemas compiled once per descriptor. Absent or
 * `null` values of non-pointer kinds decode to the kind's zero value; unknown
 * object keys are ignored.
 */

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const FLOAT32_MAX = 3.4028234663852886e38;

const integerBounds: Record<IntegerName, readonly [number, number]> = {
  int: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
  int8: [-128, 127],
  int16: [-32768, 32767],
  int32: [-2147483648, 2147483647],
  int64: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
  uint: [0, Number.MAX_SAFE_INTEGER],
  uint8: [0, 255],
  uint16: [0, 65535],
  uint32: [0, 4294967295],
  uint64: [0, Number.MAX_SAFE_INTEGER]
};

const compiled = new WeakMap<TypeDescriptor, z.ZodTypeAny>();

/** Wire value standing in for an absent or null input; `null` where the kind has none. */
function wireZero(type: TypeDescriptor): unknown {
  switch (type.kind) {
    case "primitive":
      if (type.name === "bool") return false;
      if (type.name === "string") return "";
      return 0;
    case "slice":
      return isByteSequence(type) ? "" : [];
    case "array":
      return new Array<null>(type.length).fill(null);
    case "map":
    case "struct":
      return {};
    case "named":
      return wireZero(type.underlying);
    case "pointer":
    case "opaque":
    case "any":
    case "context":
    case "error":
      return null;
  }
}

function primitiveSchema(type: PrimitiveType): z.ZodTypeAny {
  switch (type.name) {
    case "bool":
      return z.boolean();
    case "string":
      return z.string();
    case "float32":
      return z.number().min(-FLOAT32_MAX).max(FLOAT32_MAX);
    case "float64":
      return z.number();
    default: {
      const [min, max] = integerBounds[type.name];
      return z.number().int().min(min).max(max);
    }
  }
}

function structSchema(type: StructType): z.ZodTypeAny {
  const fields = visibleFields(type);
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const f of fields) shape[serializedNameOf(f)] = schemaFor(f.type);
  return z.object(shape).transform((wire) => {
    const out: Record<string, unknown> = {};
    for (const f of fields) out[f.name] = wire[serializedNameOf(f)];
    return out;
  });
}

const bytesSchema = z
  .string()
  .regex(BASE64, "Expected base64 string")
  .transform((s) => new Uint8Array(Buffer.from(s, "base64")));

const dateSchema = z
  .string()
  .datetime({ offset: true, message: "Expected RFC 3339 date-time string" })
  .transform((s) => new Date(s))
  .nullable();

function build(type: TypeDescriptor): z.ZodTypeAny {
  switch (type.kind) {
    case "primitive":
      return primitiveSchema(type);
    case "pointer":
      return schemaFor(type.elem).nullable();
    case "slice":
      return isByteSequence(type) ? bytesSchema : z.array(schemaFor(type.elem));
    case "array":
      return z.array(schemaFor(type.elem)).length(type.length);
    case "map":
      return z.record(z.string(), schemaFor(type.value));
    case "struct": {
      // Lazy so self-referential structs compile; the cache entry exists before expansion.
      let expanded: z.ZodTypeAny | undefined;
      return z.lazy(() => (expanded ??= structSchema(type)));
    }
    case "named":
      return schemaFor(type.underlying);
    case "opaque":
      return isDateType(type) ? dateSchema : z.unknown();
    case "any":
      return z.unknown();
    case "context":
    case "error":
      return z.never();
  }
}

/** zod schema that decodes the wire form of `type` into its runtime value. */
export function schemaFor(type: TypeDescriptor): z.ZodTypeAny {
  const cached = compiled.get(type);
  if (cached) return cached;

  let schema: z.ZodTypeAny | undefined;
  const zero = wireZero(type);
  const inner = z.lazy(() => (schema ??= build(type)));
  const wrapped = z.preprocess((v) => (v === null || v === undefined ? structuredClone(zero) : v), inner);
  compiled.set(type, wrapped);
  return wrapped;
}

function formatIssue(error: z.ZodError, label: string): string {
  const issue = error.issues[0];
  if (!issue) return `${label}: invalid value`;
  const where = issue.path.length > 0 ? `${label}.${issue.path.join(".")}` : label;
  return `${where}: ${issue.message}`;
}

export function parseJson(raw: string | Uint8Array): unknown {
  const text = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf-8");
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    throw new DecodeError(`Invalid JSON: ${toErrorMessage(err)}`, { cause: err });
  }
}

/** Validates an already-parsed wire value against `type`. */
export function decodeValue(value: unknown, type: TypeDescriptor, label = "value"): unknown {
  const parsed = schemaFor(type).safeParse(value);
  if (!parsed.success) throw new DecodeError(formatIssue(parsed.error, label), { cause: parsed.error });
  return parsed.data;
}

export function decode(raw: string | Uint8Array, type: TypeDescriptor, label = "value"): unknown {
  return decodeValue(parseJson(raw), type, label);
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === "") return true;
  if (Array.isArray(value) || value instanceof Uint8Array) return value.length === 0;
  if (value instanceof Map) return value.size === 0;
  return false;
}

function entriesOf(value: unknown): Array<[string, unknown]> | undefined {
  if (value instanceof Map) return [...value.entries()].map(([k, v]) => [String(k), v]);
  if (isRecord(value)) return Object.entries(value);
  return undefined;
}

/** Converts a runtime value into its JSON-ready wire form. */
export function toWire(value: unknown, type: TypeDescriptor): unknown {
  if (value === undefined || value === null) return null;
  switch (type.kind) {
    case "pointer":
      return toWire(value, type.elem);
    case "slice":
      if (isByteSequence(type) && value instanceof Uint8Array) return Buffer.from(value).toString("base64");
      return Array.isArray(value) ? value.map((v) => toWire(v, type.elem)) : value;
    case "array":
      return Array.isArray(value) ? value.map((v) => toWire(v, type.elem)) : value;
    case "map": {
      const entries = entriesOf(value);
      if (!entries) return value;
      return Object.fromEntries(entries.map(([k, v]) => [k, toWire(v, type.value)]));
    }
    case "struct": {
      if (!isRecord(value)) return value;
      const out: Record<string, unknown> = {};
      for (const f of visibleFields(type)) {
        const v = value[f.name];
        if (f.optional && isEmpty(v)) continue;
        out[serializedNameOf(f)] = toWire(v, f.type);
      }
      return out;
    }
    case "named":
      return toWire(value, type.underlying);
    case "opaque":
      return value instanceof Date ? value.toISOString() : value;
    case "primitive":
    case "any":
    case "context":
    case "error":
      return value;
  }
}

/** Encodes a result value; `JSON.stringify` failures (cycles, bigint) propagate. */
export function encode(value: unknown, type: TypeDescriptor): string {
  return JSON.stringify(toWire(value, type));
}
