/**
 * Target-neutral schema tree produced by the type walker.
 * Rendered to JSON Schema by the OpenAPI assembler and to TypeScript by the client generator.
 */

export type PrimitiveSchemaType = "string" | "integer" | "number" | "boolean";

export interface PrimitiveNode {
  readonly kind: "primitive";
  readonly type: PrimitiveSchemaType;
  readonly format?: string;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly description?: string;
  /** Literal TypeScript type used by the client generator instead of the mapped one. */
  readonly tsType?: string;
}

export interface AnyNode {
  readonly kind: "any";
}

export interface ArrayNode {
  readonly kind: "array";
  readonly items: SchemaNode;
  readonly minItems?: number;
  readonly maxItems?: number;
}

export interface ObjectNode {
  readonly kind: "object";
  /** Component name; absent for inline objects and mappings. */
  readonly name?: string;
  readonly description?: string;
  /** Keyed by serialized field name, in declaration order. */
  readonly properties: Map<string, SchemaNode>;
  /** Properties not marked "omit if empty". */
  readonly required: Set<string>;
  /** Value schema of a keyed mapping. */
  readonly additionalProperties?: SchemaNode;
  /** Key schema of a keyed mapping; informational only. */
  readonly keys?: SchemaNode;
}

export interface ReferenceNode {
  readonly kind: "reference";
  readonly name: string;
}

export interface NullableNode {
  readonly kind: "nullable";
  readonly inner: SchemaNode;
}

export type SchemaNode = PrimitiveNode | AnyNode | ArrayNode | ObjectNode | ReferenceNode | NullableNode;

export const ANY: AnyNode = Object.freeze({ kind: "any" });

export function objectNode(init: { name?: string; description?: string } = {}): ObjectNode {
  return { kind: "object", ...init, properties: new Map(), required: new Set() };
}
