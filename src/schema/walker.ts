import {
  BUILTIN_SCOPE,
  identityOf,
  isByteSequence,
  serializedNameOf,
  typeIdentity,
  visibleFields,
  type NamedType,
  type PrimitiveName,
  type StructType,
  type TypeDescriptor
} from "../types/descriptor.js";
import { ANY, objectNode, type ObjectNode, type PrimitiveNode, type SchemaNode } from "./node.js";
import { ComponentRegistry } from "./registry.js";

export interface WalkerOptions {
  /** Nodes returned verbatim for a type identity (`scope.name`). Checked before anything else. */
  hooks?: ReadonlyMap<string, SchemaNode>;
  /** `nullable` wraps pointers; `transparent` walks straight through them. Defaults to `nullable`. */
  pointers?: "nullable" | "transparent";
  /** `alias` registers named non-composite types as components; `inline` walks their underlying type. Defaults to `alias`. */
  namedTypes?: "alias" | "inline";
  registry?: ComponentRegistry;
}

const primitives: Record<PrimitiveName, PrimitiveNode> = {
  bool: { kind: "primitive", type: "boolean" },
  string: { kind: "primitive", type: "string" },
  int: { kind: "primitive", type: "integer" },
  int8: { kind: "primitive", type: "integer", maximum: 127 },
  int16: { kind: "primitive", type: "integer", maximum: 32767 },
  int32: { kind: "primitive", type: "integer", format: "int32" },
  int64: { kind: "primitive", type: "integer", format: "int64" },
  uint: { kind: "primitive", type: "integer", minimum: 0 },
  uint8: { kind: "primitive", type: "integer", minimum: 0, maximum: 255 },
  uint16: { kind: "primitive", type: "integer", minimum: 0, maximum: 65535 },
  uint32: { kind: "primitive", type: "integer", format: "int32", minimum: 0 },
  uint64: { kind: "primitive", type: "integer", format: "int64", minimum: 0 },
  float32: { kind: "primitive", type: "number", format: "float" },
  float64: { kind: "primitive", type: "number", format: "double" }
};

const BASE64: PrimitiveNode = { kind: "primitive", type: "string", format: "byte" };

/** Overrides for external types every document knows about. */
export function defaultHooks(): Map<string, SchemaNode> {
  return new Map<string, SchemaNode>([
    [identityOf(BUILTIN_SCOPE, "Date"), { kind: "primitive", type: "string", format: "date-time" }],
    [identityOf(BUILTIN_SCOPE, "Duration"), { kind: "primitive", type: "string", description: "duration with unit suffix" }],
    [
      identityOf("decimal.js", "Decimal"),
      { kind: "primitive", type: "string", description: "precise representation of decimal value" }
    ]
  ]);
}

/**
 * Turns type descriptors into schema nodes.
 *
 * Named structs (and, in `alias` mode, named non-composite types) become
 * components in the registry and are referenced by name; everything else is
 * expanded inline. One walker, one registry, one synthesis pass.
 */
export class TypeWalker {
  readonly registry: ComponentRegistry;
  private readonly hooks: ReadonlyMap<string, SchemaNode>;
  private readonly pointers: "nullable" | "transparent";
  private readonly namedTypes: "alias" | "inline";

  constructor(opts: WalkerOptions = {}) {
    this.registry = opts.registry ?? new ComponentRegistry();
    this.hooks = opts.hooks ?? new Map();
    this.pointers = opts.pointers ?? "nullable";
    this.namedTypes = opts.namedTypes ?? "alias";
  }

  walk(type: TypeDescriptor): SchemaNode {
    const identity = typeIdentity(type);
    if (identity !== undefined) {
      const hook = this.hooks.get(identity);
      if (hook) return hook;
    }

    switch (type.kind) {
      case "primitive":
        return primitives[type.name];
      case "pointer": {
        const inner = this.walk(type.elem);
        return this.pointers === "transparent" ? inner : { kind: "nullable", inner };
      }
      case "slice":
        if (isByteSequence(type)) return BASE64;
        return { kind: "array", items: this.walk(type.elem) };
      case "array":
        return { kind: "array", items: this.walk(type.elem), minItems: type.length, maxItems: type.length };
      case "map":
        return {
          kind: "object",
          properties: new Map(),
          required: new Set(),
          keys: this.walk(type.key),
          additionalProperties: this.walk(type.value)
        };
      case "struct":
        if (type.name === undefined || identity === undefined) {
          const inline = objectNode({ description: type.description });
          this.fillFields(inline, type);
          return inline;
        }
        return this.component(type, type.name, identity);
      case "named":
        if (this.namedTypes === "inline") return this.walk(type.underlying);
        return this.alias(type, identity ?? type.name);
      case "opaque":
      case "any":
      case "context":
      case "error":
        return ANY;
    }
  }

  private component(type: StructType, name: string, identity: string): SchemaNode {
    // Keyed by identity and descriptor: distinct structs sharing a name and scope stay apart.
    const existing = this.registry.lookup(identity, type);
    if (existing) return { kind: "reference", name: existing.name };

    const allocated = this.registry.allocateName(name);
    const node = objectNode({ name: allocated, description: type.description });
    // Registered before the fields are walked: self references resolve to this entry.
    this.registry.register(identity, allocated, node, type);
    this.fillFields(node, type);
    return { kind: "reference", name: allocated };
  }

  private alias(type: NamedType, identity: string): SchemaNode {
    const existing = this.registry.lookup(identity);
    if (existing) return { kind: "reference", name: existing.name };

    const { name } = this.registry.register(identity, this.registry.allocateName(type.name));
    this.registry.define(identity, this.walk(type.underlying));
    return { kind: "reference", name };
  }

  private fillFields(node: ObjectNode, type: StructType): void {
    for (const field of visibleFields(type)) {
      const key = serializedNameOf(field);
      node.properties.set(key, this.walk(field.type));
      if (!field.optional) node.required.add(key);
    }
  }
}
