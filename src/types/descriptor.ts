/**
 * Runtime type descriptors.
 *
 * TypeScript erases types, so exposed methods describe their parameters and
 * results with these values instead. The set of kinds is closed: every consumer
 * (codec, schema walker, code generator) switches over `kind` exhaustively.
 */

export type IntegerName =
  | "int"
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "uint"
  | "uint8"
  | "uint16"
  | "uint32"
  | "uint64";

export type FloatName = "float32" | "float64";

export type PrimitiveName = "bool" | "string" | IntegerName | FloatName;

export interface PrimitiveType {
  readonly kind: "primitive";
  readonly name: PrimitiveName;
}

export interface PointerType {
  readonly kind: "pointer";
  readonly elem: TypeDescriptor;
}

export interface SliceType {
  readonly kind: "slice";
  readonly elem: TypeDescriptor;
}

export interface ArrayType {
  readonly kind: "array";
  readonly elem: TypeDescriptor;
  readonly length: number;
}

export interface MapType {
  readonly kind: "map";
  readonly key: TypeDescriptor;
  readonly value: TypeDescriptor;
}

export interface FieldDescriptor {
  /** Source name: the property the value is read from and written to. */
  readonly name: string;
  readonly type: TypeDescriptor;
  /** Name on the wire; defaults to `name`. */
  readonly serializedName?: string;
  /** "Omit if empty": dropped from output when empty, optional in generated clients. */
  readonly optional?: boolean;
  readonly exclude?: boolean;
  readonly private?: boolean;
}

export interface StructType {
  readonly kind: "struct";
  /** Absent for anonymous structs. */
  readonly name?: string;
  readonly scope?: string;
  readonly description?: string;
  readonly fields: () => readonly FieldDescriptor[];
}

export interface NamedType {
  readonly kind: "named";
  readonly name: string;
  readonly scope: string;
  readonly underlying: TypeDescriptor;
}

export interface OpaqueType {
  readonly kind: "opaque";
  readonly name: string;
  readonly scope: string;
}

export interface AnyType {
  readonly kind: "any";
}

export interface ContextType {
  readonly kind: "context";
}

export interface ErrorType {
  readonly kind: "error";
}

export type TypeDescriptor =
  | PrimitiveType
  | PointerType
  | SliceType
  | ArrayType
  | MapType
  | StructType
  | NamedType
  | OpaqueType
  | AnyType
  | ContextType
  | ErrorType;

export type TypeKind = TypeDescriptor["kind"];

export const BUILTIN_SCOPE = "builtin";

/**
 * Stable identity of a named type: `scope.name`.
 * Returns undefined for kinds without a declared name (primitives, anonymous structs, ...).
 */
export function typeIdentity(type: TypeDescriptor): string | undefined {
  switch (type.kind) {
    case "struct":
      return type.name ? identityOf(type.scope ?? "", type.name) : undefined;
    case "named":
    case "opaque":
      return identityOf(type.scope, type.name);
    default:
      return undefined;
  }
}

export function identityOf(scope: string, name: string): string {
  return scope ? `${scope}.${name}` : name;
}

/** Variable-length `uint8` sequences travel as base64 strings; fixed arrays stay arrays. */
export function isByteSequence(type: TypeDescriptor): boolean {
  return type.kind === "slice" && type.elem.kind === "primitive" && type.elem.name === "uint8";
}

export function isDateType(type: TypeDescriptor): boolean {
  return type.kind === "opaque" && type.scope === BUILTIN_SCOPE && type.name === "Date";
}

export function serializedNameOf(field: FieldDescriptor): string {
  return field.serializedName ?? field.name;
}

/** Fields that take part in encoding and schemas. */
export function visibleFields(type: StructType): FieldDescriptor[] {
  return type.fields().filter((f) => !f.private && !f.exclude);
}

/** Human-readable rendering, used in error messages and logs. */
export function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case "primitive":
      return type.name;
    case "pointer":
      return `*${describeType(type.elem)}`;
    case "slice":
      return `[]${describeType(type.elem)}`;
    case "array":
      return `[${type.length}]${describeType(type.elem)}`;
    case "map":
      return `map[${describeType(type.key)}]${describeType(type.value)}`;
    case "struct":
      return type.name ? identityOf(type.scope ?? "", type.name) : "struct{...}";
    case "named":
    case "opaque":
      return identityOf(type.scope, type.name);
    case "any":
      return "any";
    case "context":
      return "context";
    case "error":
      return "error";
  }
}

const primitive = (name: PrimitiveName): PrimitiveType => Object.freeze({ kind: "primitive", name });

export interface StructInit {
  name?: string;
  scope?: string;
  description?: string;
  fields: () => readonly FieldDescriptor[];
}

export interface FieldOptions {
  serializedName?: string;
  optional?: boolean;
  exclude?: boolean;
  private?: boolean;
}

/** Descriptor builders. */
export const t = {
  bool: () => primitive("bool"),
  string: () => primitive("string"),
  int: () => primitive("int"),
  int8: () => primitive("int8"),
  int16: () => primitive("int16"),
  int32: () => primitive("int32"),
  int64: () => primitive("int64"),
  uint: () => primitive("uint"),
  uint8: () => primitive("uint8"),
  uint16: () => primitive("uint16"),
  uint32: () => primitive("uint32"),
  uint64: () => primitive("uint64"),
  float32: () => primitive("float32"),
  float64: () => primitive("float64"),

  pointer: (elem: TypeDescriptor): PointerType => Object.freeze({ kind: "pointer", elem }),
  slice: (elem: TypeDescriptor): SliceType => Object.freeze({ kind: "slice", elem }),
  array: (elem: TypeDescriptor, length: number): ArrayType => {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Invalid fixed array length: ${length}`);
    }
    return Object.freeze({ kind: "array", elem, length });
  },
  map: (key: TypeDescriptor, value: TypeDescriptor): MapType => Object.freeze({ kind: "map", key, value }),
  bytes: (): SliceType => Object.freeze({ kind: "slice", elem: primitive("uint8") }),

  struct: (init: StructInit): StructType => {
    let cached: readonly FieldDescriptor[] | undefined;
    return Object.freeze({
      kind: "struct",
      name: init.name,
      scope: init.scope,
      description: init.description,
      // Resolved once, so thunks that build descriptors stay identity-stable.
      fields: () => (cached ??= Object.freeze([...init.fields()]))
    });
  },
  field: (name: string, type: TypeDescriptor, opts: FieldOptions = {}): FieldDescriptor =>
    Object.freeze({ name, type, ...opts }),

  named: (name: string, underlying: TypeDescriptor, scope = ""): NamedType =>
    Object.freeze({ kind: "named", name, scope, underlying }),
  opaque: (scope: string, name: string): OpaqueType => Object.freeze({ kind: "opaque", scope, name }),
  date: (): OpaqueType => Object.freeze({ kind: "opaque", scope: BUILTIN_SCOPE, name: "Date" }),
  duration: (): OpaqueType => Object.freeze({ kind: "opaque", scope: BUILTIN_SCOPE, name: "Duration" }),
  any: (): AnyType => Object.freeze({ kind: "any" }),

  context: (): ContextType => Object.freeze({ kind: "context" }),
  error: (): ErrorType => Object.freeze({ kind: "error" })
};
