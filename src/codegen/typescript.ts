import { compareNames } from "../internal/utils.js";
import type { Convention, MethodDescriptor, MethodIndex } from "../rpc/method.js";
import { BUILTIN_SCOPE, identityOf } from "../types/descriptor.js";
import type { SchemaNode } from "../schema/node.js";
import { TypeWalker } from "../schema/walker.js";

export interface ClientParam {
  name: string;
  type: string;
}

export interface ClientMethod {
  name: string;
  /** Path segment the method is served under. */
  route: string;
  description?: string;
  params: ClientParam[];
  /** Absent when the method produces no value. */
  result?: string;
}

export interface ClientField {
  name: string;
  type: string;
  optional: boolean;
}

export interface ClientInterface {
  name: string;
  description?: string;
  fields: ClientField[];
}

export interface ClientAlias {
  name: string;
  type: string;
}

export interface ClientDocument {
  name: string;
  description?: string;
  convention: Convention;
  methods: ClientMethod[];
  interfaces: ClientInterface[];
  aliases: ClientAlias[];
}

export interface ClientOptions {
  /** Class name of the generated client. Defaults to `API`. */
  name?: string;
  description?: string;
  /** Type identity (`scope.Name`) to a literal TypeScript type. */
  shims?: Readonly<Record<string, string>>;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

// Words that cannot name a parameter in module (strict) code.
const RESERVED = new Set([
  "arguments", "await", "break", "case", "catch", "class", "const", "continue", "debugger", "default",
  "delete", "do", "else", "enum", "eval", "export", "extends", "false", "finally", "for", "function",
  "if", "implements", "import", "in", "instanceof", "interface", "let", "new", "null", "package",
  "private", "protected", "public", "return", "static", "super", "switch", "this", "throw", "true",
  "try", "typeof", "var", "void", "while", "with", "yield"
]);

function shimHooks(shims: Readonly<Record<string, string>>): Map<string, SchemaNode> {
  const hooks = new Map<string, SchemaNode>([
    [identityOf(BUILTIN_SCOPE, "Date"), { kind: "primitive", type: "string", format: "date-time" }],
    [identityOf(BUILTIN_SCOPE, "Duration"), { kind: "primitive", type: "string" }],
    [identityOf("decimal.js", "Decimal"), { kind: "primitive", type: "string" }]
  ]);
  for (const [identity, tsType] of Object.entries(shims)) {
    hooks.set(identity, { kind: "primitive", type: "string", tsType });
  }
  return hooks;
}

function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

/** A parameter name usable in generated code, unique among `taken`. */
function bindingName(name: string, taken: Set<string>): string {
  let base = name.replace(/[^A-Za-z0-9_$]/g, "_");
  if (!IDENTIFIER.test(base)) base = `_${base}`;
  if (RESERVED.has(base)) base = `${base}_`;
  let candidate = base;
  for (let n = 1; taken.has(candidate); n++) candidate = `${base}${n}`;
  taken.add(candidate);
  return candidate;
}

/** TypeScript type expression for a schema node. */
export function tsTypeOf(node: SchemaNode): string {
  switch (node.kind) {
    case "any":
      return "unknown";
    case "primitive":
      if (node.tsType !== undefined) return node.tsType;
      return node.type === "integer" ? "number" : node.type;
    case "array":
      return `${tsTypeOf(node.items)}[]`;
    case "nullable":
      return `(${tsTypeOf(node.inner)} | null)`;
    case "reference":
      return node.name;
    case "object": {
      if (node.additionalProperties) {
        const numeric = node.keys?.kind === "primitive" && (node.keys.type === "integer" || node.keys.type === "number");
        return `{ [key: ${numeric ? "number" : "string"}]: ${tsTypeOf(node.additionalProperties)} }`;
      }
      if (node.properties.size === 0) return "{}";
      const members = [...node.properties].map(
        ([key, child]) => `${propertyKey(key)}${node.required.has(key) ? "" : "?"}: ${tsTypeOf(child)}`
      );
      return `{ ${members.join("; ")} }`;
    }
  }
}

function paramsOf(args: MethodDescriptor["args"], walker: TypeWalker): ClientParam[] {
  const taken = new Set<string>();
  return args.map((a) => ({ name: bindingName(a.name, taken), type: tsTypeOf(walker.walk(a.type)) }));
}

/**
 * Describes the typed client for a scanned index: one method per endpoint,
 * one interface per named struct and one alias per named non-struct type.
 */
export function generateClient(index: MethodIndex, opts: ClientOptions = {}): ClientDocument {
  const walker = new TypeWalker({ hooks: shimHooks(opts.shims ?? {}) });
  const name = opts.name ?? "API";
  walker.registry.reserveName(name);

  const sorted = [...index.values()].sort((a, b) => compareNames(a.name, b.name));
  const methods: ClientMethod[] = sorted.map((m) => ({
    name: m.name,
    route: m.route,
    description: m.description,
    params: paramsOf(m.args, walker),
    result: m.resultType ? tsTypeOf(walker.walk(m.resultType)) : undefined
  }));

  const interfaces: ClientInterface[] = [];
  const aliases: ClientAlias[] = [];
  for (const component of walker.registry.entries()) {
    const node = component.node;
    if (node.kind === "object" && node.name === component.name) {
      interfaces.push({
        name: component.name,
        description: node.description,
        fields: [...node.properties].map(([key, child]) => ({
          name: key,
          type: tsTypeOf(child),
          optional: !node.required.has(key)
        }))
      });
    } else {
      aliases.push({ name: component.name, type: tsTypeOf(node) });
    }
  }
  interfaces.sort((a, b) => compareNames(a.name, b.name));
  aliases.sort((a, b) => compareNames(a.name, b.name));

  const convention = sorted[0]?.convention ?? "positional";
  return { name, description: opts.description, convention, methods, interfaces, aliases };
}

function docComment(text: string | undefined, indent: string): string[] {
  if (!text) return [];
  return [`${indent}/**`, ...text.split("\n").map((line) => `${indent} * ${line}`.trimEnd()), `${indent} */`];
}

function renderMethod(method: ClientMethod, convention: Convention): string[] {
  const params = method.params.map((p) => `${p.name}: ${p.type}`).join(", ");
  const body =
    convention === "positional"
      ? `[${method.params.map((p) => p.name).join(", ")}]`
      : (method.params[0]?.name ?? "undefined");
  const call = `this.#invoke(${JSON.stringify(method.route)}, ${body})`;
  const head = `  async ${propertyKey(method.name)}(${params})`;
  const lines = docComment(method.description, "  ");
  if (method.result === undefined) {
    lines.push(`${head}: Promise<void> {`, `    await ${call};`, "  }");
  } else {
    lines.push(`${head}: Promise<${method.result}> {`, `    return (await ${call}) as ${method.result};`, "  }");
  }
  return lines;
}

/** Renders a client document as a TypeScript module whose default export is the client class. */
export function renderClient(doc: ClientDocument): string {
  const out: string[] = [];
  out.push(...docComment(doc.description, ""));
  // #private helpers never clash with exposed method names.
  out.push(
    `export default class ${doc.name} {`,
    "  readonly #baseURL: string;",
    "",
    '  constructor(baseURL: string = ".") {',
    "    this.#baseURL = baseURL;",
    "  }"
  );
  for (const method of doc.methods) {
    out.push("", ...renderMethod(method, doc.convention));
  }
  out.push(
    "",
    "  async #invoke(method: string, payload: unknown): Promise<unknown> {",
    '    const res = await fetch(this.#baseURL + "/" + encodeURIComponent(method), {',
    '      method: "POST",',
    "      body: payload === undefined ? undefined : JSON.stringify(payload),",
    '      headers: { "Content-Type": "application/json" }',
    "    });",
    "    if (!res.ok) throw new Error(await res.text());",
    "    const text = await res.text();",
    "    return text.length > 0 ? JSON.parse(text) : undefined;",
    "  }",
    "}"
  );

  for (const iface of doc.interfaces) {
    out.push("", ...docComment(iface.description, ""), `export interface ${iface.name} {`);
    for (const f of iface.fields) out.push(`  ${propertyKey(f.name)}${f.optional ? "?" : ""}: ${f.type};`);
    out.push("}");
  }
  for (const alias of doc.aliases) {
    out.push("", `export type ${alias.name} = ${alias.type};`);
  }
  return out.join("\n") + "\n";
}
