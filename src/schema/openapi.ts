import { stringify as stringifyYaml } from "yaml";

import { compareNames } from "../internal/utils.js";
import type { MethodDescriptor, MethodIndex } from "../rpc/method.js";
import { identityOf } from "../types/descriptor.js";
import type { SchemaNode } from "./node.js";
import { defaultHooks, TypeWalker } from "./walker.js";

export interface JsonSchema {
  type?: string;
  format?: string;
  $ref?: string;
  description?: string;
  minimum?: number;
  maximum?: number;
  items?: JsonSchema;
  prefixItems?: JsonSchema[];
  minItems?: number;
  maxItems?: number;
  properties?: Record<string, JsonSchema>;
  additionalProperties?: JsonSchema;
  anyOf?: JsonSchema[];
}

interface MediaType {
  schema: JsonSchema;
}

export interface ResponseObject {
  description: string;
  content: { "application/json"?: MediaType; "text/plain"?: MediaType };
}

export interface OperationObject {
  operationId: string;
  summary?: string;
  requestBody?: { content: { "application/json": MediaType } };
  responses: { "200": ResponseObject; "400": ResponseObject; "500": ResponseObject };
}

export interface OpenAPIDocument {
  openapi: "3.1.0";
  info: { title: string; version: string; description?: string };
  servers?: { url: string }[];
  paths: Record<string, { post: OperationObject }>;
  components: { schemas: Record<string, JsonSchema> };
}

export interface Definition {
  scope: string;
  name: string;
  schema: SchemaNode;
}

export interface OpenAPIOptions {
  title?: string;
  version?: string;
  description?: string;
  /** Server URLs, in order. */
  servers?: readonly string[];
  /** Replace the schema of specific external types; wins over the defaults. */
  define?: readonly Definition[];
}

export type OpenAPIFormat = "json" | "yaml";

const COMPONENTS_PREFIX = "#/components/schemas/";

const badRequest: ResponseObject = {
  description:
    "Payload can not be decoded into arguments or not enough arguments were supplied, returns error message (plain text)",
  content: { "text/plain": { schema: { type: "string" } } }
};

const internalError: ResponseObject = {
  description: "Method or session factory failed, returns error message (plain text)",
  content: { "text/plain": { schema: { type: "string" } } }
};

function toJsonSchema(node: SchemaNode): JsonSchema {
  switch (node.kind) {
    case "any":
      return {};
    case "primitive": {
      const out: JsonSchema = { type: node.type };
      if (node.format !== undefined) out.format = node.format;
      if (node.minimum !== undefined) out.minimum = node.minimum;
      if (node.maximum !== undefined) out.maximum = node.maximum;
      if (node.description !== undefined) out.description = node.description;
      return out;
    }
    case "array": {
      const out: JsonSchema = { type: "array", items: toJsonSchema(node.items) };
      if (node.minItems !== undefined) out.minItems = node.minItems;
      if (node.maxItems !== undefined) out.maxItems = node.maxItems;
      return out;
    }
    case "object": {
      const out: JsonSchema = { type: "object" };
      if (node.description !== undefined) out.description = node.description;
      if (node.properties.size > 0) {
        out.properties = {};
        for (const [key, child] of node.properties) out.properties[key] = toJsonSchema(child);
      }
      if (node.additionalProperties) out.additionalProperties = toJsonSchema(node.additionalProperties);
      return out;
    }
    case "reference":
      return { $ref: COMPONENTS_PREFIX + node.name };
    case "nullable":
      return { anyOf: [toJsonSchema(node.inner), { type: "null" }] };
  }
}

function requestSchema(walker: TypeWalker, method: MethodDescriptor): JsonSchema | undefined {
  if (method.convention === "payload") {
    const arg = method.args[0];
    return arg ? toJsonSchema(walker.walk(arg.type)) : undefined;
  }
  const n = method.args.length;
  const out: JsonSchema = { type: "array", items: {} };
  if (n > 0) {
    out.prefixItems = method.args.map((a) => toJsonSchema(walker.walk(a.type)));
    out.minItems = n;
    out.maxItems = n;
  }
  return out;
}

function operationFor(walker: TypeWalker, method: MethodDescriptor): OperationObject {
  const op: OperationObject = {
    operationId: method.name,
    responses: {
      "200": {
        description: "Success",
        content: {
          "application/json": {
            schema: method.resultType ? toJsonSchema(walker.walk(method.resultType)) : {}
          }
        }
      },
      "400": badRequest,
      "500": internalError
    }
  };
  if (method.description) op.summary = method.description;
  const request = requestSchema(walker, method);
  if (request) op.requestBody = { content: { "application/json": { schema: request } } };
  return op;
}

/**
 * Builds an OpenAPI 3.1 document for a scanned index.
 *
 * One POST path per method at `/<route>`, shared 400/500 responses, and a
 * components section holding every named struct reached from the methods.
 * The result is stable for a given index; callers cache it.
 */
export function generateOpenAPI(index: MethodIndex, opts: OpenAPIOptions = {}): OpenAPIDocument {
  const hooks = defaultHooks();
  for (const d of opts.define ?? []) hooks.set(identityOf(d.scope, d.name), d.schema);
  const walker = new TypeWalker({ hooks, pointers: "transparent", namedTypes: "inline" });

  const methods = [...index.values()].sort((a, b) => compareNames(a.route, b.route));
  const paths: OpenAPIDocument["paths"] = {};
  for (const method of methods) {
    paths[`/${method.route}`] = { post: operationFor(walker, method) };
  }

  const schemas: Record<string, JsonSchema> = {};
  const components = walker.registry.entries().sort((a, b) => compareNames(a.name, b.name));
  for (const component of components) schemas[component.name] = toJsonSchema(component.node);

  const info: OpenAPIDocument["info"] = { title: opts.title ?? "API", version: opts.version ?? "1.0.0" };
  if (opts.description) info.description = opts.description;

  const servers = (opts.servers ?? []).map((url) => ({ url }));
  return {
    openapi: "3.1.0",
    info,
    ...(servers.length > 0 ? { servers } : {}),
    paths,
    components: { schemas }
  };
}

export function renderOpenAPI(doc: OpenAPIDocument, format: OpenAPIFormat = "json"): string {
  // Responses are shared objects; spell them out instead of emitting anchors.
  if (format === "yaml") return stringifyYaml(doc, { aliasDuplicateObjects: false });
  return JSON.stringify(doc, null, 2) + "\n";
}
