import { describe, expect, it } from "vitest";

import type { SchemaNode } from "../src/schema/node.js";
import { ComponentRegistry } from "../src/schema/registry.js";
import { defaultHooks, TypeWalker } from "../src/schema/walker.js";
import { t, type StructType } from "../src/types/descriptor.js";

const TreeNode: StructType = t.struct({
  name: "TreeNode",
  scope: "tree",
  fields: () => [
    t.field("Value", t.int()),
    t.field("Parent", t.pointer(TreeNode)),
    t.field("Children", t.slice(TreeNode))
  ]
});

function component(walker: TypeWalker, name: string): SchemaNode | undefined {
  return walker.registry.entries().find((c) => c.name === name)?.node;
}

describe("TypeWalker", () => {
  it("maps primitives with bounds and formats", () => {
    const walker = new TypeWalker();
    expect(walker.walk(t.int16())).toEqual({ kind: "primitive", type: "integer", maximum: 32767 });
    expect(walker.walk(t.uint8())).toEqual({ kind: "primitive", type: "integer", minimum: 0, maximum: 255 });
    expect(walker.walk(t.int64())).toEqual({ kind: "primitive", type: "integer", format: "int64" });
    expect(walker.walk(t.float32())).toEqual({ kind: "primitive", type: "number", format: "float" });
    expect(walker.walk(t.bool())).toEqual({ kind: "primitive", type: "boolean" });
  });

  it("terminates on self-referential structs and references them by name", () => {
    const walker = new TypeWalker();
    expect(walker.walk(TreeNode)).toEqual({ kind: "reference", name: "TreeNode" });
    expect(walker.registry.entries().map((c) => c.name)).toEqual(["TreeNode"]);

    const node = component(walker, "TreeNode");
    expect(node?.kind).toBe("object");
    if (node?.kind !== "object") return;
    expect(node.name).toBe("TreeNode");
    expect(node.properties.get("Parent")).toEqual({ kind: "nullable", inner: { kind: "reference", name: "TreeNode" } });
    expect(node.properties.get("Children")).toEqual({ kind: "array", items: { kind: "reference", name: "TreeNode" } });
  });

  it("resolves mutually referential structs", () => {
    const Author: StructType = t.struct({
      name: "Author",
      fields: () => [t.field("Books", t.slice(Book))]
    });
    const Book: StructType = t.struct({
      name: "Book",
      fields: () => [t.field("Author", t.pointer(Author))]
    });
    const walker = new TypeWalker({ pointers: "transparent" });
    walker.walk(Book);
    expect(walker.registry.entries().map((c) => c.name)).toEqual(["Book", "Author"]);
    const author = component(walker, "Author");
    expect(author?.kind === "object" ? author.properties.get("Books") : undefined).toEqual({
      kind: "array",
      items: { kind: "reference", name: "Book" }
    });
  });

  it("maps byte sequences to base64 strings", () => {
    const walker = new TypeWalker();
    const Blob = t.struct({ name: "Blob", fields: () => [t.field("Data", t.bytes())] });
    walker.walk(Blob);
    const blob = component(walker, "Blob");
    expect(blob?.kind === "object" ? blob.properties.get("Data") : undefined).toEqual({
      kind: "primitive",
      type: "string",
      format: "byte"
    });
  });

  it("bounds fixed-length sequences", () => {
    expect(new TypeWalker().walk(t.array(t.uint8(), 4))).toEqual({
      kind: "array",
      items: { kind: "primitive", type: "integer", minimum: 0, maximum: 255 },
      minItems: 4,
      maxItems: 4
    });
  });

  it("disambiguates same-named structs from different scopes", () => {
    const ItemA = t.struct({ name: "Item", scope: "a", fields: () => [t.field("id", t.int())] });
    const ItemB = t.struct({ name: "Item", scope: "b", fields: () => [t.field("label", t.string())] });
    const walker = new TypeWalker();

    expect(walker.walk(ItemA)).toEqual({ kind: "reference", name: "Item" });
    expect(walker.walk(ItemB)).toEqual({ kind: "reference", name: "Item1" });
    expect(walker.walk(ItemA)).toEqual({ kind: "reference", name: "Item" });

    const second = component(walker, "Item1");
    expect(second?.kind === "object" ? [...second.properties.keys()] : []).toEqual(["label"]);
  });

  it("keeps distinct structs apart when name and scope coincide", () => {
    const First = t.struct({ name: "Item", fields: () => [t.field("id", t.int())] });
    const Second = t.struct({ name: "Item", fields: () => [t.field("label", t.string())] });
    const walker = new TypeWalker();

    expect(walker.walk(First)).toEqual({ kind: "reference", name: "Item" });
    expect(walker.walk(Second)).toEqual({ kind: "reference", name: "Item1" });
    expect(walker.walk(Second)).toEqual({ kind: "reference", name: "Item1" });
    expect(walker.registry.entries().map((c) => [c.identity, c.name])).toEqual([
      ["Item", "Item"],
      ["Item", "Item1"]
    ]);

    const second = component(walker, "Item1");
    expect(second?.kind === "object" ? [...second.properties.keys()] : []).toEqual(["label"]);
  });

  it("inlines anonymous structs without registering them", () => {
    const walker = new TypeWalker();
    const anon = t.struct({
      fields: () => [t.field("x", t.int()), t.field("note", t.string(), { optional: true }), t.field("hidden", t.int(), { exclude: true })]
    });
    const node = walker.walk(anon);
    expect(walker.registry.entries()).toEqual([]);
    expect(node.kind).toBe("object");
    if (node.kind !== "object") return;
    expect([...node.properties.keys()]).toEqual(["x", "note"]);
    expect([...node.required]).toEqual(["x"]);
  });

  it("maps keyed mappings to open objects", () => {
    const node = new TypeWalker().walk(t.map(t.string(), t.float64()));
    expect(node.kind === "object" ? node.additionalProperties : undefined).toEqual({
      kind: "primitive",
      type: "number",
      format: "double"
    });
  });

  it("returns hook nodes verbatim before any other rule", () => {
    const hooks = defaultHooks();
    const walker = new TypeWalker({ hooks });
    expect(walker.walk(t.date())).toBe(hooks.get("builtin.Date"));
    expect(walker.walk(t.opaque("decimal.js", "Decimal"))).toEqual({
      kind: "primitive",
      type: "string",
      description: "precise representation of decimal value"
    });

    const Money = t.struct({ name: "Money", scope: "billing", fields: () => [t.field("cents", t.int())] });
    const override: SchemaNode = { kind: "primitive", type: "string" };
    const custom = new TypeWalker({ hooks: new Map([["billing.Money", override]]) });
    expect(custom.walk(Money)).toBe(override);
    expect(custom.registry.entries()).toEqual([]);
  });

  it("maps unknown opaque and dynamic kinds to any", () => {
    const walker = new TypeWalker();
    expect(walker.walk(t.opaque("streams", "Channel"))).toEqual({ kind: "any" });
    expect(walker.walk(t.any())).toEqual({ kind: "any" });
  });

  it("walks through pointers in transparent mode", () => {
    expect(new TypeWalker({ pointers: "transparent" }).walk(t.pointer(t.string()))).toEqual({
      kind: "primitive",
      type: "string"
    });
  });

  it("registers named non-composite types as aliases or inlines them", () => {
    const Celsius = t.named("Celsius", t.float64(), "units");
    const aliasing = new TypeWalker();
    expect(aliasing.walk(Celsius)).toEqual({ kind: "reference", name: "Celsius" });
    expect(component(aliasing, "Celsius")).toEqual({ kind: "primitive", type: "number", format: "double" });

    expect(new TypeWalker({ namedTypes: "inline" }).walk(Celsius)).toEqual({
      kind: "primitive",
      type: "number",
      format: "double"
    });
  });
});

describe("ComponentRegistry", () => {
  it("allocates suffixed names and skips reserved ones", () => {
    const registry = new ComponentRegistry();
    registry.reserveName("Item1");
    expect(registry.allocateName("Item")).toBe("Item");
    expect(registry.allocateName("Item")).toBe("Item2");
    expect(registry.allocateName("Item")).toBe("Item3");
  });

  it("refuses to register an identity twice", () => {
    const registry = new ComponentRegistry();
    registry.register("a.Item", "Item");
    expect(() => registry.register("a.Item", "Item")).toThrow("Component already registered: a.Item");
  });

  it("keeps a fresh registry per walker", () => {
    const Thing = t.struct({ name: "Thing", fields: () => [] });
    const first = new TypeWalker();
    const second = new TypeWalker();
    first.walk(Thing);
    expect(second.walk(Thing)).toEqual({ kind: "reference", name: "Thing" });
    expect(second.registry.entries().map((c) => c.name)).toEqual(["Thing"]);
  });
});
