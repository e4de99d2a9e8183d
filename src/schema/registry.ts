import { ANY, type SchemaNode } from "./node.js";

export interface Component {
  /** `scope.name` of the source type. */
  readonly identity: string;
  /** Unique name within one synthesis pass. */
  readonly name: string;
  readonly node: SchemaNode;
}

type Entry = { identity: string; name: string; node: SchemaNode; source?: object };

/**
 * Per-pass store of named components, keyed by type identity.
 *
 * Entries are registered before their contents are walked, so a re-entrant
 * lookup for the same identity finds the entry and stops recursion.
 * An entry may remember the descriptor it was made from; a different
 * descriptor under the same identity gets an entry of its own.
 * Not shared between passes.
 */
export class ComponentRegistry {
  private readonly byIdentity = new Map<string, Entry[]>();
  private readonly ordered: Entry[] = [];
  private readonly nameUsage = new Map<string, number>();
  private readonly taken = new Set<string>();

  /** Entry for `identity`; with `source`, only the entry made from that descriptor. */
  lookup(identity: string, source?: object): Component | undefined {
    return this.find(identity, source);
  }

  /**
   * Returns `base` the first time it is asked for, then `base1`, `base2`, ...
   * skipping names already taken.
   */
  allocateName(base: string): string {
    let usage = this.nameUsage.get(base) ?? 0;
    let candidate = usage === 0 ? base : `${base}${usage}`;
    while (this.taken.has(candidate)) {
      usage++;
      candidate = `${base}${usage}`;
    }
    this.nameUsage.set(base, usage + 1);
    this.taken.add(candidate);
    return candidate;
  }

  /** Keeps `name` out of allocation, e.g. for a generated class name. */
  reserveName(name: string): void {
    this.taken.add(name);
  }

  /** Inserts a component; `node` defaults to a placeholder until `define` fills it in. */
  register(identity: string, name: string, node: SchemaNode = ANY, source?: object): Component {
    if (this.find(identity, source)) throw new Error(`Component already registered: ${identity}`);
    const entry: Entry = { identity, name, node, source };
    const list = this.byIdentity.get(identity);
    if (list) list.push(entry);
    else this.byIdentity.set(identity, [entry]);
    this.ordered.push(entry);
    return entry;
  }

  define(identity: string, node: SchemaNode, source?: object): void {
    const entry = this.find(identity, source);
    if (!entry) throw new Error(`Unknown component: ${identity}`);
    entry.node = node;
  }

  /** Components in registration order. */
  entries(): Component[] {
    return this.ordered.map(({ identity, name, node }) => ({ identity, name, node }));
  }

  private find(identity: string, source: object | undefined): Entry | undefined {
    const list = this.byIdentity.get(identity);
    if (!list) return undefined;
    if (source === undefined) return list[0];
    return list.find((e) => e.source === undefined || e.source === source);
  }
}
