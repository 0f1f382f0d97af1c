import type { RefDefinition } from "./ast";
import { normalizeRefLabel } from "./parser-helpers";

export interface ReferenceLookup {
  getReference(label: string): RefDefinition | null;
}

/**
 * Link reference definitions keyed by normalized label. The first definition
 * for a label wins; lookups never mutate the map.
 */
export class ReferenceMap implements ReferenceLookup, Iterable<RefDefinition> {
  private readonly references = new Map<string, RefDefinition>();

  add(label: string, url: string, title = ""): boolean {
    const key = normalizeRefLabel(label);
    if (key === "" || this.references.has(key)) return false;
    this.references.set(key, Object.freeze({ label, url, title }));
    return true;
  }

  contains(label: string): boolean {
    return this.references.has(normalizeRefLabel(label));
  }

  getReference(label: string): RefDefinition | null {
    return this.references.get(normalizeRefLabel(label)) ?? null;
  }

  get size(): number {
    return this.references.size;
  }

  [Symbol.iterator](): Iterator<RefDefinition> {
    return this.references.values();
  }
}
