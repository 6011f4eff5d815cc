/**
 * Read-only, dual-keyed map of a variant's informational strings.
 * Every entry is reachable by its property name (or alias) and by its integer id;
 * keys(), values(), entries() and iteration share ascending id order.
 */

import type { InformationProperty } from "../types/catalog.types";
import type { PropertyValue } from "../types/font.types";
import { NotFoundError } from "./errors";
import { lookupPropertyById } from "./properties";
import { resolveLocalizedString } from "./resolvers/NameResolver";

export type InformationKey = string | number;

interface InformationEntry {
  property: InformationProperty;
  value: string;
}

function describeKey(key: unknown): string {
  return typeof key === "string" ? JSON.stringify(key) : String(key);
}

export class InformationMap implements Iterable<string> {
  private readonly ordered: InformationEntry[];
  private readonly byName = new Map<string, InformationEntry>();
  private readonly byId = new Map<number, InformationEntry>();

  constructor(entries: Iterable<[InformationProperty, string]>) {
    this.ordered = [...entries]
      .map(([property, value]) => ({ property, value }))
      .sort((a, b) => a.property.id - b.property.id);

    for (const entry of this.ordered) {
      this.byId.set(entry.property.id, entry);
      this.byName.set(entry.property.name, entry);
      for (const alias of entry.property.aliases) this.byName.set(alias, entry);
    }
  }

  /**
   * Build from validated raw values, resolving localized tables against `locale`.
   * Values that resolve to nothing are left out.
   */
  static fromProperties(
    properties: ReadonlyMap<number, PropertyValue>,
    locale: string
  ): InformationMap {
    const entries: [InformationProperty, string][] = [];
    for (const [id, raw] of properties) {
      const property = lookupPropertyById(id);
      const value = resolveLocalizedString(raw, locale);
      if (property && value !== null) entries.push([property, value]);
    }
    return new InformationMap(entries);
  }

  get size(): number {
    return this.ordered.length;
  }

  private lookup(key: unknown): InformationEntry | undefined {
    if (typeof key === "string") {
      return this.byName.get(key);
    }
    if (typeof key === "number" && Number.isInteger(key)) {
      return this.byId.get(key);
    }
    return undefined;
  }

  /**
   * Containment never throws; keys of any other type are simply absent
   */
  has(key: unknown): boolean {
    return this.lookup(key) !== undefined;
  }

  /**
   * Look up by property name, alias or integer id
   * @throws NotFoundError when the key is absent or cannot name a property
   */
  get(key: InformationKey): string {
    const entry = this.lookup(key);
    if (!entry) {
      throw new NotFoundError(`${describeKey(key)} doesn't exist`);
    }
    return entry.value;
  }

  /** Non-throwing lookup */
  find(key: InformationKey): string | undefined {
    return this.lookup(key)?.value;
  }

  *keys(): IterableIterator<string> {
    for (const entry of this.ordered) yield entry.property.name;
  }

  *ids(): IterableIterator<number> {
    for (const entry of this.ordered) yield entry.property.id;
  }

  *values(): IterableIterator<string> {
    for (const entry of this.ordered) yield entry.value;
  }

  *entries(): IterableIterator<[string, string]> {
    for (const entry of this.ordered) yield [entry.property.name, entry.value];
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this.keys();
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.entries());
  }
}
