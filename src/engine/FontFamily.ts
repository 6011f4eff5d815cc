/**
 * A named, ordered group of variants. Hosts best-variant matching.
 */

import type { ValidatedFamily } from "../types/catalog.types";
import type { VariantCriteria } from "../types/font.types";
import { rankVariants } from "../lib/matcher";
import { resolveIndex } from "../utils/fontUtils";
import { NotFoundError } from "./errors";
import { type FamilyHost, FontVariant } from "./FontVariant";
import { catalogLogger } from "./logger";

export class FontFamily implements Iterable<FontVariant> {
  readonly name: string;
  private readonly variants: readonly FontVariant[];

  constructor(
    private readonly host: FamilyHost,
    /** Position within the collection */
    readonly index: number,
    record: ValidatedFamily,
    locale: string
  ) {
    this.name = record.name;
    this.variants = record.variants.map(
      (variant, variantIndex) =>
        new FontVariant({ host, familyIndex: index }, variantIndex, variant, locale)
    );
  }

  get length(): number {
    return this.variants.length;
  }

  /**
   * Variant at `index`; negative indexes count from the end
   * @throws IndexOutOfRangeError
   */
  getByIndex(index: number): FontVariant {
    return this.variants[resolveIndex(index, this.variants.length, "variant")];
  }

  /**
   * Number: position. String: face name.
   * @throws NotFoundError for an unknown face name
   */
  get(key: number | string): FontVariant {
    if (typeof key === "number") return this.getByIndex(key);

    const variant = this.variants.find((candidate) => candidate.name === key);
    if (!variant) {
      throw new NotFoundError(`unknown font variant '${key}' in family '${this.name}'`);
    }
    return variant;
  }

  /**
   * Without criteria: every variant in enumeration order.
   * With criteria: every variant ranked by the matching engine, best first.
   */
  getMatchingVariants(criteria?: VariantCriteria): FontVariant[] {
    if (criteria === undefined) return [...this.variants];

    if (criteria.style !== undefined && criteria.italic !== undefined) {
      catalogLogger.debug("FontFamily", "style overrides italic", {
        family: this.name,
        style: criteria.style,
        italic: criteria.italic,
      });
    }
    return rankVariants(this.variants, criteria);
  }

  /**
   * Closest variant to the criteria. Families are never empty, so this always returns.
   */
  getBestVariant(criteria: VariantCriteria = {}): FontVariant {
    const [best] = this.getMatchingVariants(criteria);
    return best ?? this.variants[0];
  }

  equals(other: unknown): boolean {
    return other instanceof FontFamily && other.host === this.host && other.index === this.index;
  }

  toString(): string {
    return `<FontFamily name="${this.name}">`;
  }

  [Symbol.iterator](): IterableIterator<FontVariant> {
    return this.variants[Symbol.iterator]();
  }
}
