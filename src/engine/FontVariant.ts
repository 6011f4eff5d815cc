/**
 * A single face of a family: weight, style, width, backing file and information strings.
 */

import type { ValidatedVariant } from "../types/catalog.types";
import { type Style, WEIGHT_NAMES } from "../types/font.types";
import type { FontFamily } from "./FontFamily";
import { InformationMap } from "./InformationMap";

/**
 * Anything that can hand out a family by position; implemented by FontCollection
 */
export interface FamilyHost {
  getByIndex(index: number): FontFamily;
}

/**
 * Non-owning reference from a variant to its family
 */
export interface FamilyHandle {
  host: FamilyHost;
  familyIndex: number;
}

function formatWeight(weight: number): string {
  const name = WEIGHT_NAMES.get(weight);
  return name ? `Weight.${name}` : String(weight);
}

function formatStyle(style: Style): string {
  return `Style.${style.toUpperCase()}`;
}

export class FontVariant {
  readonly name: string;
  readonly weight: number;
  readonly style: Style;
  readonly width: number;
  readonly filename: string;
  readonly information: InformationMap;

  constructor(
    private readonly handle: FamilyHandle,
    /** Position within the family */
    readonly index: number,
    record: ValidatedVariant,
    locale: string
  ) {
    this.name = record.name;
    this.weight = record.weight;
    this.style = record.style;
    this.width = record.width;
    this.filename = record.filename;
    this.information = InformationMap.fromProperties(record.properties, locale);
  }

  get family(): FontFamily {
    return this.handle.host.getByIndex(this.handle.familyIndex);
  }

  /** Backing font files */
  get files(): string[] {
    return [this.filename];
  }

  /**
   * Same face of the same family in the same collection
   */
  equals(other: unknown): boolean {
    return (
      other instanceof FontVariant &&
      other.handle.host === this.handle.host &&
      other.handle.familyIndex === this.handle.familyIndex &&
      other.index === this.index
    );
  }

  toString(): string {
    return (
      `<FontVariant name=${this.name}, family=${this.family.toString()}, ` +
      `style=${formatStyle(this.style)} weight=${formatWeight(this.weight)}>`
    );
  }
}
