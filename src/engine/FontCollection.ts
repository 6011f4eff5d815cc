/**
 * Font collection: an immutable snapshot of font families taken from a provider.
 *
 * Construction is the only step that touches the provider. Families and variants
 * are views into the snapshot and stay valid for as long as the collection is held.
 */

import type { CatalogOptions } from "../types/catalog.types";
import type { FontEnumerationProvider, FontFamilyRecord } from "../types/font.types";
import { getSystemFontDirectories, resolveIndex } from "../utils/fontUtils";
import { resolveCatalogOptions } from "./config";
import { NotFoundError } from "./errors";
import { FontFamily } from "./FontFamily";
import type { FamilyHost } from "./FontVariant";
import { catalogLogger } from "./logger";
import { FontkitDirectoryProvider } from "./providers/FontkitDirectoryProvider";
import { StaticFontProvider } from "./providers/StaticFontProvider";
import { validateSnapshot } from "./validation";

export class FontCollection implements FamilyHost, Iterable<FontFamily> {
  readonly options: Readonly<CatalogOptions>;
  private readonly familyList: readonly FontFamily[];
  private readonly byName = new Map<string, FontFamily>();
  private readonly byFoldedName = new Map<string, FontFamily>();

  constructor(provider: FontEnumerationProvider, options: Partial<CatalogOptions> = {}) {
    const startTime = Date.now();
    this.options = resolveCatalogOptions(options);

    const snapshot = validateSnapshot(provider.enumerate(), this.options.validation);
    this.familyList = snapshot.map(
      (record, index) => new FontFamily(this, index, record, this.options.locale)
    );

    for (const family of this.familyList) {
      this.byName.set(family.name, family);
      const folded = family.name.toLowerCase();
      if (!this.byFoldedName.has(folded)) this.byFoldedName.set(folded, family);
    }

    catalogLogger.timed("info", "FontCollection", "build", startTime, {
      families: this.familyList.length,
      variants: this.familyList.reduce((total, family) => total + family.length, 0),
      locale: this.options.locale,
    });
  }

  /**
   * Collection over in-memory records
   */
  static fromSnapshot(
    records: readonly FontFamilyRecord[],
    options: Partial<CatalogOptions> = {}
  ): FontCollection {
    return new FontCollection(new StaticFontProvider(records), options);
  }

  /**
   * Collection over the platform font directories (plus FONT_CATALOG_DIRS)
   */
  static system(options: Partial<CatalogOptions> = {}): FontCollection {
    const resolved = resolveCatalogOptions(options);
    const provider = new FontkitDirectoryProvider(getSystemFontDirectories(), {
      locale: resolved.locale,
    });
    return new FontCollection(provider, resolved);
  }

  get length(): number {
    return this.familyList.length;
  }

  /**
   * Family at `index`; negative indexes count from the end
   * @throws IndexOutOfRangeError
   */
  getByIndex(index: number): FontFamily {
    return this.familyList[resolveIndex(index, this.familyList.length, "family")];
  }

  /**
   * @throws NotFoundError for an unknown family name
   */
  getByName(name: string): FontFamily {
    const family = this.findByName(name);
    if (!family) {
      throw new NotFoundError(`unknown font family '${name}'`);
    }
    return family;
  }

  get(key: number | string): FontFamily {
    return typeof key === "number" ? this.getByIndex(key) : this.getByName(key);
  }

  has(name: string): boolean {
    return this.findByName(name) !== undefined;
  }

  families(): FontFamily[] {
    return [...this.familyList];
  }

  [Symbol.iterator](): IterableIterator<FontFamily> {
    return this.familyList[Symbol.iterator]();
  }

  private findByName(name: string): FontFamily | undefined {
    if (this.options.ignoreFamilyNameCase) {
      return this.byFoldedName.get(name.toLowerCase());
    }
    return this.byName.get(name);
  }
}
