/**
 * In-memory snapshot provider
 */

import type { FontEnumerationProvider, FontFamilyRecord } from "../../types/font.types";

export class StaticFontProvider implements FontEnumerationProvider {
  constructor(private readonly records: readonly FontFamilyRecord[]) {}

  enumerate(): FontFamilyRecord[] {
    return this.records.map((family) => ({ name: family.name, variants: [...family.variants] }));
  }
}
