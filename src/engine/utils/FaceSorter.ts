/**
 * Face Sorter Utility
 * Stable display order for provider output: families by name,
 * faces by width, weight, style (upright first), then name.
 */

import type { FontFamilyRecord, FontVariantRecord, Style } from "../../types/font.types";
import { Width } from "../../types/font.types";

const STYLE_ORDER: Record<Style, number> = {
  normal: 0,
  oblique: 1,
  italic: 2,
};

function compareNames(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true });
}

/**
 * Sort faces: narrow to wide, light to heavy, upright before slanted
 */
export function sortFaces(faces: readonly FontVariantRecord[]): FontVariantRecord[] {
  return [...faces].sort((a, b) => {
    const widthA = a.width ?? Width.NORMAL;
    const widthB = b.width ?? Width.NORMAL;
    if (widthA !== widthB) return widthA - widthB;

    if (a.weight !== b.weight) return a.weight - b.weight; // 100 -> 900

    const styleDelta = STYLE_ORDER[a.style] - STYLE_ORDER[b.style];
    if (styleDelta !== 0) return styleDelta;

    return compareNames(a.name, b.name);
  });
}

/**
 * Sort families alphabetically by name, sorting each family's faces
 */
export function sortFamilies(families: readonly FontFamilyRecord[]): FontFamilyRecord[] {
  return [...families]
    .sort((a, b) => compareNames(a.name, b.name))
    .map((family) => ({ name: family.name, variants: sortFaces(family.variants) }));
}
