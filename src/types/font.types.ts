/**
 * Font-related type definitions
 */

/**
 * Weight constants. The weight axis is the integer range 1-1000; these are
 * labels over it, not a closed set.
 */
export const Weight = {
  THIN: 100,
  EXTRA_LIGHT: 200,
  LIGHT: 300,
  SEMI_LIGHT: 350,
  NORMAL: 400,
  REGULAR: 400,
  MEDIUM: 500,
  SEMI_BOLD: 600,
  BOLD: 700,
  EXTRA_BOLD: 800,
  BLACK: 900,
  EXTRA_BLACK: 950,
} as const;

export type Weight = number;

export const MIN_WEIGHT = 1;
export const MAX_WEIGHT = 1000;

/** Display label per weight value (REGULAR wins over its NORMAL alias) */
export const WEIGHT_NAMES: ReadonlyMap<number, string> = new Map([
  [100, "THIN"],
  [200, "EXTRA_LIGHT"],
  [300, "LIGHT"],
  [350, "SEMI_LIGHT"],
  [400, "REGULAR"],
  [500, "MEDIUM"],
  [600, "SEMI_BOLD"],
  [700, "BOLD"],
  [800, "EXTRA_BOLD"],
  [900, "BLACK"],
  [950, "EXTRA_BLACK"],
]);

export const Style = {
  NORMAL: "normal" as const,
  OBLIQUE: "oblique" as const,
  ITALIC: "italic" as const,
} as const;

export type Style = (typeof Style)[keyof typeof Style];

export const STYLE_VALUES: readonly Style[] = [Style.NORMAL, Style.OBLIQUE, Style.ITALIC];

/**
 * Width (stretch) classes, 1 = ultra-condensed through 9 = ultra-expanded.
 */
export const Width = {
  ULTRA_CONDENSED: 1,
  EXTRA_CONDENSED: 2,
  CONDENSED: 3,
  SEMI_CONDENSED: 4,
  NORMAL: 5,
  SEMI_EXPANDED: 6,
  EXPANDED: 7,
  EXTRA_EXPANDED: 8,
  ULTRA_EXPANDED: 9,
} as const;

export type Width = number;

export const MIN_WIDTH = 1;
export const MAX_WIDTH = 9;

/**
 * Localized string table: locale tag -> string ("en", "en-US", "de", ...)
 */
export type LocalizedString = Record<string, string>;

export type PropertyValue = string | LocalizedString;

/**
 * Property table as handed over by a provider.
 * Keys are property names, aliases, or decimal information ids ("1").
 */
export type PropertyTable = Record<string, PropertyValue>;

export interface FontVariantRecord {
  name: string; // Face name, e.g. "Bold Italic"
  weight: number;
  style: Style;
  width?: number; // Defaults to Width.NORMAL
  filename: string;
  properties?: PropertyTable;
}

export interface FontFamilyRecord {
  name: string;
  variants: FontVariantRecord[];
}

/**
 * Source of the installed-font snapshot. Called once per collection.
 */
export interface FontEnumerationProvider {
  enumerate(): FontFamilyRecord[];
}

/**
 * Best-variant criteria. Supplying `width` selects the extended (3-axis) path.
 * `style` takes precedence over `italic` when both are given.
 */
export interface VariantCriteria {
  weight?: number;
  style?: Style;
  width?: number;
  italic?: boolean;
}
