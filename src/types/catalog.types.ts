/**
 * Type definitions for the catalog snapshot, options and logging
 */

import type { PropertyTable, PropertyValue, Style } from "./font.types";

/**
 * Validation mode for provider snapshots
 */
export const ValidationMode = {
  STRICT: "strict" as const, // Reject the snapshot on the first bad record
  LENIENT: "lenient" as const, // Drop bad records, log a warning per drop
} as const;

export type ValidationMode = (typeof ValidationMode)[keyof typeof ValidationMode];

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: number;
  level: Exclude<LogLevel, "silent">;
  component: string;
  action: string;
  duration?: number;
  metadata?: Record<string, unknown>;
}

/**
 * Collection construction options
 */
export interface CatalogOptions {
  /** Preferred locale for localized property values, e.g. "en-US" */
  locale: string;
  validation: ValidationMode;
  /** Case-insensitive family-name lookup (first family in enumeration order wins) */
  ignoreFamilyNameCase: boolean;
}

/**
 * One entry of the informational-string enumeration
 */
export interface InformationProperty {
  id: number;
  name: string;
  aliases: readonly string[];
  /** Font-property id used by the filtered query; null when not filterable */
  propertyId: number | null;
}

/**
 * Variant record after snapshot validation
 */
export interface ValidatedVariant {
  name: string;
  weight: number;
  style: Style;
  width: number;
  filename: string;
  /** information id -> raw (possibly localized) value */
  properties: ReadonlyMap<number, PropertyValue>;
}

export interface ValidatedFamily {
  name: string;
  variants: ValidatedVariant[];
}

/**
 * One face as read from a font file, before grouping into families
 */
export interface ParsedFace {
  familyName: string;
  faceName: string;
  weight: number;
  style: Style;
  width: number;
  properties: PropertyTable;
}
