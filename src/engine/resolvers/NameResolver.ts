/**
 * Name resolver
 * Picks one string out of a localized name record and collects parser name
 * records into provider property tables.
 */

import type { LocalizedString, PropertyTable, PropertyValue } from "../../types/font.types";
import { isRecord } from "../../utils/fontUtils";

const FALLBACK_LOCALES = ["en-us", "en"];

/**
 * Resolve a localized value
 * Order: requested locale, its language subtag, en-US, en, first entry.
 * Returns null for an empty record or empty string.
 */
export function resolveLocalizedString(value: PropertyValue, locale: string): string | null {
  if (typeof value === "string") {
    return value.length > 0 ? value : null;
  }

  const entries = Object.entries(value).filter(([, text]) => text.length > 0);
  if (entries.length === 0) return null;

  const wanted = locale.toLowerCase();
  const language = wanted.split("-")[0];
  const candidates = [wanted, language, ...FALLBACK_LOCALES];

  for (const candidate of candidates) {
    const match = entries.find(([tag]) => tag.toLowerCase() === candidate);
    if (match) return match[1];
  }

  // Same language, other region (e.g. "en-GB" for "en-US")
  const sameLanguage = entries.find(([tag]) => tag.toLowerCase().split("-")[0] === language);
  if (sameLanguage) return sameLanguage[1];

  return entries[0][1];
}

function toLocalizedString(record: unknown): PropertyValue | null {
  if (typeof record === "string") return record.length > 0 ? record : null;
  if (!isRecord(record)) return null;

  const localized: LocalizedString = {};
  for (const [tag, text] of Object.entries(record)) {
    if (typeof text === "string" && text.length > 0) localized[tag] = text;
  }
  return Object.keys(localized).length > 0 ? localized : null;
}

/**
 * Collect name records keyed by parser-specific keys into a property table.
 * `keyMap` maps parser keys (fontkit "fontFamily", opentype.js "postScriptName", ...)
 * to property names. Unmapped keys are ignored.
 */
export function collectNameRecords(
  records: unknown,
  keyMap: Readonly<Record<string, string>>
): PropertyTable {
  const table: PropertyTable = {};
  if (!isRecord(records)) return table;

  for (const [recordKey, propertyName] of Object.entries(keyMap)) {
    const value = toLocalizedString(records[recordKey]);
    if (value !== null) table[propertyName] = value;
  }
  return table;
}
