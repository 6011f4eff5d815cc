/**
 * Informational-string enumeration shared by InformationMap and the filtered query.
 * Ids follow the OS informational string ids (copyright = 1 ... supported script tags = 21).
 */

import type { InformationProperty } from "../types/catalog.types";

export const InformationId = {
  COPYRIGHT: 1,
  VERSIONS: 2,
  TRADEMARK: 3,
  MANUFACTURER: 4,
  DESIGNER: 5,
  DESIGNER_URL: 6,
  DESCRIPTION: 7,
  VENDOR_URL: 8,
  LICENSE_DESCRIPTION: 9,
  LICENSE_INFO_URL: 10,
  WIN32_FAMILY_NAMES: 11,
  WIN32_SUBFAMILY_NAMES: 12,
  TYPOGRAPHIC_FAMILY_NAMES: 13,
  TYPOGRAPHIC_SUBFAMILY_NAMES: 14,
  SAMPLE_TEXT: 15,
  FULL_NAME: 16,
  POSTSCRIPT_NAME: 17,
  POSTSCRIPT_CID_NAME: 18,
  WEIGHT_STRETCH_STYLE_FAMILY_NAME: 19,
  DESIGN_SCRIPT_LANGUAGE_TAG: 20,
  SUPPORTED_SCRIPT_LANGUAGE_TAG: 21,
} as const;

export type InformationId = (typeof InformationId)[keyof typeof InformationId];

/**
 * Font-property ids usable as query predicates
 */
export const FontPropertyId = {
  WEIGHT_STRETCH_STYLE_FAMILY_NAME: 1,
  TYPOGRAPHIC_FAMILY_NAME: 2,
  FULL_NAME: 4,
  WIN32_FAMILY_NAME: 5,
  POSTSCRIPT_NAME: 6,
  DESIGN_SCRIPT_LANGUAGE_TAG: 7,
  SUPPORTED_SCRIPT_LANGUAGE_TAG: 8,
} as const;

function property(
  id: InformationId,
  name: string,
  propertyId: number | null = null,
  aliases: readonly string[] = []
): InformationProperty {
  return { id, name, aliases, propertyId };
}

/** Ordered by id; this is the iteration order of every InformationMap */
export const INFORMATION_PROPERTIES: readonly InformationProperty[] = [
  property(InformationId.COPYRIGHT, "copyright"),
  property(InformationId.VERSIONS, "versions"),
  property(InformationId.TRADEMARK, "trademark"),
  property(InformationId.MANUFACTURER, "manufacturer"),
  property(InformationId.DESIGNER, "designer"),
  property(InformationId.DESIGNER_URL, "designerUrl"),
  property(InformationId.DESCRIPTION, "description"),
  property(InformationId.VENDOR_URL, "vendorUrl"),
  property(InformationId.LICENSE_DESCRIPTION, "licenseDescription"),
  property(InformationId.LICENSE_INFO_URL, "licenseInfoUrl"),
  property(
    InformationId.WIN32_FAMILY_NAMES,
    "win32FamilyNames",
    FontPropertyId.WIN32_FAMILY_NAME
  ),
  property(InformationId.WIN32_SUBFAMILY_NAMES, "win32SubfamilyNames"),
  property(
    InformationId.TYPOGRAPHIC_FAMILY_NAMES,
    "typographicFamilyNames",
    FontPropertyId.TYPOGRAPHIC_FAMILY_NAME,
    ["preferredFamilyNames"]
  ),
  property(InformationId.TYPOGRAPHIC_SUBFAMILY_NAMES, "typographicSubfamilyNames", null, [
    "preferredSubfamilyNames",
  ]),
  property(InformationId.SAMPLE_TEXT, "sampleText"),
  property(InformationId.FULL_NAME, "fullName", FontPropertyId.FULL_NAME),
  property(InformationId.POSTSCRIPT_NAME, "postscriptName", FontPropertyId.POSTSCRIPT_NAME),
  property(InformationId.POSTSCRIPT_CID_NAME, "postscriptCidName"),
  property(
    InformationId.WEIGHT_STRETCH_STYLE_FAMILY_NAME,
    "weightStretchStyleFamilyName",
    FontPropertyId.WEIGHT_STRETCH_STYLE_FAMILY_NAME,
    ["wwsFamilyName"]
  ),
  property(
    InformationId.DESIGN_SCRIPT_LANGUAGE_TAG,
    "designScriptLanguageTag",
    FontPropertyId.DESIGN_SCRIPT_LANGUAGE_TAG
  ),
  property(
    InformationId.SUPPORTED_SCRIPT_LANGUAGE_TAG,
    "supportedScriptLanguageTag",
    FontPropertyId.SUPPORTED_SCRIPT_LANGUAGE_TAG
  ),
];

const byId = new Map<number, InformationProperty>();
const byName = new Map<string, InformationProperty>();
for (const prop of INFORMATION_PROPERTIES) {
  byId.set(prop.id, prop);
  byName.set(prop.name, prop);
  for (const alias of prop.aliases) byName.set(alias, prop);
}

/** Canonical name or alias */
export function lookupPropertyByName(name: string): InformationProperty | undefined {
  return byName.get(name);
}

export function lookupPropertyById(id: number): InformationProperty | undefined {
  return byId.get(id);
}

const DECIMAL_ID = /^\d+$/;

/**
 * Resolve a provider table key: canonical name, alias, or decimal id ("16")
 */
export function resolvePropertyKey(key: string): InformationProperty | undefined {
  if (DECIMAL_ID.test(key)) return byId.get(Number(key));
  return byName.get(key);
}
