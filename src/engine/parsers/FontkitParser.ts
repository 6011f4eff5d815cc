/**
 * Fontkit parser wrapper
 * Reads name records and the OS/2 table into ParsedFace records.
 * Handles single fonts, WOFF/WOFF2 and TrueType/OpenType collections.
 */

import * as fontkit from "fontkit";
import type { ParsedFace } from "../../types/catalog.types";
import { isRecord } from "../../utils/fontUtils";
import { collectNameRecords } from "../resolvers/NameResolver";
import { buildParsedFace } from "./faceTables";

/**
 * fontkit `name.records` keys -> information property names
 */
export const FONTKIT_NAME_KEYS: Readonly<Record<string, string>> = {
  copyright: "copyright",
  version: "versions",
  trademark: "trademark",
  manufacturer: "manufacturer",
  designer: "designer",
  designerURL: "designerUrl",
  description: "description",
  vendorURL: "vendorUrl",
  license: "licenseDescription",
  licenseURL: "licenseInfoUrl",
  fontFamily: "win32FamilyNames",
  fontSubfamily: "win32SubfamilyNames",
  preferredFamily: "typographicFamilyNames",
  preferredSubfamily: "typographicSubfamilyNames",
  sampleText: "sampleText",
  fullName: "fullName",
  postscriptName: "postscriptName",
  postscriptCIDFontName: "postscriptCidName",
  wwsFamilyName: "weightStretchStyleFamilyName",
};

function faceFromFont(font: unknown, locale: string): ParsedFace | null {
  if (!isRecord(font)) return null;
  const nameTable = font.name;
  const records = isRecord(nameTable) ? nameTable.records : undefined;
  return buildParsedFace(collectNameRecords(records, FONTKIT_NAME_KEYS), font["OS/2"], locale);
}

/**
 * Parse a font file buffer. Collections yield one face per member font.
 * Throws whatever fontkit throws for data it cannot read.
 */
export function parseWithFontkit(buffer: Buffer, locale: string): ParsedFace[] {
  const created: unknown = fontkit.create(buffer);
  const fonts: unknown[] =
    isRecord(created) && Array.isArray(created.fonts) ? created.fonts : [created];

  const faces: ParsedFace[] = [];
  for (const font of fonts) {
    const face = faceFromFont(font, locale);
    if (face) faces.push(face);
  }
  return faces;
}
