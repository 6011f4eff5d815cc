export { FontCollection } from "./engine/FontCollection";
export { FontFamily } from "./engine/FontFamily";
export { FontVariant } from "./engine/FontVariant";
export { InformationMap, type InformationKey } from "./engine/InformationMap";
export {
  FontCatalogError,
  IndexOutOfRangeError,
  InvalidArgumentError,
  NotFoundError,
  TypeMismatchError,
} from "./engine/errors";
export { CatalogLogger, catalogLogger, defaultLogLevel } from "./engine/logger";
export { resolveCatalogOptions } from "./engine/config";
export {
  FontPropertyId,
  INFORMATION_PROPERTIES,
  InformationId,
  lookupPropertyById,
  lookupPropertyByName,
} from "./engine/properties";
export { validateSnapshot } from "./engine/validation";
export { StaticFontProvider } from "./engine/providers/StaticFontProvider";
export { JsonFileFontProvider } from "./engine/providers/JsonFileFontProvider";
export {
  type DirectoryProviderOptions,
  FontkitDirectoryProvider,
} from "./engine/providers/FontkitDirectoryProvider";
export { getMatchingVariants, type VariantFilters } from "./lib/query";
export { rankVariants, resolveCriteria, STYLE_FALLBACKS } from "./lib/matcher";
export { getSystemFontDirectories } from "./utils/fontUtils";
export {
  MAX_WEIGHT,
  MAX_WIDTH,
  MIN_WEIGHT,
  MIN_WIDTH,
  Style,
  Weight,
  Width,
} from "./types/font.types";
export type {
  FontEnumerationProvider,
  FontFamilyRecord,
  FontVariantRecord,
  LocalizedString,
  PropertyTable,
  PropertyValue,
  VariantCriteria,
} from "./types/font.types";
export type {
  CatalogOptions,
  InformationProperty,
  LogEntry,
  LogLevel,
} from "./types/catalog.types";
export { ValidationMode } from "./types/catalog.types";
