/**
 * Collection-wide filtered query over variant information strings
 */

import type { FontCollection } from "../engine/FontCollection";
import type { FontVariant } from "../engine/FontVariant";
import { InvalidArgumentError, TypeMismatchError } from "../engine/errors";
import { lookupPropertyByName } from "../engine/properties";
import type { InformationProperty } from "../types/catalog.types";

/** Property name (or alias) -> expected value */
export type VariantFilters = Readonly<Record<string, unknown>>;

export interface CompiledFilter {
  property: InformationProperty;
  value: string;
}

export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Validate filters in key order and resolve each key to its property.
 * @throws InvalidArgumentError for an empty filter set, an unknown or
 * non-filterable property
 * @throws TypeMismatchError for a non-string value
 */
export function compileFilters(filters: VariantFilters): CompiledFilter[] {
  const keys = Object.keys(filters);
  if (keys.length === 0) {
    throw new InvalidArgumentError("no filter conditions passed");
  }

  return keys.map((key) => {
    const property = lookupPropertyByName(key);
    if (!property) {
      throw new InvalidArgumentError(`"${key}" isn't a known font property name`);
    }
    if (property.propertyId === null) {
      throw new InvalidArgumentError(`"${key}" doesn't have a mapping to font property id`);
    }

    const value = filters[key];
    if (typeof value !== "string") {
      throw new TypeMismatchError(`'${describeType(value)}' object cannot be converted to string`);
    }
    return { property, value };
  });
}

/**
 * Every filter must equal the variant's value; a missing value fails the filter
 */
export function matchesFilters(variant: FontVariant, filters: readonly CompiledFilter[]): boolean {
  return filters.every(({ property, value }) => variant.information.find(property.id) === value);
}

/**
 * Variants across the whole collection whose information matches every filter,
 * in collection order (families in order, variants within each family in order)
 */
export function getMatchingVariants(
  collection: FontCollection,
  filters: VariantFilters
): FontVariant[] {
  const compiled = compileFilters(filters);
  const matches: FontVariant[] = [];
  for (const family of collection) {
    for (const variant of family) {
      if (matchesFilters(variant, compiled)) matches.push(variant);
    }
  }
  return matches;
}
