import { describe, expect, it } from "vitest";
import { FontCollection } from "../engine/FontCollection";
import { InvalidArgumentError, TypeMismatchError } from "../engine/errors";
import { sampleFamilies } from "../test/fixtures";
import { compileFilters, describeType, getMatchingVariants } from "./query";

const collection = FontCollection.fromSnapshot(sampleFamilies(), { locale: "en-US" });

function fullNames(filters: Record<string, unknown>): string[] {
  return getMatchingVariants(collection, filters).map((variant) =>
    variant.information.get("fullName")
  );
}

describe("getMatchingVariants", () => {
  it("finds a face by its full name", () => {
    const matches = getMatchingVariants(collection, { fullName: "Harbor Sans Bold Italic" });

    expect(matches).toHaveLength(1);
    expect(matches[0].weight).toBe(700);
    expect(matches[0].style).toBe("italic");
    expect(matches[0].family.name).toBe("Harbor Sans");
  });

  it("returns matches in collection order", () => {
    expect(fullNames({ win32FamilyNames: "Harbor Sans" })).toEqual([
      "Harbor Sans Regular",
      "Harbor Sans Italic",
      "Harbor Sans Bold",
      "Harbor Sans Bold Italic",
      "Harbor Sans Condensed",
      "Harbor Sans Black",
    ]);
  });

  it("requires every filter to match", () => {
    expect(fullNames({ win32FamilyNames: "Harbor Sans", fullName: "Harbor Sans Bold" })).toEqual([
      "Harbor Sans Bold",
    ]);
    expect(fullNames({ win32FamilyNames: "Harbor Sans", fullName: "Harbor Serif Light" })).toEqual(
      []
    );
  });

  it("treats a missing property as a failed filter", () => {
    expect(fullNames({ postscriptName: "HarborSans-Regular" })).toEqual(["Harbor Sans Regular"]);
    expect(fullNames({ typographicFamilyNames: "Harbor Sans" })).toEqual([]);
  });

  it("compares strings exactly", () => {
    expect(fullNames({ fullName: "harbor sans bold" })).toEqual([]);
  });

  it("rejects an empty filter set", () => {
    expect(() => getMatchingVariants(collection, {})).toThrow(InvalidArgumentError);
    expect(() => getMatchingVariants(collection, {})).toThrow("no filter conditions passed");
  });

  it("rejects unknown property names", () => {
    expect(() => getMatchingVariants(collection, { notARealProperty: "x" })).toThrow(
      '"notARealProperty" isn\'t a known font property name'
    );
  });

  it("rejects properties that cannot be filtered on", () => {
    expect(() => getMatchingVariants(collection, { copyright: "x" })).toThrow(
      "\"copyright\" doesn't have a mapping to font property id"
    );
  });

  it("rejects values that are not strings", () => {
    const run = () => getMatchingVariants(collection, { fullName: 1.5 });

    expect(run).toThrow(TypeMismatchError);
    expect(run).toThrow(InvalidArgumentError);
    expect(run).toThrow("'number' object cannot be converted to string");
  });

  it("validates keys in order before matching", () => {
    expect(() => getMatchingVariants(collection, { copyright: 1.5, bogus: "x" })).toThrow(
      "\"copyright\" doesn't have a mapping to font property id"
    );
    expect(() => getMatchingVariants(collection, { fullName: null, bogus: "x" })).toThrow(
      "'null' object cannot be converted to string"
    );
  });
});

describe("compileFilters", () => {
  it("resolves aliases to canonical properties", () => {
    const [filter] = compileFilters({ preferredFamilyNames: "Harbor Sans" });

    expect(filter.property.name).toBe("typographicFamilyNames");
    expect(filter.property.propertyId).toBe(2);
    expect(filter.value).toBe("Harbor Sans");
  });
});

describe("describeType", () => {
  it("names values the way error messages show them", () => {
    expect(describeType(null)).toBe("null");
    expect(describeType([])).toBe("array");
    expect(describeType(undefined)).toBe("undefined");
    expect(describeType(true)).toBe("boolean");
    expect(describeType({})).toBe("object");
  });
});
