import { describe, expect, it } from "vitest";
import { resolveCatalogOptions } from "./config";
import { InvalidArgumentError } from "./errors";

describe("resolveCatalogOptions", () => {
  it("applies defaults", () => {
    const options = resolveCatalogOptions({}, { FONT_CATALOG_LOCALE: "en-GB" });

    expect(options).toEqual({
      locale: "en-GB",
      validation: "lenient",
      ignoreFamilyNameCase: false,
    });
  });

  it("prefers explicit options over the environment", () => {
    const options = resolveCatalogOptions(
      { locale: "fr-FR", validation: "strict", ignoreFamilyNameCase: true },
      { FONT_CATALOG_LOCALE: "en-GB" }
    );

    expect(options).toEqual({ locale: "fr-FR", validation: "strict", ignoreFamilyNameCase: true });
  });

  it("falls back to a runtime locale", () => {
    expect(resolveCatalogOptions({}, {}).locale.length).toBeGreaterThan(0);
  });

  it("rejects an empty locale", () => {
    expect(() => resolveCatalogOptions({ locale: "" }, {})).toThrow(InvalidArgumentError);
    expect(() => resolveCatalogOptions({ locale: "" }, {})).toThrow(
      /^invalid catalog options: locale: /
    );
  });
});
