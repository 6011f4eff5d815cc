import { describe, expect, it } from "vitest";
import { sampleFamilies } from "../../test/fixtures";
import { StaticFontProvider } from "./StaticFontProvider";

describe("StaticFontProvider", () => {
  it("returns its records", () => {
    const provider = new StaticFontProvider(sampleFamilies());

    expect(provider.enumerate()).toEqual(sampleFamilies());
  });

  it("hands out fresh lists on every call", () => {
    const provider = new StaticFontProvider(sampleFamilies());
    const first = provider.enumerate();
    first.pop();
    first[0].variants.pop();

    const second = provider.enumerate();
    expect(second).toHaveLength(5);
    expect(second[0].variants).toHaveLength(6);
  });
});
