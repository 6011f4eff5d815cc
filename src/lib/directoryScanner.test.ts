import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { catalogLogger } from "../engine/logger";
import { collectFontFiles } from "./directoryScanner";

describe("collectFontFiles", () => {
  let root: string;

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), "font-catalog-scan-"));
    mkdirSync(join(root, "nested", "deeper"), { recursive: true });
    writeFileSync(join(root, "b.ttf"), "b");
    writeFileSync(join(root, "A.OTF"), "a");
    writeFileSync(join(root, "notes.txt"), "not a font");
    writeFileSync(join(root, "nested", "c.woff2"), "c");
    writeFileSync(join(root, "nested", "deeper", "d.ttc"), "d");
    catalogLogger.setLevel("silent");
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("collects font files recursively in sorted order", () => {
    expect(collectFontFiles([root])).toEqual([
      join(root, "A.OTF"),
      join(root, "b.ttf"),
      join(root, "nested", "c.woff2"),
      join(root, "nested", "deeper", "d.ttc"),
    ]);
  });

  it("does not repeat files reached through overlapping directories", () => {
    expect(collectFontFiles([root, join(root, "nested")])).toHaveLength(4);
  });

  it("skips missing directories with a warning", () => {
    catalogLogger.clear();
    const missing = join(root, "missing");

    expect(collectFontFiles([missing])).toEqual([]);
    const [entry] = catalogLogger.getEntries();
    expect(entry.level).toBe("warn");
    expect(entry.action).toBe("skip directory");
    expect(entry.metadata?.directory).toBe(missing);
  });
});
