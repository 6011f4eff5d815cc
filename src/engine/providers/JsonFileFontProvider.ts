/**
 * Snapshot provider backed by a JSON file of the form `{ "families": [...] }`
 */

import { readFileSync } from "node:fs";
import type { FontEnumerationProvider, FontFamilyRecord } from "../../types/font.types";
import { InvalidArgumentError } from "../errors";
import { catalogLogger } from "../logger";
import { formatIssues, snapshotFileSchema } from "../validation";

export class JsonFileFontProvider implements FontEnumerationProvider {
  constructor(private readonly path: string) {}

  /**
   * @throws InvalidArgumentError when the file cannot be read, is not JSON,
   * or does not have the snapshot shape
   */
  enumerate(): FontFamilyRecord[] {
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(this.path, "utf8"));
    } catch (err) {
      throw new InvalidArgumentError(
        `cannot read font snapshot ${this.path}: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const result = snapshotFileSchema.safeParse(data);
    if (!result.success) {
      throw new InvalidArgumentError(
        `invalid font snapshot ${this.path}: ${formatIssues(result.error).join("; ")}`
      );
    }

    catalogLogger.debug("JsonFileFontProvider", "read", {
      path: this.path,
      families: result.data.families.length,
    });
    return result.data.families;
  }
}
