/**
 * Zod validation schemas for provider snapshots
 * LENIENT mode by default (log warnings, drop invalid records)
 */

import { z } from "zod";
import {
  ValidationMode,
  type ValidatedFamily,
  type ValidatedVariant,
} from "../types/catalog.types";
import {
  MAX_WEIGHT,
  MAX_WIDTH,
  MIN_WEIGHT,
  MIN_WIDTH,
  type PropertyValue,
  Width,
} from "../types/font.types";
import { InvalidArgumentError } from "./errors";
import { catalogLogger } from "./logger";
import { resolvePropertyKey } from "./properties";

export const styleSchema = z.enum(["normal", "oblique", "italic"]);

export const propertyValueSchema = z.union([z.string(), z.record(z.string(), z.string())]);

/**
 * Variant record schema
 * Weight 1-1000 and width 1-9 are integral; width defaults to normal
 */
export const variantRecordSchema = z.object({
  name: z.string().min(1),
  weight: z.number().int().min(MIN_WEIGHT).max(MAX_WEIGHT),
  style: styleSchema,
  width: z.number().int().min(MIN_WIDTH).max(MAX_WIDTH).default(Width.NORMAL),
  filename: z.string().min(1),
  properties: z.record(z.string(), propertyValueSchema).default({}),
});

/**
 * Family record schema; variants are validated one by one so that
 * lenient mode can drop a single bad variant
 */
export const familyRecordSchema = z.object({
  name: z.string().min(1),
  variants: z.array(z.unknown()),
});

/**
 * Shape of a snapshot file (types only, ranges are checked at construction)
 */
export const snapshotFileSchema = z.object({
  families: z.array(
    z.object({
      name: z.string(),
      variants: z.array(
        z.object({
          name: z.string(),
          weight: z.number(),
          style: styleSchema,
          width: z.number().optional(),
          filename: z.string(),
          properties: z.record(z.string(), propertyValueSchema).optional(),
        })
      ),
    })
  ),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Report a snapshot problem according to mode.
 * STRICT throws; LENIENT logs a warning and lets the caller drop the record.
 */
function reportIssue(mode: ValidationMode, context: string, issues: string[]): void {
  if (mode === ValidationMode.STRICT) {
    throw new InvalidArgumentError(`invalid font snapshot: ${context}: ${issues.join("; ")}`);
  }
  catalogLogger.warn("Validation", "drop", { context, issues });
}

/**
 * Validate data with mode
 * Returns the parsed value, or null when LENIENT mode dropped it
 */
export function validateWithMode<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  mode: ValidationMode,
  context: string
): z.infer<S> | null {
  const result = schema.safeParse(data);
  if (result.success) return result.data;
  reportIssue(mode, context, formatIssues(result.error));
  return null;
}

function validateProperties(
  properties: Record<string, PropertyValue>,
  mode: ValidationMode,
  context: string
): Map<number, PropertyValue> {
  const resolved = new Map<number, PropertyValue>();
  for (const [key, value] of Object.entries(properties)) {
    const prop = resolvePropertyKey(key);
    if (!prop) {
      reportIssue(mode, `${context}.properties`, [`"${key}" isn't a known font property name`]);
      continue;
    }
    if (resolved.has(prop.id)) {
      reportIssue(mode, `${context}.properties`, [`"${key}" duplicates "${prop.name}"`]);
      continue;
    }
    resolved.set(prop.id, value);
  }
  return resolved;
}

/**
 * Validate a provider snapshot and enforce the collection invariants:
 * unique family names and non-empty families.
 */
export function validateSnapshot(records: readonly unknown[], mode: ValidationMode): ValidatedFamily[] {
  const families: ValidatedFamily[] = [];
  const seenNames = new Set<string>();

  records.forEach((raw, familyIndex) => {
    const familyContext = `families[${familyIndex}]`;
    const family = validateWithMode(familyRecordSchema, raw, mode, familyContext);
    if (!family) return;

    if (seenNames.has(family.name)) {
      reportIssue(mode, familyContext, [`duplicate font family "${family.name}"`]);
      return;
    }

    const variants: ValidatedVariant[] = [];
    family.variants.forEach((rawVariant, variantIndex) => {
      const variantContext = `${family.name}.variants[${variantIndex}]`;
      const variant = validateWithMode(variantRecordSchema, rawVariant, mode, variantContext);
      if (!variant) return;

      variants.push({
        name: variant.name,
        weight: variant.weight,
        style: variant.style,
        width: variant.width,
        filename: variant.filename,
        properties: validateProperties(variant.properties, mode, variantContext),
      });
    });

    if (variants.length === 0) {
      reportIssue(mode, familyContext, [`font family "${family.name}" has no variants`]);
      return;
    }

    seenNames.add(family.name);
    families.push({ name: family.name, variants });
  });

  return families;
}
