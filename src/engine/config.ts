/**
 * Catalog options: defaults from the environment, validated with zod
 */

import { z } from "zod";
import { type CatalogOptions, ValidationMode } from "../types/catalog.types";
import { InvalidArgumentError } from "./errors";
import { formatIssues } from "./validation";

const DEFAULT_LOCALE = "en-US";

const catalogOptionsSchema = z.object({
  locale: z.string().min(1),
  validation: z.enum([ValidationMode.STRICT, ValidationMode.LENIENT]),
  ignoreFamilyNameCase: z.boolean(),
});

function systemLocale(): string {
  try {
    return Intl.DateTimeFormat().resolvedOptions().locale || DEFAULT_LOCALE;
  } catch {
    // Runtimes built without Intl support
    return DEFAULT_LOCALE;
  }
}

/**
 * Resolve collection options.
 * Locale: explicit, then FONT_CATALOG_LOCALE, then the runtime locale, then en-US.
 */
export function resolveCatalogOptions(
  options: Partial<CatalogOptions> = {},
  env: NodeJS.ProcessEnv = process.env
): CatalogOptions {
  const result = catalogOptionsSchema.safeParse({
    locale: options.locale ?? env.FONT_CATALOG_LOCALE ?? systemLocale(),
    validation: options.validation ?? ValidationMode.LENIENT,
    ignoreFamilyNameCase: options.ignoreFamilyNameCase ?? false,
  });

  if (!result.success) {
    throw new InvalidArgumentError(
      `invalid catalog options: ${formatIssues(result.error).join("; ")}`
    );
  }
  return result.data;
}
