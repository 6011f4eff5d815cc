/**
 * Matching logic: rank a family's variants against weight/style/width criteria.
 * Pure functions only; no collection access.
 */

import {
  MAX_WEIGHT,
  MAX_WIDTH,
  MIN_WEIGHT,
  MIN_WIDTH,
  Style,
  type VariantCriteria,
  Weight,
  Width,
} from "../types/font.types";
import { clamp } from "../utils/fontUtils";

export type MatchPath = "basic" | "extended";

export interface ResolvedCriteria {
  path: MatchPath;
  weight: number;
  style: Style;
  width: number;
}

/** What the engine needs to know about a candidate */
export interface MatchCandidate {
  weight: number;
  style: Style;
  width: number;
  /** Enumeration position within the family */
  index: number;
}

/**
 * Styles to try, in order, when the requested one is missing
 */
export const STYLE_FALLBACKS: Readonly<Record<Style, readonly Style[]>> = {
  [Style.ITALIC]: [Style.OBLIQUE, Style.NORMAL],
  [Style.OBLIQUE]: [Style.ITALIC, Style.NORMAL],
  [Style.NORMAL]: [Style.OBLIQUE, Style.ITALIC],
};

function axisValue(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return clamp(value, min, max);
}

/**
 * Apply defaults and pick the algorithm path.
 * `style` wins over `italic`; `width` selects the extended path.
 */
export function resolveCriteria(criteria: VariantCriteria = {}): ResolvedCriteria {
  let style: Style = Style.NORMAL;
  if (criteria.style !== undefined) {
    style = criteria.style;
  } else if (criteria.italic !== undefined) {
    style = criteria.italic ? Style.ITALIC : Style.NORMAL;
  }

  return {
    path: criteria.width === undefined ? "basic" : "extended",
    weight: axisValue(criteria.weight, Weight.REGULAR, MIN_WEIGHT, MAX_WEIGHT),
    style,
    width: axisValue(criteria.width, Width.NORMAL, MIN_WIDTH, MAX_WIDTH),
  };
}

/**
 * 0 for the requested style, 1.. for its fallbacks in order
 */
export function styleRank(requested: Style, actual: Style): number {
  if (requested === actual) return 0;
  const position = STYLE_FALLBACKS[requested].indexOf(actual);
  return position === -1 ? STYLE_FALLBACKS[requested].length + 1 : position + 1;
}

/**
 * Basic (2-axis) order. The lowest style rank present is the effective style group,
 * so sorting by rank first puts that group ahead of every other style.
 * Within a style: nearest weight, then the heavier weight, then enumeration order.
 */
function compareBasic(criteria: ResolvedCriteria, a: MatchCandidate, b: MatchCandidate): number {
  const styleDelta = styleRank(criteria.style, a.style) - styleRank(criteria.style, b.style);
  if (styleDelta !== 0) return styleDelta;

  const weightDelta = Math.abs(a.weight - criteria.weight) - Math.abs(b.weight - criteria.weight);
  if (weightDelta !== 0) return weightDelta;

  if (a.weight !== b.weight) return b.weight - a.weight;
  return a.index - b.index;
}

/**
 * Extended (3-axis) order: style rank, width distance, weight distance, enumeration order
 */
function compareExtended(criteria: ResolvedCriteria, a: MatchCandidate, b: MatchCandidate): number {
  const styleDelta = styleRank(criteria.style, a.style) - styleRank(criteria.style, b.style);
  if (styleDelta !== 0) return styleDelta;

  const widthDelta = Math.abs(a.width - criteria.width) - Math.abs(b.width - criteria.width);
  if (widthDelta !== 0) return widthDelta;

  const weightDelta = Math.abs(a.weight - criteria.weight) - Math.abs(b.weight - criteria.weight);
  if (weightDelta !== 0) return weightDelta;

  return a.index - b.index;
}

/**
 * Rank every candidate, best match first. Total: never drops a candidate.
 */
export function rankVariants<T extends MatchCandidate>(
  candidates: readonly T[],
  criteria: VariantCriteria = {}
): T[] {
  const resolved = resolveCriteria(criteria);
  const compare = resolved.path === "extended" ? compareExtended : compareBasic;
  return [...candidates].sort((a, b) => compare(resolved, a, b));
}

/**
 * Best match, or undefined for an empty candidate list
 */
export function selectBestVariant<T extends MatchCandidate>(
  candidates: readonly T[],
  criteria: VariantCriteria = {}
): T | undefined {
  return rankVariants(candidates, criteria)[0];
}
