/**
 * @summary Turns audited weights into ranked, normalized feature rows.
 *
 * For each label the raw score of a feature is its metric value (the
 * weight itself; bias terms score 0). Scores are normalized by the largest
 * distance from zero within the label and reported as a percentage, so the
 * strongest feature sits at +/-100%. This is a heuristic: it ignores
 * feature co-occurrence.
 *
 * Used by:
 * - pipeline/analyze.ts to produce the final FeatureReport
 */

import type { AuditResult } from "../audit/audit-parser.js";
import type { FeatureCatalog } from "../catalog/feature-catalog.js";
import { UnsupportedFeatureError } from "../types/errors.js";
import { CONSTANT_FEATURE } from "../types/feature.js";
import type { DiagnosticLogger, FeatureId } from "../types/feature.js";

// ---------------------------------------------------------------------------
// Selectors
// ---------------------------------------------------------------------------

/** Metric letters; only `w` (weight) is implemented */
export type MetricSelector = "w";

/** `r`: signed relative score, `a`: absolute relative score */
export type OrderSelector = "r" | "a";

const METRICS = new Map<string, (weight: number) => number>([
  ["w", (weight) => weight],
]);

/** Guard against a zero divisor when every score is 0 */
export const SCORE_EPSILON = 1e-10;

/** Minimum width reserved for feature names */
export const MIN_NAME_WIDTH = 10;

/**
 * Validate a metric letter.
 *
 * @throws UnsupportedFeatureError for anything but `w`
 */
export function parseMetricSelector(value: string): MetricSelector {
  if (value === "w") return value;
  throw new UnsupportedFeatureError(`metric '${value}'`, `Metric '${value}' is not implemented; use 'w'`);
}

/**
 * Validate an order letter.
 *
 * @throws UnsupportedFeatureError for anything but `r` or `a`
 */
export function parseOrderSelector(value: string): OrderSelector {
  if (value === "r" || value === "a") return value;
  throw new UnsupportedFeatureError(`order '${value}'`, `Order '${value}' is not implemented; use 'r' or 'a'`);
}

// ---------------------------------------------------------------------------
// Report Types
// ---------------------------------------------------------------------------

export interface ScoreRow {
  feature: FeatureId;
  hash: number;
  min: number;
  max: number;
  weight: number;
  score: number;
  /** score / maxDistance, made absolute in `a` order */
  normalized: number;
  /** normalized * 100 */
  relScore: number;
}

export interface LabelScores {
  label: string;
  /** Verbatim prediction line; multi-class mode only */
  prediction?: string;
  rows: ScoreRow[];
  minScore: number;
  maxScore: number;
  maxDistance: number;
  /** Longest feature name, at least MIN_NAME_WIDTH */
  nameWidth: number;
  /** max weight - min weight over the rows */
  weightRange: number;
}

export interface ScoreOptions {
  metric: MetricSelector;
  order: OrderSelector;
  log?: DiagnosticLogger | undefined;
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

interface LabelInput {
  label: string;
  prediction?: string;
  features: readonly FeatureId[];
  weights: ReadonlyMap<FeatureId, number>;
  hashes: ReadonlyMap<FeatureId, number>;
}

/**
 * Score every label of an audit result.
 *
 * Multi-class labels that never appeared in the audit are skipped with a
 * diagnostic. Neither the audit result nor the catalog is modified.
 */
export function scoreAudit(
  audit: AuditResult,
  catalog: FeatureCatalog,
  options: ScoreOptions
): LabelScores[] {
  const { plan } = audit;

  if (plan.mode === "single") {
    const label = plan.labels[0] ?? "";
    return [
      scoreLabel(
        { label, features: audit.features, weights: audit.weights, hashes: audit.featureHashes },
        catalog,
        options
      ),
    ];
  }

  const out: LabelScores[] = [];
  for (const label of plan.labels) {
    const entry = audit.byLabel.get(label);
    if (!entry) {
      options.log?.(`no audit output for label ${label}`);
      continue;
    }
    out.push(
      scoreLabel(
        {
          label,
          prediction: entry.prediction,
          features: Array.from(entry.weights.keys()),
          weights: entry.weights,
          hashes: entry.hashes,
        },
        catalog,
        options
      )
    );
  }
  return out;
}

/**
 * Score one label's features.
 */
export function scoreLabel(
  input: LabelInput,
  catalog: FeatureCatalog,
  options: ScoreOptions
): LabelScores {
  const metric = METRICS.get(options.metric);
  if (metric === undefined) {
    throw new UnsupportedFeatureError(`metric '${options.metric}'`);
  }

  const scored: Array<Omit<ScoreRow, "normalized" | "relScore">> = [];
  let minScore = 0;
  let maxScore = 0;

  for (const feature of input.features) {
    const weight = input.weights.get(feature);
    if (weight === undefined) {
      options.log?.(`no weight for ${feature} (label ${input.label}); skipped`);
      continue;
    }

    const score = feature.startsWith(CONSTANT_FEATURE) ? 0 : metric(weight);
    minScore = Math.min(minScore, score);
    maxScore = Math.max(maxScore, score);

    const range = catalog.rangeOf(feature);
    scored.push({
      feature,
      hash: input.hashes.get(feature) ?? 0,
      min: range?.min ?? 0,
      max: range?.max ?? 0,
      weight,
      score,
    });
  }

  let maxDistance = Math.max(Math.abs(maxScore), Math.abs(minScore));
  if (maxDistance === 0) {
    maxDistance = SCORE_EPSILON;
  }

  const rows: ScoreRow[] = scored.map((row) => {
    const ratio = row.score / maxDistance;
    const normalized = options.order === "a" ? Math.abs(ratio) : ratio;
    return { ...row, normalized, relScore: normalized * 100 };
  });

  // Array.prototype.sort is stable: ties keep audit order
  rows.sort((a, b) => b.score - a.score);

  let nameWidth = MIN_NAME_WIDTH;
  let minWeight = 0;
  let maxWeight = 0;
  for (const row of rows) {
    nameWidth = Math.max(nameWidth, row.feature.length);
    minWeight = Math.min(minWeight, row.weight);
    maxWeight = Math.max(maxWeight, row.weight);
  }

  const result: LabelScores = {
    label: input.label,
    rows,
    minScore,
    maxScore,
    maxDistance,
    nameWidth,
    weightRange: maxWeight - minWeight,
  };
  if (input.prediction !== undefined) {
    result.prediction = input.prediction;
  }
  return result;
}
