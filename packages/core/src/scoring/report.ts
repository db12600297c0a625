/**
 * @summary Plain-text rendering of scored labels.
 *
 * Layout (columns joined by one space, no trailing spaces):
 *
 * ```
 * FeatureName    HashVal   MinVal   MaxVal  Weight  RelScore
 * a^x             123456     1.00     2.00 +0.5000  +100.00%
 * ```
 */

import type { LabelScores, ScoreRow } from "./score-engine.js";

const HEADER = ["FeatureName", "HashVal", "MinVal", "MaxVal", "Weight", "RelScore"] as const;

const HASH_WIDTH = 10;
const RANGE_WIDTH = 8;
const REL_WIDTH = 9;
const MIN_WEIGHT_WIDTH = 7;

/**
 * Format a number with an explicit sign.
 *
 * @example
 * signed(0.5, 4);  // "+0.5000"
 * signed(-20, 2);  // "-20.00"
 */
export function signed(value: number, digits: number): string {
  const fixed = value.toFixed(digits);
  return fixed.startsWith("-") ? fixed : `+${fixed}`;
}

/**
 * Width of the weight column: sign, integer digits of the weight range,
 * point and four decimals.
 */
export function weightColumnWidth(weightRange: number): number {
  const integerDigits = weightRange >= 1 ? Math.floor(Math.log10(weightRange)) + 1 : 1;
  return Math.max(MIN_WEIGHT_WIDTH, integerDigits + 6);
}

interface Widths {
  name: number;
  weight: number;
}

function joinColumns(cells: string[]): string {
  return cells.join(" ").trimEnd();
}

function formatHeader(widths: Widths): string {
  const [name, hash, min, max, weight, rel] = HEADER;
  return joinColumns([
    name.padEnd(widths.name),
    hash.padStart(HASH_WIDTH),
    min.padStart(RANGE_WIDTH),
    max.padStart(RANGE_WIDTH),
    weight.padStart(widths.weight),
    rel.padStart(REL_WIDTH),
  ]);
}

/**
 * Format one table row.
 */
export function formatRow(row: ScoreRow, widths: Widths): string {
  return joinColumns([
    row.feature.padEnd(widths.name),
    String(row.hash).padStart(HASH_WIDTH),
    row.min.toFixed(2).padStart(RANGE_WIDTH),
    row.max.toFixed(2).padStart(RANGE_WIDTH),
    signed(row.weight, 4).padStart(widths.weight),
    `${signed(row.relScore, 2)}%`.padStart(REL_WIDTH),
  ]);
}

/**
 * Render one label's table.
 *
 * @param withLabelHeader - Prefix the `=== Class Label:` line (multi-class mode)
 */
export function formatLabelTable(scores: LabelScores, withLabelHeader: boolean): string[] {
  const widths: Widths = {
    name: Math.max(scores.nameWidth, HEADER[0].length),
    weight: weightColumnWidth(scores.weightRange),
  };

  const lines: string[] = [];
  if (withLabelHeader) {
    lines.push(`=== Class Label: ${scores.label}  Prediction: ${scores.prediction ?? ""}`.trimEnd());
  }
  lines.push(formatHeader(widths));
  for (const row of scores.rows) {
    lines.push(formatRow(row, widths));
  }
  return lines;
}

/**
 * Render every label, separated by a blank line.
 */
export function formatReport(labels: readonly LabelScores[], multiclass: boolean): string {
  return labels.map((scores) => formatLabelTable(scores, multiclass).join("\n")).join("\n\n");
}
