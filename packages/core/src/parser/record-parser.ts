/**
 * @summary Parser for the namespaced sparse-vector line format.
 *
 * Grammar:
 *
 * ```
 * line   := label-field "|" region ("|" region)*
 * region := [namespace][":" weight] (key[":" value])*
 * ```
 *
 * A region whose first character is whitespace belongs to the default
 * (empty) namespace. Values default to 1.
 *
 * Used by:
 * - FeatureCatalog ingestion (pipeline/analyze.ts)
 * - Tests that simulate the auditor by reading probe lines back
 */

import { MalformedRecordError } from "../types/errors.js";
import type { FeatureValue, ParsedRecord } from "../types/feature.js";

// ---------------------------------------------------------------------------
// Record Parsing
// ---------------------------------------------------------------------------

/** Namespace token and its optional `:weight` suffix at the start of a region */
const NAMESPACE_PREFIX = /^([^\s:]*)(?::(\S*))?/;

/**
 * Parse one corpus line into its label field and feature triples.
 *
 * @param line - Raw line; a trailing carriage return is ignored
 * @param lineNumber - 1-based position in the corpus, used in error messages
 * @throws MalformedRecordError if the line has no `|` or a bad `key:value`
 *
 * @example
 * parseRecord("1 |a x:2 y");
 * // { labelField: "1 ", features: [
 * //   { namespace: "a", key: "x", value: 2 },
 * //   { namespace: "a", key: "y", value: 1 } ] }
 */
export function parseRecord(line: string, lineNumber?: number): ParsedRecord {
  const text = line.endsWith("\r") ? line.slice(0, -1) : line;

  const bar = text.indexOf("|");
  if (bar < 0) {
    throw new MalformedRecordError("missing '|' separator", line, lineNumber);
  }

  const labelField = text.slice(0, bar);
  const features: FeatureValue[] = [];

  for (const region of text.slice(bar + 1).split("|")) {
    parseRegion(region, features, line, lineNumber);
  }

  return { labelField, features };
}

function parseRegion(
  region: string,
  out: FeatureValue[],
  line: string,
  lineNumber: number | undefined
): void {
  const match = NAMESPACE_PREFIX.exec(region);
  const namespace = match?.[1] ?? "";
  const namespaceWeight = match?.[2];

  if (namespaceWeight !== undefined && !isNumeric(namespaceWeight)) {
    throw new MalformedRecordError(
      `bad weight for namespace '${namespace}'`,
      line,
      lineNumber
    );
  }

  const body = region.slice(match?.[0].length ?? 0);

  for (const token of body.split(/\s+/)) {
    if (token.length === 0) continue;
    out.push({ namespace, ...parseFeatureToken(token, line, lineNumber) });
  }
}

function parseFeatureToken(
  token: string,
  line: string,
  lineNumber: number | undefined
): { key: string; value: number } {
  const colon = token.lastIndexOf(":");
  if (colon < 0) {
    return { key: token, value: 1 };
  }

  const key = token.slice(0, colon);
  const valueText = token.slice(colon + 1);

  if (key.length === 0) {
    throw new MalformedRecordError(`empty feature key in '${token}'`, line, lineNumber);
  }
  if (!isNumeric(valueText)) {
    throw new MalformedRecordError(`bad feature value in '${token}'`, line, lineNumber);
  }

  return { key, value: Number(valueText) };
}

// ---------------------------------------------------------------------------
// Multi-class Label Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a multi-class label field into a label -> weight map.
 *
 * A trailing tag is dropped first: the last token is a tag when it starts
 * with `'`, or when other tokens precede it and it has no `:`.
 *
 * @example
 * parseMulticlassLabels("1:0.5 3 'row7"); // Map { "1" => 0.5, "3" => 1 }
 */
export function parseMulticlassLabels(
  labelField: string,
  lineNumber?: number
): Map<string, number> {
  const tokens = labelField.trim().split(/\s+/).filter((t) => t.length > 0);

  const last = tokens[tokens.length - 1];
  if (last !== undefined && (last.startsWith("'") || (tokens.length > 1 && !last.includes(":")))) {
    tokens.pop();
  }

  const labels = new Map<string, number>();
  for (const token of tokens) {
    const colon = token.indexOf(":");
    const label = colon < 0 ? token : token.slice(0, colon);
    const weightText = colon < 0 ? undefined : token.slice(colon + 1);

    if (label.length === 0) {
      throw new MalformedRecordError(`empty label in '${token}'`, labelField, lineNumber);
    }
    if (weightText !== undefined && !isNumeric(weightText)) {
      throw new MalformedRecordError(`bad label weight in '${token}'`, labelField, lineNumber);
    }

    labels.set(label, weightText === undefined ? 1 : Number(weightText));
  }

  return labels;
}

/**
 * Sort label identifiers by numeric value ascending.
 *
 * Non-numeric identifiers sort after numeric ones, by string order.
 */
export function sortLabels(labels: Iterable<string>): string[] {
  return Array.from(labels).sort((a, b) => {
    const na = isNumeric(a) ? Number(a) : Number.NaN;
    const nb = isNumeric(b) ? Number(b) : Number.NaN;
    const aNum = !Number.isNaN(na);
    const bNum = !Number.isNaN(nb);

    if (aNum && bNum) return na - nb || compareText(a, b);
    if (aNum) return -1;
    if (bNum) return 1;
    return compareText(a, b);
  });
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function isNumeric(text: string): boolean {
  return text.trim().length > 0 && Number.isFinite(Number(text));
}
