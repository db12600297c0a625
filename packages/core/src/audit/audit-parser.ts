/**
 * @summary Consumes the auditor's two-lines-per-example output.
 *
 * Each probe example yields a prediction line followed by an audit line of
 * whitespace-separated `name:hash:value:weight` entries. The auditor does
 * not echo labels, so example `i` is attributed to `labels[i % n]` of the
 * same LabelPlan the probe builder used.
 *
 * Used by:
 * - pipeline/analyze.ts after the auditor finishes
 */

import { AuditProtocolError } from "../types/errors.js";
import { CONSTANT_FEATURE, constantFeatureId } from "../types/feature.js";
import type { FeatureId, LabelPlan } from "../types/feature.js";
import { parseAuditToken } from "./audit-token.js";

// ---------------------------------------------------------------------------
// Result Types
// ---------------------------------------------------------------------------

/** Audit data of one class label (multi-class mode) */
export interface LabelAudit {
  label: string;
  /** Prediction line of the label's most recent example, verbatim */
  prediction: string;
  weights: Map<FeatureId, number>;
  hashes: Map<FeatureId, number>;
}

export interface AuditResult {
  plan: LabelPlan;
  /** Number of complete examples read */
  examples: number;
  /** Label each example was attributed to, in stream order */
  exampleLabels: string[];
  /** Every feature name seen, in first-seen order */
  features: FeatureId[];
  hashToFeature: Map<number, FeatureId>;
  featureHashes: Map<FeatureId, number>;
  /** Single-label weights */
  weights: Map<FeatureId, number>;
  /** Multi-class weights, one entry per label seen */
  byLabel: Map<string, LabelAudit>;
}

export type LineSource = Iterable<string> | AsyncIterable<string>;

// ---------------------------------------------------------------------------
// Audit Parser
// ---------------------------------------------------------------------------

/**
 * Incremental audit stream parser. Feed lines with push(), then call finish().
 */
export class AuditParser {
  private readonly plan: LabelPlan;
  private readonly exampleLabels: string[] = [];
  private readonly seen = new Set<FeatureId>();
  private readonly features: FeatureId[] = [];
  private readonly hashToFeature = new Map<number, FeatureId>();
  private readonly featureHashes = new Map<FeatureId, number>();
  private readonly weights = new Map<FeatureId, number>();
  private readonly byLabel = new Map<string, LabelAudit>();
  private pendingPrediction: string | undefined;
  private index = 0;

  constructor(plan: LabelPlan) {
    if (plan.labels.length === 0) {
      throw new AuditProtocolError("label plan is empty", 0);
    }
    this.plan = plan;
  }

  push(line: string): void {
    const text = line.endsWith("\r") ? line.slice(0, -1) : line;

    if (this.pendingPrediction === undefined) {
      if (text.trim().length === 0) return;
      this.pendingPrediction = text;
      return;
    }

    this.consumeAuditLine(this.pendingPrediction, text);
    this.pendingPrediction = undefined;
    this.index += 1;
  }

  finish(): AuditResult {
    if (this.pendingPrediction !== undefined) {
      throw new AuditProtocolError("stream ended after a prediction line", this.index);
    }

    return {
      plan: this.plan,
      examples: this.index,
      exampleLabels: [...this.exampleLabels],
      features: [...this.features],
      hashToFeature: this.hashToFeature,
      featureHashes: this.featureHashes,
      weights: this.weights,
      byLabel: this.byLabel,
    };
  }

  private currentLabel(): string {
    const label = this.plan.labels[this.index % this.plan.labels.length];
    if (label === undefined) {
      throw new AuditProtocolError("no label for example", this.index);
    }
    return label;
  }

  private consumeAuditLine(prediction: string, line: string): void {
    const label = this.currentLabel();
    const multiclass = this.plan.mode === "multiclass";
    this.exampleLabels.push(label);

    let target: LabelAudit | undefined;
    if (multiclass) {
      target = this.byLabel.get(label);
      if (!target) {
        target = { label, prediction, weights: new Map(), hashes: new Map() };
        this.byLabel.set(label, target);
      }
      target.prediction = prediction;
    }

    for (const token of line.split(/\s+/)) {
      if (token.length === 0) continue;
      const entry = parseAuditToken(token, this.index);

      const isBias = entry.feature === "" || entry.feature === CONSTANT_FEATURE;
      const name = isBias ? constantFeatureId(multiclass ? label : undefined) : entry.feature;

      if (!this.seen.has(name)) {
        this.seen.add(name);
        this.features.push(name);
      }
      this.hashToFeature.set(entry.hash, name);
      this.featureHashes.set(name, entry.hash);

      if (target) {
        target.weights.set(name, entry.weight);
        target.hashes.set(name, entry.hash);
      } else {
        this.weights.set(name, entry.weight);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Convenience Parsers
// ---------------------------------------------------------------------------

/**
 * Parse a complete audit stream from any line source.
 */
export async function parseAuditStream(source: LineSource, plan: LabelPlan): Promise<AuditResult> {
  const parser = new AuditParser(plan);
  for await (const line of source) {
    parser.push(line);
  }
  return parser.finish();
}

/**
 * Parse audit output held in memory.
 */
export function parseAuditText(text: string, plan: LabelPlan): AuditResult {
  const parser = new AuditParser(plan);
  for (const line of text.split("\n")) {
    parser.push(line);
  }
  return parser.finish();
}
