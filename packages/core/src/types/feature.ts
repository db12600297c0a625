/**
 * @summary Feature, namespace and label types shared by every pipeline stage.
 *
 * A feature identity is the pair (namespace, key). Its canonical string form
 * joins the two with `^`, which is the same spelling the auditor prints, so
 * catalog identities and audit names compare directly.
 */

// ---------------------------------------------------------------------------
// Feature Identity
// ---------------------------------------------------------------------------

/** Separator between namespace and key in a canonical feature identity */
export const FEATURE_SEPARATOR = "^";

/** Identity of the model's bias term */
export const CONSTANT_FEATURE = "Constant";

/** Short code of the default (empty) namespace */
export const DEFAULT_NAMESPACE_CODE = " ";

/** Short code that matches every namespace in a pair directive */
export const WILDCARD_NAMESPACE_CODE = ":";

/** Canonical `namespace^key` string */
export type FeatureId = string;

/**
 * Build the canonical identity of a feature.
 *
 * @example
 * featureId("a", "x"); // "a^x"
 * featureId("", "x");  // "^x"
 */
export function featureId(namespace: string, key: string): FeatureId {
  return `${namespace}${FEATURE_SEPARATOR}${key}`;
}

/**
 * Identity of the synthetic interaction feature for two base features.
 */
export function pairFeatureId(
  namespace1: string,
  key1: string,
  namespace2: string,
  key2: string
): FeatureId {
  return `${featureId(namespace1, key1)}${FEATURE_SEPARATOR}${featureId(namespace2, key2)}`;
}

/**
 * Bias identity for a label; `Constant_<label>` in multi-class mode.
 */
export function constantFeatureId(label?: string): FeatureId {
  return label === undefined ? CONSTANT_FEATURE : `${CONSTANT_FEATURE}_${label}`;
}

/**
 * First character of a namespace, used by keep/ignore/pair directives.
 */
export function namespaceShortCode(namespace: string): string {
  return namespace.length === 0 ? DEFAULT_NAMESPACE_CODE : namespace.charAt(0);
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** One `(namespace, key, value)` triple of a parsed record */
export interface FeatureValue {
  namespace: string;
  key: string;
  value: number;
}

/** A parsed corpus line */
export interface ParsedRecord {
  /** Raw text before the first `|`, unparsed */
  labelField: string;
  /** Triples in line order */
  features: FeatureValue[];
}

/** Observed value range of one feature */
export interface FeatureRange {
  min: number;
  max: number;
}

// ---------------------------------------------------------------------------
// Labels and Modes
// ---------------------------------------------------------------------------

/** Label of the single probe example in single-label mode */
export const SINGLE_LABEL = "1";

export type LabelMode = "single" | "multiclass";

/**
 * Ordered label list shared by the probe builder and the audit parser.
 *
 * Audit example `i` belongs to `labels[i % labels.length]`, so both stages
 * must receive this same value.
 */
export interface LabelPlan {
  mode: LabelMode;
  labels: readonly string[];
}

/** Namespace pair directive, as two short codes */
export type PairSpec = readonly [string, string];

/** Receives verbose, non-fatal diagnostics */
export type DiagnosticLogger = (message: string) => void;
