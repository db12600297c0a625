/**
 * @summary Main entry point for the @varscope/core package.
 *
 * This package holds the feature statistics and scoring engine of varscope.
 * Given a namespaced sparse-vector corpus and a trainer that can audit its
 * model, it reports each feature's value range, learned weight and relative
 * distance from zero.
 *
 * Key features:
 * - parseRecord / parseMulticlassLabels for the corpus line grammar
 * - FeatureCatalog for ranges, namespaces and pair expansion
 * - buildProbeExamples for one dense probe per label
 * - AuditParser for the auditor's two-lines-per-example output
 * - scoreAudit / formatReport for ranking and rendering
 * - analyzeFeatures to run everything through injected collaborators
 *
 * Usage:
 * ```typescript
 * import { analyzeFeatures, formatReport } from "@varscope/core";
 *
 * const report = await analyzeFeatures(request, { trainer, auditor, probes });
 * console.log(formatReport(report.labels, report.plan.mode === "multiclass"));
 * ```
 */

// ---------------------------------------------------------------------------
// Types and Errors
// ---------------------------------------------------------------------------

export type {
  FeatureId,
  FeatureValue,
  ParsedRecord,
  FeatureRange,
  LabelMode,
  LabelPlan,
  PairSpec,
  DiagnosticLogger,
} from "./types/index.js";

export {
  FEATURE_SEPARATOR,
  CONSTANT_FEATURE,
  DEFAULT_NAMESPACE_CODE,
  WILDCARD_NAMESPACE_CODE,
  SINGLE_LABEL,
  featureId,
  pairFeatureId,
  constantFeatureId,
  namespaceShortCode,
  VarscopeError,
  MalformedRecordError,
  AuditProtocolError,
  EmptyCorpusError,
  TrainerProcessError,
  UnsupportedFeatureError,
  ConfigurationError,
  CatalogSealedError,
  isVarscopeError,
} from "./types/index.js";

// ---------------------------------------------------------------------------
// Parsing and Catalog
// ---------------------------------------------------------------------------

export {
  parseRecord,
  parseMulticlassLabels,
  sortLabels,
} from "./parser/record-parser.js";

export {
  FeatureCatalog,
  namespaceAllowed,
} from "./catalog/feature-catalog.js";

export type { NamespaceFilter } from "./catalog/feature-catalog.js";

export {
  interpretTrainerOptions,
  labelModeOf,
  UNSUPPORTED_REDUCTIONS,
  RESERVED_OPTIONS,
} from "./options/trainer-options.js";

export type {
  TrainerDirectives,
  MulticlassDirective,
} from "./options/trainer-options.js";

// ---------------------------------------------------------------------------
// Probe and Audit
// ---------------------------------------------------------------------------

export {
  PROBE_VALUE,
  probeLabelField,
  renderProbeBody,
  buildProbeExamples,
} from "./probe/probe-builder.js";

export {
  AUDIT_FIELD_COUNT,
  parseAuditToken,
} from "./audit/audit-token.js";

export type { AuditEntry } from "./audit/audit-token.js";

export {
  AuditParser,
  parseAuditStream,
  parseAuditText,
} from "./audit/audit-parser.js";

export type {
  AuditResult,
  LabelAudit,
  LineSource,
} from "./audit/audit-parser.js";

// ---------------------------------------------------------------------------
// Scoring and Report
// ---------------------------------------------------------------------------

export {
  SCORE_EPSILON,
  MIN_NAME_WIDTH,
  parseMetricSelector,
  parseOrderSelector,
  scoreAudit,
  scoreLabel,
} from "./scoring/score-engine.js";

export type {
  MetricSelector,
  OrderSelector,
  ScoreRow,
  LabelScores,
  ScoreOptions,
} from "./scoring/score-engine.js";

export {
  signed,
  weightColumnWidth,
  formatRow,
  formatLabelTable,
  formatReport,
} from "./scoring/report.js";

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export type {
  Trainer,
  Auditor,
  ProbeSink,
} from "./pipeline/collaborators.js";

export {
  buildCatalog,
  buildProbeSet,
  analyzeFeatures,
  reportMissingFeatures,
} from "./pipeline/analyze.js";

export type {
  AnalyzeRequest,
  AnalyzeDeps,
  ProbeSet,
  FeatureReport,
} from "./pipeline/analyze.js";

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

/**
 * Package version.
 */
export const VERSION = "0.1.0";
