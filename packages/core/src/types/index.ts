/**
 * @summary Central export point for all type definitions in @varscope/core.
 *
 * Usage:
 * ```typescript
 * import type { FeatureRange, LabelPlan } from "@varscope/core";
 * import { MalformedRecordError, isVarscopeError } from "@varscope/core";
 * ```
 */

// ---------------------------------------------------------------------------
// Feature Types
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
} from "./feature.js";

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
} from "./feature.js";

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

export {
  VarscopeError,
  MalformedRecordError,
  AuditProtocolError,
  EmptyCorpusError,
  TrainerProcessError,
  UnsupportedFeatureError,
  ConfigurationError,
  CatalogSealedError,
  isVarscopeError,
} from "./errors.js";
