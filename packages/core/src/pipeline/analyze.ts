/**
 * @summary End-to-end feature analysis over injected collaborators.
 *
 * Stages run strictly in order and any failure aborts the run:
 *
 * 1. interpret trainer options and selectors (before reading the corpus)
 * 2. parse the corpus into the catalog, collecting labels in multi-class mode
 * 3. expand namespace pairs, finalize the catalog
 * 4. build and write the probe examples
 * 5. train, then audit the probe
 * 6. parse the audit stream, score and rank
 */

import { AuditParser } from "../audit/audit-parser.js";
import type { AuditResult, LineSource } from "../audit/audit-parser.js";
import { FeatureCatalog } from "../catalog/feature-catalog.js";
import { interpretTrainerOptions, labelModeOf } from "../options/trainer-options.js";
import type { TrainerDirectives } from "../options/trainer-options.js";
import { parseMulticlassLabels, parseRecord, sortLabels } from "../parser/record-parser.js";
import { buildProbeExamples } from "../probe/probe-builder.js";
import { parseMetricSelector, parseOrderSelector, scoreAudit } from "../scoring/score-engine.js";
import type { LabelScores, MetricSelector, OrderSelector } from "../scoring/score-engine.js";
import { EmptyCorpusError } from "../types/errors.js";
import { CONSTANT_FEATURE, SINGLE_LABEL } from "../types/feature.js";
import type { DiagnosticLogger, LabelPlan } from "../types/feature.js";
import type { Auditor, ProbeSink, Trainer } from "./collaborators.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnalyzeRequest {
  /** Corpus path handed to the trainer */
  corpusPath: string;
  /** Decoded corpus lines, read once */
  corpus: LineSource;
  /** Trainer arguments, forwarded unchanged */
  trainerArgs: readonly string[];
  /** Metric letter, default `w` */
  metric?: string;
  /** Order letter, default `r` */
  order?: string;
}

export interface AnalyzeDeps {
  trainer: Trainer;
  auditor: Auditor;
  probes: ProbeSink;
  log?: DiagnosticLogger | undefined;
}

export interface ProbeSet {
  directives: TrainerDirectives;
  catalog: FeatureCatalog;
  plan: LabelPlan;
  probes: string[];
}

export interface FeatureReport extends ProbeSet {
  metric: MetricSelector;
  order: OrderSelector;
  probePath: string;
  modelPath: string;
  audit: AuditResult;
  labels: LabelScores[];
}

// ---------------------------------------------------------------------------
// Catalog Stage
// ---------------------------------------------------------------------------

/**
 * Read the corpus into a finalized catalog and derive the label plan.
 *
 * @throws MalformedRecordError on the first bad line
 * @throws EmptyCorpusError if no record was read
 */
export async function buildCatalog(
  corpus: LineSource,
  directives: TrainerDirectives,
  source: string
): Promise<{ catalog: FeatureCatalog; plan: LabelPlan }> {
  const catalog = new FeatureCatalog({ keep: directives.keep, ignore: directives.ignore });
  const mode = labelModeOf(directives);
  const labels = new Map<string, number>();

  let lineNumber = 0;
  for await (const line of corpus) {
    lineNumber += 1;
    if (line.trim().length === 0) continue;

    const record = parseRecord(line, lineNumber);
    if (mode === "multiclass") {
      for (const [label, weight] of parseMulticlassLabels(record.labelField, lineNumber)) {
        labels.set(label, weight);
      }
    }
    catalog.ingest(record);
  }

  if (catalog.recordCount === 0) {
    throw new EmptyCorpusError(source);
  }

  catalog.expandPairs(directives.pairs);
  catalog.finalize();

  const plan: LabelPlan =
    mode === "multiclass"
      ? { mode, labels: sortLabels(labels.keys()) }
      : { mode, labels: [SINGLE_LABEL] };

  if (plan.labels.length === 0) {
    throw new EmptyCorpusError(`${source} (no class labels)`);
  }

  return { catalog, plan };
}

/**
 * Interpret options, build the catalog and the probe lines, without
 * training anything.
 */
export async function buildProbeSet(
  corpus: LineSource,
  trainerArgs: readonly string[],
  source: string
): Promise<ProbeSet> {
  const directives = interpretTrainerOptions(trainerArgs);
  const { catalog, plan } = await buildCatalog(corpus, directives, source);
  return { directives, catalog, plan, probes: buildProbeExamples(catalog, plan) };
}

// ---------------------------------------------------------------------------
// Full Analysis
// ---------------------------------------------------------------------------

/**
 * Run the whole analysis.
 *
 * @example
 * const report = await analyzeFeatures(
 *   { corpusPath: "train.txt", corpus: lines, trainerArgs: ["-q", "ab"] },
 *   { trainer, auditor, probes: workspace }
 * );
 * console.log(formatReport(report.labels, report.plan.mode === "multiclass"));
 */
export async function analyzeFeatures(
  request: AnalyzeRequest,
  deps: AnalyzeDeps
): Promise<FeatureReport> {
  const metric = parseMetricSelector(request.metric ?? "w");
  const order = parseOrderSelector(request.order ?? "r");
  const log = deps.log;

  const probeSet = await buildProbeSet(request.corpus, request.trainerArgs, request.corpusPath);
  const { catalog, plan, probes } = probeSet;
  log?.(
    `catalog: ${catalog.recordCount} records, ${catalog.namespaces().length} namespaces, ` +
      `${catalog.featureIds().length} features (${catalog.pairFeatureIds().length} from pairs)`
  );

  const probePath = await deps.probes.writeProbe(probes);
  log?.(`probe: ${probes.length} example(s) written to ${probePath}`);

  const modelPath = await deps.trainer.train(request.corpusPath, probeSet.directives.args);
  log?.(`model: ${modelPath}`);

  const parser = new AuditParser(plan);
  for await (const line of await deps.auditor.audit(modelPath, probePath)) {
    parser.push(line);
  }
  const audit = parser.finish();
  log?.(`audit: ${audit.examples} example(s), ${audit.features.length} features`);

  if (log) {
    reportMissingFeatures(catalog, audit, log);
  }

  const labels = scoreAudit(audit, catalog, { metric, order, log });

  return { ...probeSet, metric, order, probePath, modelPath, audit, labels };
}

/**
 * Log catalog features the auditor never printed.
 */
export function reportMissingFeatures(
  catalog: FeatureCatalog,
  audit: AuditResult,
  log: DiagnosticLogger
): number {
  const audited = new Set(audit.features);
  let missing = 0;
  for (const id of catalog.featureIds()) {
    if (id.startsWith(CONSTANT_FEATURE) || audited.has(id)) continue;
    log(`feature ${id} not found in audit output`);
    missing += 1;
  }
  return missing;
}
