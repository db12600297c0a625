/**
 * @summary Builds the dense probe examples fed to the auditor.
 *
 * One example per label, each holding every known (namespace, key) pair at
 * value 1, so the auditor has to reveal the hash and weight of every
 * feature. Pair features are not written out; the trainer derives them from
 * the base keys.
 *
 * Used by:
 * - pipeline/analyze.ts before handing the probe file to the auditor
 * - The `probe` CLI command
 */

import type { FeatureCatalog } from "../catalog/feature-catalog.js";
import type { LabelPlan } from "../types/feature.js";

/** Value every feature carries in a probe example */
export const PROBE_VALUE = 1;

/**
 * Label field of a probe example.
 *
 * Multi-class probes carry only the positive marker `<label>:1`.
 */
export function probeLabelField(label: string, mode: LabelPlan["mode"]): string {
  return mode === "multiclass" ? `${label}:${PROBE_VALUE}` : label;
}

/**
 * Render the namespace regions shared by every probe line.
 *
 * @example
 * // catalog with a: {x, y} and default namespace: {z}
 * renderProbeBody(catalog); // " |a x:1 y:1 | z:1"
 */
export function renderProbeBody(catalog: FeatureCatalog): string {
  let body = "";
  for (const namespace of catalog.namespaces()) {
    body += ` |${namespace}`;
    for (const key of catalog.keysOf(namespace)) {
      body += ` ${key}:${PROBE_VALUE}`;
    }
  }
  return body;
}

/**
 * Build one probe line per label, in label-plan order.
 *
 * @returns Lines without trailing newlines; `plan.labels.length` of them
 */
export function buildProbeExamples(catalog: FeatureCatalog, plan: LabelPlan): string[] {
  const body = renderProbeBody(catalog);
  return plan.labels.map((label) => `${probeLabelField(label, plan.mode)}${body}`);
}
