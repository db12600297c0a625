/**
 * @summary Tests for probe example generation.
 */

import { describe, it, expect } from "vitest";
import {
  FeatureCatalog,
  buildProbeExamples,
  parseRecord,
  probeLabelField,
  renderProbeBody,
} from "../index.js";

function finalizedCatalog(lines: string[]): FeatureCatalog {
  const catalog = new FeatureCatalog();
  for (const line of lines) catalog.ingest(parseRecord(line));
  catalog.finalize();
  return catalog;
}

describe("buildProbeExamples", () => {
  it("emits a bare label in single-label mode", () => {
    const catalog = finalizedCatalog(["1 |a x:2 y:3", "-1 |a x:1"]);
    const probes = buildProbeExamples(catalog, { mode: "single", labels: ["1"] });

    expect(probes).toEqual(["1 |a x:1 y:1"]);
  });

  it("emits one positive-marker line per label in multi-class mode", () => {
    const catalog = finalizedCatalog(["1 |a x", "3 |b y"]);
    const probes = buildProbeExamples(catalog, { mode: "multiclass", labels: ["1", "2", "3"] });

    expect(probes).toEqual([
      "1:1 |a x:1 |b y:1",
      "2:1 |a x:1 |b y:1",
      "3:1 |a x:1 |b y:1",
    ]);
  });

  it("writes the default namespace as an empty marker", () => {
    const catalog = finalizedCatalog(["1 | w |n k"]);
    expect(renderProbeBody(catalog)).toBe(" | w:1 |n k:1");
  });

  it("covers every known (namespace, key) pair", () => {
    const catalog = finalizedCatalog(["1 |a x y |b z", "0 |c q |a w"]);
    const probes = buildProbeExamples(catalog, { mode: "multiclass", labels: ["0", "1"] });

    expect(probes).toHaveLength(2);

    const expected = new Set<string>();
    for (const ns of catalog.namespaces()) {
      for (const key of catalog.keysOf(ns)) expected.add(`${ns}^${key}`);
    }

    const covered = new Set<string>();
    for (const line of probes) {
      for (const f of parseRecord(line).features) covered.add(`${f.namespace}^${f.key}`);
    }
    expect(covered).toEqual(expected);
  });

  it("reads back through the record parser at probe value 1", () => {
    const catalog = finalizedCatalog(["1 |t 12:30:4"]);
    const [probe = ""] = buildProbeExamples(catalog, { mode: "single", labels: ["1"] });

    expect(parseRecord(probe).features).toEqual([{ namespace: "t", key: "12:30", value: 1 }]);
  });

  it("is stable across runs over the same catalog", () => {
    const catalog = finalizedCatalog(["1 |a x y |b z"]);
    const plan = { mode: "single" as const, labels: ["1"] };
    expect(buildProbeExamples(catalog, plan)).toEqual(buildProbeExamples(catalog, plan));
  });
});

describe("probeLabelField", () => {
  it("adds the :1 marker only in multi-class mode", () => {
    expect(probeLabelField("4", "multiclass")).toBe("4:1");
    expect(probeLabelField("1", "single")).toBe("1");
  });
});
