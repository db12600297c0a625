/**
 * @summary Tests for audit token splitting and the audit stream parser.
 */

import { describe, it, expect } from "vitest";
import {
  AuditParser,
  AuditProtocolError,
  parseAuditStream,
  parseAuditText,
  parseAuditToken,
} from "../index.js";
import type { LabelPlan } from "../index.js";

const SINGLE: LabelPlan = { mode: "single", labels: ["1"] };
const THREE: LabelPlan = { mode: "multiclass", labels: ["1", "2", "3"] };

// -----------------------------------------------------------------------------
// parseAuditToken
// -----------------------------------------------------------------------------

describe("parseAuditToken", () => {
  it("splits the four trailing fields", () => {
    expect(parseAuditToken("a^x:101:1:0.25", 0)).toEqual({
      feature: "a^x",
      hash: 101,
      value: 1,
      weight: 0.25,
    });
  });

  it("keeps earlier colons in the feature name", () => {
    expect(parseAuditToken("t^12:30:7:1:-1.5", 0)).toEqual({
      feature: "t^12:30",
      hash: 7,
      value: 1,
      weight: -1.5,
    });
  });

  it("yields an empty name for the bias entry", () => {
    expect(parseAuditToken(":116060:1:0.1", 0).feature).toBe("");
  });

  it("drops an @ annotation on the weight", () => {
    expect(parseAuditToken("a^x:5:1:0.5@2.25", 0).weight).toBe(0.5);
  });

  it("rejects tokens with fewer than four fields", () => {
    expect(() => parseAuditToken("a^x:5:1", 3)).toThrow(AuditProtocolError);
    expect(() => parseAuditToken("a^x:5:1", 3)).toThrow(/example 3/);
  });

  it("rejects a hash that is not an unsigned integer", () => {
    expect(() => parseAuditToken("a^x:-5:1:0.5", 0)).toThrow(/unsigned integer/);
  });

  it("rejects a non-numeric weight", () => {
    expect(() => parseAuditToken("a^x:5:1:nope", 0)).toThrow(/non-numeric/);
  });
});

// -----------------------------------------------------------------------------
// Single-label streams
// -----------------------------------------------------------------------------

describe("AuditParser (single-label)", () => {
  it("collects weights, hashes and the feature list", () => {
    const result = parseAuditText("0.731\n\ta^x:11:1:0.5 a^y:12:1:-0.25 :13:1:0.1\n", SINGLE);

    expect(result.examples).toBe(1);
    expect(result.features).toEqual(["a^x", "a^y", "Constant"]);
    expect(result.weights.get("a^x")).toBe(0.5);
    expect(result.weights.get("Constant")).toBe(0.1);
    expect(result.featureHashes.get("a^y")).toBe(12);
    expect(result.hashToFeature.get(13)).toBe("Constant");
    expect(result.byLabel.size).toBe(0);
  });

  it("treats a literal Constant entry as the bias", () => {
    const result = parseAuditText("0.5\nConstant:116060:1:0.3\n", SINGLE);
    expect(result.features).toEqual(["Constant"]);
    expect(result.weights.get("Constant")).toBe(0.3);
  });

  it("accepts an example without feature entries", () => {
    const result = parseAuditText("0.5\n\n", SINGLE);
    expect(result.examples).toBe(1);
    expect(result.features).toEqual([]);
  });

  it("fails when the stream ends after a prediction line", () => {
    const parser = new AuditParser(SINGLE);
    parser.push("0.5");
    expect(() => parser.finish()).toThrow(/ended after a prediction line/);
  });

  it("fails on a malformed token instead of skipping it", () => {
    expect(() => parseAuditText("0.5\na^x:11:1:0.5 broken\n", SINGLE)).toThrow(AuditProtocolError);
  });
});

// -----------------------------------------------------------------------------
// Multi-class streams
// -----------------------------------------------------------------------------

describe("AuditParser (multi-class)", () => {
  it("attributes example i to labels[i % n]", () => {
    const lines: string[] = [];
    for (let i = 0; i < 7; i++) {
      lines.push(`pred${i}`, `a^x:${i}:1:${i}`);
    }
    const result = parseAuditText(lines.join("\n"), THREE);

    expect(result.examples).toBe(7);
    expect(result.exampleLabels).toEqual(["1", "2", "3", "1", "2", "3", "1"]);
    // the last example of label 1 wins
    expect(result.byLabel.get("1")?.weights.get("a^x")).toBe(6);
    expect(result.byLabel.get("1")?.prediction).toBe("pred6");
    expect(result.byLabel.get("3")?.prediction).toBe("pred5");
  });

  it("renames the bias per label", () => {
    const text = ["1.0", ":100:1:0.1 a^x:5:1:0.7", "2.0", ":200:1:-0.2 a^x:6:1:-0.4"].join("\n");
    const result = parseAuditText(text, { mode: "multiclass", labels: ["1", "2"] });

    expect(result.features).toEqual(["Constant_1", "a^x", "Constant_2"]);
    expect(result.byLabel.get("1")?.weights.get("Constant_1")).toBe(0.1);
    expect(result.byLabel.get("2")?.weights.get("Constant_2")).toBe(-0.2);
    expect(result.byLabel.get("2")?.hashes.get("a^x")).toBe(6);
    expect(result.weights.size).toBe(0);
  });

  it("skips blank lines between examples", () => {
    const result = parseAuditText("p1\na^x:1:1:1\n\n\np2\na^x:2:1:2\n", {
      mode: "multiclass",
      labels: ["5", "9"],
    });
    expect(result.exampleLabels).toEqual(["5", "9"]);
  });
});

describe("parseAuditStream", () => {
  it("reads an async line source", async () => {
    async function* lines(): AsyncGenerator<string> {
      yield "0.1";
      yield "b^k:3:1:2";
    }
    const result = await parseAuditStream(lines(), SINGLE);
    expect(result.weights.get("b^k")).toBe(2);
  });

  it("rejects an empty label plan", () => {
    expect(() => new AuditParser({ mode: "multiclass", labels: [] })).toThrow(AuditProtocolError);
  });
});
