/**
 * @summary Tests for the analyze and probe commands with a simulated vw.
 *
 * The fake runner plays the learner: training writes a placeholder model,
 * auditing reads the probe file back and prints one audit line per example
 * from a fixed weight table. No process is spawned.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TrainerProcessError, parseRecord } from "@varscope/core";
import { keptArtifactsOf } from "@varscope/runner-vw";
import type { CommandRunner } from "@varscope/runner-vw";
import { runAnalyze, runProbe } from "../commands/index.js";

interface FakeVw {
  run: CommandRunner;
  calls: Array<{ binary: string; args: string[] }>;
}

function argAfter(args: readonly string[], flag: string): string {
  const value = args[args.indexOf(flag) + 1];
  if (value === undefined) throw new Error(`no value after ${flag}`);
  return value;
}

function fakeVw(weights: Record<string, number>): FakeVw {
  const calls: FakeVw["calls"] = [];

  const run: CommandRunner = async (binary, args, options) => {
    calls.push({ binary, args: [...args] });

    if (!args.includes("--audit")) {
      await fs.writeFile(argAfter(args, "-f"), "model");
      return { exitCode: 0, stderr: "" };
    }

    const probe = await fs.readFile(argAfter(args, "-d"), "utf-8");
    const out: string[] = [];
    let hash = 100;
    for (const line of probe.split("\n").filter((l) => l.length > 0)) {
      const tokens = parseRecord(line).features.map(({ namespace, key, value }) => {
        const name = `${namespace}^${key}`;
        return `${name}:${hash++}:${value}:${weights[name] ?? 0}`;
      });
      tokens.push(`Constant:${hash++}:1:0.05`);
      out.push("0.5", tokens.join(" "));
    }

    if (options?.stdoutPath === undefined) throw new Error("audit output not captured");
    await fs.writeFile(options.stdoutPath, `${out.join("\n")}\n`);
    return { exitCode: 0, stderr: "" };
  };

  return { run, calls };
}

describe("runAnalyze", () => {
  let tmpDir: string;
  let runsDir: string;
  let corpus: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "varscope-cli-test-"));
    runsDir = path.join(tmpDir, "runs");
    corpus = path.join(tmpDir, "train.txt");
    await fs.writeFile(corpus, "1 |a x:2 y:3\n-1 |a x:1\n");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("prints the ranked report and removes the run directory", async () => {
    const vw = fakeVw({ "a^x": 0.5, "a^y": -0.25 });

    const outcome = await runAnalyze(corpus, [], { tmpDir: runsDir }, {}, vw.run);

    expect(outcome.text.split("\n")).toEqual([
      "FeatureName    HashVal   MinVal   MaxVal  Weight  RelScore",
      "a^x                100     1.00     2.00 +0.5000  +100.00%",
      "Constant           102     0.00     0.00 +0.0500    +0.00%",
      "a^y                101     0.00     3.00 -0.2500   -50.00%",
    ]);
    expect(outcome.kept).toBeUndefined();
    expect(await fs.readdir(runsDir)).toEqual([]);
  });

  it("invokes the trainer with managed outputs", async () => {
    const vw = fakeVw({});
    const outcome = await runAnalyze(corpus, ["--", "--passes", "2"], { tmpDir: runsDir, keepArtifacts: true }, {}, vw.run);
    const kept = outcome.kept;

    expect(kept).toBeDefined();
    expect(vw.calls.map((c) => c.args)).toEqual([
      ["-d", corpus, "--passes", "2", "-f", kept?.model, "--readable_model", kept?.readableModel, "--quiet"],
      ["-t", "-i", kept?.model, "--audit", "-d", kept?.probe, "--quiet"],
    ]);
    expect(await fs.readFile(kept?.probe ?? "", "utf-8")).toBe("1 |a x:1 y:1\n");
  });

  it("takes the trainer binary from the environment", async () => {
    const vw = fakeVw({});
    await runAnalyze(corpus, [], { tmpDir: runsDir }, { VARSCOPE_TRAINER: "/opt/vw/bin/vw" }, vw.run);

    expect(vw.calls.map((c) => c.binary)).toEqual(["/opt/vw/bin/vw", "/opt/vw/bin/vw"]);
  });

  it("lets the --trainer flag override the environment", async () => {
    const vw = fakeVw({});
    await runAnalyze(corpus, [], { tmpDir: runsDir, trainer: "./vw" }, { VARSCOPE_TRAINER: "/opt/vw" }, vw.run);

    expect(vw.calls[0]?.binary).toBe("./vw");
  });

  it("cleans up when the trainer fails", async () => {
    const run: CommandRunner = async () => {
      throw new TrainerProcessError("vw -d train.txt", 1, "bad option");
    };

    await expect(runAnalyze(corpus, [], { tmpDir: runsDir }, {}, run)).rejects.toThrow(
      "Command exited with status 1: vw -d train.txt"
    );
    expect(await fs.readdir(runsDir)).toEqual([]);
  });

  it("keeps and reports the artifacts of a failed run in keep mode", async () => {
    const run: CommandRunner = async () => {
      throw new TrainerProcessError("vw -d train.txt", 1, "bad option");
    };

    const failure = await runAnalyze(corpus, [], { tmpDir: runsDir, keepArtifacts: true }, {}, run).then(
      () => undefined,
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(TrainerProcessError);
    const kept = keptArtifactsOf(failure);
    const [entry] = await fs.readdir(runsDir);
    expect(entry).toBeDefined();
    expect(kept?.dir).toBe(path.join(runsDir, entry ?? ""));
    expect(await fs.readFile(kept?.probe ?? "", "utf-8")).toBe("1 |a x:1 y:1\n");
  });

  it("rejects unsupported reductions without running anything", async () => {
    const vw = fakeVw({});

    await expect(runAnalyze(corpus, ["--ect", "3"], { tmpDir: runsDir }, {}, vw.run)).rejects.toThrow(
      /not supported/
    );
    expect(vw.calls).toHaveLength(0);
  });

  it("skips blank corpus lines", async () => {
    await fs.writeFile(corpus, "1 |a x\n\n1 |a y\n");
    const vw = fakeVw({ "a^x": 1, "a^y": 1 });

    const outcome = await runAnalyze(corpus, [], { tmpDir: runsDir }, {}, vw.run);
    expect(outcome.report.catalog.recordCount).toBe(2);
  });
});

describe("runProbe", () => {
  let tmpDir: string;
  let corpus: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "varscope-cli-test-"));
    corpus = path.join(tmpDir, "train.txt");
    await fs.writeFile(corpus, "2 |a x |b y\n1 |a z\n");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("builds one probe per class label", async () => {
    const set = await runProbe(corpus, ["--oaa", "2"], {}, {});
    expect(set.probes).toEqual(["1:1 |a x:1 z:1 |b y:1", "2:1 |a x:1 z:1 |b y:1"]);
  });

  it("applies namespace filters", async () => {
    const set = await runProbe(corpus, ["--ignore", "b"], {}, {});
    expect(set.probes).toEqual(["1 |a x:1 z:1"]);
  });
});
