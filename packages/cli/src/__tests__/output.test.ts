/**
 * @summary Tests for fatal-error formatting.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { MalformedRecordError, TrainerProcessError } from "@varscope/core";
import { keptArtifactsOf, withWorkspace } from "@varscope/runner-vw";
import { fatalMessage, printFatal } from "../output.js";

describe("fatalMessage", () => {
  it("uses the error message", () => {
    const error = new MalformedRecordError("missing '|' separator", "1 a", 3);
    expect(fatalMessage(error)).toBe(error.message);
    expect(fatalMessage("plain")).toBe("plain");
  });

  it("appends the last stderr line of a failed trainer", () => {
    const error = new TrainerProcessError("vw -d train.txt", 1, "reading data\nunrecognised option '--bogus'\n\n");
    expect(fatalMessage(error)).toBe(
      "Command exited with status 1: vw -d train.txt (unrecognised option '--bogus')"
    );
  });

  it("falls back to the spawn error", () => {
    const error = new TrainerProcessError("vw", null, "", new Error("spawn vw ENOENT"));
    expect(fatalMessage(error)).toBe("Command failed to run: vw (spawn vw ENOENT)");
  });

  it("leaves a silent failure alone", () => {
    expect(fatalMessage(new TrainerProcessError("vw", 2))).toBe("Command exited with status 2: vw");
  });
});

describe("printFatal", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "varscope-output-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("prints one line for an error without kept artifacts", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => undefined);

    printFatal(new TrainerProcessError("vw", 1, "bad option"));

    expect(err).toHaveBeenCalledTimes(1);
    expect(err.mock.calls[0]?.[1]).toBe("Command exited with status 1: vw (bad option)");
  });

  it("lists the artifacts a failed run kept", async () => {
    const failure = new TrainerProcessError("vw", 1);
    await withWorkspace({ tmpDir, keep: true }, async () => Promise.reject(failure)).catch(() => undefined);
    const kept = keptArtifactsOf(failure);
    const err = vi.spyOn(console, "error").mockImplementation(() => undefined);

    printFatal(failure);

    expect(kept).toBeDefined();
    const printed = err.mock.calls.map((call) => call[1]);
    expect(printed).toContain(kept?.probe);
    expect(printed).toContain(kept?.model);
    expect(printed).toContain(kept?.readableModel);
    expect(printed).toContain(kept?.audit);
  });
});
