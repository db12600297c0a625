/**
 * @summary Tests for the plain/gzip line reader.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { gzipSync, strToU8 } from "fflate";
import { isGzip, readLines } from "../lines.js";

async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of source) lines.push(line);
  return lines;
}

describe("readLines", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "varscope-lines-test-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("keeps blank lines and strips carriage returns", async () => {
    const file = path.join(tmpDir, "train.txt");
    await fs.writeFile(file, "1 |a x\r\n\n-1 |b y\n");

    expect(await collect(readLines(file))).toEqual(["1 |a x", "", "-1 |b y"]);
  });

  it("yields a last line without a newline", async () => {
    const file = path.join(tmpDir, "train.txt");
    await fs.writeFile(file, "first\nsecond");

    expect(await collect(readLines(file))).toEqual(["first", "second"]);
  });

  it("inflates gzip files", async () => {
    const file = path.join(tmpDir, "train.txt.gz");
    await fs.writeFile(file, gzipSync(strToU8("1 |a x:2\n2 |b y\n")));

    expect(await collect(readLines(file))).toEqual(["1 |a x:2", "2 |b y"]);
  });

  it("detects gzip by content, not by name", async () => {
    const file = path.join(tmpDir, "corpus");
    await fs.writeFile(file, gzipSync(strToU8("3 |c z\n")));

    expect(await collect(readLines(file))).toEqual(["3 |c z"]);
  });

  it("yields nothing for an empty file", async () => {
    const file = path.join(tmpDir, "empty.txt");
    await fs.writeFile(file, "");

    expect(await collect(readLines(file))).toEqual([]);
  });

  it("rejects a missing file", async () => {
    await expect(collect(readLines(path.join(tmpDir, "missing.txt")))).rejects.toThrow(/ENOENT/);
  });
});

describe("isGzip", () => {
  it("checks the magic bytes", () => {
    expect(isGzip(new Uint8Array([0x1f, 0x8b, 8]))).toBe(true);
    expect(isGzip(strToU8("1 |a"))).toBe(false);
    expect(isGzip(new Uint8Array([0x1f]))).toBe(false);
  });
});
