/**
 * @summary Line reader for corpus files and audit captures.
 *
 * Files starting with the gzip magic bytes are inflated on the fly with
 * fflate's streaming Gunzip, so compressed corpora never hit the disk
 * decompressed.
 *
 * Used by:
 * - The CLI to feed the corpus into analyzeFeatures
 * - VwAuditor to read its stdout capture back
 */

import { createReadStream } from "node:fs";
import { DecodeUTF8, Gunzip } from "fflate";

type ByteSink = (bytes: Uint8Array, final: boolean) => void;

/**
 * True if the bytes start with the gzip magic number 1f 8b.
 */
export function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

/**
 * Yield every line of a text or gzip file.
 *
 * Blank lines are kept so callers can report exact line numbers. A trailing
 * carriage return is removed; a final newline does not produce an extra
 * empty line.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  let pending = "";
  const decoder = new DecodeUTF8((text) => {
    pending += text;
  });

  let sink: ByteSink | undefined;

  for await (const chunk of createReadStream(filePath)) {
    const bytes: Uint8Array = Buffer.from(chunk);
    if (sink === undefined) {
      sink = isGzip(bytes) ? gunzipInto(decoder) : (data, final) => decoder.push(data, final);
    }
    sink(bytes, false);
    yield* takeCompleteLines();
  }

  sink?.(new Uint8Array(0), true);
  yield* takeCompleteLines();
  if (pending.length > 0) {
    yield stripCarriageReturn(pending);
    pending = "";
  }

  function* takeCompleteLines(): Generator<string> {
    const parts = pending.split("\n");
    pending = parts.pop() ?? "";
    for (const line of parts) {
      yield stripCarriageReturn(line);
    }
  }
}

function gunzipInto(decoder: DecodeUTF8): ByteSink {
  const gunzip = new Gunzip((data, final) => decoder.push(data, final));
  return (bytes, final) => gunzip.push(bytes, final);
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
