/**
 * @summary Tokenizer for one feature entry of an audit line.
 *
 * Entry format: `name:hash:value:weight`. The feature name may itself
 * contain colons, so the string is split on every `:` and only the last
 * three fields are positional; the rest is joined back into the name.
 */

import { AuditProtocolError } from "../types/errors.js";

/** Number of trailing colon fields that make up an entry */
export const AUDIT_FIELD_COUNT = 4;

export interface AuditEntry {
  /** Feature name as printed; empty for the bias term */
  feature: string;
  hash: number;
  value: number;
  weight: number;
}

/**
 * Split an audit token into its feature name and numeric fields.
 *
 * A trailing `@...` annotation on the weight field is dropped.
 *
 * @param token - One whitespace-delimited token of an audit line
 * @param exampleIndex - Zero-based example index, for error reporting
 * @throws AuditProtocolError if fewer than four fields are present or a
 *   numeric field does not parse
 *
 * @example
 * parseAuditToken("a^x:y:123:1:-0.5", 0);
 * // { feature: "a^x:y", hash: 123, value: 1, weight: -0.5 }
 */
export function parseAuditToken(token: string, exampleIndex: number): AuditEntry {
  const fields = token.split(":");
  if (fields.length < AUDIT_FIELD_COUNT) {
    throw new AuditProtocolError(
      `expected ${AUDIT_FIELD_COUNT} colon-separated fields, got ${fields.length}`,
      exampleIndex,
      token
    );
  }

  const suffix = fields.splice(fields.length - (AUDIT_FIELD_COUNT - 1));
  const [hashText = "", valueText = "", weightField = ""] = suffix;
  const weightText = weightField.split("@")[0] ?? "";

  if (!/^\d+$/.test(hashText)) {
    throw new AuditProtocolError(`hash is not an unsigned integer`, exampleIndex, token);
  }

  const value = parseNumber(valueText);
  const weight = parseNumber(weightText);
  if (value === undefined || weight === undefined) {
    throw new AuditProtocolError(`non-numeric value or weight`, exampleIndex, token);
  }

  return {
    feature: fields.join(":"),
    hash: Number(hashText),
    value,
    weight,
  };
}

function parseNumber(text: string): number | undefined {
  if (text.trim().length === 0) return undefined;
  const n = Number(text);
  return Number.isFinite(n) ? n : undefined;
}
