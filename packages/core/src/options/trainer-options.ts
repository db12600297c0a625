/**
 * @summary Reads the effects of forwarded trainer arguments on the analysis.
 *
 * varscope does not reinterpret the trainer's whole command line. It only
 * looks for the options that change what the catalog and the probes must
 * contain, and rejects the ones it cannot honor. The arguments themselves
 * are forwarded to the trainer unchanged.
 *
 * Recognized:
 * - `-q XY`, `-qXY`, `--quadratic XY`, `--quadratic=XY`: namespace pairs
 * - `--keep X...`, `--ignore X...`: namespace filters by short code
 * - `--oaa N`, `--csoaa N`: multi-class mode
 */

import { ConfigurationError, UnsupportedFeatureError } from "../types/errors.js";
import type { LabelMode, PairSpec } from "../types/feature.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MulticlassDirective {
  reduction: "oaa" | "csoaa";
  classes: number;
}

export interface TrainerDirectives {
  pairs: PairSpec[];
  keep: Set<string>;
  ignore: Set<string>;
  multiclass: MulticlassDirective | undefined;
  /** The arguments as given, for the trainer */
  args: readonly string[];
}

// ---------------------------------------------------------------------------
// Option Tables
// ---------------------------------------------------------------------------

/** Multi-class reductions other than one-against-all style */
export const UNSUPPORTED_REDUCTIONS: readonly string[] = [
  "--ect",
  "--wap",
  "--csoaa_ldf",
  "--wap_ldf",
  "--log_multi",
  "--recall_tree",
  "--cs_active",
  "--multilabel_oaa",
  "--plt",
];

/** Options the runner sets itself */
export const RESERVED_OPTIONS: readonly string[] = [
  "-d",
  "--data",
  "-f",
  "--final_regressor",
  "-i",
  "--initial_regressor",
  "-t",
  "--testonly",
  "-a",
  "--audit",
  "-p",
  "--predictions",
  "--readable_model",
];

// ---------------------------------------------------------------------------
// Interpretation
// ---------------------------------------------------------------------------

/**
 * Interpret forwarded trainer arguments.
 *
 * @throws UnsupportedFeatureError for a multi-class reduction other than oaa/csoaa
 * @throws ConfigurationError for reserved options or malformed values
 *
 * @example
 * const d = interpretTrainerOptions(["--oaa", "3", "-q", "ab", "--ignore", "c"]);
 * // d.multiclass => { reduction: "oaa", classes: 3 }
 * // d.pairs      => [["a", "b"]]
 * // d.ignore     => Set { "c" }
 */
export function interpretTrainerOptions(args: readonly string[]): TrainerDirectives {
  const directives: TrainerDirectives = {
    pairs: [],
    keep: new Set(),
    ignore: new Set(),
    multiclass: undefined,
    args: [...args],
  };

  for (let i = 0; i < args.length; i++) {
    const raw = args[i] ?? "";
    const [flag = "", inline] = splitInline(raw);

    if (UNSUPPORTED_REDUCTIONS.includes(flag)) {
      throw new UnsupportedFeatureError(
        flag,
        `Multi-class reduction ${flag} is not supported; use --oaa or --csoaa`
      );
    }
    if (RESERVED_OPTIONS.includes(flag)) {
      throw new ConfigurationError(`Option ${flag} is managed by varscope and cannot be forwarded`);
    }

    if (flag === "-q" || flag === "--quadratic") {
      const value = inline ?? args[++i];
      directives.pairs.push(parsePair(flag, value));
      continue;
    }
    if (flag.startsWith("-q") && !flag.startsWith("--")) {
      directives.pairs.push(parsePair("-q", flag.slice(2)));
      continue;
    }

    if (flag === "--keep" || flag === "--ignore") {
      const value = inline ?? args[++i];
      if (!value) {
        throw new ConfigurationError(`Option ${flag} needs a namespace short code`);
      }
      const target = flag === "--keep" ? directives.keep : directives.ignore;
      for (const code of value) target.add(code);
      continue;
    }

    if (flag === "--oaa" || flag === "--csoaa") {
      const value = inline ?? args[++i];
      const classes = Number(value);
      if (!Number.isInteger(classes) || classes < 1) {
        throw new ConfigurationError(`Option ${flag} needs a positive class count, got '${value ?? ""}'`);
      }
      directives.multiclass = { reduction: flag === "--oaa" ? "oaa" : "csoaa", classes };
      continue;
    }
  }

  return directives;
}

/** Label mode implied by the directives */
export function labelModeOf(directives: TrainerDirectives): LabelMode {
  return directives.multiclass ? "multiclass" : "single";
}

function splitInline(raw: string): [string, string | undefined] {
  if (!raw.startsWith("--")) return [raw, undefined];
  const eq = raw.indexOf("=");
  return eq < 0 ? [raw, undefined] : [raw.slice(0, eq), raw.slice(eq + 1)];
}

function parsePair(flag: string, value: string | undefined): PairSpec {
  if (value === undefined || value.length !== 2) {
    throw new ConfigurationError(`Option ${flag} needs exactly two namespace short codes, got '${value ?? ""}'`);
  }
  return [value.charAt(0), value.charAt(1)];
}
