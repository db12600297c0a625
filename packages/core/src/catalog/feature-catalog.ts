/**
 * @summary Accumulates the feature universe of a training corpus.
 *
 * The catalog owns three pieces of state, all built in one pass:
 * - the namespaces seen, in first-seen order, each with its known keys
 * - the value range of every feature identity
 * - synthetic interaction features produced by namespace-pair expansion
 *
 * Lifecycle: ingest() for every record, expandPairs(), then finalize().
 * After finalize() the catalog is read-only.
 *
 * Ranges are widened from the first observed value. A feature missing from
 * at least one ingested record has the implicit sparse value 0 folded into
 * its range at finalize().
 */

import { CatalogSealedError } from "../types/errors.js";
import {
  CONSTANT_FEATURE,
  WILDCARD_NAMESPACE_CODE,
  featureId,
  namespaceShortCode,
  pairFeatureId,
} from "../types/feature.js";
import type {
  FeatureId,
  FeatureRange,
  PairSpec,
  ParsedRecord,
} from "../types/feature.js";

// ---------------------------------------------------------------------------
// Namespace Filter
// ---------------------------------------------------------------------------

/**
 * Keep/ignore sets of namespace short codes.
 */
export interface NamespaceFilter {
  ignore: ReadonlySet<string>;
  keep: ReadonlySet<string>;
}

/**
 * Whether a namespace passes the filter.
 *
 * Ignore is checked first, so a code in both sets is dropped.
 */
export function namespaceAllowed(namespace: string, filter: NamespaceFilter): boolean {
  const code = namespaceShortCode(namespace);
  if (filter.ignore.has(code)) return false;
  if (filter.keep.size > 0 && !filter.keep.has(code)) return false;
  return true;
}

// ---------------------------------------------------------------------------
// Feature Catalog
// ---------------------------------------------------------------------------

interface RangeState extends FeatureRange {
  /** Number of records the feature appeared in */
  records: number;
  /** Index of the last record that counted towards `records` */
  lastRecord: number;
}

export class FeatureCatalog {
  private readonly filter: NamespaceFilter;
  private readonly spaces = new Map<string, Map<string, number>>();
  private readonly ranges = new Map<FeatureId, RangeState>();
  private readonly pairs = new Set<FeatureId>();
  private ingested = 0;
  private sealed = false;

  constructor(filter: Partial<NamespaceFilter> = {}) {
    this.filter = {
      ignore: filter.ignore ?? new Set<string>(),
      keep: filter.keep ?? new Set<string>(),
    };
  }

  /** Number of records ingested so far */
  get recordCount(): number {
    return this.ingested;
  }

  get finalized(): boolean {
    return this.sealed;
  }

  /**
   * Add one parsed record.
   *
   * Triples from filtered namespaces are skipped. A key seen again keeps
   * its latest value; the range tracks every value.
   */
  ingest(record: ParsedRecord): void {
    this.assertOpen("ingest records");
    const recordIndex = this.ingested++;

    for (const { namespace, key, value } of record.features) {
      if (!namespaceAllowed(namespace, this.filter)) continue;

      let keys = this.spaces.get(namespace);
      if (!keys) {
        keys = new Map<string, number>();
        this.spaces.set(namespace, keys);
      }
      keys.set(key, value);

      const id = featureId(namespace, key);
      const range = this.ranges.get(id);
      if (!range) {
        this.ranges.set(id, { min: value, max: value, records: 1, lastRecord: recordIndex });
        continue;
      }

      range.min = Math.min(range.min, value);
      range.max = Math.max(range.max, value);
      if (range.lastRecord !== recordIndex) {
        range.records += 1;
        range.lastRecord = recordIndex;
      }
    }
  }

  /**
   * Register an interaction feature for every key pair of every matching
   * namespace pair. Existing identities are left untouched, so running this
   * twice with the same specs changes nothing.
   *
   * @param specs - Short-code pairs such as `["a", "b"]`; `:` matches any namespace
   * @returns Number of newly registered identities
   */
  expandPairs(specs: Iterable<PairSpec>): number {
    this.assertOpen("expand namespace pairs");
    let added = 0;

    for (const [left, right] of specs) {
      for (const ns1 of this.namespacesMatching(left)) {
        for (const ns2 of this.namespacesMatching(right)) {
          for (const key1 of this.keysOf(ns1)) {
            for (const key2 of this.keysOf(ns2)) {
              const id = pairFeatureId(ns1, key1, ns2, key2);
              if (this.ranges.has(id)) continue;
              this.ranges.set(id, { min: 0, max: 0, records: 0, lastRecord: -1 });
              this.pairs.add(id);
              added += 1;
            }
          }
        }
      }
    }

    return added;
  }

  /**
   * Fold the implicit zero into sparse features, register the bias term
   * and seal the catalog.
   */
  finalize(): void {
    this.assertOpen("finalize twice");

    for (const [id, range] of this.ranges) {
      if (this.pairs.has(id)) continue;
      if (range.records < this.ingested) {
        range.min = Math.min(range.min, 0);
        range.max = Math.max(range.max, 0);
      }
    }

    if (!this.ranges.has(CONSTANT_FEATURE)) {
      this.ranges.set(CONSTANT_FEATURE, { min: 0, max: 0, records: 0, lastRecord: -1 });
    }

    this.sealed = true;
  }

  // -------------------------------------------------------------------------
  // Read Access
  // -------------------------------------------------------------------------

  /** Namespaces in first-seen order */
  namespaces(): string[] {
    return Array.from(this.spaces.keys());
  }

  /** Keys of a namespace in first-seen order */
  keysOf(namespace: string): string[] {
    return Array.from(this.spaces.get(namespace)?.keys() ?? []);
  }

  /** Last value stored for a key */
  lastValue(namespace: string, key: string): number | undefined {
    return this.spaces.get(namespace)?.get(key);
  }

  rangeOf(id: FeatureId): FeatureRange | undefined {
    const range = this.ranges.get(id);
    return range ? { min: range.min, max: range.max } : undefined;
  }

  has(id: FeatureId): boolean {
    return this.ranges.has(id);
  }

  /** Every registered identity: base, pair and (after finalize) Constant */
  featureIds(): FeatureId[] {
    return Array.from(this.ranges.keys());
  }

  /** Identities registered by pair expansion */
  pairFeatureIds(): FeatureId[] {
    return Array.from(this.pairs);
  }

  private namespacesMatching(code: string): string[] {
    return this.namespaces().filter(
      (ns) =>
        (code === WILDCARD_NAMESPACE_CODE || namespaceShortCode(ns) === code) &&
        namespaceAllowed(ns, this.filter)
    );
  }

  private assertOpen(operation: string): void {
    if (this.sealed) {
      throw new CatalogSealedError(operation);
    }
  }
}
