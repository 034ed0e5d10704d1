/**
 * Plain-JSON view of an Aggregate.
 *
 * Keys are emitted in sorted order so two equal aggregates always
 * serialise to the same bytes.
 */
export interface AggregateSnapshot {
  patients: Record<string, Record<string, number>>;
  totals: Record<string, number>;
}

/**
 * Counting structure keyed by (patient_id, event_type).
 *
 * `totals[t]` always equals the sum of `counts[p][t]` over all patients:
 * both are only ever changed together, by `increment()` or by a merge.
 *
 * Lifecycle: a worker owns a fresh Aggregate while it reads a partition,
 * then seals it. A sealed Aggregate rejects further increments. Merging
 * into a target consumes the source, which must not be used afterwards.
 */
export class Aggregate {
  private readonly counts = new Map<string, Map<string, number>>();
  private readonly totalsByType = new Map<string, number>();
  private sealed = false;
  private consumed = false;

  /** Adds `by` occurrences of `eventType` for `patientId`. */
  increment(patientId: string, eventType: string, by: number = 1): void {
    this.assertWritable();
    if (!Number.isInteger(by) || by < 0) {
      throw new RangeError(`increment must be a non-negative integer, got ${by}`);
    }

    let perType = this.counts.get(patientId);
    if (!perType) {
      perType = new Map<string, number>();
      this.counts.set(patientId, perType);
    }
    perType.set(eventType, (perType.get(eventType) ?? 0) + by);
    this.totalsByType.set(eventType, (this.totalsByType.get(eventType) ?? 0) + by);
  }

  count(patientId: string, eventType: string): number {
    return this.counts.get(patientId)?.get(eventType) ?? 0;
  }

  total(eventType: string): number {
    return this.totalsByType.get(eventType) ?? 0;
  }

  /** Sum of all totals. */
  get size(): number {
    let sum = 0;
    for (const n of this.totalsByType.values()) sum += n;
    return sum;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /** Marks the aggregate read-only. Idempotent. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  /**
   * Destructively merges `source` into this aggregate.
   *
   * `source` is marked consumed; reading or merging it again throws.
   */
  absorb(source: Aggregate): this {
    this.assertWritable();
    if (source === this) {
      throw new Error('An aggregate cannot absorb itself');
    }
    this.addFrom(source);
    source.consumed = true;
    return this;
  }

  /**
   * Non-destructive merge: returns a new sealed aggregate holding the
   * sum of `a` and `b`. Associative and commutative.
   */
  static merge(a: Aggregate, b: Aggregate): Aggregate {
    return new Aggregate().addFrom(a).addFrom(b).seal();
  }

  /** Rebuilds an aggregate from its snapshot form. */
  static fromSnapshot(snapshot: AggregateSnapshot): Aggregate {
    const agg = new Aggregate();
    for (const [patientId, perType] of Object.entries(snapshot.patients)) {
      for (const [eventType, n] of Object.entries(perType)) {
        agg.increment(patientId, eventType, n);
      }
    }
    return agg;
  }

  /** Sorted, JSON-ready copy of the counts and totals. */
  toSnapshot(): AggregateSnapshot {
    this.assertReadable();

    const patients: Record<string, Record<string, number>> = {};
    for (const patientId of [...this.counts.keys()].sort()) {
      const perType = this.counts.get(patientId);
      if (!perType) continue;
      patients[patientId] = sortedRecord(perType);
    }

    return { patients, totals: sortedRecord(this.totalsByType) };
  }

  /** Structural equality of counts and totals. */
  equals(other: Aggregate): boolean {
    return JSON.stringify(this.toSnapshot()) === JSON.stringify(other.toSnapshot());
  }

  private addFrom(source: Aggregate): this {
    source.assertReadable();
    for (const [patientId, perType] of source.counts) {
      for (const [eventType, n] of perType) {
        this.increment(patientId, eventType, n);
      }
    }
    return this;
  }

  private assertReadable(): void {
    if (this.consumed) {
      throw new Error('Aggregate was consumed by a merge and can no longer be read');
    }
  }

  private assertWritable(): void {
    this.assertReadable();
    if (this.sealed) {
      throw new Error('Aggregate is sealed');
    }
  }
}

function sortedRecord(map: ReadonlyMap<string, number>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const key of [...map.keys()].sort()) {
    out[key] = map.get(key) ?? 0;
  }
  return out;
}
