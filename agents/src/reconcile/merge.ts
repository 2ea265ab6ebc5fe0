/**
 * Non-regression merge: an incoming value replaces the stored one only when it
 * is non-null and different. `undefined` (not observed) and `null` (observed
 * empty) never clear a stored value.
 */
export class PatchBuilder<Row extends object> {
  readonly patch: Partial<Row> = {};
  private count = 0;

  constructor(private readonly current: Partial<Row> | null) {}

  set<K extends keyof Row>(key: K, incoming: Row[K] | null | undefined): this {
    if (incoming === undefined || incoming === null) return this;
    if (this.current && this.current[key] === incoming) return this;
    this.patch[key] = incoming;
    this.count++;
    return this;
  }

  /** Sets a bookkeeping field unconditionally; does not count as a change. */
  always<K extends keyof Row>(key: K, value: Row[K]): this {
    this.patch[key] = value;
    return this;
  }

  /** Number of merged fields that changed so far. */
  get size(): number {
    return this.count;
  }

  get changed(): boolean {
    return this.count > 0;
  }
}
