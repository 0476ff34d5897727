/**
 * HashSet<K> - A set backed by hash bucketing on an Equality<K>.
 *
 * API mirrors native Set<K>. Membership is decided by `equals`, with `hash`
 * only choosing the bucket, so a degenerate hash stays correct and merely
 * degrades to linear scans.
 */

import { config, createLogger } from "@setwise/core";
import { defaultEquality, type Equality } from "@setwise/equality";

const log = createLogger("hash-set");

const DEFAULT_COLLISION_THRESHOLD = 8;

export class HashSet<K> implements Iterable<K> {
  private readonly _equality: Equality<K>;
  private readonly _buckets = new Map<number, K[]>();
  private readonly _collisionThreshold: number;
  private _size = 0;
  private _warned = false;

  constructor(equality: Equality<K> = defaultEquality<K>()) {
    this._equality = equality;
    const threshold = config.get("collisions.threshold");
    this._collisionThreshold =
      typeof threshold === "number" && threshold > 0 ? threshold : DEFAULT_COLLISION_THRESHOLD;
  }

  /** Build a set from any iterable, keeping the first of each equivalent pair. */
  static from<K>(values: Iterable<K>, equality?: Equality<K>): HashSet<K> {
    const set = new HashSet<K>(equality);
    for (const k of values) set.add(k);
    return set;
  }

  get size(): number {
    return this._size;
  }

  get equality(): Equality<K> {
    return this._equality;
  }

  has(k: K): boolean {
    const bucket = this._buckets.get(this._equality.hash(k));
    if (!bucket) return false;
    for (let i = 0; i < bucket.length; i++) {
      if (this._equality.equals(k, bucket[i])) return true;
    }
    return false;
  }

  add(k: K): this {
    this.tryAdd(k);
    return this;
  }

  /**
   * Add `k` unless an equivalent element is already present.
   * Returns true when `k` was added.
   */
  tryAdd(k: K): boolean {
    const h = this._equality.hash(k);
    const bucket = this._buckets.get(h);
    if (!bucket) {
      this._buckets.set(h, [k]);
      this._size++;
      return true;
    }
    for (let i = 0; i < bucket.length; i++) {
      if (this._equality.equals(k, bucket[i])) return false;
    }
    bucket.push(k);
    this._size++;
    if (!this._warned && bucket.length > this._collisionThreshold) {
      this._warned = true;
      log.warn(
        `${bucket.length} elements share hash ${h}; lookups fall back to linear equality scans`
      );
    }
    return true;
  }

  delete(k: K): boolean {
    const h = this._equality.hash(k);
    const bucket = this._buckets.get(h);
    if (!bucket) return false;
    for (let i = 0; i < bucket.length; i++) {
      if (this._equality.equals(k, bucket[i])) {
        bucket.splice(i, 1);
        if (bucket.length === 0) this._buckets.delete(h);
        this._size--;
        return true;
      }
    }
    return false;
  }

  clear(): void {
    this._buckets.clear();
    this._size = 0;
  }

  *[Symbol.iterator](): IterableIterator<K> {
    for (const bucket of this._buckets.values()) {
      for (const k of bucket) yield k;
    }
  }

  values(): IterableIterator<K> {
    return this[Symbol.iterator]();
  }

  forEach(fn: (value: K) => void): void {
    for (const k of this) fn(k);
  }

  toArray(): K[] {
    const result: K[] = [];
    for (const k of this) result.push(k);
    return result;
  }
}
