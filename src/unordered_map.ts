/***
 * UnorderedMap — Hash map with stable element references.
 *
 * Inserting never invalidates a ref to another element, and erasing
 * invalidates only the ref to the erased element. Both hold across
 * growth, because the map is split in two:
 *
 * - ElementChain owns every (key, value) pair in one singly-linked list,
 *   newest first. Slots never move while their element is alive.
 * - BucketIndex maps hash buckets to lists of anchors. An anchor holds
 *   the chain position just before its element, so erase can unlink an
 *   element from the singly-linked chain in O(1) once it is found.
 *
 * Rehash doubles the bucket count and moves anchors between buckets. It
 * never touches the chain, so refs stay valid.
 *
 * Two anchors need fixing whenever the chain changes shape:
 *
 *   insert   the old front element's anchor pointed at the sentinel;
 *            it now has to point at the new front element.
 *   erase    the erased element's successor pointed at the erased
 *            element; it now has to point at the erased one's predecessor.
 *
 * Usage:
 *
 *   const m = new UnorderedMap<number, number>({ default_value: () => 0 });
 *   m.entry(5).value = 10;
 *   m.entry(7).value = 20;
 *
 *   const seven = m.find(7);
 *   for (let i = 0; i < 100; i++) m.insert(100 + i, i); // several rehashes
 *   seven?.value; // 20, same element
 *
 *   m.erase(5);
 *   m.at(5); // throws MapError(KEY_NOT_FOUND)
 *
 ***/

import {
  is_non_negative_integer,
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
} from "type_primitives";
import {
  BUCKET_GROWTH_FACTOR,
  INITIAL_BUCKET_COUNT,
  MAX_LOAD_FACTOR,
} from "utils/constants";
import { MAP_ERROR, MapError } from "utils/error";
import {
  default_equals,
  default_hash,
  type EqualsFn,
  type HashFn,
} from "hash/hash";
import {
  BEFORE_BEGIN,
  END_POSITION,
  ElementChain,
  type ChainPosition,
} from "element/element_chain";
import { ElementRef, create_ref } from "element/element_ref";
import {
  BEFORE_HEAD,
  BucketIndex,
  NO_ANCHOR,
  type AnchorID,
  type BucketID,
} from "bucket/bucket_index";

export interface UnorderedMapOptions<K, V> {
  /** Must return a non-negative integer. Defaults to default_hash. */
  hash?: HashFn<K>;
  /** Must agree with `hash`. Defaults to SameValueZero. */
  equals?: EqualsFn<K>;
  /** Produces the value `entry()` inserts for a missing key. */
  default_value?: () => V;
  /** Defaults to 1. */
  initial_bucket_count?: number;
}

export class UnorderedMap<K, V> implements Iterable<[K, V]> {
  private readonly _hash: HashFn<K>;
  private readonly _equals: EqualsFn<K>;
  private readonly _default_value: (() => V) | undefined;
  private readonly _chain = new ElementChain<K, V>();
  private readonly _index: BucketIndex;

  constructor(private readonly _options: UnorderedMapOptions<K, V> = {}) {
    this._hash = _options.hash ?? default_hash;
    this._equals = _options.equals ?? default_equals;
    this._default_value = _options.default_value;
    this._index = new BucketIndex(
      validate_and_cast(
        _options.initial_bucket_count ?? INITIAL_BUCKET_COUNT,
        is_positive_integer,
        "initial_bucket_count must be a positive integer",
      ),
    );
  }

  /** Insert each pair in order. Later duplicates of a key are dropped. */
  static from<K, V>(
    entries: Iterable<readonly [K, V]>,
    options?: UnorderedMapOptions<K, V>,
  ): UnorderedMap<K, V> {
    const map = new UnorderedMap<K, V>(options);
    for (const [key, value] of entries) map.insert(key, value);
    return map;
  }

  /** Literal-list construction with the default options. */
  static of<K, V>(...entries: (readonly [K, V])[]): UnorderedMap<K, V> {
    return UnorderedMap.from(entries);
  }

  //=========================================================
  // Queries
  //=========================================================

  public get size(): number {
    return this._chain.length;
  }

  public get is_empty(): boolean {
    return this._chain.length === 0;
  }

  public get bucket_count(): number {
    return this._index.bucket_count;
  }

  public get load_factor(): number {
    return this._chain.length / this._index.bucket_count;
  }

  public get max_load_factor(): number {
    return MAX_LOAD_FACTOR;
  }

  public hash_function(): HashFn<K> {
    return this._hash;
  }

  public key_equals(): EqualsFn<K> {
    return this._equals;
  }

  /** Bucket that `key` currently hashes to. */
  public bucket(key: K): BucketID {
    return this._bucket_of(key);
  }

  public bucket_size(bucket: number): number {
    return this._index.bucket_size(
      validate_and_cast<number, BucketID>(
        bucket,
        (b) => is_non_negative_integer(b) && b < this._index.bucket_count,
        "bucket must index an existing bucket",
      ),
    );
  }

  /** Ref to the element with `key`, or undefined when absent. */
  public find(key: K): ElementRef<K, V> | undefined {
    return create_ref(this._chain, this._position_of(key));
  }

  public has(key: K): boolean {
    return this._position_of(key) !== END_POSITION;
  }

  public get(key: K): V | undefined {
    const position = this._position_of(key);
    return position === END_POSITION
      ? undefined
      : this._chain.value_at(position);
  }

  /** Value for `key`. Throws MapError(KEY_NOT_FOUND) when absent. */
  public at(key: K): V {
    const position = this._position_of(key);
    if (position === END_POSITION) {
      throw new MapError(MAP_ERROR.KEY_NOT_FOUND, undefined, { key });
    }
    return this._chain.value_at(position);
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Insert (key, value) unless `key` is already present, in which case
   * nothing changes and the first value wins. Returns true if inserted.
   * May rehash.
   */
  public insert(key: K, value: V): boolean {
    const bucket = this._bucket_of(key);
    if (this._anchor_in(bucket, key) !== NO_ANCHOR) return false;

    // The current front element's anchor targets the sentinel. Find it
    // before linking, then point it at the new front element.
    let front_anchor = NO_ANCHOR;
    if (this._chain.length > 0) {
      const front_key = this._chain.key_at(this._chain.front);
      front_anchor = this._anchor_in(this._bucket_of(front_key), front_key);
    }

    const position = this._chain.push_front(key, value);
    if (front_anchor !== NO_ANCHOR) this._index.retarget(front_anchor, position);
    this._index.push_front(bucket, BEFORE_BEGIN);

    if (this._chain.length / this._index.bucket_count > MAX_LOAD_FACTOR) {
      this._rehash();
    }
    return true;
  }

  /**
   * Ref to the element with `key`, inserting `default_value()` first if
   * absent. Throws MapError(MISSING_DEFAULT_VALUE) when the map has no
   * default_value and the key is missing.
   */
  public entry(key: K): ElementRef<K, V> {
    const found = this.find(key);
    if (found !== undefined) return found;

    if (this._default_value === undefined) {
      throw new MapError(
        MAP_ERROR.MISSING_DEFAULT_VALUE,
        "entry() needs a default_value option to insert a missing key",
        { key },
      );
    }
    this.insert(key, this._default_value());
    // Rehash leaves the chain alone, so the new element is still in front
    return new ElementRef(
      this._chain,
      this._chain.front,
      this._chain.generation_at(this._chain.front),
    );
  }

  /** Remove the element with `key`. Returns false if it was absent. */
  public erase(key: K): boolean {
    const bucket = this._bucket_of(key);
    const previous = this._find_previous(bucket, key);
    const anchor = this._index.after(bucket, previous);
    if (anchor === NO_ANCHOR) return false;

    const before = this._index.target(anchor);
    const position = this._chain.next(before);
    const successor = this._chain.next(position);

    // The successor's predecessor changes from `position` to `before`
    if (successor !== END_POSITION) {
      const successor_key = this._chain.key_at(successor);
      this._index.retarget(
        this._anchor_in(this._bucket_of(successor_key), successor_key),
        before,
      );
    }

    this._chain.erase_after(before);
    this._index.erase_after(bucket, previous);
    return true;
  }

  /** Remove every element. The bucket count is kept. */
  public clear(): void {
    this._chain.clear();
    this._index.clear();
  }

  /**
   * Replace this map's contents with a copy of `other`'s, re-inserted in
   * `other`'s iteration order. Hash, equality and default_value stay this
   * map's own.
   */
  public assign(other: UnorderedMap<K, V>): this {
    if (other === this) return this;
    this.clear();
    for (const [key, value] of other) this.insert(key, value);
    return this;
  }

  /** Independent copy with the same options. */
  public clone(): UnorderedMap<K, V> {
    return new UnorderedMap<K, V>(this._options).assign(this);
  }

  //=========================================================
  // Iteration (newest element first)
  //=========================================================

  /** First element in iteration order, or undefined when empty. */
  public begin(): ElementRef<K, V> | undefined {
    return create_ref(this._chain, this._chain.front);
  }

  public [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  public entries(): IterableIterator<[K, V]> {
    const chain = this._chain;
    return chain.walk((p): [K, V] => [chain.key_at(p), chain.value_at(p)]);
  }

  public keys(): IterableIterator<K> {
    const chain = this._chain;
    return chain.walk((p) => chain.key_at(p));
  }

  public values(): IterableIterator<V> {
    const chain = this._chain;
    return chain.walk((p) => chain.value_at(p));
  }

  public refs(): IterableIterator<ElementRef<K, V>> {
    const chain = this._chain;
    return chain.walk(
      (p) => new ElementRef(chain, p, chain.generation_at(p)),
    );
  }

  public for_each(fn: (key: K, value: V) => void): void {
    const chain = this._chain;
    for (let p = chain.front; p !== END_POSITION; p = chain.next(p)) {
      fn(chain.key_at(p), chain.value_at(p));
    }
  }

  //=========================================================
  // Internal
  //=========================================================

  private _bucket_of(key: K): BucketID {
    return unsafe_cast<BucketID>(
      this._hash_of(key) % this._index.bucket_count,
    );
  }

  private _hash_of(key: K): number {
    return validate_and_cast(
      this._hash(key),
      is_non_negative_integer,
      "hash must return a non-negative integer",
    );
  }

  /**
   * Anchor preceding the one whose element has `key` in `bucket`
   * (BEFORE_HEAD if it is the first). When no element matches, returns
   * the bucket's last anchor, so after() of the result is NO_ANCHOR.
   */
  private _find_previous(bucket: BucketID, key: K): AnchorID {
    let previous = BEFORE_HEAD;
    let anchor = this._index.head(bucket);
    while (anchor !== NO_ANCHOR) {
      const position = this._chain.next(this._index.target(anchor));
      if (this._equals(this._chain.key_at(position), key)) return previous;
      previous = anchor;
      anchor = this._index.next(anchor);
    }
    return previous;
  }

  private _anchor_in(bucket: BucketID, key: K): AnchorID {
    return this._index.after(bucket, this._find_previous(bucket, key));
  }

  private _position_of(key: K): ChainPosition {
    const anchor = this._anchor_in(this._bucket_of(key), key);
    if (anchor === NO_ANCHOR) return END_POSITION;
    return this._chain.next(this._index.target(anchor));
  }

  private _rehash(): void {
    const prev_count = this._index.bucket_count;
    const next_count = prev_count * BUCKET_GROWTH_FACTOR;
    this._index.grow(next_count);

    const chain = this._chain;
    for (let p = chain.front; p !== END_POSITION; p = chain.next(p)) {
      const key = chain.key_at(p);
      const h = this._hash_of(key);
      const from = unsafe_cast<BucketID>(h % prev_count);
      const to = unsafe_cast<BucketID>(h % next_count);
      // `to` is either `from` or `from + prev_count`, a bucket this loop
      // never reads from, so a moved anchor is not visited twice
      if (from !== to) {
        this._index.move_after(from, this._find_previous(from, key), to);
      }
    }
  }
}
