/***
 *
 * BucketIndex — Per-bucket singly-linked lists of anchors.
 *
 * An anchor does not hold an element. It holds the chain position right
 * BEFORE its element ("the element after my target is the one I index"),
 * which is what lets the map unlink an element from a singly-linked
 * chain without a back-pointer.
 *
 * Anchors live in their own arena (target + link columns) with a free
 * list. Bucket b's list starts at heads[b] and follows link[] until
 * NO_ANCHOR. Walking a list for removal uses a "previous" cursor, where
 * BEFORE_HEAD stands for the bucket head itself:
 *
 *   heads[b] → a4 → a1 → NO_ANCHOR
 *   after(b, BEFORE_HEAD) = a4,  after(b, a4) = a1,  after(b, a1) = NO_ANCHOR
 *
 * Growing the bucket count never touches anchor targets: an anchor moved
 * to another bucket still denotes the same predecessor position.
 *
 ***/

import {
  GrowableInt32Array,
  unsafe_cast,
  type Brand,
} from "type_primitives";
import { ABSENT } from "utils/constants";
import { grow_int32_array } from "utils/arrays";
import type { ChainPosition } from "element/element_chain";

export type AnchorID = Brand<number, "anchor_id">;
export type BucketID = Brand<number, "bucket_id">;

export const NO_ANCHOR = unsafe_cast<AnchorID>(ABSENT);
export const BEFORE_HEAD = unsafe_cast<AnchorID>(ABSENT);

export class BucketIndex {
  private _heads: Int32Array;
  private _target = new GrowableInt32Array();
  private _link = new GrowableInt32Array();
  private _free_anchors: number[] = [];
  private _anchor_count = 0;

  constructor(bucket_count: number) {
    this._heads = new Int32Array(bucket_count).fill(ABSENT);
  }

  //=========================================================
  // Queries
  //=========================================================

  public get bucket_count(): number {
    return this._heads.length;
  }

  /** Anchors currently linked into some bucket. */
  public get anchor_count(): number {
    return this._anchor_count;
  }

  public head(bucket: BucketID): AnchorID {
    return unsafe_cast<AnchorID>(this._heads[bucket]);
  }

  public next(anchor: AnchorID): AnchorID {
    return unsafe_cast<AnchorID>(this._link.get(anchor));
  }

  /** The anchor following `previous` in `bucket` (BEFORE_HEAD = the head). */
  public after(bucket: BucketID, previous: AnchorID): AnchorID {
    return previous === BEFORE_HEAD ? this.head(bucket) : this.next(previous);
  }

  public target(anchor: AnchorID): ChainPosition {
    return unsafe_cast<ChainPosition>(this._target.get(anchor));
  }

  public bucket_size(bucket: BucketID): number {
    let n = 0;
    for (let a = this._heads[bucket]; a !== ABSENT; a = this._link.get(a)) n++;
    return n;
  }

  //=========================================================
  // Mutations
  //=========================================================

  public retarget(anchor: AnchorID, position: ChainPosition): void {
    this._target.set_at(anchor, position);
  }

  /** Link a new anchor targeting `position` at the head of `bucket`. */
  public push_front(bucket: BucketID, position: ChainPosition): AnchorID {
    const anchor = this._allocate();
    this._target.set_at(anchor, position);
    this._link.set_at(anchor, this._heads[bucket]);
    this._heads[bucket] = anchor;
    this._anchor_count++;
    return unsafe_cast<AnchorID>(anchor);
  }

  /** Unlink and release the anchor following `previous` in `bucket`. */
  public erase_after(bucket: BucketID, previous: AnchorID): void {
    const anchor = this._unlink_after(bucket, previous);
    this._free_anchors.push(anchor);
    this._anchor_count--;
  }

  /**
   * Move the anchor following `previous` in `from` to the head of `to`.
   * The anchor keeps its id and its target.
   */
  public move_after(from: BucketID, previous: AnchorID, to: BucketID): void {
    const anchor = this._unlink_after(from, previous);
    this._link.set_at(anchor, this._heads[to]);
    this._heads[to] = anchor;
  }

  /**
   * Grow to `bucket_count` buckets. New buckets start empty; the caller
   * redistributes anchors afterwards. Never shrinks.
   */
  public grow(bucket_count: number): void {
    this._heads = grow_int32_array(this._heads, bucket_count, ABSENT);
  }

  /** Empty every bucket. The bucket count is kept. */
  public clear(): void {
    this._heads.fill(ABSENT);
    this._target.clear();
    this._link.clear();
    this._free_anchors.length = 0;
    this._anchor_count = 0;
  }

  //=========================================================
  // Internal
  //=========================================================

  private _allocate(): number {
    const recycled = this._free_anchors.pop();
    if (recycled !== undefined) return recycled;
    const anchor = this._target.length;
    this._target.push(ABSENT);
    this._link.push(ABSENT);
    return anchor;
  }

  private _unlink_after(bucket: BucketID, previous: AnchorID): number {
    const anchor = this.after(bucket, previous);
    const rest = this._link.get(anchor);
    if (previous === BEFORE_HEAD) this._heads[bucket] = rest;
    else this._link.set_at(previous, rest);
    return anchor;
  }
}
