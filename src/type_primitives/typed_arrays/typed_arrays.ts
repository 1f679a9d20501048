/***
 * GrowableTypedArray — TypedArray wrapper with amortised O(1) append.
 *
 * TypedArrays have fixed length — resizing requires allocating a new
 * buffer and copying. GrowableTypedArray wraps one with a separate
 * logical length and doubles the backing buffer on overflow.
 *
 * The element chain and the bucket index keep their link columns in
 * GrowableInt32Array, since every link is a slot index or ABSENT (-1).
 *
 ***/

import {
  DEFAULT_INITIAL_CAPACITY,
  GROWTH_FACTOR,
} from "../../utils/constants";

export type AnyTypedArray =
  | Int32Array
  | Uint32Array
  | Float64Array;

export class GrowableTypedArray<T extends AnyTypedArray> {
  private _buf: T;
  private _len = 0;

  constructor(
    private readonly _ctor: new (n: number) => T,
    initial_capacity = DEFAULT_INITIAL_CAPACITY,
  ) {
    this._buf = new _ctor(initial_capacity);
  }

  public get length(): number {
    return this._len;
  }

  public push(value: number): void {
    if (this._len >= this._buf.length) this._grow();
    this._buf[this._len++] = value;
  }

  public get(i: number): number {
    return this._buf[i];
  }

  public set_at(i: number, value: number): void {
    this._buf[i] = value;
  }

  /** Drop every element. The backing buffer is kept for reuse. */
  public clear(): void {
    this._len = 0;
  }

  private _grow(): void {
    const next = new this._ctor((this._buf.length || 1) * GROWTH_FACTOR);
    next.set(this._buf);
    this._buf = next;
  }
}

export class GrowableInt32Array extends GrowableTypedArray<Int32Array> {
  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    super(Int32Array, initial_capacity);
  }
}
