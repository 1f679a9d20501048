/***
 *
 * ElementChain — Slot arena that owns every element as one singly-linked list.
 *
 * Elements live in parallel columns indexed by slot: keys, values, a
 * next-link and a generation. Slot 0 is the before-first sentinel. It
 * never holds an element, but it is a valid position, so "the element
 * after position p" is defined for the front element too (p = 0).
 *
 *   slot:        0 (sentinel)   1     2     3
 *   next:        3              ABSENT 1    2      → chain: 3 → 2 → 1
 *
 * New elements are always linked in at the front. A slot never moves
 * while its element is alive; erasing releases the slot to a free list
 * and bumps its generation, so a ref still holding (slot, generation)
 * can tell it has gone stale once the slot is reused.
 *
 ***/

import {
  GrowableInt32Array,
  unsafe_cast,
  type Brand,
} from "type_primitives";
import {
  ABSENT,
  BEFORE_BEGIN_SLOT,
  INITIAL_GENERATION,
  INITIAL_SLOT_CAPACITY,
} from "utils/constants";
import { grow_number_array } from "utils/arrays";

/** A slot in the chain: the sentinel, an element, or END_POSITION. */
export type ChainPosition = Brand<number, "chain_position">;

export const BEFORE_BEGIN = unsafe_cast<ChainPosition>(BEFORE_BEGIN_SLOT);
export const END_POSITION = unsafe_cast<ChainPosition>(ABSENT);

export class ElementChain<K, V> {
  // Slot 0 is never written; released slots are reset to undefined
  private _keys: (K | undefined)[] = [undefined];
  private _values: (V | undefined)[] = [undefined];
  private _next = new GrowableInt32Array(INITIAL_SLOT_CAPACITY);
  private _generations: number[] = new Array<number>(
    INITIAL_SLOT_CAPACITY,
  ).fill(INITIAL_GENERATION);
  private _free_slots: number[] = [];
  private _length = 0;

  constructor() {
    this._next.push(ABSENT);
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of live elements. */
  public get length(): number {
    return this._length;
  }

  /** First element, or END_POSITION when the chain is empty. */
  public get front(): ChainPosition {
    return this.next(BEFORE_BEGIN);
  }

  public next(position: ChainPosition): ChainPosition {
    return unsafe_cast<ChainPosition>(this._next.get(position));
  }

  public key_at(position: ChainPosition): K {
    return unsafe_cast<K>(this._keys[position]);
  }

  public value_at(position: ChainPosition): V {
    return unsafe_cast<V>(this._values[position]);
  }

  public generation_at(position: ChainPosition): number {
    return this._generations[position];
  }

  /**
   * True while the element that occupied `position` at `generation`
   * is still alive. The sentinel and END_POSITION are never live.
   */
  public is_live(position: ChainPosition, generation: number): boolean {
    return (
      position > BEFORE_BEGIN &&
      position < this._next.length &&
      this._generations[position] === generation
    );
  }

  //=========================================================
  // Mutations
  //=========================================================

  public set_value_at(position: ChainPosition, value: V): void {
    this._values[position] = value;
  }

  /**
   * Link a new element in at the front and return its slot.
   * Reuses a released slot when one is available.
   */
  public push_front(key: K, value: V): ChainPosition {
    const slot = this._allocate();
    this._keys[slot] = key;
    this._values[slot] = value;
    this._next.set_at(slot, this._next.get(BEFORE_BEGIN));
    this._next.set_at(BEFORE_BEGIN, slot);
    this._length++;
    return unsafe_cast<ChainPosition>(slot);
  }

  /**
   * Unlink and release the element right after `position`.
   * `position` must not be the last element.
   */
  public erase_after(position: ChainPosition): void {
    const victim = this._next.get(position);
    this._next.set_at(position, this._next.get(victim));
    this._release(victim);
    this._length--;
  }

  /** Release every element. Outstanding refs all go stale. */
  public clear(): void {
    let slot = this._next.get(BEFORE_BEGIN);
    while (slot !== ABSENT) {
      const next = this._next.get(slot);
      this._release(slot);
      slot = next;
    }
    this._next.set_at(BEFORE_BEGIN, ABSENT);
    this._length = 0;
  }

  /**
   * Walk the chain front to back, projecting each element slot.
   * Single pass; mutating the chain mid-walk is not supported.
   */
  public walk<T>(
    project: (position: ChainPosition) => T,
  ): IterableIterator<T> {
    let position = this.front;
    const chain = this;
    return {
      next(): IteratorResult<T> {
        if (position === END_POSITION) {
          return { value: undefined, done: true };
        }
        const current = position;
        position = chain.next(position);
        return { value: project(current), done: false };
      },
      [Symbol.iterator]() {
        return this;
      },
    };
  }

  //=========================================================
  // Internal
  //=========================================================

  private _allocate(): number {
    const recycled = this._free_slots.pop();
    if (recycled !== undefined) return recycled; // generation bumped on release

    const slot = this._next.length;
    this._next.push(ABSENT);
    if (slot >= this._generations.length) {
      this._generations = grow_number_array(
        this._generations,
        slot + 1,
        INITIAL_GENERATION,
      );
    }
    this._generations[slot] = INITIAL_GENERATION;
    return slot;
  }

  private _release(slot: number): void {
    this._keys[slot] = undefined;
    this._values[slot] = undefined;
    this._next.set_at(slot, ABSENT);
    this._generations[slot]++;
    this._free_slots.push(slot);
  }
}
