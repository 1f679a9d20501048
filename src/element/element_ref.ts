/***
 * ElementRef — Stable handle to one element of an UnorderedMap.
 *
 * A ref pins a chain slot plus the slot's generation at the time it was
 * made. Reads and writes go straight into the chain's columns, so
 *
 *   const r = map.find("a");
 *   r.value += 1;
 *
 * updates the stored value in place. Slots never move, which keeps a ref
 * valid across every insert and every rehash. Erasing the element, or
 * clearing the map, makes it stale: `is_valid` turns false and, in dev
 * builds, touching `key` or `value` throws MapError(STALE_REFERENCE).
 *
 * `successor()` steps to the next element in iteration order, which makes
 * a ref double as the forward cursor returned by `begin()`.
 *
 ***/

import { MAP_ERROR, MapError } from "utils/error";
import {
  END_POSITION,
  type ChainPosition,
  type ElementChain,
} from "./element_chain";

export class ElementRef<K, V> {
  constructor(
    private readonly _chain: ElementChain<K, V>,
    private readonly _position: ChainPosition,
    private readonly _generation: number,
  ) {}

  public get is_valid(): boolean {
    return this._chain.is_live(this._position, this._generation);
  }

  public get key(): K {
    this._check();
    return this._chain.key_at(this._position);
  }

  public get value(): V {
    this._check();
    return this._chain.value_at(this._position);
  }

  public set value(value: V) {
    this._check();
    this._chain.set_value_at(this._position, value);
  }

  /** The next element in iteration order, or undefined at the end. */
  public successor(): ElementRef<K, V> | undefined {
    this._check();
    return create_ref(this._chain, this._chain.next(this._position));
  }

  /** True if both refs denote the same live element of the same map. */
  public same_as(other: ElementRef<K, V>): boolean {
    return (
      this._chain === other._chain &&
      this._position === other._position &&
      this._generation === other._generation
    );
  }

  public entry(): [K, V] {
    return [this.key, this.value];
  }

  private _check(): void {
    if (__DEV__ && !this.is_valid) {
      throw new MapError(
        MAP_ERROR.STALE_REFERENCE,
        "element was erased or the map was cleared",
        { position: this._position, generation: this._generation },
      );
    }
  }
}

/** Ref to the element at `position`, or undefined for END_POSITION. */
export function create_ref<K, V>(
  chain: ElementChain<K, V>,
  position: ChainPosition,
): ElementRef<K, V> | undefined {
  if (position === END_POSITION) return undefined;
  return new ElementRef(chain, position, chain.generation_at(position));
}
