/**
 * Grow a number[] to hold at least `min_capacity` elements.
 * Doubles from the current length until sufficient, fills new slots
 * with `fill`, and copies existing data into the new buffer.
 */
export function grow_number_array(
  arr: number[],
  min_capacity: number,
  fill: number,
): number[] {
  let cap = arr.length || 1;
  while (cap < min_capacity) cap *= 2;
  const next = new Array<number>(cap).fill(fill);
  for (let i = 0; i < arr.length; i++) next[i] = arr[i];
  return next;
}

/**
 * Grow an Int32Array to exactly `capacity` elements. Existing data is
 * copied to the front and the tail is filled with `fill`.
 */
export function grow_int32_array(
  arr: Int32Array,
  capacity: number,
  fill: number,
): Int32Array {
  if (capacity <= arr.length) return arr;
  const next = new Int32Array(capacity).fill(fill);
  next.set(arr);
  return next;
}
