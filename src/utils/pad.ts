/**
 * Sequence padding helpers
 *
 * Two distinct ownership contracts:
 * - pad()    extends the caller's array in place and returns it
 * - padded() copies first, so the caller's array is never touched
 */

/**
 * Append `fill` to `array` until it is at least `width` long.
 * Mutates and returns the same array; no-op when already wide enough.
 */
export function pad<T>(array: T[], width: number, fill: T): T[] {
  for (let i = array.length; i < width; i++) {
    array.push(fill);
  }
  return array;
}

/**
 * Copy of `array` extended with `fill` to at least `width` entries.
 * An absent array is treated as empty.
 */
export function padded<T>(array: readonly T[] | undefined, width: number, fill: T): T[] {
  const result = array === undefined ? [] : [...array];
  return pad(result, width, fill);
}
