/**
 * Binary search over a strictly ascending number[]. Returns the index of
 * `value`, or -1 if absent.
 */
export function sorted_index_of(arr: readonly number[], value: number): number {
  let lo = 0;
  let hi = arr.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const v = arr[mid];
    if (v === value) return mid;
    if (v < value) lo = mid + 1;
    else hi = mid - 1;
  }
  return -1;
}

/**
 * Copy of a strictly ascending array with `value` inserted in order.
 * The caller guarantees `value` is not already present.
 */
export function sorted_with<T extends number>(arr: readonly T[], value: T): T[] {
  const next: T[] = [];
  let inserted = false;
  for (let i = 0; i < arr.length; i++) {
    if (!inserted && value < arr[i]) {
      next.push(value);
      inserted = true;
    }
    next.push(arr[i]);
  }
  if (!inserted) next.push(value);
  return next;
}

/** Copy of `arr` without `value`. */
export function sorted_without<T extends number>(arr: readonly T[], value: T): T[] {
  const next: T[] = [];
  for (let i = 0; i < arr.length; i++) {
    if (arr[i] !== value) next.push(arr[i]);
  }
  return next;
}

/** True when every element is greater than the one before it. */
export function is_strictly_ascending(arr: readonly number[]): boolean {
  for (let i = 1; i < arr.length; i++) {
    if (arr[i - 1] >= arr[i]) return false;
  }
  return true;
}
