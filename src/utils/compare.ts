export type Comparator<K> = (a: K, b: K) => number;

function sign(lower: boolean, higher: boolean): number {
  if (lower) {
    return -1;
  }
  return higher ? 1 : 0;
}

/**
 * Orders numbers, bigints and strings by their natural `<`. NaN has no place
 * in that order and is rejected. Any other key type needs a comparator passed
 * through the tree options.
 */
export function defaultCompare<K>(a: K, b: K): number {
  if (typeof a === "number" && typeof b === "number") {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      throw new TypeError("NaN cannot be ordered as a key");
    }
    return sign(a < b, a > b);
  }
  if (typeof a === "bigint" && typeof b === "bigint") {
    return sign(a < b, a > b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return sign(a < b, a > b);
  }
  throw new TypeError(
    `Keys of type ${typeof a} and ${typeof b} need an explicit comparator`,
  );
}

export function reverseCompare<K>(compare: Comparator<K>): Comparator<K> {
  return (a, b) => compare(b, a);
}

export function formatKey(key: unknown): string {
  if (typeof key === "bigint") {
    return `${key}n`;
  }
  if (typeof key === "string") {
    return JSON.stringify(key);
  }
  return String(key);
}
