/**
 * Core types for @peglogic/peg
 */

/** Anything addressable by position: strings, arrays, typed arrays, array-likes. */
export type Indexable = ArrayLike<unknown>;

/**
 * What expressions derive over. Element-consuming expressions need an
 * Indexable and simply fail on anything else; the structural projection
 * helpers also accept plain objects.
 */
export type Source = Indexable | object;

/** One successful way an expression matched: its result and the next position. */
export type Derivation = readonly [result: unknown, position: number];

export function isIndexable(value: unknown): value is Indexable {
  if (typeof value === "string") return true;
  return (
    typeof value === "object" &&
    value !== null &&
    "length" in value &&
    typeof value.length === "number"
  );
}

export function isSource(value: unknown): value is Source {
  return typeof value === "string" || (typeof value === "object" && value !== null);
}
