/**
 * Instantiated results
 *
 * The values a successful match step produces, and the monoid that combines
 * them when expressions are chained. The variants form a closed tagged union:
 *
 *   Empty                  success without payload, identity of combination
 *   End(position)          end-of-input marker
 *   Item(value, position)  one consumed element
 *   Sequence(items)        flat, ordered run of chained results
 *   Labeled(result, label) a named sub-result
 *
 * @module
 */

// ============================================================================
// Variants
// ============================================================================

export interface EmptyResult {
  readonly _tag: "Empty";
}

export interface EndResult {
  readonly _tag: "End";
  readonly position: number;
}

export interface ItemResult {
  readonly _tag: "Item";
  readonly value: unknown;
  readonly position: number;
}

export interface SequenceResult {
  readonly _tag: "Sequence";
  /** Never contains a SequenceResult or an EmptyResult; an EndResult only as the first item. */
  readonly items: readonly unknown[];
  /** Position of the first positioned item, if any. */
  readonly position: number | undefined;
}

export interface LabeledResult {
  readonly _tag: "Labeled";
  readonly result: unknown;
  readonly label: string;
}

export type Instantiation = EmptyResult | EndResult | ItemResult | SequenceResult | LabeledResult;

const TAGS: ReadonlySet<string> = new Set(["Empty", "End", "Item", "Sequence", "Labeled"]);

// ============================================================================
// Constructors
// ============================================================================

export const Empty: EmptyResult = Object.freeze({ _tag: "Empty" });

export function End(position: number): EndResult {
  return { _tag: "End", position };
}

export function Item(value: unknown, position: number): ItemResult {
  return { _tag: "Item", value, position };
}

/**
 * Build a sequence from arbitrary results, flattening nested sequences and
 * dropping Empty and End markers.
 */
export function Sequence(items: readonly unknown[]): SequenceResult {
  const flat = items.flatMap(itemsOf);
  return { _tag: "Sequence", items: flat, position: firstPosition(flat) };
}

export function Labeled(result: unknown, label: string): LabeledResult {
  return { _tag: "Labeled", result, label };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isInstantiation(value: unknown): value is Instantiation {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    typeof value._tag === "string" &&
    TAGS.has(value._tag)
  );
}

export function isEmpty(value: unknown): value is EmptyResult {
  return isInstantiation(value) && value._tag === "Empty";
}

export function isEnd(value: unknown): value is EndResult {
  return isInstantiation(value) && value._tag === "End";
}

export function isItem(value: unknown): value is ItemResult {
  return isInstantiation(value) && value._tag === "Item";
}

export function isSequence(value: unknown): value is SequenceResult {
  return isInstantiation(value) && value._tag === "Sequence";
}

export function isLabeled(value: unknown): value is LabeledResult {
  return isInstantiation(value) && value._tag === "Labeled";
}

// ============================================================================
// Combination
// ============================================================================

function itemsOf(value: unknown): readonly unknown[] {
  if (!isInstantiation(value)) return [value];
  switch (value._tag) {
    case "Empty":
    case "End":
      return [];
    case "Sequence":
      return value.items;
    case "Item":
    case "Labeled":
      return [value];
  }
}

/** Position a result was matched at, when it carries one. */
export function positionOf(value: unknown): number | undefined {
  if (!isInstantiation(value)) return undefined;
  switch (value._tag) {
    case "Empty":
      return undefined;
    case "End":
    case "Item":
    case "Sequence":
      return value.position;
    case "Labeled":
      return positionOf(value.result);
  }
}

function firstPosition(items: readonly unknown[]): number | undefined {
  for (const item of items) {
    const position = positionOf(item);
    if (position !== undefined) return position;
  }
  return undefined;
}

/**
 * The combination monoid used by `Chain`.
 *
 * Empty is the identity. An End marker on the right is dropped; one on the
 * left stays as the first item of the Sequence it starts. Everything else
 * concatenates into one flat Sequence.
 */
export function combine(left: unknown, right: unknown): unknown {
  if (isEmpty(left)) return right;
  if (isEmpty(right)) return left;
  if (isEnd(left)) {
    const rest = isSequence(right) ? right.items : [right];
    const started: SequenceResult = { _tag: "Sequence", items: [left, ...rest], position: left.position };
    return started;
  }
  if (isEnd(right)) return left;
  return Sequence([left, right]);
}

// ============================================================================
// Projection to plain data
// ============================================================================

/** Anything that knows how to expose its plain value (bound variables, constants). */
export interface Unpackable {
  unpack(): unknown;
}

function isUnpackable(value: unknown): value is Unpackable {
  return (
    typeof value === "object" &&
    value !== null &&
    "unpack" in value &&
    typeof value.unpack === "function"
  );
}

/**
 * Recursively project a result down to plain data: Items become their
 * values, Sequences arrays, Labeled results their inner value, markers
 * `undefined`, and unpackable patterns whatever they unpack to.
 */
export function unpack(value: unknown): unknown {
  if (isInstantiation(value)) {
    switch (value._tag) {
      case "Empty":
      case "End":
        return undefined;
      case "Item":
        return unpack(value.value);
      case "Sequence":
        return value.items.map(unpack);
      case "Labeled":
        return unpack(value.result);
    }
  }
  if (isUnpackable(value)) return value.unpack();
  return value;
}

// ============================================================================
// Structural equality
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((x, i) => deepEqual(x, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key]))
    );
  }
  return false;
}

/** Deep equality of the unpacked forms of two values. */
export function structurallyEqual(a: unknown, b: unknown): boolean {
  return deepEqual(unpack(a), unpack(b));
}
