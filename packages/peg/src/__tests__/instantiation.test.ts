import { describe, it, expect } from "vitest";
import {
  Empty,
  End,
  Item,
  Labeled,
  Sequence,
  combine,
  isInstantiation,
  isSequence,
  positionOf,
  structurallyEqual,
  unpack,
} from "../instantiation.js";

// ---------------------------------------------------------------------------
// Combination monoid
// ---------------------------------------------------------------------------

describe("combine", () => {
  const a = Item("a", 0);
  const b = Item("b", 1);
  const c = Item("c", 2);

  it("treats Empty as identity on both sides", () => {
    expect(combine(Empty, a)).toBe(a);
    expect(combine(a, Empty)).toBe(a);
    expect(combine(Empty, Empty)).toBe(Empty);
  });

  it("drops an End marker on the right", () => {
    expect(combine(a, End(1))).toBe(a);
    const ab = combine(a, b);
    expect(combine(ab, End(2))).toBe(ab);
  });

  it("keeps an End marker on the left as the first item", () => {
    expect(combine(End(0), a)).toEqual({ _tag: "Sequence", items: [End(0), a], position: 0 });
    expect(combine(End(0), combine(a, b))).toEqual({
      _tag: "Sequence",
      items: [End(0), a, b],
      position: 0,
    });
    expect(combine(End(3), End(3))).toEqual({ _tag: "Sequence", items: [End(3), End(3)], position: 3 });
    expect(unpack(combine(End(0), a))).toEqual([undefined, "a"]);
  });

  it("keeps a leading End when the sequence grows", () => {
    const started = combine(End(0), a);
    expect(combine(started, b)).toEqual({ _tag: "Sequence", items: [End(0), a, b], position: 0 });
    expect(combine(c, started)).toEqual({ _tag: "Sequence", items: [c, End(0), a], position: 2 });
  });

  it("turns two items into a sequence", () => {
    expect(combine(a, b)).toEqual({ _tag: "Sequence", items: [a, b], position: 0 });
  });

  it("never nests sequences", () => {
    const left = combine(combine(a, b), c);
    const right = combine(a, combine(b, c));
    expect(left).toEqual({ _tag: "Sequence", items: [a, b, c], position: 0 });
    expect(right).toEqual(left);
    expect(combine(Sequence([a]), Sequence([b, c]))).toEqual(left);
  });

  it("keeps labeled results as single items", () => {
    const l = Labeled(b, "n");
    expect(combine(a, l)).toEqual({ _tag: "Sequence", items: [a, l], position: 0 });
  });

  it("combines plain values too", () => {
    expect(combine("x", a)).toEqual({ _tag: "Sequence", items: ["x", a], position: 0 });
  });
});

describe("Sequence", () => {
  it("takes the position of its first positioned item", () => {
    expect(Sequence(["x", Item("a", 3)]).position).toBe(3);
    expect(Sequence(["x", "y"]).position).toBeUndefined();
  });

  it("drops markers and flattens", () => {
    const s = Sequence([Empty, Sequence([Item("a", 0)]), End(1), Item("b", 1)]);
    expect(s.items).toEqual([Item("a", 0), Item("b", 1)]);
  });
});

// ---------------------------------------------------------------------------
// Projection and equality
// ---------------------------------------------------------------------------

describe("unpack", () => {
  it("projects items, sequences and labels to plain data", () => {
    const r = Labeled(Sequence([Item("a", 0), Labeled(Item("b", 1), "n")]), "outer");
    expect(unpack(r)).toEqual(["a", "b"]);
  });

  it("maps markers to undefined", () => {
    expect(unpack(Empty)).toBeUndefined();
    expect(unpack(End(4))).toBeUndefined();
  });

  it("uses a value's own unpack method", () => {
    expect(unpack({ unpack: () => 42 })).toBe(42);
  });

  it("leaves plain values alone", () => {
    const obj = { x: 1 };
    expect(unpack(obj)).toBe(obj);
  });
});

describe("structurallyEqual", () => {
  it("compares unpacked forms", () => {
    expect(structurallyEqual(Item("a", 0), "a")).toBe(true);
    expect(structurallyEqual(Item("a", 0), Item("a", 9))).toBe(true);
    expect(structurallyEqual(Item("a", 0), Item("b", 0))).toBe(false);
  });

  it("compares arrays and plain objects deeply", () => {
    expect(structurallyEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
    expect(structurallyEqual([1], [1, 2])).toBe(false);
    expect(structurallyEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
  });

  it("treats NaN as equal to itself", () => {
    expect(structurallyEqual(NaN, NaN)).toBe(true);
  });
});

describe("guards", () => {
  it("recognises only the known tags", () => {
    expect(isInstantiation(Item("a", 0))).toBe(true);
    expect(isInstantiation({ _tag: "Other" })).toBe(false);
    expect(isInstantiation("Item")).toBe(false);
    expect(isSequence(Sequence([]))).toBe(true);
  });

  it("reports positions", () => {
    expect(positionOf(Item("a", 5))).toBe(5);
    expect(positionOf(Labeled(Item("a", 2), "x"))).toBe(2);
    expect(positionOf(Empty)).toBeUndefined();
    expect(positionOf("plain")).toBeUndefined();
  });
});
