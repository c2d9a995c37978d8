import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { config } from "@peglogic/core";
import { UndefinedSymbolError } from "../errors.js";
import { element, endOfInput, item, oneOf, plus, star, when } from "../expressions.js";
import { Grammar } from "../grammar.js";
import { unpack } from "../instantiation.js";
import { self, within } from "../structure.js";
import type { Lazy } from "../lazy.js";
import type { Derivation, Source } from "../types.js";

function results(g: Grammar, input: Source): Array<[unknown, number]> {
  return [...g.derive(input)].map(([r, p]) => [unpack(r), p]);
}

function digits(): Grammar {
  const g = new Grammar("pair");
  g.define("pair", g.ref("digit").then(g.ref("digit")));
  g.define("digit", item("0").or(item("1")));
  return g;
}

/** expr := expr '+' digit | digit */
function leftRecursive(): Grammar {
  const g = new Grammar("expr");
  g.define("expr", g.ref("expr").then(item("+")).then(g.ref("digit")).or(g.ref("digit")));
  g.define("digit", oneOf("0123456789"));
  return g;
}

/** list := 'a' list | 'a' */
function list(): Grammar {
  const g = new Grammar("list");
  g.define("list", item("a").then(g.ref("list")).or(item("a")));
  return g;
}

describe("Grammar", () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    config.reset();
    config.set({ log: { level: "warn" }, grammar: { warnings: true } });
    warn = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
    config.reset();
  });

  describe("rules", () => {
    it("resolves references defined later", () => {
      expect(results(digits(), "10")).toEqual([[["1", "0"], 2]]);
    });

    it("lists its symbols", () => {
      const g = digits();
      expect(g.symbols).toEqual(["pair", "digit"]);
      expect(g.has("digit")).toBe(true);
      expect(g.has("other")).toBe(false);
    });

    it("define returns the grammar", () => {
      const g = new Grammar("s");
      expect(g.define("s", item("x"))).toBe(g);
    });

    it("a redefined rule replaces the old one", () => {
      const g = new Grammar("s").define("s", item("x")).define("s", item("y"));
      expect(results(g, "y")).toEqual([["y", 1]]);
      expect(results(g, "x")).toEqual([]);
    });

    it("is an expression itself", () => {
      const whole = digits().then(endOfInput);
      expect([...whole.derive("10")].map(([r, p]) => [unpack(r), p])).toEqual([[["1", "0"], 2]]);
      expect([...whole.derive("100")]).toEqual([]);
    });

    it("parses token arrays", () => {
      const g = new Grammar("sum");
      g.define("sum", g.ref("num").then(item("+")).then(g.ref("num")).or(g.ref("num")));
      g.define("num", when((t) => typeof t === "number"));
      expect(results(g, [1, "+", 2])).toEqual([
        [[1, "+", 2], 3],
        [1, 1],
      ]);
    });
  });

  describe("undefined symbols", () => {
    it("throws when a reference is pulled", () => {
      const g = new Grammar("start");
      g.define("start", item("a").then(g.ref("missing")));
      const ref = g.ref("missing");
      expect(ref.symbol).toBe("missing");
      expect(() => results(g, "a")).toThrow(UndefinedSymbolError);
      expect(() => results(g, "a")).toThrow("Undefined rule 'missing' in grammar 'start'");
    });

    it("is not raised for a branch that is never reached", () => {
      const g = new Grammar("start");
      g.define("start", item("a").then(g.ref("missing")));
      expect(results(g, "b")).toEqual([]);
    });

    it("carries the symbol and code", () => {
      const g = new Grammar("nope");
      try {
        results(g, "x");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(UndefinedSymbolError);
        if (error instanceof UndefinedSymbolError) {
          expect(error.code).toBe("UNDEFINED_SYMBOL");
          expect(error.symbol).toBe("nope");
          expect(error.grammar).toBe("nope");
        }
      }
    });
  });

  describe("recursion", () => {
    it("right recursion yields every length, longest first", () => {
      expect(results(list(), "aaa")).toEqual([
        [["a", "a", "a"], 3],
        [["a", "a"], 2],
        ["a", 1],
      ]);
      expect(warn).not.toHaveBeenCalled();
    });

    it("left recursion is cut at the re-entry", () => {
      expect(results(leftRecursive(), "1+2")).toEqual([
        [["1", "+", "2"], 3],
        ["1", 1],
      ]);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        "[peglogic:grammar] Instantiation of rule 'expr' at position 0 may be infinite. Tracking back."
      );
    });

    it("a rule that only calls itself has no derivations", () => {
      const g = new Grammar("rule");
      g.define("rule", g.ref("rule"));
      expect(results(g, "")).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        "[peglogic:grammar] Instantiation of rule 'rule' at position 0 may be infinite. Tracking back."
      );
    });

    it("warnings can be turned off", () => {
      config.set({ grammar: { warnings: false } });
      expect(results(leftRecursive(), "1")).toEqual([["1", 1]]);
      expect(warn).not.toHaveBeenCalled();
    });

    it("warnings follow the log level", () => {
      config.set({ log: { level: "error" } });
      expect(results(leftRecursive(), "1")).toEqual([["1", 1]]);
      expect(warn).not.toHaveBeenCalled();
    });

    it("the guard is reset between parses", () => {
      const g = leftRecursive();
      expect(results(g, "1")).toEqual([["1", 1]]);
      expect(results(g, "1")).toEqual([["1", 1]]);
      expect(warn).toHaveBeenCalledTimes(2);
    });
  });

  describe("greedy repetition over rules", () => {
    /** start := repeat(digit) 'x' | digit 'y' */
    function retrying(repeat: typeof star): Grammar {
      const g = new Grammar("start");
      const digit = g.ref("digit");
      g.define("start", repeat(digit).then(item("x")).or(digit.then(item("y"))));
      g.define("digit", item("1"));
      return g;
    }

    it("star leaves no rule call behind for a later alternative", () => {
      expect(results(retrying(star), "1y")).toEqual([[["1", "y"], 2]]);
      expect(warn).not.toHaveBeenCalled();
    });

    it("plus leaves no rule call behind for a later alternative", () => {
      expect(results(retrying(plus), "1y")).toEqual([[["1", "y"], 2]]);
      expect(results(retrying(plus), "1x")).toEqual([[["1", "x"], 2]]);
      expect(warn).not.toHaveBeenCalled();
    });

    it("repeats a rule across the input", () => {
      const g = new Grammar("start");
      g.define("start", star(g.ref("pair")).then(endOfInput));
      g.define("pair", item("a").then(item("b")));
      expect(results(g, "abab")).toEqual([[["a", "b", "a", "b"], 4]]);
    });
  });

  describe("nested input", () => {
    /** tree := within(element, tree) | 1 */
    function tree(): Grammar {
      const g = new Grammar("tree");
      g.define("tree", within(element, g.ref("tree")).or(item(1)));
      return g;
    }

    it("descends into nested arrays", () => {
      expect(results(tree(), [[[1]]])).toEqual([[1, 1]]);
      expect(results(tree(), [[[[1]]]])).toEqual([[1, 1]]);
      expect(results(tree(), [[[2]]])).toEqual([]);
      expect(warn).not.toHaveBeenCalled();
    });

    it("still stops a rule that re-enters on the same input", () => {
      const g = new Grammar("loop");
      g.define("loop", within(self, g.ref("loop")).or(item("a")));
      expect(results(g, "a")).toEqual([
        ["a", 0],
        ["a", 1],
      ]);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        "[peglogic:grammar] Instantiation of rule 'loop' at position 0 may be infinite. Tracking back."
      );
    });
  });

  it("interleaved parses of one grammar do not interfere", () => {
    const g = list();
    const streams: Array<Lazy<Derivation>> = [g.derive("aaa"), g.derive("aa")];
    const collected: Array<Array<[unknown, number]>> = [[], []];
    let open = true;
    while (open) {
      open = false;
      streams.forEach((stream, i) => {
        const r = stream.next();
        if (!r.done) {
          collected[i].push([unpack(r.value[0]), r.value[1]]);
          open = true;
        }
      });
    }
    expect(collected).toEqual([
      [
        [["a", "a", "a"], 3],
        [["a", "a"], 2],
        ["a", 1],
      ],
      [
        [["a", "a"], 2],
        ["a", 1],
      ],
    ]);
  });
});
