/**
 * Parsers for structured data like objects and collections.
 *
 *   self            the whole input value instead of its next element
 *   get(name)       continues with input[name]
 *   at(i)           continues with input[i]
 *   typeOf(t)       continues only if the input is a t
 *   within(p, q)    continues parsing p's output with q
 *
 * Built from the public algebra alone.
 */

import { Expression, derivation, ret, zero } from "./expressions.js";
import type { ParseContext } from "./context.js";
import { unpack } from "./instantiation.js";
import { type Lazy, empty, flatMap, map, once } from "./lazy.js";
import { type Derivation, type Source, isIndexable, isSource } from "./types.js";

class Self extends Expression {
  protected instantiate(input: Source, position: number): Lazy<Derivation> {
    return once(derivation(input, position));
  }
}

/** The input itself, consuming nothing. Use `within(p, self)` when p does not emit a collection. */
export const self: Expression = new Self();

/** Continue with the input's property `name`; fails when it has none. */
export function get(name: string): Expression {
  return self.bind((value) =>
    typeof value === "object" && value !== null && name in value
      ? ret(Reflect.get(value, name))
      : zero
  );
}

/** Continue with `input[index]`; fails when out of range. */
export function at(index: number): Expression {
  return self.bind((value) =>
    isIndexable(value) && index >= 0 && index < value.length ? ret(value[index]) : zero
  );
}

type Primitive = "string" | "number" | "boolean" | "bigint" | "symbol" | "function" | "object";

/** Continue with the input if it is an instance of `type` (or has that `typeof`). */
export function typeOf(type: Primitive | (abstract new (...args: never[]) => unknown)): Expression {
  return self.bind((value) => {
    const matches = typeof type === "string" ? typeof value === type : value instanceof type;
    return matches ? ret(value) : zero;
  });
}

class Within extends Expression {
  constructor(
    readonly outer: Expression,
    readonly inner: Expression
  ) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return flatMap(this.outer.derive(input, position, context), ([result, next]) => {
      const nested = unpack(result);
      if (!isSource(nested)) return empty();
      return map(this.inner.derive(nested, 0, context), ([r]) => derivation(r, next));
    });
  }
}

/**
 * Parse each (unpacked) result of `outer` with `inner`, from position 0.
 * Yields `inner`'s results at the position `outer` stopped at.
 */
export function within(outer: Expression, inner: Expression): Expression {
  return new Within(outer, inner);
}
