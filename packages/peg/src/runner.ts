/**
 * Convenience entry points over `Expression.derive`.
 */

import { ParseError } from "./errors.js";
import type { Expression } from "./expressions.js";
import { unpack } from "./instantiation.js";
import { first } from "./lazy.js";
import type { Derivation, Indexable, Source } from "./types.js";

/** Every derivation, in enumeration order. */
export function derivations(expr: Expression, input: Source, position = 0): Derivation[] {
  return [...expr.derive(input, position)];
}

/** The first derivation, if any. The rest of the search is abandoned. */
export function firstDerivation(
  expr: Expression,
  input: Source,
  position = 0
): Derivation | undefined {
  const r = first(expr.derive(input, position));
  return r.done ? undefined : r.value;
}

/**
 * Unpacked result of the first derivation that consumes the whole input.
 *
 * @throws ParseError when there is none
 */
export function parseAll(expr: Expression, input: Indexable): unknown {
  let furthest: number | undefined;
  for (const [result, position] of expr.derive(input, 0)) {
    if (position === input.length) return unpack(result);
    furthest = Math.max(furthest ?? position, position);
  }
  if (furthest === undefined) throw new ParseError(input, 0, "a match");
  throw new ParseError(input, furthest, "end of input");
}
