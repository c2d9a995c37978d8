/**
 * Error kinds raised by @peglogic/peg.
 *
 * None of these signals a failed match; see `PeglogicError`.
 */

import { PeglogicError } from "@peglogic/core";
import type { Indexable } from "./types.js";

/** A rule was invoked (or a grammar started) under a symbol that has no definition. */
export class UndefinedSymbolError extends PeglogicError {
  readonly symbol: string;
  /** Start symbol of the grammar the lookup happened in. */
  readonly grammar: string;

  constructor(symbol: string, grammar: string) {
    super("UNDEFINED_SYMBOL", `Undefined rule '${symbol}' in grammar '${grammar}'`);
    this.name = "UndefinedSymbolError";
    this.symbol = symbol;
    this.grammar = grammar;
  }
}

/** A factory was about to be called without arguments it declared as required. */
export class FactoryArgumentError extends PeglogicError {
  readonly missing: readonly string[];

  constructor(factory: string, missing: readonly string[]) {
    super(
      "FACTORY_ARGUMENT",
      `Cannot construct ${factory}: unbound required argument(s) ${missing.map((m) => `'${m}'`).join(", ")}`
    );
    this.name = "FactoryArgumentError";
    this.missing = missing;
  }
}

/** Descriptive parse error with position context, raised by `parseAll`. */
export class ParseError extends PeglogicError {
  /** Zero-based position in the input where parsing stopped. */
  readonly position: number;
  /** What the parser expected at that position. */
  readonly expected: string;

  constructor(input: Indexable, position: number, expected: string) {
    super("PARSE_ERROR", describe(input, position, expected));
    this.name = "ParseError";
    this.position = position;
    this.expected = expected;
  }
}

function describe(input: Indexable, position: number, expected: string): string {
  if (typeof input !== "string") {
    return `Parse error at position ${position}: expected ${expected}`;
  }
  const { line, col } = lineCol(input, position);
  const snippet = input.slice(Math.max(0, position - 10), position + 20);
  return `Parse error at line ${line}, col ${col}: expected ${expected}\n  ...${snippet}...`;
}

/** Convert a zero-based offset to 1-based line/col. */
function lineCol(input: string, pos: number): { line: number; col: number } {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}
