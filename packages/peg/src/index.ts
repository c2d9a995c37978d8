/**
 * @peglogic/peg
 *
 * Backtracking parsing over any indexable sequence, built on a monad of
 * lazily enumerated derivations, with logic variables and constructors to
 * bind and rebuild what was matched.
 *
 * Provides:
 * - The expression algebra (sequencing, alternation, repetition, lookahead)
 * - Unifiable patterns (constants, variables, labels, factories)
 * - Grammars of late-bound, mutually recursive rules
 * - Projection helpers for structured, non-text input
 *
 * @module
 */

// Core types
export { type Source, type Indexable, type Derivation, isIndexable, isSource } from "./types.js";

// Lazy sequences
export { Lazy, empty, once, map, flatMap, concat, defer, first } from "./lazy.js";

// Instantiated results
export {
  Empty,
  End,
  Item,
  Sequence,
  Labeled,
  combine,
  unpack,
  structurallyEqual,
  positionOf,
  isInstantiation,
  isEmpty,
  isEnd,
  isItem,
  isSequence,
  isLabeled,
  type Instantiation,
  type EmptyResult,
  type EndResult,
  type ItemResult,
  type SequenceResult,
  type LabeledResult,
  type Unpackable,
} from "./instantiation.js";

// Patterns
export {
  Any,
  Nothing,
  Constant,
  Variable,
  Label,
  Make,
  constant,
  variable,
  label,
  make,
  either,
  lift,
  unifyWith,
  isUnifiable,
  isPattern,
  type Unifiable,
  type Pattern,
  type MakeOptions,
} from "./unify.js";

// Expressions
export {
  Expression,
  Return,
  Zero,
  Bind,
  Alternative,
  Chain,
  Element,
  ItemMatch,
  EndOfInput,
  OneOf,
  Unify,
  Locate,
  Ahead,
  GreedyRepeat,
  BacktrackingRepeat,
  derivation,
  ret,
  zero,
  element,
  endOfInput,
  item,
  when,
  oneOf,
  bind,
  chain,
  alt,
  ahead,
  locate,
  star,
  plus,
  some,
  many,
} from "./expressions.js";

// Grammars
export { Grammar, Reference } from "./grammar.js";

// Per-parse state
export { ParseContext, Trail, CallHistory, type CallFrame } from "./context.js";

// Structured input
export { self, get, at, typeOf, within } from "./structure.js";

// Running
export { derivations, firstDerivation, parseAll } from "./runner.js";

// Errors
export { UndefinedSymbolError, FactoryArgumentError, ParseError } from "./errors.js";
