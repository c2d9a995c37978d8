/**
 * Expression algebra
 *
 * Expressions are immutable nodes. Deriving one against an indexable source
 * at a position lazily enumerates every `(result, nextPosition)` pair it can
 * match there, depth first and in a fixed order.
 *
 * Expressions form a monad with
 *
 *   ret(x)                 consumes nothing and yields x
 *   bind(p, f)             for each result r of p, every derivation of f(r)
 *                          from where p stopped
 *
 *     bind(p, ret)                 == p
 *     bind(ret(a), f)              == f(a)
 *     bind(bind(p, f), g)          == bind(p, a => bind(f(a), g))
 *
 * and with addition
 *
 *   p.or(q)                all of p's derivations, then all of q's
 *   zero                   no derivations
 *
 *     p.or(zero) == p == zero.or(p)
 *     p.or(q).or(r)  == p.or(q.or(r))
 *     bind(p.or(q), f) == bind(p, f).or(bind(q, f))
 *
 * `p.then(q)` chains two expressions and combines their results into one
 * flat Sequence. `p.unify(pattern)` pipes results through a pattern.
 *
 * @module
 */

import { ParseContext } from "./context.js";
import { Empty, End, Item, combine, unpack } from "./instantiation.js";
import { Lazy, concat, defer, done, empty, first, flatMap, map, once, yielded } from "./lazy.js";
import { type Derivation, type Source, isIndexable } from "./types.js";
import { type Pattern, lift, unifyWith } from "./unify.js";

export function derivation(result: unknown, position: number): Derivation {
  return [result, position];
}

// ============================================================================
// Base class
// ============================================================================

export abstract class Expression {
  /**
   * Enumerate this expression's derivations. Called through `derive`, which
   * supplies the context of the surrounding parse.
   */
  protected abstract instantiate(
    input: Source,
    position: number,
    context: ParseContext
  ): Lazy<Derivation>;

  /**
   * Lazily enumerate every derivation of this expression against `input`
   * at `position`.
   *
   * Without a context this is a top-level parse: a fresh context is created
   * and closing the returned sequence (exhausting it or breaking out of a
   * loop over it) releases every binding the parse made.
   */
  derive(input: Source, position = 0, context?: ParseContext): Lazy<Derivation> {
    if (context) return this.instantiate(input, position, context);
    const root = new ParseContext();
    return new TopLevel(
      defer(() => this.instantiate(input, position, root)),
      root
    );
  }

  /** Chain: this, then `next`, results combined. */
  then(next: Expression): Expression {
    return new Chain(this, next);
  }

  /** Alternative: this expression's derivations, then `other`'s. */
  or(other: Expression): Expression {
    return new Alternative(this, other);
  }

  /** Pipe each result through `pattern`; plain values are matched as constants. */
  unify(pattern: unknown): Expression {
    return new Unify(this, lift(pattern));
  }

  /** Unify `pattern` against the position this expression started matching at. */
  locate(pattern: unknown): Expression {
    return new Locate(this, lift(pattern));
  }

  /** Monadic bind. */
  bind(f: (result: unknown) => Expression): Expression {
    return new Bind(this, f);
  }
}

class TopLevel extends Lazy<Derivation> {
  constructor(
    private readonly inner: Lazy<Derivation>,
    private readonly context: ParseContext
  ) {
    super();
  }

  protected pull(): IteratorResult<Derivation, undefined> {
    return this.inner.next();
  }

  protected release(): void {
    this.inner.return();
    this.context.trail.rewind(0);
  }
}

// ============================================================================
// Monad
// ============================================================================

export class Return extends Expression {
  constructor(readonly value: unknown) {
    super();
  }

  protected instantiate(_input: Source, position: number): Lazy<Derivation> {
    return once(derivation(this.value, position));
  }
}

export class Zero extends Expression {
  protected instantiate(): Lazy<Derivation> {
    return empty();
  }
}

export class Bind extends Expression {
  constructor(
    readonly expr: Expression,
    readonly each: (result: unknown) => Expression
  ) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return flatMap(this.expr.derive(input, position, context), ([result, next]) =>
      this.each(result).derive(input, next, context)
    );
  }
}

export class Alternative extends Expression {
  constructor(
    readonly one: Expression,
    readonly other: Expression
  ) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return concat(this.one.derive(input, position, context), () =>
      this.other.derive(input, position, context)
    );
  }
}

export class Chain extends Expression {
  constructor(
    readonly left: Expression,
    readonly right: Expression
  ) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return flatMap(this.left.derive(input, position, context), ([r1, p1]) =>
      map(this.right.derive(input, p1, context), ([r2, p2]) => derivation(combine(r1, r2), p2))
    );
  }
}

// ============================================================================
// Consuming input
// ============================================================================

export class Element extends Expression {
  protected instantiate(input: Source, position: number): Lazy<Derivation> {
    if (!isIndexable(input) || position >= input.length) return empty();
    return once(derivation(Item(input[position], position), position + 1));
  }
}

/** Consumes one element that unifies with `pattern`, once per unification. */
export class ItemMatch extends Expression {
  constructor(readonly pattern: Pattern) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    if (!isIndexable(input) || position >= input.length) return empty();
    return map(unifyWith(this.pattern, input[position], context.trail), (unified) =>
      derivation(Item(unified, position), position + 1)
    );
  }
}

export class EndOfInput extends Expression {
  protected instantiate(input: Source, position: number): Lazy<Derivation> {
    if (!isIndexable(input) || position !== input.length) return empty();
    return once(derivation(End(position), position));
  }
}

/**
 * Consumes one element contained in a set of choices. Sets compose with set
 * arithmetic into new sets.
 */
export class OneOf extends Expression {
  readonly choices: ReadonlySet<unknown>;

  constructor(choices: Iterable<unknown>) {
    super();
    this.choices = new Set(choices);
  }

  protected instantiate(input: Source, position: number): Lazy<Derivation> {
    if (!isIndexable(input) || position >= input.length) return empty();
    if (!this.choices.has(input[position])) return empty();
    return once(derivation(Item(input[position], position), position + 1));
  }

  or(other: Expression): Expression {
    return other instanceof OneOf ? this.union(other) : super.or(other);
  }

  union(other: OneOf): OneOf {
    return new OneOf([...this.choices, ...other.choices]);
  }

  intersect(other: OneOf): OneOf {
    return new OneOf([...this.choices].filter((c) => other.choices.has(c)));
  }

  difference(other: OneOf): OneOf {
    return new OneOf([...this.choices].filter((c) => !other.choices.has(c)));
  }

  symmetricDifference(other: OneOf): OneOf {
    return this.difference(other).union(other.difference(this));
  }
}

// ============================================================================
// Unification
// ============================================================================

export class Unify extends Expression {
  constructor(
    readonly expr: Expression,
    readonly pattern: Pattern
  ) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return flatMap(this.expr.derive(input, position, context), ([result, next]) =>
      map(unifyWith(this.pattern, result, context.trail), (unified) => derivation(unified, next))
    );
  }
}

export class Locate extends Expression {
  constructor(
    readonly expr: Expression,
    readonly pattern: Pattern
  ) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return flatMap(this.expr.derive(input, position, context), (found) =>
      map(unifyWith(this.pattern, position, context.trail), () => found)
    );
  }
}

// ============================================================================
// Lookahead
// ============================================================================

/** Zero-width: succeeds with Empty iff `expr` has a derivation here. */
export class Ahead extends Expression {
  constructor(readonly expr: Expression) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return defer(() =>
      first(this.expr.derive(input, position, context)).done
        ? empty()
        : once(derivation(Empty, position))
    );
  }
}

// ============================================================================
// Repetition
// ============================================================================

/**
 * Greedy repetition. Takes only the first derivation of `expr` at each step
 * and yields a single result, the combination of all steps.
 *
 * Variables bound inside an iteration are NOT unbound afterwards: each
 * step's enumeration is left open once its first derivation is taken. Call
 * `Variable.unbind()` when a captured variable must be reused. Rule calls
 * made by a step are taken off the grammar's call history all the same.
 */
export class GreedyRepeat extends Expression {
  constructor(
    readonly expr: Expression,
    readonly requireOne: boolean
  ) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return new GreedyRun(this, input, position, context);
  }
}

class GreedyRun extends Lazy<Derivation> {
  private ran = false;

  constructor(
    private readonly repeat: GreedyRepeat,
    private readonly input: Source,
    private readonly position: number,
    private readonly context: ParseContext
  ) {
    super();
  }

  protected pull(): IteratorResult<Derivation, undefined> {
    if (this.ran) return done();
    this.ran = true;

    let result: unknown = Empty;
    let position = this.position;
    let count = 0;
    const depths = this.context.frameDepths();
    for (;;) {
      const step = this.repeat.expr.derive(this.input, position, this.context);
      const r = step.next();
      if (r.done) break;
      const [value, next] = r.value;
      if (next === position) {
        // zero-width step: drop it and stop
        step.return();
        break;
      }
      // the step stays open for its bindings, but its rule calls are over
      this.context.restoreFrames(depths);
      result = combine(result, value);
      position = next;
      count++;
    }

    if (this.repeat.requireOne && count === 0) return done();
    return yielded(derivation(result, position));
  }
}

/**
 * Backtracking repetition, one or more times. For each derivation of `expr`
 * every continuation is tried (longest first) and finally the derivation
 * alone, so every prefix length is a candidate.
 *
 * Nesting depth grows with the number of repetitions matched.
 */
export class BacktrackingRepeat extends Expression {
  constructor(readonly expr: Expression) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return flatMap(this.expr.derive(input, position, context), ([r1, p1]) => {
      if (p1 === position) return once(derivation(r1, p1));
      return concat(
        map(this.derive(input, p1, context), ([r2, p2]) => derivation(combine(r1, r2), p2)),
        () => once(derivation(r1, p1))
      );
    });
  }
}

// ============================================================================
// Constructors
// ============================================================================

/** Consume nothing, yield `value`. */
export function ret(value: unknown): Expression {
  return new Return(value);
}

/** No derivations. */
export const zero: Expression = new Zero();

/** Consume the next element, whatever it is. */
export const element: Expression = new Element();

/** Match the end of the input. */
export const endOfInput: Expression = new EndOfInput();

/** Consume one element unifying with `pattern` (a plain value matches by equality). */
export function item(pattern: unknown): Expression {
  return new ItemMatch(lift(pattern));
}

/** Consume one element whose value satisfies `predicate`. */
export function when(predicate: (value: unknown) => boolean): Expression {
  return element.bind((r) => (predicate(unpack(r)) ? ret(r) : zero));
}

/** Consume one element contained in `choices`. */
export function oneOf(choices: Iterable<unknown>): OneOf {
  return new OneOf(choices);
}

export function bind(expr: Expression, f: (result: unknown) => Expression): Expression {
  return new Bind(expr, f);
}

/** Chain any number of expressions left to right; no expressions is `ret(Empty)`. */
export function chain(...exprs: Expression[]): Expression {
  if (exprs.length === 0) return ret(Empty);
  return exprs.reduce((acc, e) => acc.then(e));
}

/** Alternation of any number of expressions; no expressions is `zero`. */
export function alt(...exprs: Expression[]): Expression {
  if (exprs.length === 0) return zero;
  return exprs.reduce((acc, e) => acc.or(e));
}

export function ahead(expr: Expression): Expression {
  return new Ahead(expr);
}

export function locate(expr: Expression, pattern: unknown): Expression {
  return expr.locate(pattern);
}

/** Greedy star. Not guaranteed to unbind variables! */
export function star(expr: Expression): Expression {
  return new GreedyRepeat(expr, false);
}

/** Greedy plus. Not guaranteed to unbind variables! */
export function plus(expr: Expression): Expression {
  return new GreedyRepeat(expr, true);
}

/** Backtracking plus. */
export function some(expr: Expression): Expression {
  return new BacktrackingRepeat(expr);
}

/** Backtracking star. */
export function many(expr: Expression): Expression {
  return some(expr).or(ret(Empty));
}
