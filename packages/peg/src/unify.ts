/**
 * Unifiable patterns
 *
 * A pattern consumes a derivation's result and yields zero or more
 * (possibly transformed) values. Zero values reject the derivation; more
 * than one make the pattern itself non-deterministic.
 *
 *   Any                   yields the value unchanged
 *   Nothing               yields nothing
 *   Constant(v)           yields v when the value is structurally equal to it
 *   Variable              binds on first use, then only matches what it holds
 *   Label(name)           wraps the value into a Labeled result
 *   Make(factory, args)   constructs an application object
 *   either(p, q)          every unification of p, then every one of q
 *
 * Instantiated results are patterns too: they unify with structurally equal
 * results, so a Variable bound to a Sequence validates a later Sequence.
 *
 * @module
 */

import type { Trail } from "./context.js";
import { FactoryArgumentError } from "./errors.js";
import {
  type Instantiation,
  type Unpackable,
  Labeled,
  isEmpty,
  isEnd,
  isInstantiation,
  isLabeled,
  isSequence,
  structurallyEqual,
  unpack,
} from "./instantiation.js";
import { Lazy, concat, empty, first, map, once, yielded, done } from "./lazy.js";

// ============================================================================
// Pattern protocol
// ============================================================================

export interface Unifiable {
  /**
   * Unify `value` against this pattern. Bindings are recorded on `trail`
   * and must be undone by the time the returned sequence is released.
   */
  unify(value: unknown, trail: Trail): Lazy<unknown>;
}

export type Pattern = Unifiable | Instantiation;

export function isUnifiable(value: unknown): value is Unifiable {
  return (
    typeof value === "object" &&
    value !== null &&
    "unify" in value &&
    typeof value.unify === "function"
  );
}

export function isPattern(value: unknown): value is Pattern {
  return isUnifiable(value) || isInstantiation(value);
}

/** Patterns stay as they are; any other value becomes a Constant. */
export function lift(value: unknown): Pattern {
  return isPattern(value) ? value : new Constant(value);
}

export function unifyWith(pattern: Pattern, value: unknown, trail: Trail): Lazy<unknown> {
  if (isUnifiable(pattern)) return pattern.unify(value, trail);
  return unifyInstantiation(pattern, value, trail);
}

/** Whether `pattern` has at least one unification with `value`. Leaves nothing bound. */
function matches(pattern: Pattern, value: unknown, trail: Trail): boolean {
  return !first(unifyWith(pattern, value, trail)).done;
}

function unifyInstantiation(pattern: Instantiation, value: unknown, trail: Trail): Lazy<unknown> {
  switch (pattern._tag) {
    case "Empty":
      return isEmpty(value) ? once(value) : empty();
    case "End":
      return isEnd(value) ? once(value) : empty();
    case "Item":
      return structurallyEqual(pattern.value, value) ? once(value) : empty();
    case "Sequence": {
      if (!isSequence(value) || value.items.length !== pattern.items.length) return empty();
      const items = value.items;
      const ok = pattern.items.every((p, i) => matches(lift(p), items[i], trail));
      return ok ? once(value) : empty();
    }
    case "Labeled": {
      if (isLabeled(value) && value.label !== pattern.label) return empty();
      const inner = isLabeled(value) ? value.result : value;
      return map(unifyWith(lift(pattern.result), inner, trail), () => value);
    }
  }
}

// ============================================================================
// Any / Nothing
// ============================================================================

class AnyPattern implements Unifiable {
  unify(value: unknown): Lazy<unknown> {
    return once(value);
  }

  toString(): string {
    return "Any";
  }
}

class NothingPattern implements Unifiable {
  unify(): Lazy<unknown> {
    return empty();
  }

  toString(): string {
    return "Nothing";
  }
}

/** Accept any result. */
export const Any: Unifiable = new AnyPattern();

/** Reject any result. */
export const Nothing: Unifiable = new NothingPattern();

// ============================================================================
// Constant
// ============================================================================

export class Constant implements Unifiable, Unpackable {
  constructor(readonly value: unknown) {}

  unify(value: unknown): Lazy<unknown> {
    return structurallyEqual(this.value, value) ? once(this.value) : empty();
  }

  unpack(): unknown {
    return unpack(this.value);
  }

  toString(): string {
    return `Constant(${JSON.stringify(this.value)})`;
  }
}

export function constant(value: unknown): Constant {
  return new Constant(value);
}

// ============================================================================
// Variable
// ============================================================================

type Cell = { readonly bound: false } | { readonly bound: true; readonly value: unknown };

const UNBOUND: Cell = Object.freeze({ bound: false });

/**
 * Logic variable. Unbound at creation; bound for exactly as long as the
 * enumeration that bound it stays open; unbound again when that enumeration
 * is exhausted or abandoned.
 *
 * @example
 * ```typescript
 * const v = variable("digit");
 * for (const [result] of item("1").unify(v).derive("1")) {
 *   v.unpack(); // "1"
 * }
 * v.bound; // false
 * ```
 */
export class Variable implements Unifiable, Unpackable {
  private cell: Cell = UNBOUND;

  constructor(readonly name?: string) {}

  get bound(): boolean {
    return this.cell.bound;
  }

  /** The bound value, or `undefined` while unbound. */
  get value(): unknown {
    return this.cell.bound ? this.cell.value : undefined;
  }

  unify(value: unknown, trail: Trail): Lazy<unknown> {
    if (this.cell.bound) return unifyBound(this.cell.value, value, trail);
    return new Binding(this, value, trail);
  }

  /**
   * Bind to `value`, recording on `trail` how to restore the current state.
   * Returns the trail mark to rewind to.
   */
  bindTo(value: unknown, trail: Trail): number {
    const prior = this.cell;
    this.cell = { bound: true, value };
    return trail.record(() => {
      this.cell = prior;
    });
  }

  /**
   * Forget the binding. Only needed after greedy repetition, which may leave
   * variables captured inside it bound.
   */
  unbind(): void {
    this.cell = UNBOUND;
  }

  unpack(): unknown {
    return unpack(this.value);
  }

  toString(): string {
    const name = this.name ?? "_";
    return this.cell.bound ? `<Variable ${name} bound to ${String(unpack(this.cell.value))}>` : `<Unbound variable ${name}>`;
  }
}

/** Yields the value once, bound; rewinds the binding when released. */
class Binding extends Lazy<unknown> {
  private mark: number | undefined;

  constructor(
    private readonly variable: Variable,
    private readonly candidate: unknown,
    private readonly trail: Trail
  ) {
    super();
  }

  protected pull(): IteratorResult<unknown, undefined> {
    if (this.mark !== undefined) return done();
    this.mark = this.variable.bindTo(this.candidate, this.trail);
    return yielded(this.candidate);
  }

  protected release(): void {
    if (this.mark !== undefined) this.trail.rewind(this.mark);
  }
}

function unifyBound(bound: unknown, value: unknown, trail: Trail): Lazy<unknown> {
  if (isPattern(bound)) return unifyWith(bound, value, trail);
  if (isPattern(value)) return unifyWith(value, bound, trail);
  return structurallyEqual(bound, value) ? once(value) : empty();
}

export function variable(name?: string): Variable {
  return new Variable(name);
}

// ============================================================================
// Label
// ============================================================================

/**
 * Labels the current result.
 *
 * @example
 * ```typescript
 * item("x").unify(label("x"))
 * ```
 */
export class Label implements Unifiable {
  constructor(readonly label: string) {}

  unify(value: unknown): Lazy<unknown> {
    return once(Labeled(value, this.label));
  }
}

export function label(name: string): Label {
  return new Label(name);
}

// ============================================================================
// Make
// ============================================================================

export interface MakeOptions<K extends string> {
  /** Names that must be bound; construction fails with FactoryArgumentError otherwise. */
  readonly required?: readonly K[];
}

/**
 * Calls a factory for each result it unifies with.
 *
 * Without bindings the factory receives the incoming result itself. With
 * bindings it receives one object holding the unpacked value of every bound
 * variable under its name; unbound names are left out.
 *
 * @example
 * ```typescript
 * const l = variable();
 * const r = variable();
 * chain(digit.unify(l), item("+"), digit.unify(r))
 *   .unify(make(({ left, right }) => new Add(left, right), { left: l, right: r }));
 * ```
 */
export class Make<R> implements Unifiable {
  constructor(private readonly construct: (value: unknown) => R) {}

  unify(value: unknown): Lazy<unknown> {
    return once(this.construct(value));
  }
}

export function make<R>(factory: (value: unknown) => R): Make<R>;
export function make<K extends string, R>(
  factory: (args: Partial<Record<K, unknown>>) => R,
  bindings: Readonly<Record<K, Variable>>,
  options?: MakeOptions<K>
): Make<R>;
export function make<R>(
  ...args:
    | [factory: (value: unknown) => R]
    | [
        factory: (args: Partial<Record<string, unknown>>) => R,
        bindings: Readonly<Record<string, Variable>>,
        options?: MakeOptions<string>,
      ]
): Make<R> {
  if (args.length === 1) {
    const factory = args[0];
    return new Make((value) => factory(value));
  }
  const [factory, bindings, options] = args;
  const required = options?.required ?? [];
  return new Make(() => {
    const named: Record<string, unknown> = {};
    for (const [name, v] of Object.entries(bindings)) {
      if (v.bound) named[name] = v.unpack();
    }
    const missing = required.filter((name) => !(name in named));
    if (missing.length > 0) {
      throw new FactoryArgumentError(factory.name || "factory", missing);
    }
    return factory(named);
  });
}

// ============================================================================
// Disjunction
// ============================================================================

class Either implements Unifiable {
  constructor(
    private readonly one: Pattern,
    private readonly another: Pattern
  ) {}

  unify(value: unknown, trail: Trail): Lazy<unknown> {
    return concat(unifyWith(this.one, value, trail), () => unifyWith(this.another, value, trail));
  }
}

/** Every unification of `one`, then every unification of `another`. */
export function either(one: unknown, another: unknown): Unifiable {
  return new Either(lift(one), lift(another));
}
