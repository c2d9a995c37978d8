/**
 * Pull-based lazy sequences.
 *
 * Every expression and pattern produces a `Lazy<T>`: an iterator whose
 * subclasses say how to produce the next candidate (`pull`) and what to undo
 * when the sequence ends (`release`). `release` runs exactly once, whether the
 * sequence is exhausted, abandoned through `return()` (a `break` out of a
 * `for...of`), or fails with an exception.
 */

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export abstract class Lazy<T> implements IterableIterator<T> {
  private closed = false;

  /** Produce the next candidate, or `done()` when there are none left. */
  protected abstract pull(): IteratorResult<T, undefined>;

  /** Undo whatever this sequence holds. Called once, on every exit path. */
  protected release(): void {}

  next(): IteratorResult<T, undefined> {
    if (this.closed) return DONE;
    let result: IteratorResult<T, undefined>;
    try {
      result = this.pull();
    } catch (error) {
      this.close();
      throw error;
    }
    if (result.done) this.close();
    return result;
  }

  return(): IteratorResult<T, undefined> {
    this.close();
    return DONE;
  }

  [Symbol.iterator](): this {
    return this;
  }

  /** Whether the sequence has ended (exhausted or abandoned). */
  get isClosed(): boolean {
    return this.closed;
  }

  private close(): void {
    if (this.closed) return;
    this.closed = true;
    this.release();
  }
}

export function done(): IteratorReturnResult<undefined> {
  return DONE;
}

export function yielded<T>(value: T): IteratorYieldResult<T> {
  return { done: false, value };
}

// ---------------------------------------------------------------------------
// Basic sequences
// ---------------------------------------------------------------------------

class Nil extends Lazy<never> {
  protected pull(): IteratorResult<never, undefined> {
    return DONE;
  }
}

class Once<T> extends Lazy<T> {
  private taken = false;

  constructor(private readonly value: T) {
    super();
  }

  protected pull(): IteratorResult<T, undefined> {
    if (this.taken) return DONE;
    this.taken = true;
    return yielded(this.value);
  }
}

/** The empty sequence. */
export function empty<T = never>(): Lazy<T> {
  return new Nil();
}

/** A sequence of exactly one value. */
export function once<T>(value: T): Lazy<T> {
  return new Once(value);
}

// ---------------------------------------------------------------------------
// Derived sequences
// ---------------------------------------------------------------------------

class Mapped<A, B> extends Lazy<B> {
  constructor(
    private readonly source: Lazy<A>,
    private readonly f: (a: A) => B
  ) {
    super();
  }

  protected pull(): IteratorResult<B, undefined> {
    const r = this.source.next();
    return r.done ? DONE : yielded(this.f(r.value));
  }

  protected release(): void {
    this.source.return();
  }
}

class FlatMapped<A, B> extends Lazy<B> {
  private inner: Lazy<B> | undefined;

  constructor(
    private readonly source: Lazy<A>,
    private readonly f: (a: A) => Lazy<B>
  ) {
    super();
  }

  protected pull(): IteratorResult<B, undefined> {
    for (;;) {
      if (this.inner) {
        const r = this.inner.next();
        if (!r.done) return r;
        this.inner = undefined;
      }
      const outer = this.source.next();
      if (outer.done) return DONE;
      this.inner = this.f(outer.value);
    }
  }

  // Inner first: its bindings were made on top of the outer ones.
  protected release(): void {
    this.inner?.return();
    this.inner = undefined;
    this.source.return();
  }
}

class Concatenated<T> extends Lazy<T> {
  private current: Lazy<T>;
  private rest: (() => Lazy<T>) | undefined;

  constructor(first: Lazy<T>, rest: () => Lazy<T>) {
    super();
    this.current = first;
    this.rest = rest;
  }

  protected pull(): IteratorResult<T, undefined> {
    for (;;) {
      const r = this.current.next();
      if (!r.done) return r;
      if (!this.rest) return DONE;
      this.current = this.rest();
      this.rest = undefined;
    }
  }

  protected release(): void {
    this.current.return();
  }
}

class Deferred<T> extends Lazy<T> {
  private inner: Lazy<T> | undefined;

  constructor(private readonly start: () => Lazy<T>) {
    super();
  }

  protected pull(): IteratorResult<T, undefined> {
    this.inner ??= this.start();
    return this.inner.next();
  }

  protected release(): void {
    this.inner?.return();
  }
}

export function map<A, B>(source: Lazy<A>, f: (a: A) => B): Lazy<B> {
  return new Mapped(source, f);
}

/** For each value of `source`, every value of `f(value)`, depth first. */
export function flatMap<A, B>(source: Lazy<A>, f: (a: A) => Lazy<B>): Lazy<B> {
  return new FlatMapped(source, f);
}

/**
 * All of `first`, then all of `rest()`. `rest` is not called before `first`
 * is exhausted, so nothing it does can observe state `first` still holds.
 */
export function concat<T>(first: Lazy<T>, rest: () => Lazy<T>): Lazy<T> {
  return new Concatenated(first, rest);
}

/** A sequence whose construction waits for the first pull. */
export function defer<T>(start: () => Lazy<T>): Lazy<T> {
  return new Deferred(start);
}

/**
 * Pull the first value and release the rest of the sequence.
 */
export function first<T>(source: Lazy<T>): IteratorResult<T, undefined> {
  const r = source.next();
  source.return();
  return r;
}
