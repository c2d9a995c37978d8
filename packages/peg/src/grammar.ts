/**
 * Grammars of named, mutually recursive rules.
 *
 * Rules are looked up when a reference is first pulled, not when it is
 * created, so rules may refer to symbols defined later:
 *
 * ```ts
 * const g = new Grammar("pair");
 * g.define("pair", g.ref("digit").then(g.ref("digit")));
 * g.define("digit", item("0").or(item("1")));
 * ```
 *
 * A reference that re-enters itself at the same position without having
 * consumed input is aborted (it yields nothing) instead of looping.
 */

import { config, createLogger } from "@peglogic/core";
import type { CallFrame, CallHistory, ParseContext } from "./context.js";
import { UndefinedSymbolError } from "./errors.js";
import { Expression } from "./expressions.js";
import { Lazy, done } from "./lazy.js";
import type { Derivation, Source } from "./types.js";

const log = createLogger("peglogic:grammar");

export class Grammar extends Expression {
  private readonly rules = new Map<string, Expression>();

  /** @param start - name of the starting symbol */
  constructor(readonly start: string) {
    super();
  }

  /** Register or replace the rule for `symbol`. Setup time only. */
  define(symbol: string, expression: Expression): this {
    this.rules.set(symbol, expression);
    return this;
  }

  /** A late-bound reference to the rule `symbol`, which need not exist yet. */
  ref(symbol: string): Reference {
    return new Reference(this, symbol);
  }

  has(symbol: string): boolean {
    return this.rules.has(symbol);
  }

  get symbols(): readonly string[] {
    return [...this.rules.keys()];
  }

  /** @throws UndefinedSymbolError when `symbol` has no rule */
  lookup(symbol: string): Expression {
    const rule = this.rules.get(symbol);
    if (!rule) throw new UndefinedSymbolError(symbol, this.start);
    return rule;
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return this.lookup(this.start).derive(input, position, context);
  }
}

export class Reference extends Expression {
  constructor(
    readonly grammar: Grammar,
    readonly symbol: string
  ) {
    super();
  }

  protected instantiate(input: Source, position: number, context: ParseContext): Lazy<Derivation> {
    return new RuleInvocation(this, input, position, context);
  }
}

/**
 * One invocation of a rule body. The call frame is pushed on the first pull
 * and popped when the body's enumeration ends, however it ends.
 */
class RuleInvocation extends Lazy<Derivation> {
  private body: Lazy<Derivation> | undefined;
  private frame: CallFrame | undefined;
  private readonly history: CallHistory;

  constructor(
    private readonly reference: Reference,
    private readonly input: Source,
    private readonly position: number,
    private readonly context: ParseContext
  ) {
    super();
    this.history = context.historyFor(reference.grammar, input);
  }

  protected pull(): IteratorResult<Derivation, undefined> {
    if (!this.body) {
      const { reference, position } = this;
      if (this.history.isReentrant(position, reference)) {
        if (config.grammarWarnings()) {
          log.warn(
            `Instantiation of rule '${reference.symbol}' at position ${position} may be infinite. Tracking back.`
          );
        }
        return done();
      }
      const rule = reference.grammar.lookup(reference.symbol);
      this.frame = { position, caller: reference, symbol: reference.symbol };
      this.history.enter(this.frame);
      this.body = rule.derive(this.input, position, this.context);
    }
    return this.body.next();
  }

  protected release(): void {
    this.body?.return();
    if (this.frame) this.history.leave(this.frame);
  }
}
