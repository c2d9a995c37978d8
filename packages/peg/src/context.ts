/**
 * Per-parse mutable state.
 *
 * A `ParseContext` is created for each top-level `derive` call and threaded
 * through every nested one. It owns the two pieces of mutable state the
 * engine has: the binding trail and the grammars' call histories. Nothing
 * here is shared between two top-level parses.
 */

// ============================================================================
// Trail
// ============================================================================

/**
 * Ordered log of undo actions for variable bindings.
 *
 * Whoever binds records an undo entry and keeps the mark it got back;
 * rewinding to that mark applies, newest first, that entry and every entry
 * recorded after it.
 */
export class Trail {
  private readonly undos: Array<() => void> = [];

  get depth(): number {
    return this.undos.length;
  }

  /** Record an undo action, returning the mark that rewinds it. */
  record(undo: () => void): number {
    const mark = this.undos.length;
    this.undos.push(undo);
    return mark;
  }

  rewind(mark: number): void {
    while (this.undos.length > mark) {
      const undo = this.undos.pop();
      undo?.();
    }
  }
}

// ============================================================================
// Call history
// ============================================================================

export interface CallFrame {
  readonly position: number;
  /** Identity of the invoking reference node. */
  readonly caller: object;
  readonly symbol: string;
}

/**
 * Stack of active rule invocations of one grammar, used to detect an
 * invocation re-entering itself without having consumed input.
 */
export class CallHistory {
  private readonly frames: CallFrame[] = [];

  get depth(): number {
    return this.frames.length;
  }

  enter(frame: CallFrame): void {
    this.frames.push(frame);
  }

  leave(frame: CallFrame): void {
    const index = this.frames.lastIndexOf(frame);
    if (index >= 0) this.frames.splice(index, 1);
  }

  /** Drop every frame above `depth`, innermost first. */
  truncate(depth: number): void {
    if (this.frames.length > depth) this.frames.length = depth;
  }

  /** Whether `caller` is already active at `position`, most recent frames first. */
  isReentrant(position: number, caller: object): boolean {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame.caller === caller && frame.position === position) return true;
    }
    return false;
  }
}

// ============================================================================
// Context
// ============================================================================

/**
 * Call histories are kept per grammar and per input: positions of a nested
 * input (see `within`) say nothing about positions of the outer one.
 */
export class ParseContext {
  readonly trail = new Trail();
  private readonly histories = new Map<object, Map<unknown, CallHistory>>();

  /** The call history of `grammar` over `input` within this parse, created on first use. */
  historyFor(grammar: object, input: unknown): CallHistory {
    let byInput = this.histories.get(grammar);
    if (!byInput) {
      byInput = new Map();
      this.histories.set(grammar, byInput);
    }
    let history = byInput.get(input);
    if (!history) {
      history = new CallHistory();
      byInput.set(input, history);
    }
    return history;
  }

  /** Current depth of every call history, for `restoreFrames`. */
  frameDepths(): Map<CallHistory, number> {
    const depths = new Map<CallHistory, number>();
    for (const byInput of this.histories.values()) {
      for (const history of byInput.values()) depths.set(history, history.depth);
    }
    return depths;
  }

  /**
   * Pop the frames pushed since `depths` was taken, without releasing the
   * enumerations that pushed them.
   */
  restoreFrames(depths: ReadonlyMap<CallHistory, number>): void {
    for (const byInput of this.histories.values()) {
      for (const history of byInput.values()) history.truncate(depths.get(history) ?? 0);
    }
  }
}
