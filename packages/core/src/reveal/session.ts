/**
 * RevealSession - simulated token-by-token playback of a finished message
 *
 * An explicit state machine over five states:
 *
 * ```
 *   idle ──start──▶ running ──(last token)──▶ completed
 *                    │  ▲
 *              pause │  │ resume
 *                    ▼  │
 *                   paused
 *
 *   idle | running | paused ──cancel──▶ canceled
 * ```
 *
 * At most one timer is pending at any time. Starting reveals the first token
 * at once; every later token waits for the delay computed for it.
 *
 * @example
 * ```typescript
 * const session = RevealSession.fromText(message.content, {
 *   onUpdate: (text) => view.setText(text),
 *   onComplete: () => tracker.markAnimated(message.id),
 * });
 * session.start();
 * // on teardown
 * session.dispose();
 * ```
 */

import { ensureError, type RevealStatus, type RevealToken } from "unfurl-shared";
import { Logger, type KernelLogger } from "unfurl-kernel";
import { systemClock, type Clock } from "./clock";
import { defaultDelayStrategy, type DelayStrategy } from "./delay";
import { joinTokens, tokenize } from "./tokenizer";

// ============================================================================
// Types
// ============================================================================

export const CURSOR_GLYPH = "●";

export interface RevealSnapshot {
  status: RevealStatus;
  /** Index of the next token to reveal */
  cursor: number;
  total: number;
  /** Text to show, including the cursor glyph while playing */
  text: string;
  /** Revealed prefix without any glyph */
  revealed: string;
}

export interface RevealCallbacks {
  /** Displayed text changed */
  onUpdate?: (text: string, snapshot: RevealSnapshot) => void;
  onStatusChange?: (status: RevealStatus, previous: RevealStatus) => void;
  /** Fires once, when the last token has been revealed */
  onComplete?: () => void;
  /** A callback threw and the session was canceled because of it */
  onError?: (error: Error) => void;
}

export interface RevealOptions extends RevealCallbacks {
  /** Multiplier applied to every delay (default 1) */
  speed?: number;
  delay?: DelayStrategy;
  clock?: Clock;
  /** Glyph appended while playing (default ●) */
  cursorGlyph?: string;
  logger?: KernelLogger;
}

// ============================================================================
// Implementation
// ============================================================================

export class RevealSession {
  private readonly tokens: readonly RevealToken[];
  private readonly content: string;
  private readonly speed: number;
  private readonly delay: DelayStrategy;
  private readonly clock: Clock;
  private readonly glyph: string;
  private readonly log: KernelLogger;
  private callbacks: RevealCallbacks;

  private _status: RevealStatus = "idle";
  private _cursor = 0;
  private cancelTimer: (() => void) | null = null;

  constructor(tokens: readonly RevealToken[], options: RevealOptions = {}) {
    this.tokens = tokens;
    this.content = joinTokens(tokens);
    this.speed = options.speed ?? 1;
    this.delay = options.delay ?? defaultDelayStrategy;
    this.clock = options.clock ?? systemClock;
    this.glyph = options.cursorGlyph ?? CURSOR_GLYPH;
    this.log = options.logger ?? Logger.for("RevealSession");
    this.callbacks = {
      onUpdate: options.onUpdate,
      onStatusChange: options.onStatusChange,
      onComplete: options.onComplete,
      onError: options.onError,
    };
  }

  /**
   * Tokenize `text` and create a session over it.
   */
  static fromText(text: string, options: RevealOptions = {}): RevealSession {
    return new RevealSession(tokenize(text), options);
  }

  get status(): RevealStatus {
    return this._status;
  }

  get cursor(): number {
    return this._cursor;
  }

  get total(): number {
    return this.tokens.length;
  }

  /** Whether a timer is pending. */
  get isScheduled(): boolean {
    return this.cancelTimer !== null;
  }

  get isFinished(): boolean {
    return this._status === "completed" || this._status === "canceled";
  }

  get revealedText(): string {
    return joinTokens(this.tokens.slice(0, this._cursor));
  }

  get displayText(): string {
    switch (this._status) {
      case "idle":
        return "";
      case "running":
      case "paused":
        return this.revealedText + this.glyph;
      case "completed":
        return this.content;
      case "canceled":
        return this.revealedText;
    }
  }

  getSnapshot(): RevealSnapshot {
    return {
      status: this._status,
      cursor: this._cursor,
      total: this.tokens.length,
      text: this.displayText,
      revealed: this.revealedText,
    };
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  /**
   * idle → running. Reveals the first token immediately.
   * Returns false when the session was already started.
   */
  start(): boolean {
    if (this._status !== "idle") return false;
    if (this.tokens.length === 0) {
      this.complete();
      return true;
    }
    this.transition("running");
    this.advance();
    return true;
  }

  /**
   * running → paused. The cursor is kept.
   */
  pause(): boolean {
    if (this._status !== "running") return false;
    this.clearTimer();
    this.transition("paused");
    return true;
  }

  /**
   * paused → running. The token at the cursor waits its full delay again.
   */
  resume(): boolean {
    if (this._status !== "paused") return false;
    this.transition("running");
    if (this.status === "running") this.scheduleNext();
    return true;
  }

  /**
   * Stop playback for good. The revealed prefix stays as it is and the
   * completion callback never fires.
   */
  cancel(): boolean {
    if (this.isFinished) return false;
    this.clearTimer();
    this.transition("canceled");
    this.emitUpdate();
    return true;
  }

  stop(): boolean {
    return this.cancel();
  }

  /**
   * Reveal everything that is left and complete.
   */
  skipToEnd(): boolean {
    if (this._status !== "running" && this._status !== "paused") return false;
    this.clearTimer();
    this._cursor = this.tokens.length;
    this.complete();
    return true;
  }

  /**
   * Teardown: cancels an unfinished session and drops all callbacks.
   * Safe to call more than once.
   */
  dispose(): void {
    this.cancel();
    this.callbacks = {};
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private advance(): void {
    if (this._status !== "running") return;
    this._cursor += 1;
    if (this._cursor >= this.tokens.length) {
      this.complete();
      return;
    }
    this.emitUpdate();
    if (this._status === "running") {
      this.scheduleNext();
    }
  }

  private scheduleNext(): void {
    const token = this.tokens[this._cursor];
    const previous = this._cursor > 0 ? this.tokens[this._cursor - 1].text : undefined;
    const delayMs = Math.max(0, this.delay(token.text, previous) * this.speed);
    this.cancelTimer = this.clock.schedule(() => this.onTimer(), delayMs);
  }

  private onTimer(): void {
    this.cancelTimer = null;
    if (this._status !== "running") return;
    this.advance();
  }

  private complete(): void {
    if (this.isFinished) return;
    this.clearTimer();
    this._cursor = this.tokens.length;
    this.transition("completed");
    this.emitUpdate();
    this.invoke("onComplete", () => this.callbacks.onComplete?.());
  }

  private clearTimer(): void {
    if (this.cancelTimer) {
      this.cancelTimer();
      this.cancelTimer = null;
    }
  }

  private transition(next: RevealStatus): void {
    const previous = this._status;
    if (previous === next) return;
    this._status = next;
    this.invoke("onStatusChange", () => this.callbacks.onStatusChange?.(next, previous));
  }

  private emitUpdate(): void {
    const snapshot = this.getSnapshot();
    this.invoke("onUpdate", () => this.callbacks.onUpdate?.(snapshot.text, snapshot));
  }

  /**
   * Run a callback. A throwing callback cancels the session the same way
   * `cancel()` does and is then reported through `onError`.
   */
  private invoke(name: keyof RevealCallbacks, fn: () => void): void {
    try {
      fn();
    } catch (caught) {
      const error = ensureError(caught);
      this.log.warn({ err: error, callback: name }, "Reveal callback failed, canceling");
      if (this.isFinished) return;
      this.clearTimer();
      this.transition("canceled");
      this.emitUpdate();
      this.invoke("onError", () => this.callbacks.onError?.(error));
    }
  }
}
