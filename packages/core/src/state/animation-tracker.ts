/**
 * AnimationTracker - which messages have already played their reveal
 *
 * The `hasAnimated` flag is monotonic: once a message is marked it is never
 * revealed again, whether it is re-rendered, scrolled back into view or
 * reloaded. Persisting the flag is debounced so a burst of completions
 * costs one save.
 *
 * @example
 * ```typescript
 * const tracker = new AnimationTracker(conversation, {
 *   persist: (snapshot) => storage.save(snapshot),
 * });
 * if (tracker.shouldReveal(message)) {
 *   // play it, then
 *   tracker.markAnimated(message.id);
 * }
 * ```
 */

import { ensureError, type Conversation, type Message } from "unfurl-shared";
import { Logger, type KernelLogger } from "unfurl-kernel";
import { systemClock, type Clock } from "../reveal/clock";
import type { ActiveConversation } from "./active-conversation";

export const DEFAULT_PERSIST_DELAY_MS = 500;

export interface AnimationTrackerOptions {
  /** Save the conversation after flags change */
  persist?: (conversation: Conversation) => void | Promise<void>;
  persistDelayMs?: number;
  clock?: Clock;
  logger?: KernelLogger;
}

export class AnimationTracker {
  private readonly interrupted = new Set<string>();
  private readonly persist?: (conversation: Conversation) => void | Promise<void>;
  private readonly persistDelayMs: number;
  private readonly clock: Clock;
  private readonly log: KernelLogger;
  private cancelPersist: (() => void) | null = null;
  private pendingSave: Promise<void> | null = null;

  constructor(
    private readonly conversation: ActiveConversation,
    options: AnimationTrackerOptions = {},
  ) {
    this.persist = options.persist;
    this.persistDelayMs = options.persistDelayMs ?? DEFAULT_PERSIST_DELAY_MS;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? Logger.for("AnimationTracker");
  }

  /**
   * Unknown ids count as animated; there is nothing to reveal for them.
   */
  isAnimated(id: string): boolean {
    return this.conversation.findMessage(id)?.hasAnimated ?? true;
  }

  /**
   * Record that a message finished its reveal. Returns whether anything changed.
   */
  markAnimated(id: string): boolean {
    const changed = this.conversation.setMessageAnimated(id);
    if (changed) {
      this.log.debug({ messageId: id }, "Message marked animated");
      this.schedulePersist();
    }
    return changed;
  }

  /**
   * A reveal was torn down before finishing. The message shows its full text
   * from now on but keeps `hasAnimated` false.
   */
  markInterrupted(id: string): void {
    this.interrupted.add(id);
  }

  isInterrupted(id: string): boolean {
    return this.interrupted.has(id);
  }

  /**
   * Only fresh, unanimated, uninterrupted assistant messages are revealed.
   */
  shouldReveal(message: Message): boolean {
    return (
      message.role === "assistant" &&
      !this.isAnimated(message.id) &&
      this.conversation.isFresh(message.id) &&
      !this.interrupted.has(message.id)
    );
  }

  /**
   * Save now if a save is pending and wait for it.
   */
  async flush(): Promise<void> {
    if (this.cancelPersist) {
      this.cancelPersist();
      this.cancelPersist = null;
      this.save();
    }
    if (this.pendingSave) {
      await this.pendingSave;
    }
  }

  /** Drop a pending save. */
  dispose(): void {
    if (this.cancelPersist) {
      this.cancelPersist();
      this.cancelPersist = null;
    }
    this.interrupted.clear();
  }

  private schedulePersist(): void {
    if (!this.persist) return;
    if (this.cancelPersist) this.cancelPersist();
    this.cancelPersist = this.clock.schedule(() => {
      this.cancelPersist = null;
      this.save();
    }, this.persistDelayMs);
  }

  private save(): void {
    const persist = this.persist;
    const snapshot = this.conversation.snapshot();
    if (!persist || !snapshot) return;
    const run = async (): Promise<void> => {
      try {
        await persist(snapshot);
      } catch (error) {
        this.log.warn({ err: ensureError(error), chatId: snapshot.id }, "Persisting animation state failed");
      }
    };
    const saving = run().finally(() => {
      if (this.pendingSave === saving) this.pendingSave = null;
    });
    this.pendingSave = saving;
  }
}
