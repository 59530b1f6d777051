/**
 * MessageDisplay - binds one message to its reveal session and its
 * rendered sections.
 *
 * A view creates one per mounted message, subscribes, and calls
 * {@link MessageDisplay.dispose} on unmount. Messages that should not be
 * revealed show their full text from the first snapshot.
 */

import type { Message, RevealStatus } from "unfurl-shared";
import { renderMessage, type PresentationNode } from "../content";
import type { AnimationTracker } from "../state/animation-tracker";
import { RevealSession, type RevealOptions, type RevealSnapshot } from "./session";

export type DisplayStatus = RevealStatus | "static";

export interface DisplaySnapshot {
  status: DisplayStatus;
  /** Text to show, cursor glyph included while playing */
  text: string;
  /** Presentation of the visible text, without the glyph */
  sections: PresentationNode[];
}

export type DisplayListener = (snapshot: DisplaySnapshot) => void;

export type MessageDisplayOptions = Omit<
  RevealOptions,
  "onUpdate" | "onStatusChange" | "onComplete" | "onError"
>;

export class MessageDisplay {
  private session: RevealSession | null = null;
  private readonly listeners = new Set<DisplayListener>();
  private snapshot: DisplaySnapshot;
  private disposed = false;

  constructor(
    private readonly message: Message,
    private readonly tracker: AnimationTracker,
    private readonly options: MessageDisplayOptions = {},
  ) {
    this.snapshot = this.staticSnapshot();
  }

  get messageId(): string {
    return this.message.id;
  }

  get status(): DisplayStatus {
    return this.snapshot.status;
  }

  /**
   * Begin playback when the message qualifies; otherwise stay static.
   * Returns whether a reveal started.
   */
  start(): boolean {
    if (this.disposed || this.session) return false;
    if (!this.tracker.shouldReveal(this.message)) return false;

    const session = RevealSession.fromText(this.message.content, {
      ...this.options,
      onUpdate: (_text, snap) => this.publish(snap),
      onStatusChange: (status, previous) => {
        // pause and resume change no text, so no update follows them
        if (status === "paused" || previous === "paused") this.publish(session.getSnapshot());
      },
      onComplete: () => {
        this.tracker.markAnimated(this.message.id);
      },
      // A failed reveal falls back to the full text, never animated again
      onError: () => {
        this.tracker.markInterrupted(this.message.id);
        this.publishStatic();
      },
    });
    this.session = session;
    session.start();
    return true;
  }

  pause(): boolean {
    return this.session?.pause() ?? false;
  }

  resume(): boolean {
    return this.session?.resume() ?? false;
  }

  skipToEnd(): boolean {
    return this.session?.skipToEnd() ?? false;
  }

  /**
   * Stop the reveal where it is. The message counts as interrupted.
   */
  stop(): boolean {
    const session = this.session;
    if (!session || !session.stop()) return false;
    this.tracker.markInterrupted(this.message.id);
    return true;
  }

  getSnapshot(): DisplaySnapshot {
    return this.snapshot;
  }

  subscribe(listener: DisplayListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const session = this.session;
    if (session && session.status !== "completed") {
      this.tracker.markInterrupted(this.message.id);
    }
    session?.dispose();
    this.listeners.clear();
  }

  private staticSnapshot(): DisplaySnapshot {
    return {
      status: "static",
      text: this.message.content,
      sections: renderMessage(this.message.content),
    };
  }

  private publish(snap: RevealSnapshot): void {
    if (this.disposed) return;
    const visible = snap.status === "completed" ? this.message.content : snap.revealed;
    this.notify({ status: snap.status, text: snap.text, sections: renderMessage(visible) });
  }

  private publishStatic(): void {
    if (this.disposed) return;
    this.notify(this.staticSnapshot());
  }

  private notify(snapshot: DisplaySnapshot): void {
    this.snapshot = snapshot;
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }
}
