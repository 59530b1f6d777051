/**
 * ActiveConversation - the client's in-memory copy of the open conversation
 *
 * Tracks which assistant messages were generated during this session
 * ("fresh") as opposed to loaded from history. Only fresh messages are ever
 * revealed; everything loaded goes through {@link ActiveConversation.load},
 * which forces `hasAnimated` to true.
 */

import type { Conversation, Message } from "unfurl-shared";

export type ConversationListener = (conversation: Conversation | null) => void;

export class ActiveConversation {
  private conversation: Conversation | null = null;
  private readonly fresh = new Set<string>();
  private readonly listeners = new Set<ConversationListener>();

  get current(): Conversation | null {
    return this.conversation;
  }

  get id(): string | null {
    return this.conversation?.id ?? null;
  }

  get messages(): readonly Message[] {
    return this.conversation?.messages ?? [];
  }

  /**
   * Replace the open conversation with one loaded from history.
   * Every message is marked animated and no message counts as fresh.
   */
  load(conversation: Conversation): void {
    this.fresh.clear();
    this.conversation = {
      ...conversation,
      messages: conversation.messages.map((message) => ({ ...message, hasAnimated: true })),
    };
    this.notify();
  }

  /**
   * Start an empty conversation locally, before the server has assigned an id.
   */
  reset(): void {
    this.fresh.clear();
    this.conversation = null;
    this.notify();
  }

  /**
   * Attach a server id and title to the open conversation, creating it when
   * nothing is open yet.
   */
  adopt(fields: Pick<Conversation, "id" | "title" | "model">): void {
    const now = new Date();
    this.conversation = this.conversation
      ? { ...this.conversation, ...fields, updatedAt: now }
      : { ...fields, messages: [], createdAt: now, updatedAt: now, isActive: true };
    this.notify();
  }

  appendMessage(message: Message): void {
    this.update((messages) => [...messages, message]);
  }

  /**
   * Append an assistant message produced during this session. It starts
   * unanimated and fresh.
   */
  appendGenerated(message: Message): void {
    this.fresh.add(message.id);
    this.appendMessage({ ...message, hasAnimated: false });
  }

  removeMessage(id: string): boolean {
    const index = this.indexOf(id);
    if (index < 0) return false;
    this.fresh.delete(id);
    this.update((messages) => messages.filter((message) => message.id !== id));
    return true;
  }

  /**
   * Drop every message after `id`. With `inclusive`, drop `id` too.
   * Returns the removed messages.
   */
  truncateAfter(id: string, inclusive = false): Message[] {
    const index = this.indexOf(id);
    if (index < 0) return [];
    const cut = inclusive ? index : index + 1;
    const removed = this.messages.slice(cut);
    for (const message of removed) this.fresh.delete(message.id);
    if (removed.length > 0) {
      this.update((messages) => messages.slice(0, cut));
    }
    return removed;
  }

  replaceMessage(id: string, patch: Partial<Omit<Message, "id">>): boolean {
    const index = this.indexOf(id);
    if (index < 0) return false;
    this.update((messages) =>
      messages.map((message) => (message.id === id ? { ...message, ...patch } : message)),
    );
    return true;
  }

  /**
   * Put `message` where `id` was, e.g. the server's copy of an optimistic
   * message. The new message is not fresh.
   */
  swapMessage(id: string, message: Message): boolean {
    const index = this.indexOf(id);
    if (index < 0) return false;
    this.fresh.delete(id);
    this.update((messages) => messages.map((existing, i) => (i === index ? message : existing)));
    return true;
  }

  findMessage(id: string): Message | undefined {
    return this.messages.find((message) => message.id === id);
  }

  /**
   * Set `hasAnimated` on a message. The flag never goes back to false.
   * Returns whether the flag changed.
   */
  setMessageAnimated(id: string): boolean {
    const message = this.findMessage(id);
    if (!message || message.hasAnimated) return false;
    return this.replaceMessage(id, { hasAnimated: true });
  }

  isFresh(id: string): boolean {
    return this.fresh.has(id);
  }

  subscribe(listener: ConversationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Deep-enough copy for callers that keep it around. */
  snapshot(): Conversation | null {
    if (!this.conversation) return null;
    return { ...this.conversation, messages: this.conversation.messages.map((m) => ({ ...m })) };
  }

  private indexOf(id: string): number {
    return this.messages.findIndex((message) => message.id === id);
  }

  private update(fn: (messages: Message[]) => Message[]): void {
    if (!this.conversation) return;
    this.conversation = {
      ...this.conversation,
      messages: fn(this.conversation.messages),
      updatedAt: new Date(),
    };
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.conversation);
    }
  }
}
