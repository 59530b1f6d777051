/**
 * Conversation and message types.
 *
 * The same shapes travel over the wire (dates as ISO strings, see
 * {@link WireMessage}) and live in memory on both sides.
 */

export type MessageRole = "user" | "assistant" | "system";

export interface MessageImage {
  id: string;
  /** Remote URL or local path */
  url: string;
  /** Provider-assigned id once the image has been uploaded */
  publicId?: string;
  filename?: string;
}

export interface Message {
  /** Opaque, stable identifier */
  id: string;
  role: MessageRole;
  /** Immutable once generation completes; only replaced by an explicit edit */
  content: string;
  images: MessageImage[];
  timestamp: Date;
  /**
   * Whether the reveal animation has already played for this message.
   * False for freshly generated assistant messages, forced true for history.
   */
  hasAnimated: boolean;
  modelUsed?: string;
  tokensUsed?: number;
  /** Provider round-trip in milliseconds */
  processingTime?: number;
}

export interface Conversation {
  id: string;
  title: string;
  model: string;
  messages: Message[];
  createdAt: Date;
  updatedAt: Date;
  /** False once soft-deleted */
  isActive: boolean;
}

export interface ConversationSummary {
  id: string;
  title: string;
  model: string;
  /** First 100 characters of the last message, empty when there is none */
  lastMessage: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Length of the last-message preview in a summary. */
export const SUMMARY_PREVIEW_LENGTH = 100;

export function summarize(conversation: Conversation): ConversationSummary {
  const last = conversation.messages[conversation.messages.length - 1];
  return {
    id: conversation.id,
    title: conversation.title,
    model: conversation.model,
    lastMessage: last ? last.content.slice(0, SUMMARY_PREVIEW_LENGTH) : "",
    createdAt: conversation.createdAt,
    updatedAt: conversation.updatedAt,
  };
}

// ============================================================================
// Wire format
// ============================================================================

/** Message as serialized to JSON (dates become ISO strings). */
export type WireMessage = Omit<Message, "timestamp"> & { timestamp: string };

export type WireConversation = Omit<Conversation, "messages" | "createdAt" | "updatedAt"> & {
  messages: WireMessage[];
  createdAt: string;
  updatedAt: string;
};

export type WireConversationSummary = Omit<ConversationSummary, "createdAt" | "updatedAt"> & {
  createdAt: string;
  updatedAt: string;
};

export function toWireMessage(message: Message): WireMessage {
  return { ...message, timestamp: message.timestamp.toISOString() };
}

export function fromWireMessage(message: WireMessage): Message {
  return { ...message, images: message.images ?? [], timestamp: new Date(message.timestamp) };
}

export function toWireConversation(conversation: Conversation): WireConversation {
  return {
    ...conversation,
    messages: conversation.messages.map(toWireMessage),
    createdAt: conversation.createdAt.toISOString(),
    updatedAt: conversation.updatedAt.toISOString(),
  };
}

export function fromWireConversation(conversation: WireConversation): Conversation {
  return {
    ...conversation,
    messages: conversation.messages.map(fromWireMessage),
    createdAt: new Date(conversation.createdAt),
    updatedAt: new Date(conversation.updatedAt),
  };
}

export function toWireSummary(summary: ConversationSummary): WireConversationSummary {
  return {
    ...summary,
    createdAt: summary.createdAt.toISOString(),
    updatedAt: summary.updatedAt.toISOString(),
  };
}

export function fromWireSummary(summary: WireConversationSummary): ConversationSummary {
  return {
    ...summary,
    createdAt: new Date(summary.createdAt),
    updatedAt: new Date(summary.updatedAt),
  };
}
