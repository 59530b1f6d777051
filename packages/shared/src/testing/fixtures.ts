/**
 * Test Fixtures
 *
 * Factory functions for creating test data with sensible defaults.
 * All functions accept partial overrides.
 */

import type { Conversation, Message, MessageImage } from "../messages";

// =============================================================================
// ID Generation
// =============================================================================

let idCounter = 0;

/**
 * Generate a unique test ID
 */
export function testId(prefix: string = "test"): string {
  return `${prefix}-${++idCounter}`;
}

/**
 * Reset the ID counter (call in beforeEach)
 */
export function resetTestIds(): void {
  idCounter = 0;
}

// =============================================================================
// Message Fixtures
// =============================================================================

const FIXED_DATE = new Date("2024-01-01T00:00:00.000Z");

export function createMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: testId("msg"),
    role: "user",
    content: "Test message",
    images: [],
    timestamp: FIXED_DATE,
    hasAnimated: true,
    ...overrides,
  };
}

export function createUserMessage(content: string = "Hello", overrides: Partial<Message> = {}): Message {
  return createMessage({ role: "user", content, ...overrides });
}

/**
 * Create a freshly generated assistant message (not yet animated).
 */
export function createAssistantMessage(
  content: string = "Hi there!",
  overrides: Partial<Message> = {},
): Message {
  return createMessage({ role: "assistant", content, hasAnimated: false, ...overrides });
}

export function createImage(overrides: Partial<MessageImage> = {}): MessageImage {
  return {
    id: testId("img"),
    url: "https://example.com/image.png",
    ...overrides,
  };
}

// =============================================================================
// Conversation Fixtures
// =============================================================================

export function createConversation(overrides: Partial<Conversation> = {}): Conversation {
  return {
    id: testId("chat"),
    title: "Test conversation",
    model: "gpt-3.5-turbo",
    messages: [],
    createdAt: FIXED_DATE,
    updatedAt: FIXED_DATE,
    isActive: true,
    ...overrides,
  };
}

/**
 * Create a conversation holding alternating user/assistant turns.
 */
export function createConversationWithTurns(
  turns: Array<[user: string, assistant: string]>,
  overrides: Partial<Conversation> = {},
): Conversation {
  const messages = turns.flatMap(([user, assistant]) => [
    createUserMessage(user),
    createAssistantMessage(assistant),
  ]);
  return createConversation({ messages, ...overrides });
}
