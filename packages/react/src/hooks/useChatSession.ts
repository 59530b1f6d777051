/**
 * React hook for a ChatSession
 *
 * Exposes the session state and the open conversation as React state, and
 * binds the session's actions. The session itself is created by the caller
 * so it can outlive the component (and survive StrictMode remounts).
 */

import { useCallback, useSyncExternalStore } from "react";
import type { ChatSession, ChatSessionState, SendMessageResponse, SendOptions } from "unfurl-client";
import type { Conversation, Message } from "unfurl-shared";

export interface UseChatSessionReturn extends ChatSessionState {
  /** Open conversation, null before the first message of a new chat */
  conversation: Conversation | null;
  messages: readonly Message[];
  send: (content: string, options?: SendOptions) => Promise<SendMessageResponse | null>;
  regenerateLast: (model?: string) => Promise<SendMessageResponse | null>;
  editAndResend: (messageId: string, content: string) => Promise<SendMessageResponse | null>;
  cancelPending: () => boolean;
  loadConversation: (id: string) => Promise<boolean>;
  newConversation: () => void;
}

const EMPTY: readonly Message[] = [];

/**
 * @example
 * ```tsx
 * const session = new ChatSession({ api: new ChatApiClient({ baseUrl }) });
 *
 * function Chat() {
 *   const { messages, isSending, send, cancelPending } = useChatSession(session);
 *   return (
 *     <>
 *       {messages.map((m) => <ChatMessage key={m.id} message={m} tracker={session.tracker} />)}
 *       {isSending && <button onClick={cancelPending}>Stop</button>}
 *       <Composer onSubmit={(text) => void send(text)} />
 *     </>
 *   );
 * }
 * ```
 */
export function useChatSession(session: ChatSession): UseChatSessionReturn {
  const state = useSyncExternalStore(
    useCallback((onChange: () => void) => session.subscribe(onChange), [session]),
    () => session.state,
    () => session.state,
  );
  const conversation = useSyncExternalStore(
    useCallback((onChange: () => void) => session.conversation.subscribe(onChange), [session]),
    () => session.conversation.current,
    () => session.conversation.current,
  );

  return {
    ...state,
    conversation,
    messages: conversation?.messages ?? EMPTY,
    send: useCallback((content: string, options?: SendOptions) => session.send(content, options), [session]),
    regenerateLast: useCallback((model?: string) => session.regenerateLast(model), [session]),
    editAndResend: useCallback((id: string, content: string) => session.editAndResend(id, content), [session]),
    cancelPending: useCallback(() => session.cancelPending(), [session]),
    loadConversation: useCallback((id: string) => session.loadConversation(id), [session]),
    newConversation: useCallback(() => session.newConversation(), [session]),
  };
}
