/**
 * # unfurl React
 *
 * React hooks and components for chat messages with typed content sections
 * and a token-by-token reveal.
 *
 * ## Hooks
 *
 * - **useRevealedText** - Reveal one message and re-render per token
 * - **useChatSession** - Session state and actions as React state
 *
 * ## Components
 *
 * - **ChatMessage** - One message, revealed once when freshly generated
 * - **SectionList / SectionRenderer** - Render presentation nodes
 * - **CodeBlock, TableBlock, NoteBlock, ...** - Individual node renderers
 *
 * ## Quick Start
 *
 * ```tsx
 * import { ChatApiClient, ChatSession } from 'unfurl-client';
 * import { ChatMessage, useChatSession } from 'unfurl-react';
 *
 * const session = new ChatSession({ api: new ChatApiClient({ baseUrl: 'http://localhost:3001' }) });
 *
 * function ChatApp() {
 *   const { messages, send } = useChatSession(session);
 *   return (
 *     <div>
 *       {messages.map((m) => <ChatMessage key={m.id} message={m} tracker={session.tracker} />)}
 *       <input onKeyDown={(e) => e.key === 'Enter' && void send(e.currentTarget.value)} />
 *     </div>
 *   );
 * }
 * ```
 *
 * @module unfurl-react
 */

export { useRevealedText } from "./hooks/useRevealedText";
export type { UseRevealedTextOptions, UseRevealedTextReturn } from "./hooks/useRevealedText";

export { useChatSession } from "./hooks/useChatSession";
export type { UseChatSessionReturn } from "./hooks/useChatSession";

export { ChatMessage, type ChatMessageProps } from "./components/ChatMessage";

export {
  SectionRenderer,
  SectionList,
  ProseBlock,
  CodeBlock,
  TableBlock,
  QaBlock,
  NoteBlock,
  ChecklistBlock,
  DialogueBlock,
  DefinitionsBlock,
  StepsBlock,
  TimelineBlock,
  MonospaceBlock,
  CollapsibleBlock,
} from "./sections";
export type { SectionRendererProps, SectionListProps } from "./sections";

// Re-export for convenience
export { ChatApiClient, ChatSession, createChatApiClient, createChatSession } from "unfurl-client";
export type { ChatApiClientConfig, ChatSessionConfig, ChatSessionState } from "unfurl-client";
export type { PresentationNode, DisplaySnapshot } from "unfurl";
