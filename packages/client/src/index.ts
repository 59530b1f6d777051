/**
 * # unfurl client
 *
 * Client for the conversation backend, in two layers:
 *
 * 1. **ChatApiClient** - typed fetch wrapper over the HTTP routes
 * 2. **ChatSession** - conversation flow on top of it: optimistic sends,
 *    regenerate, edit-and-resend and cancellation
 *
 * ```typescript
 * import { ChatApiClient, ChatSession } from 'unfurl-client';
 *
 * const session = new ChatSession({
 *   api: new ChatApiClient({ baseUrl: 'http://localhost:3001' }),
 * });
 * await session.send('Hello!');
 * ```
 *
 * @module unfurl-client
 */

export * from "./api-client";
export * from "./chat-session";
export { parseFailure, type ParsedFailure } from "./wire";
