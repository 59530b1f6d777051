/**
 * # Unfurl Core
 *
 * Everything a chat client needs between receiving a finished assistant
 * message and drawing it:
 *
 * - **Content** - classify raw text into typed sections and turn each
 *   section into a presentation node
 * - **Reveal** - tokenize, pace and play back a message token by token
 * - **State** - the open conversation and which messages have already
 *   been revealed
 *
 * ```typescript
 * import { renderMessage, MessageDisplay, AnimationTracker } from 'unfurl';
 *
 * const display = new MessageDisplay(message, tracker);
 * display.subscribe(({ sections }) => draw(sections));
 * display.start();
 * ```
 *
 * @module unfurl
 */

export * from "./content";
export * from "./reveal";
export * from "./state";
