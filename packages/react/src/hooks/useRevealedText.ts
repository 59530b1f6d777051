/**
 * React hook for revealing a message
 *
 * Binds one message to a {@link MessageDisplay}:
 * - Starts the reveal after mount when the message qualifies
 * - Re-renders on every revealed token
 * - Disposes on unmount or when the message changes, which stops an
 *   unfinished reveal and records it as interrupted
 *
 * Messages that are not revealed (user messages, history, already animated)
 * show their full text on the first render.
 */

import { useCallback, useEffect, useMemo, useRef, useSyncExternalStore } from "react";
import {
  MessageDisplay,
  type AnimationTracker,
  type DisplaySnapshot,
  type MessageDisplayOptions,
} from "unfurl";
import type { Message } from "unfurl-shared";

export interface UseRevealedTextOptions extends MessageDisplayOptions {
  /** Start automatically after mount (default: true) */
  autoStart?: boolean;
}

export interface UseRevealedTextReturn extends DisplaySnapshot {
  /** Whether the reveal is still in progress */
  isRevealing: boolean;
  start: () => boolean;
  pause: () => boolean;
  resume: () => boolean;
  skipToEnd: () => boolean;
  stop: () => boolean;
}

/**
 * @example
 * ```tsx
 * function AssistantMessage({ message }: { message: Message }) {
 *   const { sections, isRevealing, skipToEnd } = useRevealedText(message, session.tracker);
 *   return (
 *     <div onClick={isRevealing ? skipToEnd : undefined}>
 *       <SectionList sections={sections} />
 *     </div>
 *   );
 * }
 * ```
 */
export function useRevealedText(
  message: Message,
  tracker: AnimationTracker,
  options: UseRevealedTextOptions = {},
): UseRevealedTextReturn {
  const { autoStart = true, speed, delay, clock, cursorGlyph, logger } = options;

  // A new display only when the message or the tracker changes; content is
  // immutable once generated.
  const display = useMemo(
    () => new MessageDisplay(message, tracker, { speed, delay, clock, cursorGlyph, logger }),
    // eslint-disable-next-line react-hooks/exhaustive-deps
    [message.id, tracker],
  );

  // Disposal waits a tick so a StrictMode remount keeps the running reveal
  const pendingDispose = useRef<{ display: MessageDisplay; timer: ReturnType<typeof setTimeout> } | null>(
    null,
  );

  useEffect(() => {
    const pending = pendingDispose.current;
    if (pending?.display === display) {
      clearTimeout(pending.timer);
      pendingDispose.current = null;
    }
    if (autoStart) display.start();
    return () => {
      pendingDispose.current = { display, timer: setTimeout(() => display.dispose(), 0) };
    };
  }, [display, autoStart]);

  const subscribe = useCallback((onChange: () => void) => display.subscribe(onChange), [display]);
  const getSnapshot = useCallback(() => display.getSnapshot(), [display]);
  const snapshot = useSyncExternalStore(subscribe, getSnapshot, getSnapshot);

  return {
    ...snapshot,
    isRevealing: snapshot.status === "running" || snapshot.status === "paused",
    start: useCallback(() => display.start(), [display]),
    pause: useCallback(() => display.pause(), [display]),
    resume: useCallback(() => display.resume(), [display]),
    skipToEnd: useCallback(() => display.skipToEnd(), [display]),
    stop: useCallback(() => display.stop(), [display]),
  };
}
