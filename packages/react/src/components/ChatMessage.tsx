import { CURSOR_GLYPH, type AnimationTracker } from "unfurl";
import type { Message } from "unfurl-shared";
import type { ReactNode } from "react";
import { useRevealedText, type UseRevealedTextOptions } from "../hooks/useRevealedText";
import { SectionList } from "../sections/SectionList";

export interface ChatMessageProps {
  message: Message;
  tracker: AnimationTracker;
  className?: string;
  revealOptions?: UseRevealedTextOptions;
  renderText?: (text: string) => ReactNode;
  onCopy?: (text: string) => Promise<void>;
}

/**
 * Renders one chat message.
 *
 * Assistant messages are classified into sections and revealed token by
 * token the first time they are shown; clicking a revealing message skips to
 * the end. User messages render as plain text with their images.
 */
export function ChatMessage({ message, tracker, className, revealOptions, renderText, onCopy }: ChatMessageProps) {
  const { sections, status, isRevealing, skipToEnd } = useRevealedText(message, tracker, revealOptions);

  if (message.role === "user") {
    return (
      <div className={className} data-role="user" style={{ alignSelf: "flex-end", whiteSpace: "pre-wrap" }}>
        {message.images.map((image) => (
          <img
            key={image.id}
            src={image.url}
            alt={image.filename ?? ""}
            style={{ maxWidth: "240px", borderRadius: "4px", display: "block", marginBottom: "4px" }}
          />
        ))}
        {message.content}
      </div>
    );
  }

  return (
    <div
      className={className}
      data-role={message.role}
      data-status={status}
      onClick={isRevealing ? () => skipToEnd() : undefined}
    >
      <SectionList sections={sections} renderText={renderText} onCopy={onCopy} />
      {status === "running" && <span aria-hidden="true">{revealOptions?.cursorGlyph ?? CURSOR_GLYPH}</span>}
    </div>
  );
}
