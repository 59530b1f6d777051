import type { PresentationNode } from "unfurl";
import type { ReactNode } from "react";
import { SectionRenderer } from "./SectionRenderer";

export interface SectionListProps {
  sections: readonly PresentationNode[];
  className?: string;
  sectionClassName?: string;
  gap?: string | number;
  renderText?: (text: string) => ReactNode;
  onCopy?: (text: string) => Promise<void>;
}

/**
 * Renders a message's presentation nodes in order
 */
export function SectionList({
  sections,
  className,
  sectionClassName,
  gap = "8px",
  renderText,
  onCopy,
}: SectionListProps) {
  return (
    <div className={className} style={{ display: "flex", flexDirection: "column", gap }}>
      {sections.map((node, index) => (
        <SectionRenderer
          key={index}
          node={node}
          className={sectionClassName}
          renderText={renderText}
          onCopy={onCopy}
        />
      ))}
    </div>
  );
}
