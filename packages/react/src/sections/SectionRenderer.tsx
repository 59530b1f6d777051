import type { PresentationNode } from "unfurl";
import type { ReactNode } from "react";
import { ChecklistBlock } from "./ChecklistBlock";
import { CodeBlock } from "./CodeBlock";
import { CollapsibleBlock } from "./CollapsibleBlock";
import { DefinitionsBlock } from "./DefinitionsBlock";
import { DialogueBlock } from "./DialogueBlock";
import { MonospaceBlock } from "./MonospaceBlock";
import { NoteBlock } from "./NoteBlock";
import { ProseBlock } from "./ProseBlock";
import { QaBlock } from "./QaBlock";
import { StepsBlock } from "./StepsBlock";
import { TableBlock } from "./TableBlock";
import { TimelineBlock } from "./TimelineBlock";

export interface SectionRendererProps {
  node: PresentationNode;
  className?: string;
  /** Custom rendering for prose, e.g. a markdown component */
  renderText?: (text: string) => ReactNode;
  onCopy?: (text: string) => Promise<void>;
}

/**
 * Renders a single presentation node based on its kind
 */
export function SectionRenderer({ node, className, renderText, onCopy }: SectionRendererProps) {
  switch (node.kind) {
    case "prose":
      return <ProseBlock node={node} className={className} renderText={renderText} />;
    case "code":
      return <CodeBlock node={node} className={className} onCopy={onCopy} />;
    case "table":
      return <TableBlock node={node} className={className} />;
    case "qa":
      return <QaBlock node={node} className={className} />;
    case "note":
      return <NoteBlock node={node} className={className} />;
    case "checklist":
      return <ChecklistBlock node={node} className={className} />;
    case "dialogue":
      return <DialogueBlock node={node} className={className} />;
    case "definitions":
      return <DefinitionsBlock node={node} className={className} />;
    case "steps":
      return <StepsBlock node={node} className={className} />;
    case "timeline":
      return <TimelineBlock node={node} className={className} />;
    case "monospace":
      return <MonospaceBlock node={node} className={className} />;
    case "collapsible":
      return <CollapsibleBlock node={node} className={className} />;
    case "rule":
      return <hr className={className} style={{ border: 0, borderTop: "1px solid #ddd" }} />;
  }
}
