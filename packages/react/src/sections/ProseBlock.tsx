import type { ProseNode } from "unfurl";
import type { ReactNode } from "react";

interface Props {
  node: ProseNode;
  className?: string;
  /**
   * Custom render function for the text.
   * If not provided, renders plain text with line breaks preserved.
   *
   * @example
   * ```tsx
   * <ProseBlock node={node} renderText={(text) => <ReactMarkdown>{text}</ReactMarkdown>} />
   * ```
   */
  renderText?: (text: string) => ReactNode;
}

export function ProseBlock({ node, className, renderText }: Props) {
  if (renderText) {
    return <div className={className}>{renderText(node.text)}</div>;
  }
  return (
    <div className={className} style={{ whiteSpace: "pre-wrap" }}>
      {node.text}
    </div>
  );
}
