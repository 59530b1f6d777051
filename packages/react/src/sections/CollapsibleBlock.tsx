import type { CollapsibleNode } from "unfurl";

interface Props {
  node: CollapsibleNode;
  className?: string;
  defaultOpen?: boolean;
}

export function CollapsibleBlock({ node, className, defaultOpen = false }: Props) {
  return (
    <details className={className} open={defaultOpen}>
      <summary style={{ cursor: "pointer", fontWeight: 600 }}>{node.title}</summary>
      <div style={{ whiteSpace: "pre-wrap", marginTop: "6px" }}>{node.body}</div>
    </details>
  );
}
