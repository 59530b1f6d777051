import type { MonospaceNode } from "unfurl";

interface Props {
  node: MonospaceNode;
  className?: string;
}

export function MonospaceBlock({ node, className }: Props) {
  return (
    <pre
      className={className}
      data-variant={node.variant}
      style={{
        fontFamily: "monospace",
        backgroundColor: node.variant === "math" ? "#fafafa" : "transparent",
        padding: "8px",
        overflow: "auto",
        margin: 0,
      }}
    >
      {node.text}
    </pre>
  );
}
