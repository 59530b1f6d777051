import type { QaNode } from "unfurl";

interface Props {
  node: QaNode;
  className?: string;
}

export function QaBlock({ node, className }: Props) {
  return (
    <div className={className}>
      {node.entries.map((entry, index) => (
        <p
          key={index}
          data-role={entry.role}
          style={{ margin: "4px 0", fontWeight: entry.role === "question" ? 600 : undefined }}
        >
          {entry.text}
        </p>
      ))}
    </div>
  );
}
