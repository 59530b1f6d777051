import type { DialogueNode } from "unfurl";

interface Props {
  node: DialogueNode;
  className?: string;
}

export function DialogueBlock({ node, className }: Props) {
  return (
    <div className={className} style={{ display: "flex", flexDirection: "column", gap: "6px" }}>
      {node.turns.map((turn, index) => (
        <div
          key={index}
          data-side={turn.side}
          style={{
            alignSelf: turn.side === "user" ? "flex-end" : "flex-start",
            backgroundColor: turn.side === "user" ? "#dbeafe" : "#f3f4f6",
            padding: "6px 10px",
            borderRadius: "8px",
            maxWidth: "80%",
          }}
        >
          {turn.speaker && <strong style={{ marginRight: "6px" }}>{turn.speaker}:</strong>}
          {turn.text}
        </div>
      ))}
    </div>
  );
}
