import type { StepsNode } from "unfurl";

interface Props {
  node: StepsNode;
  className?: string;
}

export function StepsBlock({ node, className }: Props) {
  return (
    <div className={className}>
      {node.steps.map((step, index) => (
        <div key={index} style={{ display: "flex", gap: "8px", margin: "4px 0" }}>
          {step.number !== undefined && (
            <span
              style={{
                minWidth: "1.5em",
                fontWeight: 600,
                color: "#0b5cad",
              }}
            >
              {step.number}.
            </span>
          )}
          <span>{step.text}</span>
        </div>
      ))}
    </div>
  );
}
