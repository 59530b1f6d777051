import type { TimelineNode } from "unfurl";

interface Props {
  node: TimelineNode;
  className?: string;
}

export function TimelineBlock({ node, className }: Props) {
  return (
    <ol className={className} style={{ listStyle: "none", paddingLeft: "12px", borderLeft: "2px solid #ddd" }}>
      {node.events.map((event, index) => (
        <li key={index} style={{ margin: "4px 0" }}>
          {event.label && <strong style={{ marginRight: "6px" }}>{event.label}</strong>}
          {event.text}
        </li>
      ))}
    </ol>
  );
}
