import type { ChecklistNode } from "unfurl";

interface Props {
  node: ChecklistNode;
  className?: string;
}

export function ChecklistBlock({ node, className }: Props) {
  return (
    <ul className={className} style={{ listStyle: "none", paddingLeft: 0, margin: 0 }}>
      {node.items.map((item, index) => (
        <li key={index} style={{ display: "flex", gap: "6px", alignItems: "baseline" }}>
          <input type="checkbox" checked={item.checked} readOnly />
          <span style={{ textDecoration: item.checked ? "line-through" : undefined }}>{item.text}</span>
        </li>
      ))}
    </ul>
  );
}
