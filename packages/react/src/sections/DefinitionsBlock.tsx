import type { DefinitionsNode } from "unfurl";

interface Props {
  node: DefinitionsNode;
  className?: string;
}

export function DefinitionsBlock({ node, className }: Props) {
  return (
    <dl className={className} style={{ margin: 0 }}>
      {node.entries.map((entry, index) =>
        entry.term ? (
          <div key={index} style={{ marginBottom: "4px" }}>
            <dt style={{ fontWeight: 600 }}>{entry.term}</dt>
            <dd style={{ marginLeft: "16px" }}>{entry.definition}</dd>
          </div>
        ) : (
          <dd key={index} style={{ marginLeft: 0 }}>
            {entry.definition}
          </dd>
        ),
      )}
    </dl>
  );
}
