import type { TableNode } from "unfurl";

interface Props {
  node: TableNode;
  className?: string;
}

const cellStyle = {
  border: "1px solid #ddd",
  padding: "6px 10px",
  textAlign: "left",
} as const;

export function TableBlock({ node, className }: Props) {
  return (
    <div className={className} style={{ overflowX: "auto" }}>
      <table style={{ borderCollapse: "collapse", fontSize: "0.875rem" }}>
        <thead>
          <tr>
            {node.headers.map((header, index) => (
              <th key={index} style={{ ...cellStyle, backgroundColor: "#f5f5f5" }}>
                {header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {node.rows.map((row, rowIndex) => (
            <tr key={rowIndex}>
              {row.map((cell, cellIndex) => (
                <td key={cellIndex} style={cellStyle}>
                  {cell}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
      {node.footnotes.map((line, index) => (
        <p key={index} style={{ fontSize: "0.75rem", color: "#666", margin: "4px 0 0" }}>
          {line}
        </p>
      ))}
    </div>
  );
}
