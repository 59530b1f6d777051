import { useState } from "react";
import type { CodeNode } from "unfurl";

interface Props {
  node: CodeNode;
  className?: string;
  /**
   * Copy handler for the copy button.
   * Defaults to the Clipboard API when available.
   */
  onCopy?: (text: string) => Promise<void>;
}

function clipboardWrite(text: string): Promise<void> {
  if (typeof navigator === "undefined" || !navigator.clipboard) {
    return Promise.reject(new Error("Clipboard is not available"));
  }
  return navigator.clipboard.writeText(text);
}

export function CodeBlock({ node, className, onCopy = clipboardWrite }: Props) {
  const [copyState, setCopyState] = useState<"idle" | "copied" | "failed">("idle");

  const copy = () => {
    onCopy(node.copyText).then(
      () => setCopyState("copied"),
      () => setCopyState("failed"),
    );
  };

  return (
    <div className={className}>
      <div
        style={{
          display: "flex",
          justifyContent: "space-between",
          fontSize: "0.75rem",
          color: "#666",
          marginBottom: "4px",
          fontFamily: "monospace",
        }}
      >
        <span>{node.language ?? "code"}</span>
        <button type="button" onClick={copy} style={{ fontSize: "0.75rem" }}>
          {copyState === "copied" ? "Copied" : copyState === "failed" ? "Copy failed" : "Copy"}
        </button>
      </div>
      <pre
        style={{
          backgroundColor: "#1e1e1e",
          color: "#d4d4d4",
          padding: "12px",
          borderRadius: "4px",
          overflow: "auto",
          fontSize: "0.875rem",
          margin: 0,
        }}
      >
        <code>{node.code}</code>
      </pre>
    </div>
  );
}
