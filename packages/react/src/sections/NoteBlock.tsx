import type { NoteNode } from "unfurl";

interface Props {
  node: NoteNode;
  className?: string;
}

const NOTE_STYLES: Record<NoteNode["noteKind"], { label: string; color: string; background: string }> = {
  note: { label: "Note", color: "#0b5cad", background: "#eef5fc" },
  tip: { label: "Tip", color: "#1a7f37", background: "#eefbf1" },
  warning: { label: "Warning", color: "#9a6700", background: "#fff8e5" },
  important: { label: "Important", color: "#8250df", background: "#f6f0ff" },
};

export function NoteBlock({ node, className }: Props) {
  const style = NOTE_STYLES[node.noteKind];
  return (
    <aside
      className={className}
      data-note-kind={node.noteKind}
      style={{
        borderLeft: `4px solid ${style.color}`,
        backgroundColor: style.background,
        padding: "8px 12px",
        borderRadius: "4px",
      }}
    >
      <strong style={{ color: style.color }}>{style.label}</strong>
      <div style={{ whiteSpace: "pre-wrap" }}>{node.text}</div>
    </aside>
  );
}
