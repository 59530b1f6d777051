/**
 * Section renderer: turns a classified section into a presentation node.
 * Pure; no I/O.
 */

import { ContentType, type ContentSection } from "unfurl-shared";
import { classify } from "./classifier";
import {
  checklistGlyph,
  isAnswerLine,
  isLabelledStep,
  isNumberedStep,
  isQuestionLine,
  isTableLine,
  isTableSeparator,
  isTableSummaryLine,
} from "./predicates";
import type {
  ChecklistItem,
  CollapsibleNode,
  DefinitionEntry,
  DialogueSide,
  DialogueTurn,
  PresentationNode,
  QaEntry,
  Step,
  TableNode,
  TimelineEvent,
} from "./presentation";

// ============================================================================
// Helpers
// ============================================================================

function nonBlankLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

/**
 * Strip inline emphasis from a table cell.
 */
export function cleanCell(cell: string): string {
  return cell
    .replace(/\*\*(.+?)\*\*/g, "$1")
    .replace(/\*(.+?)\*/g, "$1")
    .replace(/`(.+?)`/g, "$1")
    .replace(/~~(.+?)~~/g, "$1")
    .trim();
}

/**
 * Cells of a table line. The border segments outside a leading or trailing
 * `|` are dropped, as are empty cells at the end; empty cells in between
 * keep their column.
 */
function splitCells(line: string): string[] {
  const cells = line.split("|").map(cleanCell);
  if (cells[0] === "") cells.shift();
  while (cells.length > 0 && cells[cells.length - 1] === "") cells.pop();
  return cells;
}

/**
 * Remove markdown debris that would show up literally in prose:
 * whitespace-bounded `**`, header marks with no heading text and
 * symbol-only lines. Newlines are kept.
 */
export function removeStrayMarkdown(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/(^|\s)\*\*(?=\s|$)/g, "$1").replace(/^(\s*)#{3,}(?=\S)(?!#)/, "$1"))
    .filter((line) => !/^\s*[#*]+\s*$/.test(line))
    .join("\n");
}

// ============================================================================
// Per-type renderers
// ============================================================================

function renderTable(section: ContentSection): PresentationNode {
  const lines = nonBlankLines(section.text);
  const headerIndex = lines.findIndex((line) => isTableLine(line) && !isTableSeparator(line));
  const headers = headerIndex === -1 ? [] : splitCells(lines[headerIndex]);
  if (headers.length === 0) {
    return { kind: "prose", text: section.text };
  }

  const node: TableNode = { kind: "table", headers, rows: [], footnotes: [] };
  lines.forEach((line, index) => {
    if (index === headerIndex) return;
    if (index < headerIndex) {
      node.footnotes.push(line);
      return;
    }
    if (isTableSeparator(line) && line.includes("|")) return;
    if (!isTableLine(line) || isTableSummaryLine(line)) {
      node.footnotes.push(line);
      return;
    }
    const cells = splitCells(line);
    if (cells.length === 0) return;
    node.rows.push(fitRow(cells, headers.length));
  });
  return node;
}

function fitRow(cells: string[], width: number): string[] {
  const row = cells.slice(0, width);
  while (row.length < width) row.push("");
  return row;
}

function renderQa(section: ContentSection): PresentationNode {
  const entries = nonBlankLines(section.text).map((line): QaEntry => {
    if (isQuestionLine(line)) return { role: "question", text: line };
    if (isAnswerLine(line)) return { role: "answer", text: line };
    return { role: "body", text: line };
  });
  return { kind: "qa", entries };
}

const NOTE_PREFIX = /^(Note|Tip|Warning|Important|Caution):\s*/;

function renderNote(section: ContentSection): PresentationNode {
  const text = section.text
    .split("\n")
    .map((line) => line.trim().replace(NOTE_PREFIX, ""))
    .join("\n")
    .trim();
  return { kind: "note", noteKind: section.noteKind ?? "note", text };
}

function renderChecklist(section: ContentSection): PresentationNode {
  const items = nonBlankLines(section.text).map((line): ChecklistItem => {
    const glyph = checklistGlyph(line);
    if (!glyph) return { checked: false, text: line };
    return { checked: glyph.checked, text: line.slice(glyph.glyph.length).trim() };
  });
  return { kind: "checklist", items };
}

const SPEAKER_PATTERN = /^(User|Agent|Support|Customer|Assistant):\s*(.*)$/;
const USER_SPEAKERS = new Set(["User", "Customer"]);

function renderDialogue(section: ContentSection): PresentationNode {
  let side: DialogueSide = "agent";
  const turns = nonBlankLines(section.text).map((line): DialogueTurn => {
    const match = SPEAKER_PATTERN.exec(line);
    if (!match) return { side, text: line };
    side = USER_SPEAKERS.has(match[1]) ? "user" : "agent";
    return { speaker: match[1], side, text: match[2] };
  });
  return { kind: "dialogue", turns };
}

function renderDefinitions(section: ContentSection): PresentationNode {
  const entries = nonBlankLines(section.text).map((line): DefinitionEntry => {
    const colon = line.indexOf(":");
    if (colon <= 0) return { definition: line };
    return { term: line.slice(0, colon).trim(), definition: line.slice(colon + 1).trim() };
  });
  return { kind: "definitions", entries };
}

function renderSteps(section: ContentSection): PresentationNode {
  let next = 1;
  const steps = nonBlankLines(section.text).map((line): Step => {
    if (isNumberedStep(line)) {
      return { number: next++, text: line.replace(/^\d+\.\s+/, "") };
    }
    if (isLabelledStep(line)) {
      return { number: next++, text: line.replace(/^(Step|Phase|Stage)\s+\d+:\s*/, "") };
    }
    return { text: line };
  });
  return { kind: "steps", steps };
}

const TIMELINE_LABEL = /^([^:]{1,40}):\s*(.*)$/;

function renderTimeline(section: ContentSection): PresentationNode {
  const events = nonBlankLines(section.text).map((line): TimelineEvent => {
    const match = TIMELINE_LABEL.exec(line);
    return match ? { label: match[1].trim(), text: match[2] } : { text: line };
  });
  return { kind: "timeline", events };
}

function renderCollapsible(section: ContentSection): CollapsibleNode {
  const body = section.text
    .split("\n")
    .map((line, index) => {
      let stripped = line
        .replace(/<\/?details>/g, "")
        .replace(/<summary>.*?(<\/summary>|$)/, "");
      if (index === 0) stripped = stripped.replace(/^\s*(Details|Show more|Expand):.*$/, "");
      return stripped;
    })
    .join("\n")
    .trim();
  return { kind: "collapsible", title: section.title ?? "Details", body };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Render one section into its presentation node.
 *
 * @example
 * ```typescript
 * render({ type: ContentType.StepByStep, text: '3. Open\n7. Press' });
 * // { kind: 'steps', steps: [{ number: 1, text: 'Open' }, { number: 2, text: 'Press' }] }
 * ```
 */
export function render(section: ContentSection): PresentationNode {
  switch (section.type) {
    case ContentType.CodeBlock:
      return {
        kind: "code",
        code: section.text,
        language: section.language || undefined,
        copyText: section.text,
      };
    case ContentType.Table:
      return renderTable(section);
    case ContentType.QaFormat:
      return renderQa(section);
    case ContentType.NoteBlock:
      return renderNote(section);
    case ContentType.Checklist:
      return renderChecklist(section);
    case ContentType.Dialogue:
      return renderDialogue(section);
    case ContentType.HorizontalRule:
      return { kind: "rule" };
    case ContentType.MathFormula:
      return { kind: "monospace", variant: "math", text: section.text };
    case ContentType.AsciiChart:
      return { kind: "monospace", variant: "ascii", text: section.text };
    case ContentType.DefinitionList:
      return renderDefinitions(section);
    case ContentType.StepByStep:
      return renderSteps(section);
    case ContentType.Timeline:
      return renderTimeline(section);
    case ContentType.Collapsible:
      return renderCollapsible(section);
    case ContentType.Plain:
      return { kind: "prose", text: removeStrayMarkdown(section.text) };
  }
}

/**
 * Classify and render a whole message.
 */
export function renderMessage(text: string): PresentationNode[] {
  return classify(text).map(render);
}
