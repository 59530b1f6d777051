/**
 * Line-level predicates used by the classifier.
 *
 * Each predicate looks at a single line and answers one question. They are
 * heuristics over free-form assistant text: ambiguous lines fall through to
 * plain prose rather than being forced into a structure.
 */

import { ContentType, type NoteKind } from "unfurl-shared";

// ============================================================================
// Patterns
// ============================================================================

export const FENCE = "```";

const QA_PATTERN = /^(Question|Q\d*|Answer|A\d*):/;
const QUESTION_PATTERN = /^(Question|Q\d*):/;
const ANSWER_PATTERN = /^(Answer|A\d*):/;
const NOTE_PATTERN = /^(Note|Tip|Warning|Important|Caution):/;
const DIALOGUE_PATTERN = /^(User|Agent|Support|Customer|Assistant):/;
const HORIZONTAL_RULE_PATTERN = /^(-{3,}|\*{3,}|_{3,})$/;
const MATH_INLINE_PATTERN = /\$\$.*\$\$|\\\[.*\\\]|\\begin\{[^}]*\}.*\\end\{[^}]*\}/;
const MATH_LABEL_PATTERN = /^(Formula|Equation):/;
const DEFINITION_PATTERN = /^[A-Za-z][^:]*:\s+\S/;
const DEFINITION_EXCLUDED_STARTERS =
  /^(Question|Answer|User|Agent|Support|Customer|Assistant|Note|Tip|Warning|Important|Caution|Certainly|Let|Here|This|That|In|For|With|When|Where|Why|How|What|The|A|An):/;
const CONVERSATIONAL_PATTERN = /(let's|we'll|you'll|i'll|can't|won't|don't|isn't|aren't|wasn't|weren't)/;
const NUMBERED_STEP_PATTERN = /^\d+\.\s+\S/;
const LABELLED_STEP_PATTERN = /^(Step|Phase|Stage)\s+\d+:/;
const TIMELINE_DATE_PATTERN = /^\d{4}(-\d{2})?(-\d{2})?:/;
const TIMELINE_MONTH_PATTERN =
  /^(January|February|March|April|May|June|July|August|September|October|November|December)\s+\d{4}:/;
const TIMELINE_LABEL_PATTERN = /^(Timeline|History):/;
const ASCII_BLOCK_PATTERN = /[█▓▒░■□]/;
const COLLAPSIBLE_PATTERN = /^(<details>|<summary>|Details:|Show more:|Expand:)/;
const TABLE_SUMMARY_PATTERN = /^(This table|Summary|Note:|In summary|Overall|Conclusion)/i;

/** Glyphs that open a checklist item, with the state they stand for. */
export const CHECKLIST_GLYPHS: ReadonlyArray<{ glyph: string; checked: boolean }> = [
  { glyph: "✅", checked: true },
  { glyph: "☑️", checked: true },
  { glyph: "☑", checked: true },
  { glyph: "✔️", checked: true },
  { glyph: "✔", checked: true },
  { glyph: "✓", checked: true },
  { glyph: "❌", checked: false },
  { glyph: "❎", checked: false },
  { glyph: "✗", checked: false },
  { glyph: "×", checked: false },
];

// ============================================================================
// Predicates
// ============================================================================

export function isFenceLine(line: string): boolean {
  return line.trim().startsWith(FENCE);
}

/** Language hint written after an opening fence, empty when absent. */
export function fenceLanguage(line: string): string {
  return line.trim().replace(/^`+/, "").trim();
}

/**
 * A table row: contains the column separator and splits into at least three
 * segments, so both `a | b | c` and `| a | b |` qualify.
 */
export function isTableLine(line: string): boolean {
  if (!line.includes("|")) return false;
  const segments = line.split("|");
  return segments.length >= 3 && segments.some((segment) => segment.trim() !== "");
}

/** Separator row between table header and body. */
export function isTableSeparator(line: string): boolean {
  return line.includes("---") || line.includes("═══");
}

/** Lead-in of a sentence that closes a table rather than extending it. */
export function isTableSummaryLine(line: string): boolean {
  return TABLE_SUMMARY_PATTERN.test(line.trim());
}

export function isQaLine(line: string): boolean {
  return QA_PATTERN.test(line.trim());
}

export function isQuestionLine(line: string): boolean {
  return QUESTION_PATTERN.test(line.trim());
}

export function isAnswerLine(line: string): boolean {
  return ANSWER_PATTERN.test(line.trim());
}

export function isNoteLine(line: string): boolean {
  return NOTE_PATTERN.test(line.trim());
}

export function noteKindOf(line: string): NoteKind {
  const lower = line.trim().toLowerCase();
  if (lower.startsWith("tip:")) return "tip";
  if (lower.startsWith("warning:") || lower.startsWith("caution:")) return "warning";
  if (lower.startsWith("important:")) return "important";
  return "note";
}

/**
 * Leading checklist glyph of a line, if the glyph is followed by whitespace.
 */
export function checklistGlyph(line: string): { glyph: string; checked: boolean } | undefined {
  const trimmed = line.trim();
  for (const entry of CHECKLIST_GLYPHS) {
    if (trimmed.startsWith(entry.glyph)) {
      const rest = trimmed.slice(entry.glyph.length);
      return /^\s/.test(rest) ? entry : undefined;
    }
  }
  return undefined;
}

export function isChecklistLine(line: string): boolean {
  return checklistGlyph(line) !== undefined;
}

export function isDialogueLine(line: string): boolean {
  return DIALOGUE_PATTERN.test(line.trim());
}

export function isHorizontalRule(line: string): boolean {
  return HORIZONTAL_RULE_PATTERN.test(line.trim());
}

export function isMathLine(line: string): boolean {
  return MATH_INLINE_PATTERN.test(line) || MATH_LABEL_PATTERN.test(line.trim());
}

/**
 * Short `term: definition` line. Conversational sentences and lines opening
 * with a reserved keyword are rejected.
 */
export function isDefinitionLine(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed.length > 100) return false;
  if (!DEFINITION_PATTERN.test(trimmed)) return false;
  if (DEFINITION_EXCLUDED_STARTERS.test(trimmed)) return false;
  if (CONVERSATIONAL_PATTERN.test(trimmed.toLowerCase())) return false;

  const colon = trimmed.indexOf(":");
  const term = trimmed.slice(0, colon).trim();
  const definition = trimmed.slice(colon + 1).trim();
  return term.split(/\s+/).length <= 4 && definition !== "";
}

export function isNumberedStep(line: string): boolean {
  return NUMBERED_STEP_PATTERN.test(line.trim());
}

export function isLabelledStep(line: string): boolean {
  return LABELLED_STEP_PATTERN.test(line.trim());
}

export function isStepLine(line: string): boolean {
  return isNumberedStep(line) || isLabelledStep(line);
}

export function isTimelineLine(line: string): boolean {
  const trimmed = line.trim();
  return (
    TIMELINE_DATE_PATTERN.test(trimmed) ||
    TIMELINE_MONTH_PATTERN.test(trimmed) ||
    TIMELINE_LABEL_PATTERN.test(trimmed)
  );
}

export function isAsciiChartLine(line: string): boolean {
  const trimmed = line.trim();
  const drawn =
    ASCII_BLOCK_PATTERN.test(trimmed) ||
    (trimmed.includes("|") && trimmed.includes("-") && trimmed.length > 10);
  return drawn && !isTableLine(line);
}

export function isCollapsibleLine(line: string): boolean {
  return COLLAPSIBLE_PATTERN.test(line.trim());
}

/**
 * Title of a collapsible section taken from its opening line.
 */
export function collapsibleTitle(line: string): string {
  const trimmed = line.trim();
  const summary = /<summary>(.*?)(<\/summary>|$)/.exec(trimmed);
  if (summary) {
    return summary[1].trim() || "Details";
  }
  const keyword = /^(Details|Show more|Expand):\s*(.*)$/.exec(trimmed);
  return keyword?.[2].trim() || "Details";
}

// ============================================================================
// Priority chain
// ============================================================================

export interface LinePredicate {
  type: ContentType;
  test: (line: string) => boolean;
}

/**
 * Typed predicates after code fences and tables, in priority order.
 * Horizontal rules are handled by the classifier directly since they always
 * stand alone.
 */
export const LINE_PREDICATES: readonly LinePredicate[] = [
  { type: ContentType.QaFormat, test: isQaLine },
  { type: ContentType.NoteBlock, test: isNoteLine },
  { type: ContentType.Checklist, test: isChecklistLine },
  { type: ContentType.Dialogue, test: isDialogueLine },
  { type: ContentType.MathFormula, test: isMathLine },
  { type: ContentType.DefinitionList, test: isDefinitionLine },
  { type: ContentType.StepByStep, test: isStepLine },
  { type: ContentType.Timeline, test: isTimelineLine },
  { type: ContentType.AsciiChart, test: isAsciiChartLine },
  { type: ContentType.Collapsible, test: isCollapsibleLine },
];

/**
 * First typed predicate matching the line, or undefined for plain text.
 */
export function matchLine(line: string): ContentType | undefined {
  for (const predicate of LINE_PREDICATES) {
    if (predicate.test(line)) return predicate.type;
  }
  return undefined;
}
