/**
 * Content section and reveal types.
 */

/**
 * Kinds of block the classifier recognises in assistant text.
 */
export enum ContentType {
  Plain = "plain",
  CodeBlock = "codeBlock",
  Table = "table",
  QaFormat = "qaFormat",
  NoteBlock = "noteBlock",
  Checklist = "checklist",
  Dialogue = "dialogue",
  HorizontalRule = "horizontalRule",
  MathFormula = "mathFormula",
  DefinitionList = "definitionList",
  StepByStep = "stepByStep",
  Timeline = "timeline",
  AsciiChart = "asciiChart",
  Collapsible = "collapsible",
}

export type NoteKind = "note" | "tip" | "warning" | "important";

/**
 * A contiguous span of message text with a single layout treatment.
 */
export interface ContentSection {
  type: ContentType;
  /** Trimmed raw substring of the message */
  text: string;
  /** Code blocks: language hint from the opening fence */
  language?: string;
  /** Note blocks only */
  noteKind?: NoteKind;
  /** Collapsible sections only */
  title?: string;
}

/**
 * Unit of simulated streaming. Concatenating every token of a message
 * reproduces its content exactly.
 */
export interface RevealToken {
  text: string;
}

export type RevealStatus = "idle" | "running" | "paused" | "completed" | "canceled";
