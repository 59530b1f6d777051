/**
 * Presentation nodes produced by the section renderer.
 *
 * A discriminated union on `kind`; UI bindings switch on it and never look at
 * the raw section text again.
 */

import type { NoteKind } from "unfurl-shared";

export interface ProseNode {
  kind: "prose";
  text: string;
}

export interface CodeNode {
  kind: "code";
  code: string;
  language?: string;
  /** Text placed on the clipboard by the copy affordance */
  copyText: string;
}

export interface TableNode {
  kind: "table";
  headers: string[];
  /** Every row has exactly `headers.length` cells */
  rows: string[][];
  /** Non-row lines folded into the table, such as a closing summary */
  footnotes: string[];
}

export interface QaEntry {
  role: "question" | "answer" | "body";
  text: string;
}

export interface QaNode {
  kind: "qa";
  entries: QaEntry[];
}

export interface NoteNode {
  kind: "note";
  noteKind: NoteKind;
  text: string;
}

export interface ChecklistItem {
  checked: boolean;
  text: string;
}

export interface ChecklistNode {
  kind: "checklist";
  items: ChecklistItem[];
}

export type DialogueSide = "user" | "agent";

export interface DialogueTurn {
  speaker?: string;
  side: DialogueSide;
  text: string;
}

export interface DialogueNode {
  kind: "dialogue";
  turns: DialogueTurn[];
}

export interface DefinitionEntry {
  term?: string;
  definition: string;
}

export interface DefinitionsNode {
  kind: "definitions";
  entries: DefinitionEntry[];
}

export interface Step {
  /** Sequential from 1; absent for lines that are not steps */
  number?: number;
  text: string;
}

export interface StepsNode {
  kind: "steps";
  steps: Step[];
}

export interface TimelineEvent {
  /** Date or heading before the colon, when the line has one */
  label?: string;
  text: string;
}

export interface TimelineNode {
  kind: "timeline";
  events: TimelineEvent[];
}

export interface MonospaceNode {
  kind: "monospace";
  variant: "math" | "ascii";
  text: string;
}

export interface RuleNode {
  kind: "rule";
}

export interface CollapsibleNode {
  kind: "collapsible";
  title: string;
  body: string;
}

export type PresentationNode =
  | ProseNode
  | CodeNode
  | TableNode
  | QaNode
  | NoteNode
  | ChecklistNode
  | DialogueNode
  | DefinitionsNode
  | StepsNode
  | TimelineNode
  | MonospaceNode
  | RuleNode
  | CollapsibleNode;

export type PresentationKind = PresentationNode["kind"];
