import { ContentType, type ContentSection, type NoteKind } from "unfurl-shared";
import { cleanup } from "./cleanup";
import {
  collapsibleTitle,
  fenceLanguage,
  isFenceLine,
  isHorizontalRule,
  isTableLine,
  isTableSummaryLine,
  matchLine,
  noteKindOf,
} from "./predicates";

/**
 * Accumulates lines of the section currently being built.
 */
class SectionAccumulator {
  readonly sections: ContentSection[] = [];
  type: ContentType = ContentType.Plain;
  private lines: string[] = [];
  private noteKind?: NoteKind;
  private title?: string;
  private language?: string;

  get isEmpty(): boolean {
    return this.lines.every((line) => line.trim() === "");
  }

  begin(type: ContentType, firstLine?: string): void {
    this.flush();
    this.type = type;
    if (firstLine === undefined) return;
    if (type === ContentType.NoteBlock) this.noteKind = noteKindOf(firstLine);
    if (type === ContentType.Collapsible) this.title = collapsibleTitle(firstLine);
  }

  beginCode(language: string): void {
    this.flush();
    this.type = ContentType.CodeBlock;
    this.language = language;
  }

  append(line: string): void {
    if (this.type === ContentType.Collapsible && this.title === "Details" && line.includes("<summary>")) {
      this.title = collapsibleTitle(line);
    }
    this.lines.push(line);
  }

  /** Emit the accumulated section, if it holds anything. */
  flush(): void {
    if (!this.isEmpty) {
      this.sections.push(this.build());
    }
    this.lines = [];
    this.type = ContentType.Plain;
    this.noteKind = undefined;
    this.title = undefined;
    this.language = undefined;
  }

  rule(): void {
    this.flush();
    this.sections.push({ type: ContentType.HorizontalRule, text: "" });
  }

  currentNoteKind(): NoteKind | undefined {
    return this.noteKind;
  }

  private build(): ContentSection {
    if (this.type === ContentType.CodeBlock) {
      return {
        type: ContentType.CodeBlock,
        text: trimBlankLines(this.lines).join("\n"),
        ...(this.language ? { language: this.language } : {}),
      };
    }
    const section: ContentSection = { type: this.type, text: this.lines.join("\n").trim() };
    if (this.noteKind) section.noteKind = this.noteKind;
    if (this.title) section.title = this.title;
    return section;
  }
}

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === "") start++;
  while (end > start && lines[end - 1].trim() === "") end--;
  return lines.slice(start, end).map((line) => line.replace(/\s+$/, ""));
}

/**
 * Segment assistant text into typed sections.
 *
 * Single pass over the lines of the cleaned text. Inside a code fence every
 * line is taken verbatim; elsewhere the first matching predicate decides the
 * line's type, and a change of type closes the running section. Lines that
 * match nothing continue the running section.
 *
 * Never throws; text that yields no section comes back as one plain section.
 *
 * @example
 * ```typescript
 * classify('Warning: do not disconnect power.');
 * // [{ type: 'noteBlock', text: 'Warning: do not disconnect power.', noteKind: 'warning' }]
 * ```
 */
export function classify(text: string): ContentSection[] {
  const acc = new SectionAccumulator();
  let inFence = false;

  for (const line of cleanup(text).split("\n")) {
    if (isFenceLine(line)) {
      if (inFence) {
        acc.flush();
      } else {
        acc.beginCode(fenceLanguage(line));
      }
      inFence = !inFence;
      continue;
    }

    if (inFence) {
      acc.append(line);
      continue;
    }

    if (isTableLine(line)) {
      if (acc.type !== ContentType.Table) acc.begin(ContentType.Table);
      acc.append(line);
      continue;
    }

    if (acc.type === ContentType.Table && !line.includes("---")) {
      if (!isTableSummaryLine(line)) {
        acc.append(line);
        continue;
      }
      acc.flush();
    }

    if (isHorizontalRule(line)) {
      acc.rule();
      continue;
    }

    if (acc.type === ContentType.Collapsible && line.trim() === "</details>") {
      acc.append(line);
      acc.flush();
      continue;
    }

    const matched = matchLine(line);
    if (matched !== undefined && shouldStartSection(acc, matched, line)) {
      acc.begin(matched, line);
    }
    acc.append(line);
  }

  acc.flush();

  if (acc.sections.length === 0) {
    return [{ type: ContentType.Plain, text }];
  }
  return acc.sections;
}

function shouldStartSection(acc: SectionAccumulator, matched: ContentType, line: string): boolean {
  if (matched !== acc.type) return true;
  // A note of a different kind gets its own callout
  return matched === ContentType.NoteBlock && acc.currentNoteKind() !== noteKindOf(line);
}
