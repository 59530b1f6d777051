import { ContentType } from "unfurl-shared";
import { classify } from "./classifier";

describe("classify", () => {
  describe("totality", () => {
    it("should return one plain section for empty input", () => {
      expect(classify("")).toEqual([{ type: ContentType.Plain, text: "" }]);
    });

    it("should return the raw text when cleanup leaves nothing", () => {
      expect(classify("###")).toEqual([{ type: ContentType.Plain, text: "###" }]);
    });

    it("should never throw on odd input", () => {
      const inputs = ["```", "|", "\n\n\n", "<details>", "</details>", "| --- |\n---", "✅"];
      for (const input of inputs) {
        expect(classify(input).length).toBeGreaterThan(0);
      }
    });
  });

  it("should parse a markdown table into one section", () => {
    const text = "| Name | Age |\n| --- | --- |\n| Alice | 30 |\n| Bob | 25 |";

    expect(classify(text)).toEqual([{ type: ContentType.Table, text }]);
  });

  it("should classify a warning as a note block", () => {
    expect(classify("Warning: do not disconnect power.")).toEqual([
      {
        type: ContentType.NoteBlock,
        text: "Warning: do not disconnect power.",
        noteKind: "warning",
      },
    ]);
  });

  it("should keep a numbered list in one step section", () => {
    expect(classify("1. Open the lid\n2. Press the button")).toEqual([
      { type: ContentType.StepByStep, text: "1. Open the lid\n2. Press the button" },
    ]);
  });

  it("should preserve the order of trigger lines", () => {
    const text = [
      "Intro text here",
      "Note: remember this",
      "---",
      "```js",
      "const a = 1;",
      "```",
      "✅ Done",
      "❌ Not done",
    ].join("\n");

    expect(classify(text).map((section) => section.type)).toEqual([
      ContentType.Plain,
      ContentType.NoteBlock,
      ContentType.HorizontalRule,
      ContentType.CodeBlock,
      ContentType.Checklist,
    ]);
  });

  describe("code blocks", () => {
    it("should capture the language and trim blank edges", () => {
      const sections = classify("```ts\n\n  const x = 1;   \n\n```");

      expect(sections).toEqual([{ type: ContentType.CodeBlock, text: "  const x = 1;", language: "ts" }]);
    });

    it("should take fenced lines verbatim", () => {
      const sections = classify("```\nNote: not a note\n| a | b |\n```");

      expect(sections).toEqual([{ type: ContentType.CodeBlock, text: "Note: not a note\n| a | b |" }]);
    });

    it("should close an unterminated fence at end of input", () => {
      expect(classify("Run this:\n```py\nprint(1)")).toEqual([
        { type: ContentType.Plain, text: "Run this:" },
        { type: ContentType.CodeBlock, text: "print(1)", language: "py" },
      ]);
    });
  });

  describe("tables", () => {
    it("should fold plain trailing lines into the table", () => {
      const text = "| A | B |\n| 1 | 2 |\nsome trailing words";

      expect(classify(text)).toEqual([{ type: ContentType.Table, text }]);
    });

    it("should end the table at a summary line", () => {
      const sections = classify("| A | B |\n|---|---|\n| 1 | 2 |\nSummary: both columns matter");

      expect(sections.map((section) => section.type)).toEqual([
        ContentType.Table,
        ContentType.DefinitionList,
      ]);
      expect(sections[1].text).toBe("Summary: both columns matter");
    });
  });

  it("should continue the running section with unmatched lines", () => {
    expect(classify("Q: Why?\nbecause it is")).toEqual([
      { type: ContentType.QaFormat, text: "Q: Why?\nbecause it is" },
    ]);
  });

  it("should split notes of different kinds", () => {
    expect(classify("Note: a\nNote: b\nWarning: c")).toEqual([
      { type: ContentType.NoteBlock, text: "Note: a\nNote: b", noteKind: "note" },
      { type: ContentType.NoteBlock, text: "Warning: c", noteKind: "warning" },
    ]);
  });

  it("should close a collapsible at its closing tag", () => {
    const sections = classify("<details>\n<summary>More</summary>\nHidden text\n</details>\nAfter");

    expect(sections).toEqual([
      {
        type: ContentType.Collapsible,
        text: "<details>\n<summary>More</summary>\nHidden text\n</details>",
        title: "More",
      },
      { type: ContentType.Plain, text: "After" },
    ]);
  });

  it("should emit horizontal rules on their own", () => {
    expect(classify("a\n***\nb").map((section) => section.type)).toEqual([
      ContentType.Plain,
      ContentType.HorizontalRule,
      ContentType.Plain,
    ]);
  });
});
