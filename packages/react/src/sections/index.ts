/**
 * React renderers for presentation nodes
 */

export { SectionRenderer, type SectionRendererProps } from "./SectionRenderer";
export { SectionList, type SectionListProps } from "./SectionList";
export { ProseBlock } from "./ProseBlock";
export { CodeBlock } from "./CodeBlock";
export { TableBlock } from "./TableBlock";
export { QaBlock } from "./QaBlock";
export { NoteBlock } from "./NoteBlock";
export { ChecklistBlock } from "./ChecklistBlock";
export { DialogueBlock } from "./DialogueBlock";
export { DefinitionsBlock } from "./DefinitionsBlock";
export { StepsBlock } from "./StepsBlock";
export { TimelineBlock } from "./TimelineBlock";
export { MonospaceBlock } from "./MonospaceBlock";
export { CollapsibleBlock } from "./CollapsibleBlock";
