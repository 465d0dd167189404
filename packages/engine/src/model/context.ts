/**
 * Compile-time context of a node: the delimiters in effect where its tag was
 * read, plus the location used in diagnostics. Delimiters can change
 * mid-template (`{{=<% %>=}}`), so each node keeps its own.
 */
export interface TemplateContext {
  readonly startChars: string;
  readonly endChars: string;
  readonly file: string;
  readonly line: number;
}

export const DEFAULT_START_CHARS = "{{";
export const DEFAULT_END_CHARS = "}}";

export function createTemplateContext(partial: Partial<TemplateContext> = {}): TemplateContext {
  return {
    startChars: partial.startChars ?? DEFAULT_START_CHARS,
    endChars: partial.endChars ?? DEFAULT_END_CHARS,
    file: partial.file ?? "<inline>",
    line: partial.line ?? 1,
  };
}
