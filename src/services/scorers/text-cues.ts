// src/services/scorers/text-cues.ts: surface cues shared by the pedagogical and clarity scorers

const DEFINITION_CUES =
  /\b(is defined as|refers to|is called|is known as|means|in other words|that is|i\.e\.|we define|definition)\b/gi;
const EXAMPLE_CUES =
  /\b(for example|for instance|e\.g\.|such as|consider|suppose|example|imagine|let's say|worked example)\b/gi;
const TRANSITION_CUES =
  /\b(first|second|third|then|next|finally|therefore|thus|because|so that|as a result|in summary|step \d+)\b/gi;
const VISUAL_CUES = /\b(figure|fig\.|diagram|chart|graph|plot|table|illustrat\w*|visuali[sz]\w*|shown below|see below)\b/gi;
const LIST_ITEM = /^\s*(\d+[.)]|[-*•])\s+/gm;
const WORKED_ARITHMETIC = /\d+(\.\d+)?\s*[=+\-*/×÷^]\s*\d+/;

function count(pattern: RegExp, text: string): number {
  return text.match(pattern)?.length ?? 0;
}

export function definitionCueCount(text: string): number {
  return count(DEFINITION_CUES, text);
}

export function exampleCueCount(text: string): number {
  return count(EXAMPLE_CUES, text);
}

export function transitionCueCount(text: string): number {
  return count(TRANSITION_CUES, text);
}

export function visualCueCount(text: string): number {
  return count(VISUAL_CUES, text);
}

export function listItemCount(text: string): number {
  return count(LIST_ITEM, text);
}

export function hasWorkedArithmetic(text: string): boolean {
  return WORKED_ARITHMETIC.test(text);
}

export function sentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((s) => s.trim())
    .filter((s) => /[\p{L}\p{N}]/u.test(s));
}

/** min(n / saturation, 1) */
export function saturate(n: number, saturation: number): number {
  return saturation <= 0 ? 0 : Math.min(n / saturation, 1);
}
