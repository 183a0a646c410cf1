/**
 * Small text helpers used by the stages.
 */

/** True for undefined, null, or a string that is empty after trimming. */
export function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === "";
}

// File search answers carry markers like 【4:0†source】
const CITATION_MARKER = /【[^】]*】/g;

export function stripCitations(text: string): string {
  return text.replace(CITATION_MARKER, "");
}

/**
 * Join items as English prose: "a", "a and b", "a, b, and c".
 */
export function oxfordJoin(items: readonly string[], conjunction = "and"): string {
  switch (items.length) {
    case 0:
      return "";
    case 1:
      return items[0] ?? "";
    case 2:
      return `${items[0]} ${conjunction} ${items[1]}`;
    default:
      return `${items.slice(0, -1).join(", ")}, ${conjunction} ${items[items.length - 1]}`;
  }
}
