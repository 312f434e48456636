/**
 * Completion signal detection: does an assistant message read like the
 * model considers the task finished?
 */

export type CompletionSignal = "none" | "phrase" | "markdown_summary" | "both";

const PHRASE_WINDOW = 500;

export const COMPLETION_PHRASES: readonly string[] = [
  "task complete",
  "task completed",
  "successfully completed",
  "work is done",
  "work is complete",
  "everything is done",
  "all done",
  "finished successfully",
  "completed successfully",
];

export const SUMMARY_HEADINGS: readonly string[] = ["summary", "results", "conclusion", "completed", "done", "final"];

// `##` at line start or after whitespace; heading word ends at whitespace or end of text.
const HEADING_RE = new RegExp(`(?:^|\\s)##[ \\t]+(?:${SUMMARY_HEADINGS.join("|")})(?=\\s|$)`, "i");

/** A completion phrase in the last 500 characters, case-insensitive. */
export function hasCompletionPhrase(text: string): boolean {
  const tail = text.slice(-PHRASE_WINDOW).toLowerCase();
  return COMPLETION_PHRASES.some((p) => tail.includes(p));
}

export function hasSummaryHeading(text: string): boolean {
  return HEADING_RE.test(text);
}

export function detectCompletion(text: string): CompletionSignal {
  const phrase = hasCompletionPhrase(text);
  const heading = hasSummaryHeading(text);
  if (phrase && heading) return "both";
  if (phrase) return "phrase";
  if (heading) return "markdown_summary";
  return "none";
}
