/**
 * Tests for completion signal detection.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { detectCompletion, hasCompletionPhrase, hasSummaryHeading } from "../src/core/completion.js";

describe("hasCompletionPhrase", () => {
  test("matches case-insensitively", () => {
    assert.strictEqual(hasCompletionPhrase("The refactor is finished. TASK COMPLETE."), true);
    assert.strictEqual(hasCompletionPhrase("Everything Is Done"), true);
  });

  test("only looks at the last 500 characters", () => {
    const early = "all done. " + "x".repeat(600);
    assert.strictEqual(hasCompletionPhrase(early), false);
    const late = "x".repeat(600) + " all done.";
    assert.strictEqual(hasCompletionPhrase(late), true);
  });

  test("ignores ordinary progress text", () => {
    assert.strictEqual(hasCompletionPhrase("Reading the config file next."), false);
  });
});

describe("hasSummaryHeading", () => {
  test("matches a heading at the start of a line", () => {
    assert.strictEqual(hasSummaryHeading("Work log\n## Summary\nChanged two files."), true);
    assert.strictEqual(hasSummaryHeading("## results\n- ok"), true);
  });

  test("matches a heading after whitespace mid-line", () => {
    assert.strictEqual(hasSummaryHeading("Wrapping up. ## Conclusion"), true);
  });

  test("requires the heading word to end there", () => {
    assert.strictEqual(hasSummaryHeading("## Summaries of each module"), false);
    assert.strictEqual(hasSummaryHeading("## Finalize the plan"), false);
  });

  test("ignores other headings and deeper levels glued to text", () => {
    assert.strictEqual(hasSummaryHeading("## Plan\n1. read"), false);
    assert.strictEqual(hasSummaryHeading("see#### summary"), false);
  });
});

describe("detectCompletion", () => {
  test("none", () => {
    assert.strictEqual(detectCompletion("Let me list the directory first."), "none");
  });

  test("phrase", () => {
    assert.strictEqual(detectCompletion("I updated the README. Task completed."), "phrase");
  });

  test("markdown_summary", () => {
    assert.strictEqual(detectCompletion("## Final\nThe tests pass."), "markdown_summary");
  });

  test("both", () => {
    assert.strictEqual(detectCompletion("We are all done! ## Summary\n- created notes.md"), "both");
  });

  test("empty text", () => {
    assert.strictEqual(detectCompletion(""), "none");
  });
});
