/**
 * Tests for the process exit helper.
 */

import { test, describe, afterEach } from "node:test";
import assert from "node:assert";
import { settleExit } from "../src/cli/exit.js";

describe("settleExit", () => {
  const before = process.exitCode;
  afterEach(() => {
    process.exitCode = before;
  });

  test("only sets the exit code when every worker stopped", () => {
    const exits: number[] = [];
    settleExit(0, true, (code) => exits.push(code));
    assert.strictEqual(process.exitCode, 0);
    assert.deepStrictEqual(exits, []);
  });

  test("exits at once when a worker is still running", () => {
    const exits: number[] = [];
    settleExit(1, false, (code) => exits.push(code));
    assert.strictEqual(process.exitCode, 1);
    assert.deepStrictEqual(exits, [1]);
  });
});
