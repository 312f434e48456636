/**
 * Tests for CLI parsing and layered configuration loading.
 */

import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parseArgs, loadConfig, shuttleHome, usage, DEFAULT_MODEL, DEFAULT_BASE_URL } from "../src/cli/config.js";
import { MAX_RETRIES } from "../src/utils/retry.js";

describe("parseArgs", () => {
  test("collects flags and positional task words", () => {
    const p = parseArgs(["-a", "coder", "-m", "m1", "--max-turns", "5", "--no-persist", "-v", "fix", "the", "bug"]);
    assert.deepStrictEqual(p.flags, { agent: "coder", model: "m1", maxTurns: "5", persist: false, verbose: true });
    assert.deepStrictEqual(p.positional, ["fix", "the", "bug"]);
  });

  test("-- ends flag parsing", () => {
    const p = parseArgs(["--", "-v", "literal"]);
    assert.deepStrictEqual(p.flags, {});
    assert.deepStrictEqual(p.positional, ["-v", "literal"]);
  });

  test("--mcp-config is repeatable", () => {
    const p = parseArgs(["--mcp-config", "a.json", "--mcp-config", "b.json"]);
    assert.deepStrictEqual(p.mcpConfigPaths, ["a.json", "b.json"]);
  });

  test("mode flags", () => {
    const p = parseArgs(["--list-agents", "--list-conversations", "-h", "-V", "--config", "c.json"]);
    assert.strictEqual(p.listAgents, true);
    assert.strictEqual(p.listConversations, true);
    assert.strictEqual(p.showHelp, true);
    assert.strictEqual(p.showVersion, true);
    assert.strictEqual(p.configPath, "c.json");
  });

  test("--resume names a saved conversation", () => {
    assert.strictEqual(parseArgs(["--resume", "ab12cd34", "and now the tests"]).resume, "ab12cd34");
    assert.strictEqual(parseArgs(["-r", "ab12cd34"]).resume, "ab12cd34");
    assert.strictEqual(parseArgs([]).resume, null);
  });

  test("a flag missing its value throws", () => {
    assert.throws(() => parseArgs(["--model"]), { message: "--model requires a value" });
  });

  test("unknown flags are ignored", () => {
    const p = parseArgs(["--frobnicate", "task"]);
    assert.deepStrictEqual(p.flags, {});
    assert.deepStrictEqual(p.positional, ["task"]);
  });
});

describe("loadConfig", () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "shuttle-config-"));
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  const writeConfig = (value: unknown, name = "config.json"): string => {
    const path = join(home, name);
    writeFileSync(path, typeof value === "string" ? value : JSON.stringify(value));
    return path;
  };

  test("defaults", () => {
    const cfg = loadConfig([], { SHUTTLE_HOME: home });
    assert.strictEqual(cfg.task, null);
    assert.strictEqual(cfg.agent, "general");
    assert.strictEqual(cfg.model, DEFAULT_MODEL);
    assert.strictEqual(cfg.baseUrl, DEFAULT_BASE_URL);
    assert.strictEqual(cfg.apiKey, "");
    assert.strictEqual(cfg.maxTurns, null);
    assert.strictEqual(cfg.maxRetries, MAX_RETRIES);
    assert.strictEqual(cfg.toolWorkers, 1);
    assert.strictEqual(cfg.turnTimeoutMs, 300_000);
    assert.strictEqual(cfg.toolTimeoutMs, 120_000);
    assert.strictEqual(cfg.temperature, 0.7);
    assert.strictEqual(cfg.persist, true);
    assert.strictEqual(cfg.outputFormat, "text");
    assert.strictEqual(cfg.homeDir, home);
    assert.strictEqual(cfg.conversationDir, join(home, "conversations"));
    assert.strictEqual(cfg.scratchDir, null);
    assert.strictEqual(cfg.resume, null);
    assert.deepStrictEqual(cfg.mcpServers, {});
  });

  test("task is the positional arguments joined", () => {
    const cfg = loadConfig(["list", "the", "files"], { SHUTTLE_HOME: home });
    assert.strictEqual(cfg.task, "list the files");
  });

  test("flags beat env, env beats the config file", () => {
    writeConfig({ model: "file-model", toolWorkers: 2, temperature: 0.2 });
    const cfg = loadConfig(["--tool-workers", "4"], {
      SHUTTLE_HOME: home,
      SHUTTLE_MODEL: "env-model",
      SHUTTLE_TOOL_WORKERS: "3",
    });
    assert.strictEqual(cfg.model, "env-model");
    assert.strictEqual(cfg.toolWorkers, 4);
    assert.strictEqual(cfg.temperature, 0.2);
  });

  test("numeric strings are coerced", () => {
    const cfg = loadConfig(["--max-turns", "7", "--temperature", "1.5"], { SHUTTLE_HOME: home, SHUTTLE_RETRY_BASE_MS: "250" });
    assert.strictEqual(cfg.maxTurns, 7);
    assert.strictEqual(cfg.temperature, 1.5);
    assert.strictEqual(cfg.retryBaseMs, 250);
  });

  test("OPENAI_API_KEY is the fallback key", () => {
    assert.strictEqual(loadConfig([], { SHUTTLE_HOME: home, OPENAI_API_KEY: "test-secret" }).apiKey, "test-secret");
    const both = loadConfig([], { SHUTTLE_HOME: home, OPENAI_API_KEY: "test-secret", SHUTTLE_API_KEY: "test-secret-2" });
    assert.strictEqual(both.apiKey, "test-secret-2");
  });

  test("SHUTTLE_VERBOSE enables verbose output", () => {
    assert.strictEqual(loadConfig([], { SHUTTLE_HOME: home, SHUTTLE_VERBOSE: "1" }).verbose, true);
    assert.strictEqual(loadConfig([], { SHUTTLE_HOME: home, SHUTTLE_VERBOSE: "no" }).verbose, false);
  });

  test("out-of-range values are rejected", () => {
    assert.throws(() => loadConfig(["--tool-workers", "0"], { SHUTTLE_HOME: home }), {
      message: "Invalid configuration: toolWorkers: Number must be greater than or equal to 1",
    });
  });

  test("unknown config file keys are rejected", () => {
    writeConfig({ colour: "red" });
    assert.throws(() => loadConfig([], { SHUTTLE_HOME: home }), {
      message: "Invalid configuration: Unrecognized key(s) in object: 'colour'",
    });
  });

  test("an explicit config file must exist", () => {
    const missing = join(home, "nope.json");
    assert.throws(() => loadConfig(["--config", missing], { SHUTTLE_HOME: home }), {
      message: `Config file not found: ${missing}`,
    });
  });

  test("SHUTTLE_CONFIG names the config file", () => {
    const path = writeConfig({ agent: "coder" }, "other.json");
    assert.strictEqual(loadConfig([], { SHUTTLE_HOME: home, SHUTTLE_CONFIG: path }).agent, "coder");
  });

  test("malformed config files", () => {
    const bad = writeConfig("{not json", "bad.json");
    assert.throws(() => loadConfig(["--config", bad], { SHUTTLE_HOME: home }), /^Error: Failed to parse config file /);
    const arr = writeConfig([1, 2], "arr.json");
    assert.throws(() => loadConfig(["--config", arr], { SHUTTLE_HOME: home }), {
      message: `Config file ${arr} must contain a JSON object`,
    });
  });

  test("--help does not read the config file", () => {
    writeConfig("{not json");
    const cfg = loadConfig(["--help"], { SHUTTLE_HOME: home });
    assert.strictEqual(cfg.showHelp, true);
  });

  test("--mcp-config files merge over the config file's servers", () => {
    writeConfig({ mcpServers: { a: { command: "server-a" }, b: { command: "server-b" } } });
    const extra = writeConfig({ mcpServers: { b: { command: "server-b2", args: ["--stdio"] } } }, "mcp.json");
    const cfg = loadConfig(["--mcp-config", extra], { SHUTTLE_HOME: home });
    assert.deepStrictEqual(cfg.mcpServers, {
      a: { command: "server-a" },
      b: { command: "server-b2", args: ["--stdio"] },
    });
  });
});

describe("shuttleHome", () => {
  test("SHUTTLE_HOME overrides the default", () => {
    assert.strictEqual(shuttleHome({ SHUTTLE_HOME: "/srv/shuttle" }), "/srv/shuttle");
    assert.ok(shuttleHome({}).endsWith(".shuttle"));
  });
});

describe("usage", () => {
  test("documents every mode", () => {
    const text = usage();
    assert.ok(text.includes("--list-agents"));
    assert.ok(text.includes("--output-format"));
    assert.ok(text.includes("SHUTTLE_HOME"));
  });
});
