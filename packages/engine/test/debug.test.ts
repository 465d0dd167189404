/**
 * Unit tests for Debug Channels.
 *
 * - Channel enable/disable via MOUSTACHE_DEBUG
 * - Pretty and JSON formatting
 * - Channels used by nodes and bindings
 */
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import {
  DefaultNode,
  configureDebug,
  debug,
  getDebugChannel,
  isDebugEnabled,
  parseDebugChannels,
  refreshDebugChannels,
  type ObjectHandler,
} from "../src/index.js";
import { root, text } from "./_helpers/tree.js";

// =============================================================================
// Test Helpers
// =============================================================================

function captureOutput(): { messages: string[]; restore: () => void } {
  const messages: string[] = [];
  configureDebug({ output: (msg) => messages.push(msg) });
  return {
    messages,
    restore: () => configureDebug({ format: "pretty", timestamps: false, output: console.log }),
  };
}

function setDebugEnv(value: string | undefined): void {
  if (value === undefined) {
    delete process.env["MOUSTACHE_DEBUG"];
  } else {
    process.env["MOUSTACHE_DEBUG"] = value;
  }
  refreshDebugChannels();
}

let originalEnv: string | undefined;

beforeEach(() => {
  originalEnv = process.env["MOUSTACHE_DEBUG"];
});

afterEach(() => {
  setDebugEnv(originalEnv);
  configureDebug({ format: "pretty", timestamps: false, output: console.log });
});

// =============================================================================
// Activation
// =============================================================================

describe("debug channel activation", () => {
  test("channels are disabled without the variable", () => {
    setDebugEnv(undefined);
    expect(isDebugEnabled()).toBe(false);
    expect(isDebugEnabled("resolve")).toBe(false);
  });

  test("single and multiple channels", () => {
    setDebugEnv("resolve");
    expect(isDebugEnabled("resolve")).toBe(true);
    expect(isDebugEnabled("node")).toBe(false);

    setDebugEnv("resolve,node");
    expect(isDebugEnabled("node")).toBe(true);
    expect(isDebugEnabled("render")).toBe(false);
  });

  test.each(["*", "1", "true"])("%s enables every channel", (value) => {
    setDebugEnv(value);
    expect(isDebugEnabled("node")).toBe(true);
    expect(isDebugEnabled("anything")).toBe(true);
  });

  test.each(["", "0", "false"])("%j disables every channel", (value) => {
    setDebugEnv(value);
    expect(isDebugEnabled()).toBe(false);
  });

  test("names are trimmed and case-insensitive", () => {
    expect(parseDebugChannels("  Node , RESOLVE ,, ")).toEqual(new Set(["node", "resolve"]));
  });

  test("disabled channels produce no output", () => {
    setDebugEnv("render");
    const { messages, restore } = captureOutput();

    debug.node("init");
    debug.render("identity");

    expect(messages).toEqual(["[render.identity]"]);
    restore();
  });

  test("extra channels follow the same switch", () => {
    setDebugEnv("cache");
    const { messages, restore } = captureOutput();

    getDebugChannel("Cache")("evict", { size: 3 });
    getDebugChannel("other")("ignored");

    expect(messages).toEqual(["[cache.evict] { size=3 }"]);
    restore();
  });
});

// =============================================================================
// Formatting
// =============================================================================

describe("pretty formatting", () => {
  beforeEach(() => {
    setDebugEnv("*");
  });

  test("formats scalar data inline", () => {
    const { messages, restore } = captureOutput();

    debug.node("test", { name: "foo", count: 42, ok: true, nothing: null, missing: undefined });

    expect(messages[0]).toBe('[node.test] { name="foo", count=42, ok=true, nothing=null, missing=undefined }');
    restore();
  });

  test("truncates long strings and summarizes large arrays", () => {
    const { messages, restore } = captureOutput();

    debug.node("test", { value: "a".repeat(100), items: [1, 2, 3, 4] });

    expect(messages[0]).toBe(`[node.test] { value="${"a".repeat(57)}...", items=[4 items] }`);
    restore();
  });

  test("formats errors and named objects compactly", () => {
    const { messages, restore } = captureOutput();

    debug.resolve("test", { error: new TypeError("bad"), node: { kind: "section" }, owner: { name: "x" } });

    expect(messages[0]).toBe("[resolve.test] { error=<TypeError: bad>, node=<section>, owner=<x> }");
    restore();
  });

  test("timestamps prefix the label", () => {
    configureDebug({ timestamps: true });
    const { messages, restore } = captureOutput();

    debug.node("test");

    expect(messages[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[node\.test\]$/);
    restore();
  });
});

describe("JSON formatting", () => {
  beforeEach(() => {
    setDebugEnv("*");
    configureDebug({ format: "json", timestamps: false });
  });

  test("outputs valid JSON", () => {
    const { messages, restore } = captureOutput();

    debug.resolve("cache.miss", { name: "a", index: 0 });

    expect(JSON.parse(messages[0] ?? "")).toEqual({
      channel: "resolve",
      point: "cache.miss",
      data: { name: "a", index: 0 },
    });
    restore();
  });

  test("keeps the name and message of errors", () => {
    const { messages, restore } = captureOutput();

    debug.render("render.failed", { node: "<root>", error: new TypeError("boom") });

    expect(JSON.parse(messages[0] ?? "")).toEqual({
      channel: "render",
      point: "render.failed",
      data: { node: "<root>", error: { name: "TypeError", message: "boom" } },
    });
    restore();
  });

  test("omits data when none is given", () => {
    const { messages, restore } = captureOutput();

    debug.node("init");

    expect(JSON.parse(messages[0] ?? "")).toEqual({ channel: "node", point: "init" });
    restore();
  });
});

// =============================================================================
// Engine call sites
// =============================================================================

describe("engine channels", () => {
  test("init reports each node once", () => {
    setDebugEnv("node");
    const { messages, restore } = captureOutput();
    const tree = root([text("a")]);

    tree.init();
    tree.init();

    expect(messages).toEqual([
      '[node.init] { node="<anonymous>", kind="" }',
      '[node.init] { node="<anonymous>", kind="" }',
    ]);
    restore();
  });

  test("binding failures are logged on the resolve channel", () => {
    setDebugEnv("resolve");
    const { messages, restore } = captureOutput();
    const failing: ObjectHandler = {
      createBinding: () => ({
        get: () => {
          throw new RangeError("too deep");
        },
      }),
    };

    const value = new DefaultNode({ name: "deep", handler: failing }).get([{}]);

    expect(value).toBeUndefined();
    expect(messages).toEqual(['[resolve.binding.failed] { node="deep", error=<RangeError: too deep> }']);
    restore();
  });
});
