/**
 * Sandbox engine: end-to-end behaviour of one execution request
 */

import { EventBus } from "../src/core/eventBus";
import { ToolEngine } from "../src/core/tool-engine";
import { registerBuiltinTools } from "../src/core/tools/builtinTools";
import { createTestEngine, delayed, expectFailure, expectSuccess } from "./helpers/sandboxHarness";

const echo = { params: ["text"], run: (text: unknown) => text };

describe("SandboxEngine", () => {
  describe("Complexity ceiling", () => {
    test("should reject more than 20 calls before touching any capability", async () => {
      const { engine, registry } = createTestEngine({ tools: { echo } });
      const script = Array.from({ length: 21 }, (_, i) => `echo(${i});`).join("\n");

      const failure = expectFailure(await engine.execute({ scriptText: script }));

      expect(failure.kind).toBe("ValidationError");
      expect(failure.message).toBe("Too many functions (21 > 20)");
      expect(registry.invocations).toHaveLength(0);
      expect(registry.listCalls).toBe(0);
    });

    test("should accept exactly 20 calls", async () => {
      const { engine } = createTestEngine({ tools: { echo } });
      const script = Array.from({ length: 20 }, (_, i) => `echo(${i});`).join("\n");

      const success = expectSuccess(await engine.execute({ scriptText: script }));
      expect(success.calls).toBe(20);
    });
  });

  describe("Timeout budget", () => {
    test("should size the timeout from the call count", async () => {
      const { engine } = createTestEngine({ tools: { echo } });

      const success = expectSuccess(await engine.execute({ scriptText: 'const v = echo("a");\nreturn v;' }));

      expect(success.calls).toBe(1);
      expect(success.timeoutMs).toBe(50_000);
    });

    test("should fall back to the minimum timeout without calls", async () => {
      const { engine } = createTestEngine();

      const success = expectSuccess(await engine.execute({ scriptText: "const v = 1;\nreturn v;" }));
      expect(success.timeoutMs).toBe(3_000);
    });

    test("should stop a script that loops forever without suspending", async () => {
      const { engine } = createTestEngine({ config: { minTimeoutMs: 200 } });

      const failure = expectFailure(await engine.execute({ scriptText: "let n = 0;\nwhile (true) { n++; }" }));

      expect(failure.kind).toBe("TimeoutError");
      expect(failure.message).toBe("Execution timed out after 0.2 seconds");
    });

    test("should stop a loop that starts spinning after a tool call", async () => {
      const { engine } = createTestEngine({
        tools: { echo },
        config: { minTimeoutMs: 200, perCallTimeoutMs: 100 },
      });

      const failure = expectFailure(
        await engine.execute({ scriptText: 'const v = echo("go");\nlet n = 0;\nwhile (v) { n++; }' })
      );

      expect(failure.kind).toBe("TimeoutError");
    });

    test("should time out a tool call that never finishes", async () => {
      const { engine } = createTestEngine({
        tools: { hang: { params: [], run: () => new Promise(() => undefined) } },
        config: { minTimeoutMs: 100, perCallTimeoutMs: 100 },
      });

      const failure = expectFailure(await engine.execute({ scriptText: "const v = hang();\nreturn v;" }));

      expect(failure.kind).toBe("TimeoutError");
      expect(failure.message).toBe("Execution timed out after 0.1 seconds");
    });
  });

  describe("Result shape", () => {
    test("should name a returned identifier", async () => {
      const { engine } = createTestEngine();

      const success = expectSuccess(await engine.execute({ scriptText: "const x = 41 + 1;\nreturn x;" }));
      expect(success.result).toEqual({ x: 42 });
    });

    test("should return an assigned result without a return statement", async () => {
      const { engine } = createTestEngine();

      const success = expectSuccess(await engine.execute({ scriptText: "result = 5;" }));
      expect(success.result).toEqual({ result: 5 });
    });

    test("should return an assigned result when the only return is conditional", async () => {
      const { engine } = createTestEngine();

      const success = expectSuccess(
        await engine.execute({ scriptText: 'const flag = false;\nif (flag) {\n  return "early";\n}\nresult = 5;' })
      );
      expect(success.result).toEqual({ result: 5 });
    });

    test("should run a script whose strings contain stray delimiters unchanged", async () => {
      const { engine } = createTestEngine();
      const script = 'const s = "run `ls` now";\nconst q = \'"""\';\nconst t = "a`b";\nreturn t;';

      const success = expectSuccess(await engine.execute({ scriptText: script }));
      expect(success.result).toEqual({ t: "a`b" });
    });

    test("should read an outcome-shaped object as a tool outcome", async () => {
      const { engine } = createTestEngine();

      const success = expectSuccess(
        await engine.execute({ scriptText: 'const data = { success: true, content: "hi", error: null };\nreturn data;' })
      );
      expect(success.result).toEqual({ data: "hi" });
    });

    test("should pass JSON-safe values through unchanged", async () => {
      const { engine } = createTestEngine();
      const script = 'const data = { n: 1.5, s: "x", list: [1, [2, { deep: true }]], none: null };\nreturn data;';

      const success = expectSuccess(await engine.execute({ scriptText: script }));
      expect(success.result).toEqual({ data: { n: 1.5, s: "x", list: [1, [2, { deep: true }]], none: null } });
    });

    test("should use the first finalAnswer when nothing is returned", async () => {
      const { engine } = createTestEngine();

      const success = expectSuccess(await engine.execute({ scriptText: 'finalAnswer("done");\nfinalAnswer("ignored");' }));
      expect(success.result).toEqual({ result: "done" });
    });

    test("should serialize text bundles returned by tools", async () => {
      const { engine } = createTestEngine({
        tools: { lines: { params: [], run: () => ({ content: [{ text: "a" }, { text: "b" }] }) } },
      });

      const success = expectSuccess(await engine.execute({ scriptText: "const page = lines();\nreturn page;" }));
      expect(success.result).toEqual({ page: "a\nb" });
    });
  });

  describe("Tool calls", () => {
    test("should execute keyword-style arguments as positional ones", async () => {
      const pair = { params: ["x", "y"], run: (x: unknown, y: unknown) => `${x}-${y}` };
      const keyword = createTestEngine({ tools: { pair } });
      const positional = createTestEngine({ tools: { pair } });

      const a = expectSuccess(await keyword.engine.execute({ scriptText: "const v = pair(x = 1, y = 2);\nreturn v;" }));
      const b = expectSuccess(await positional.engine.execute({ scriptText: "const v = pair(1, 2);\nreturn v;" }));

      expect(a.result).toEqual({ v: "1-2" });
      expect(a.result).toEqual(b.result);
      expect(keyword.registry.invocations).toEqual([{ name: "pair", args: [1, 2] }]);
    });

    test("should pass a keyword flag to sorted by position", async () => {
      const { engine } = createTestEngine();

      const success = expectSuccess(await engine.execute({ scriptText: "const xs = sorted([3, 1, 2], reverse = true);\nreturn xs;" }));
      expect(success.result).toEqual({ xs: [3, 2, 1] });
    });

    test("should keep parallel results in input order", async () => {
      const finished: string[] = [];
      const { engine } = createTestEngine({
        tools: {
          toolA: { params: ["n"], run: (n: unknown) => delayed(50, `A:${n}`).then((v) => (finished.push("toolA"), v)) },
          toolB: { params: ["n"], run: (n: unknown) => delayed(5, `B:${n}`).then((v) => (finished.push("toolB"), v)) },
        },
      });

      const success = expectSuccess(
        await engine.execute({ scriptText: 'const both = parallel([toolA, 1], ["toolB", 2]);\nreturn both;' })
      );

      expect(finished).toEqual(["toolB", "toolA"]);
      expect(success.result).toEqual({ both: ["A:1", "B:2"] });
    });

    test("should reject a malformed parallel call", async () => {
      const { engine } = createTestEngine({ tools: { echo } });

      const failure = expectFailure(await engine.execute({ scriptText: "const r = parallel(echo);\nreturn r;" }));

      expect(failure.kind).toBe("ArgumentError");
      expect(failure.message).toContain("parallel() call 0 must be an array of [tool, ...args]");
    });

    test("should fail with the error of a failed tool outcome", async () => {
      const { engine, store } = createTestEngine({
        tools: { fetch_page: { params: ["url"], run: () => ({ success: false, content: null, error: "page unreachable" }) } },
      });

      const failure = expectFailure(
        await engine.execute({ scriptText: 'const page = fetch_page("https://example.test");\nreturn page;', sessionId: "s1" })
      );

      expect(failure.kind).toBe("ToolFailureError");
      expect(failure.message).toBe("page unreachable");
      expect(await store.list()).toEqual([]);
    });

    test("should fail on an error string returned by a tool", async () => {
      const { engine } = createTestEngine({ tools: { echo } });

      const failure = expectFailure(await engine.execute({ scriptText: 'const msg = echo("Error: not reachable");\nreturn msg;' }));

      expect(failure.kind).toBe("ToolFailureError");
      expect(failure.message).toBe("Error: not reachable");
    });

    test("should report an arity mismatch from the tool engine", async () => {
      const eventBus = new EventBus();
      const tools = new ToolEngine(eventBus);
      registerBuiltinTools(tools);
      const { engine } = createTestEngine({ registry: tools });

      const failure = expectFailure(await engine.execute({ scriptText: "const s = add(1);\nreturn s;" }));

      expect(failure.kind).toBe("ArgumentError");
      expect(failure.message).toContain("Tool add expects 2 args, got 1");
    });

    test("should run the built-in tools end to end", async () => {
      const tools = new ToolEngine(new EventBus());
      registerBuiltinTools(tools);
      const { engine } = createTestEngine({ registry: tools });

      const success = expectSuccess(
        await engine.execute({ scriptText: 'const total = add(2, 3);\nconst words = word_count("one two three");\nreturn { total, words };' })
      );

      expect(success.result).toEqual({ total: 5, words: 3 });
    });
  });

  describe("Sessions", () => {
    test("should merge results into the session and expose them to later runs", async () => {
      const { engine, store } = createTestEngine();

      expectSuccess(await engine.execute({ scriptText: "const a = 1;\nreturn a;", sessionId: "s1" }));
      expectSuccess(await engine.execute({ scriptText: "const b = 2;\nreturn b;", sessionId: "s1" }));
      expect(await store.load("s1")).toEqual({ a: 1, b: 2 });

      const success = expectSuccess(await engine.execute({ scriptText: "const total = a + b;\nreturn total;", sessionId: "s1" }));
      expect(success.result).toEqual({ total: 3 });
    });

    test("should expose session values through globalsSchema", async () => {
      const { engine, store } = createTestEngine();
      await store.save("s1", { urls: ["a", "b"] });

      const success = expectSuccess(
        await engine.execute({ scriptText: 'const found = globalsSchema.urls;\nconst missing = globalsSchema.pages ?? "";\nreturn { found, missing };', sessionId: "s1" })
      );
      expect(success.result).toEqual({ found: ["a", "b"], missing: "" });
    });

    test("should default the session id", async () => {
      const { engine, store } = createTestEngine();

      expectSuccess(await engine.execute({ scriptText: "const a = 1;\nreturn a;" }));
      expect(await store.list()).toEqual(["default_session"]);
    });
  });

  describe("Failures", () => {
    test("should classify a script that does not parse", async () => {
      const { engine } = createTestEngine();

      const failure = expectFailure(await engine.execute({ scriptText: "const = ;" }));

      expect(failure.kind).toBe("StructuralError");
      expect(failure.message).toMatch(/^SyntaxError: /);
    });

    test("should classify a blank script", async () => {
      const { engine } = createTestEngine();

      const failure = expectFailure(await engine.execute({ scriptText: "   \n  " }));

      expect(failure.kind).toBe("StructuralError");
      expect(failure.message).toBe("Script is empty");
    });

    test("should hint at missing browser tools", async () => {
      const { engine } = createTestEngine({ tools: { echo } });

      const failure = expectFailure(await engine.execute({ scriptText: 'const tab = open_tab("https://example.test");\nreturn tab;' }));

      expect(failure.kind).toBe("UnknownSymbolError");
      expect(failure.message).toBe(
        "ReferenceError: open_tab is not defined\n\nHint: Browser tools are not available. Make sure the browser tool server is running."
      );
      expect(failure.traceback).toBeDefined();
    });

    test("should classify reading a property of a missing value", async () => {
      const { engine } = createTestEngine({ tools: { echo } });

      const failure = expectFailure(await engine.execute({ scriptText: "const page = echo(null);\nreturn page.title;" }));

      expect(failure.kind).toBe("AttributeAccessError");
      expect(failure.message.split("\n")[0]).toBe("AttributeAccessError: 'title' could not be accessed.");
    });

    test("should classify use before initialization", async () => {
      const { engine } = createTestEngine();

      const failure = expectFailure(await engine.execute({ scriptText: "const r = y + 1;\nconst y = 2;\nreturn r;" }));

      expect(failure.kind).toBe("UnboundReferenceError");
      expect(failure.message.split("\n")[0]).toBe("UnboundReferenceError: Variable 'y' was accessed before being assigned a value.");
    });

    test("should not expose host globals", async () => {
      const { engine } = createTestEngine();

      const failure = expectFailure(await engine.execute({ scriptText: "const p = process.env;\nreturn p;" }));
      expect(failure.kind).toBe("UnknownSymbolError");
    });

    test("should refuse string code generation", async () => {
      const { engine } = createTestEngine();

      const failure = expectFailure(await engine.execute({ scriptText: 'const v = eval("1 + 1");\nreturn v;' }));
      expect(failure.kind).toBe("GenericRuntimeError");
    });
  });

  describe("Events", () => {
    test("should emit start and finish events", async () => {
      const { engine, eventBus } = createTestEngine();

      expectSuccess(await engine.execute({ scriptText: "const a = 1;\nreturn a;" }));

      expect(eventBus.history.map((e) => e.type)).toEqual(["ScriptStartEvent", "SessionSaveEvent", "ScriptFinishEvent"]);
    });

    test("should emit an error event with the kind", async () => {
      const { engine, eventBus } = createTestEngine();

      expectFailure(await engine.execute({ scriptText: "const = ;" }));

      const [errorEvent] = eventBus.getHistory({ type: "ScriptErrorEvent" });
      expect(errorEvent.payload).toMatchObject({ kind: "StructuralError", sessionId: "default_session" });
    });
  });
});
