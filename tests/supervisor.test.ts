/**
 * Execution supervisor: budget, compilation and the vm run
 */

import { ComplexityLimitError, ScriptTimeoutError } from "../src/core/errors";
import { CancellationToken } from "../src/core/sandbox/cancellation";
import { CapabilityTableBuilder, FinalAnswerSlot } from "../src/core/sandbox/capabilities";
import { parseScript, rewriteScript } from "../src/core/sandbox/preprocessor";
import { ExecutionSupervisor, assertWithinCeiling, compileUnit, computeTimeoutMs } from "../src/core/sandbox/supervisor";
import { delayed, silentLogger } from "./helpers/sandboxHarness";

const policy = { minTimeoutMs: 3_000, perCallTimeoutMs: 50_000 };

function tableWith(bindings: Record<string, unknown>, asyncNames: string[] = []) {
  const builder = new CapabilityTableBuilder();
  for (const [name, value] of Object.entries(bindings)) {
    builder.add(name, "binding", value, { async: asyncNames.includes(name) });
  }
  return builder.build(new FinalAnswerSlot());
}

function unitFor(text: string, asyncNames: string[] = []) {
  return compileUnit(rewriteScript(parseScript(text), new Set(asyncNames)));
}

describe("computeTimeoutMs", () => {
  test("should use the minimum for few calls", () => {
    expect(computeTimeoutMs(0, policy)).toBe(3_000);
  });

  test("should scale with the call count", () => {
    expect(computeTimeoutMs(1, policy)).toBe(50_000);
    expect(computeTimeoutMs(4, policy)).toBe(200_000);
  });
});

describe("assertWithinCeiling", () => {
  test("should allow the limit itself", () => {
    expect(() => assertWithinCeiling(20, 20)).not.toThrow();
  });

  test("should reject one call over the limit", () => {
    expect(() => assertWithinCeiling(21, 20)).toThrow(new ComplexityLimitError(21, 20));
  });
});

describe("compileUnit", () => {
  test("should wrap the script in one async function", () => {
    const { code } = unitFor("const a = 1;\nreturn a;");
    expect(code).toContain("(async function __main() {");
  });

  test("should guard loop bodies with a checkpoint", () => {
    const { code } = unitFor("let n = 0;\nwhile (n < 3) n++;\nfor (const v of [1]) { n += v; }");
    expect(code.match(/__checkpoint\(\);/g)).toHaveLength(2);
  });

  test("should strip type annotations", () => {
    const { code } = unitFor("const n: number = 1;\nreturn n;");
    expect(code).not.toContain(": number");
  });
});

describe("ExecutionSupervisor", () => {
  const supervisor = new ExecutionSupervisor(silentLogger());

  test("should run against the table's bindings", async () => {
    const table = tableWith({ double: (n: number) => n * 2 });

    await expect(supervisor.run(unitFor("return double(21);"), table, new CancellationToken(1_000))).resolves.toBe(42);
  });

  test("should await suspending bindings", async () => {
    const table = tableWith({ fetchValue: () => delayed(5, "fetched") }, ["fetchValue"]);
    const unit = unitFor("const v = fetchValue();\nreturn v + '!';", ["fetchValue"]);

    await expect(supervisor.run(unit, table, new CancellationToken(1_000))).resolves.toBe("fetched!");
  });

  test("should hide host globals", async () => {
    const unit = unitFor("return [typeof process, typeof require, typeof setTimeout];");
    await expect(supervisor.run(unit, tableWith({}), new CancellationToken(1_000))).resolves.toEqual([
      "undefined",
      "undefined",
      "undefined",
    ]);
  });

  test("should time out a spinning loop", async () => {
    const unit = unitFor("while (true) {}");
    await expect(supervisor.run(unit, tableWith({}), new CancellationToken(50))).rejects.toBeInstanceOf(ScriptTimeoutError);
  });

  test("should time out a call that outlives the budget", async () => {
    const table = tableWith({ wait: () => delayed(150, "late") }, ["wait"]);
    const token = new CancellationToken(50);

    await expect(supervisor.run(unitFor("const v = wait();\nreturn v;", ["wait"]), table, token)).rejects.toThrow(
      "Execution timed out after 0.05 seconds"
    );
    expect(token.isCancelled).toBe(true);
  });

  test("should let script errors through", async () => {
    const unit = unitFor("throw new RangeError('bad');");
    await expect(supervisor.run(unit, tableWith({}), new CancellationToken(1_000))).rejects.toMatchObject({
      name: "RangeError",
      message: "bad",
    });
  });
});
