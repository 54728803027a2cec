/**
 * Error classifier
 */

import vm from "vm";
import { createConfig } from "../src/core/config";
import {
  ComplexityLimitError,
  ScriptTimeoutError,
  StructuralError,
  ToolArgumentError,
  ToolNotFoundError,
} from "../src/core/errors";
import { classifyError } from "../src/core/sandbox/classifier";

const context = { optionalCapabilityGroups: createConfig().optionalCapabilityGroups };
const BROWSER_HINT = "Browser tools are not available. Make sure the browser tool server is running.";

/**
 * Errors thrown inside a separate realm, as sandboxed scripts throw them
 */
function thrownBy(code: string): unknown {
  try {
    vm.runInNewContext(code);
  } catch (e) {
    return e;
  }
  throw new Error(`Expected to throw: ${code}`);
}

function firstLine(message: string): string {
  return message.split("\n")[0];
}

describe("classifyError", () => {
  describe("Pre-execution errors", () => {
    test("should keep structural errors without a traceback", () => {
      expect(classifyError(new StructuralError("SyntaxError: ';' expected. (line 2)", 2))).toEqual({
        kind: "StructuralError",
        message: "SyntaxError: ';' expected. (line 2)",
      });
    });

    test("should report the complexity ceiling as a validation error", () => {
      expect(classifyError(new ComplexityLimitError(21, 20))).toEqual({
        kind: "ValidationError",
        message: "Too many functions (21 > 20)",
      });
    });
  });

  describe("Timeouts", () => {
    test("should classify the supervisor's timeout", () => {
      expect(classifyError(new ScriptTimeoutError(3_000))).toEqual({
        kind: "TimeoutError",
        message: "Execution timed out after 3 seconds",
      });
    });

    test("should classify the vm's own timeout", () => {
      const error = Object.assign(new Error("Script execution timed out after 3000ms"), { code: "ERR_SCRIPT_EXECUTION_TIMEOUT" });
      expect(classifyError(error)).toEqual({ kind: "TimeoutError", message: "Script execution timed out after 3000ms" });
    });
  });

  describe("Unknown symbols", () => {
    test("should explain an undefined name", () => {
      const result = classifyError(thrownBy("missingFn()"), context);

      expect(result.kind).toBe("UnknownSymbolError");
      expect(result.message).toBe(
        "ReferenceError: missingFn is not defined\n\nHint: This usually means a function or variable name is misspelled or not defined."
      );
      expect(result.traceback).toContain("missingFn is not defined");
    });

    test("should point at a missing capability group", () => {
      const result = classifyError(thrownBy('search_google("cats")'), context);
      expect(result.message).toBe(`ReferenceError: search_google is not defined\n\nHint: ${BROWSER_HINT}`);
    });

    test("should treat unknown tool names the same way", () => {
      const result = classifyError(new ToolNotFoundError("open_tab"), context);

      expect(result.kind).toBe("UnknownSymbolError");
      expect(result.message).toBe(`Tool not found: open_tab\n\nHint: ${BROWSER_HINT}`);
    });
  });

  test("should classify use before initialization", () => {
    const result = classifyError(thrownBy("x; let x = 1;"));
    const lines = result.message.split("\n");

    expect(result.kind).toBe("UnboundReferenceError");
    expect(lines[0]).toBe("UnboundReferenceError: Variable 'x' was accessed before being assigned a value.");
    expect(lines[lines.length - 1]).toBe("Original error: Cannot access 'x' before initialization");
  });

  describe("Attribute access", () => {
    test("should name the property read from a missing value", () => {
      const result = classifyError(thrownBy("const page = null; page.title"));

      expect(result.kind).toBe("AttributeAccessError");
      expect(firstLine(result.message)).toBe("AttributeAccessError: 'title' could not be accessed.");
      expect(result.message).toContain("`value?.title`");
    });

    test("should name a missing method", () => {
      const result = classifyError(thrownBy("const page = {}; page.extract()"));

      expect(result.kind).toBe("AttributeAccessError");
      expect(firstLine(result.message)).toBe("AttributeAccessError: 'extract' could not be accessed.");
    });
  });

  describe("Argument mismatches", () => {
    test("should explain a tool arity error", () => {
      const result = classifyError(new ToolArgumentError("add", "Tool add expects 2 args, got 1"));

      expect(result.kind).toBe("ArgumentError");
      expect(result.message).toBe(
        "ArgumentError: Tool argument mismatch.\nTool add expects 2 args, got 1\n\nHint: Check the tool's expected arguments and provide them in the correct order."
      );
    });

    test("should recognise arity messages from other errors", () => {
      expect(classifyError(new Error("search expects 1-2 args, got 3")).kind).toBe("ArgumentError");
    });
  });

  describe("Other runtime errors", () => {
    test("should keep the name and message", () => {
      expect(classifyError(new RangeError("min() arg is an empty sequence"))).toMatchObject({
        kind: "GenericRuntimeError",
        message: "RangeError: min() arg is an empty sequence",
      });
    });

    test("should map a runtime SyntaxError to a generic error", () => {
      const result = classifyError(thrownBy('JSON.parse("{")'));

      expect(result.kind).toBe("GenericRuntimeError");
      expect(result.message).toMatch(/^SyntaxError: /);
    });

    test("should hint at missing tool dependencies", () => {
      expect(classifyError(new Error("Cannot find module 'playwright'")).message).toBe(
        "Error: Cannot find module 'playwright'\n\nHint: A runtime dependency of a tool is missing. Install it on the tool host and retry."
      );
    });

    test("should hint at tool failures", () => {
      expect(classifyError(new Error("tool exploded")).message).toBe(
        [
          "Error: tool exploded",
          "",
          "Hint: This might be a tool execution error. Check:",
          "  1. Tool name is correct",
          "  2. Arguments match the tool's expected format",
          "  3. Tool returned valid data (not an error message)",
        ].join("\n")
      );
    });

    test("should classify thrown non-errors", () => {
      expect(classifyError("boom")).toEqual({ kind: "GenericRuntimeError", message: "Error: boom" });
    });
  });
});
