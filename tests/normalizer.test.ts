/**
 * Result-shape normalizer
 */

import { normalizeScript } from "../src/core/sandbox/normalizer";
import { parseScript, printScript } from "../src/core/sandbox/preprocessor";

function normalize(text: string): string {
  return printScript(normalizeScript(parseScript(text).sourceFile));
}

describe("normalizeScript", () => {
  test("should name a returned identifier", () => {
    expect(normalize("const x = 1;\nreturn x;")).toBe("const x = 1;\nreturn { x };\n");
  });

  test("should leave other return expressions alone", () => {
    expect(normalize("const x = 1;\nreturn x + 1;")).toBe("const x = 1;\nreturn x + 1;\n");
  });

  test("should rewrite returns inside script-level blocks", () => {
    expect(normalize("const x = 1;\nif (x) {\n    return x;\n}")).toBe("const x = 1;\nif (x) {\n    return { x };\n}\n");
  });

  test("should still append a return when the only return is inside a block", () => {
    expect(normalize('const flag = false;\nif (flag) {\n    return "early";\n}\nresult = 5;')).toBe(
      'const flag = false;\nif (flag) {\n    return "early";\n}\nresult = 5;\nreturn result;\n'
    );
  });

  test("should not append a return after a top-level one", () => {
    expect(normalize("result = 5;\nreturn 7;")).toBe("result = 5;\nreturn 7;\n");
  });

  test("should append a return for an assigned result", () => {
    expect(normalize("result = 5;")).toBe("result = 5;\nreturn result;\n");
  });

  test("should append a return for a declared result", () => {
    expect(normalize("const result = [1, 2];")).toBe("const result = [1, 2];\nreturn result;\n");
  });

  test("should not touch returns inside functions", () => {
    const printed = normalize("function pick(y) { return y; }\nresult = pick(2);");
    expect(printed).toContain("return y;");
    expect(printed).not.toContain("return { y }");
    expect(printed.endsWith("return result;\n")).toBe(true);
  });

  test("should ignore a result assigned only inside a function", () => {
    expect(normalize("function f() { result = 1; }")).not.toContain("return result");
  });

  test("should leave a script without return or result unchanged", () => {
    expect(normalize('print("hi");')).toBe('print("hi");\n');
  });
});
