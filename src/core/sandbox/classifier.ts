/**
 * Error Classifier
 *
 * Maps anything a run can throw onto a stable error kind and a message
 * that names the problem and, where one is known, the fix. Errors raised
 * inside the sandbox come from another realm, so built-in kinds are
 * recognised by name and message rather than instanceof.
 */

import type { CapabilityGroup } from "../config";
import {
  ComplexityLimitError,
  ErrorKind,
  ScriptTimeoutError,
  StructuralError,
  ToolArgumentError,
  ToolNotFoundError,
  hasErrorCode,
  isErrorLike,
} from "../errors";

export interface ClassifiedError {
  kind: ErrorKind;
  message: string;
  traceback?: string;
}

export interface ClassifierContext {
  optionalCapabilityGroups?: CapabilityGroup[];
}

const TDZ_PATTERN = /Cannot access '([\w$]+)' before initialization/;
const NOT_DEFINED_PATTERN = /([\w$]+) is not defined/;
const PROPERTY_PATTERN = /Cannot (?:read|set) properties of (?:undefined|null) \((?:reading|setting) '([^']+)'\)/;
const METHOD_PATTERN = /[\w$\]]\.([\w$]+) is not a function/;
const ARITY_PATTERN = /expects .* args/;
const MISSING_RUNTIME_PATTERNS = ["Executable doesn't exist", "browserType.launch", "Cannot find module"];

function hint(lines: string[]): string {
  return `Hint: ${lines.join("\n  ")}`;
}

function groupFor(name: string, groups: CapabilityGroup[] = []): CapabilityGroup | undefined {
  return groups.find((group) => group.tools.includes(name));
}

function unboundReference(message: string, traceback?: string): ClassifiedError {
  const name = TDZ_PATTERN.exec(message)?.[1] ?? "unknown";
  return {
    kind: "UnboundReferenceError",
    traceback,
    message: [
      `UnboundReferenceError: Variable '${name}' was accessed before being assigned a value.`,
      "This usually happens when:",
      "  1. A tool call failed and the result wasn't checked before use",
      "  2. The variable is used before the statement that declares it",
      "  3. The tool returned an error instead of the expected data",
      "",
      hint([
        "Check that tool calls succeeded before using their results:",
        `const ${name} = await tool_name(...);`,
        `if (typeof ${name} === "string" && ${name}.startsWith("Error")) { /* handle the failure */ }`,
      ]),
      "",
      `Original error: ${message}`,
    ].join("\n"),
  };
}

function unknownSymbol(name: string, message: string, context: ClassifierContext, traceback?: string): ClassifiedError {
  const group = groupFor(name, context.optionalCapabilityGroups);
  const advice = group
    ? group.hint
    : "This usually means a function or variable name is misspelled or not defined.";
  return {
    kind: "UnknownSymbolError",
    traceback,
    message: `${message}\n\n${hint([advice])}`,
  };
}

function attributeAccess(attribute: string, message: string, traceback?: string): ClassifiedError {
  return {
    kind: "AttributeAccessError",
    traceback,
    message: [
      `AttributeAccessError: '${attribute}' could not be accessed.`,
      "",
      "This often happens when:",
      "  1. Extracting data from dynamic pages whose content has not loaded yet",
      "  2. The page or response structure is different from what was expected",
      "  3. A tool returned null or an empty value",
      "",
      hint([
        "Fix strategies:",
        "- Wait for the page to load before extracting data",
        `- Check the value exists before reading from it: \`value?.${attribute}\``,
        "- Extract the raw text first, then parse it",
        "- Inspect the actual content before assuming its shape",
      ]),
      "",
      `Original error: ${message}`,
    ].join("\n"),
  };
}

function genericRuntime(name: string, message: string, traceback?: string): ClassifiedError {
  const base = `${name}: ${message}`;

  if (MISSING_RUNTIME_PATTERNS.some((pattern) => message.includes(pattern))) {
    return {
      kind: "GenericRuntimeError",
      traceback,
      message: `${base}\n\n${hint(["A runtime dependency of a tool is missing. Install it on the tool host and retry."])}`,
    };
  }

  if (/tool/i.test(message)) {
    return {
      kind: "GenericRuntimeError",
      traceback,
      message: `${base}\n\n${hint([
        "This might be a tool execution error. Check:",
        "1. Tool name is correct",
        "2. Arguments match the tool's expected format",
        "3. Tool returned valid data (not an error message)",
      ])}`,
    };
  }

  return { kind: "GenericRuntimeError", traceback, message: base };
}

export function classifyError(error: unknown, context: ClassifierContext = {}): ClassifiedError {
  if (error instanceof StructuralError) {
    return { kind: "StructuralError", message: error.message };
  }
  if (error instanceof ComplexityLimitError) {
    return { kind: "ValidationError", message: error.message };
  }
  if (error instanceof ScriptTimeoutError) {
    return { kind: "TimeoutError", message: error.message };
  }
  if (hasErrorCode(error, "ERR_SCRIPT_EXECUTION_TIMEOUT")) {
    return { kind: "TimeoutError", message: isErrorLike(error) ? error.message : "Execution timed out" };
  }

  if (!isErrorLike(error)) {
    return { kind: "GenericRuntimeError", message: `Error: ${String(error)}` };
  }

  const { name, message, stack: traceback } = error;

  if (error instanceof ToolArgumentError || ARITY_PATTERN.test(message)) {
    return {
      kind: "ArgumentError",
      traceback,
      message: `ArgumentError: Tool argument mismatch.\n${message}\n\n${hint([
        "Check the tool's expected arguments and provide them in the correct order.",
      ])}`,
    };
  }

  if (error instanceof ToolNotFoundError) {
    return unknownSymbol(error.toolName, message, context, traceback);
  }

  if (name === "ReferenceError") {
    if (TDZ_PATTERN.test(message)) {
      return unboundReference(message, traceback);
    }
    const symbol = NOT_DEFINED_PATTERN.exec(message)?.[1];
    if (symbol) {
      return unknownSymbol(symbol, `ReferenceError: ${message}`, context, traceback);
    }
  }

  if (name === "TypeError") {
    const attribute = PROPERTY_PATTERN.exec(message)?.[1] ?? METHOD_PATTERN.exec(message)?.[1];
    if (attribute) {
      return attributeAccess(attribute, message, traceback);
    }
  }

  return genericRuntime(name, message, traceback);
}
