/**
 * Script Preprocessor
 *
 * Parses generated script text with the TypeScript compiler (through an
 * in-memory ts-morph project), closes a string the parser reports as
 * unterminated, and rewrites the tree:
 *
 * - named-argument calls `f(x = 1, y = 2)` become positional `f(1, 2)`
 * - calls to asynchronous capabilities are wrapped in `await`
 *
 * Every pass goes through `ts.transform` and yields a new tree.
 */

import { Diagnostic, Project, SourceFile, SyntaxKind, ts } from "ts-morph";
import { StructuralError } from "../errors";
import type { ToolscriptLogger } from "../logger";

export interface ParsedScript {
  text: string;
  sourceFile: ts.SourceFile;
  /** Call expressions in the parsed tree; fixed for the rest of the run */
  callCount: number;
  repairs: string[];
}

const SCRIPT_FILE_NAME = "script.ts";

const STRING_DELIMITERS: ReadonlyArray<{ label: string; pattern: RegExp; closing: string }> = [
  { label: "triple-quoted", pattern: /"""/g, closing: '"""' },
  { label: "template", pattern: /(?<!\\)`/g, closing: "`" },
];

// Unterminated string literal, unterminated template literal
const UNTERMINATED_STRING_CODES: ReadonlySet<number> = new Set([1002, 1160]);

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });

function leadingWhitespace(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Drop surrounding blank lines and the indentation common to every line
 */
export function normalizeFraming(text: string): string {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  while (lines.length > 0 && lines[0].trim() === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();

  const indents = lines.filter((line) => line.trim() !== "").map(leadingWhitespace);
  const common = indents.length > 0 ? Math.min(...indents) : 0;

  return lines.map((line) => line.slice(Math.min(common, leadingWhitespace(line)))).join("\n");
}

/**
 * Close a string left open by an odd number of delimiters
 */
export function repairStringDelimiters(text: string): { text: string; repairs: string[] } {
  let repaired = text;
  const repairs: string[] = [];

  for (const { label, pattern, closing } of STRING_DELIMITERS) {
    const count = repaired.match(pattern)?.length ?? 0;
    if (count % 2 !== 0) {
      repaired = `${repaired}\n${closing}`;
      repairs.push(label);
    }
  }

  return { text: repaired, repairs };
}

function parseText(text: string): { sourceFile: SourceFile; diagnostics: Diagnostic[] } {
  const project = new Project({
    useInMemoryFileSystem: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, noLib: true },
  });
  const sourceFile = project.createSourceFile(SCRIPT_FILE_NAME, text, { scriptKind: ts.ScriptKind.TS });
  return { sourceFile, diagnostics: project.getProgram().getSyntacticDiagnostics(sourceFile) };
}

/**
 * Parse script text into a syntax tree. Delimiters are repaired only when
 * the text as written leaves a string or template open.
 * @throws StructuralError when the text is empty or does not parse
 */
export function parseScript(rawText: string, logger?: ToolscriptLogger): ParsedScript {
  const framed = normalizeFraming(rawText);
  if (framed.trim() === "") {
    throw new StructuralError("Script is empty");
  }

  let text = framed;
  let repairs: string[] = [];
  let { sourceFile, diagnostics } = parseText(framed);

  if (diagnostics.some((d) => UNTERMINATED_STRING_CODES.has(d.getCode()))) {
    const repaired = repairStringDelimiters(framed);
    if (repaired.repairs.length > 0) {
      for (const repair of repaired.repairs) {
        logger?.warn(`Fixing unterminated ${repair} string`, { repair });
      }
      ({ text, repairs } = repaired);
      ({ sourceFile, diagnostics } = parseText(text));
    }
  }

  if (diagnostics.length > 0) {
    const first = diagnostics[0];
    const message = ts.flattenDiagnosticMessageText(first.compilerObject.messageText, "\n");
    const line = first.getLineNumber();
    throw new StructuralError(`SyntaxError: ${message}${line ? ` (line ${line})` : ""}`, line);
  }

  return {
    text,
    sourceFile: sourceFile.compilerNode,
    callCount: sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression).length,
    repairs,
  };
}

/**
 * `name = value` used as a call argument
 */
function namedArgumentValue(arg: ts.Expression): ts.Expression | undefined {
  if (ts.isBinaryExpression(arg) && arg.operatorToken.kind === ts.SyntaxKind.EqualsToken && ts.isIdentifier(arg.left)) {
    return arg.right;
  }
  return undefined;
}

export function stripNamedArguments(): ts.TransformerFactory<ts.SourceFile> {
  return (context) => {
    const visit = (node: ts.Node): ts.Node => {
      const visited = ts.visitEachChild(node, visit, context);
      if (!ts.isCallExpression(visited)) return visited;

      let changed = false;
      const args = visited.arguments.map((arg) => {
        const value = namedArgumentValue(arg);
        if (value === undefined) return arg;
        changed = true;
        return value;
      });

      return changed
        ? context.factory.updateCallExpression(visited, visited.expression, visited.typeArguments, args)
        : visited;
    };
    return (sourceFile) => ts.visitEachChild(sourceFile, visit, context);
  };
}

function isAsyncFunction(node: ts.Node): boolean {
  return (
    ts.canHaveModifiers(node) &&
    (ts.getModifiers(node)?.some((m) => m.kind === ts.SyntaxKind.AsyncKeyword) ?? false)
  );
}

function isCapabilityCall(node: ts.Node, names: ReadonlySet<string>): node is ts.CallExpression {
  return ts.isCallExpression(node) && ts.isIdentifier(node.expression) && names.has(node.expression.text);
}

/**
 * Wrap calls to asynchronous capabilities in `await`. The script body
 * becomes an async function, so top level counts as async; calls inside
 * nested non-async functions are left alone since `await` is illegal there.
 */
export function markSuspensionPoints(asyncNames: ReadonlySet<string>): ts.TransformerFactory<ts.SourceFile> {
  return (context) => {
    const f = context.factory;

    const visitorFor = (asyncScope: boolean): ts.Visitor => {
      const visit = (node: ts.Node): ts.Node => {
        if (ts.isFunctionLike(node)) {
          return ts.visitEachChild(node, visitorFor(isAsyncFunction(node)), context);
        }

        // Already awaited: rewrite only inside the call
        if (ts.isAwaitExpression(node) && isCapabilityCall(node.expression, asyncNames)) {
          return f.updateAwaitExpression(node, ts.visitEachChild(node.expression, visit, context));
        }

        const visited = ts.visitEachChild(node, visit, context);
        if (asyncScope && isCapabilityCall(visited, asyncNames)) {
          return f.createParenthesizedExpression(f.createAwaitExpression(visited));
        }
        return visited;
      };
      return visit;
    };

    return (sourceFile) => ts.visitEachChild(sourceFile, visitorFor(true), context);
  };
}

/**
 * Apply the argument and suspension rewrites
 */
export function rewriteScript(parsed: ParsedScript, asyncNames: ReadonlySet<string>): ts.SourceFile {
  const result = ts.transform(parsed.sourceFile, [stripNamedArguments(), markSuspensionPoints(asyncNames)]);
  return result.transformed[0];
}

export function printScript(sourceFile: ts.SourceFile): string {
  return printer.printFile(sourceFile);
}
