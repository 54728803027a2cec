/**
 * Result-Shape Normalizer
 *
 * `return total` at script level becomes `return { total }` so the result
 * keeps the variable's name. A script with no top-level return that
 * assigns `result` gets a trailing `return result;`.
 */

import { ts } from "ts-morph";

export const RESULT_BINDING = "result";

/**
 * Visit script-level nodes, skipping nested function bodies
 */
function forEachScriptLevelNode(node: ts.Node, callback: (node: ts.Node) => void): void {
  ts.forEachChild(node, (child) => {
    if (ts.isFunctionLike(child) || ts.isClassLike(child)) return;
    callback(child);
    forEachScriptLevelNode(child, callback);
  });
}

// Returns nested in blocks are conditional and do not count
function hasTopLevelReturn(sourceFile: ts.SourceFile): boolean {
  return sourceFile.statements.some((statement) => ts.isReturnStatement(statement));
}

function assignsResult(sourceFile: ts.SourceFile): boolean {
  let found = false;
  forEachScriptLevelNode(sourceFile, (node) => {
    if (ts.isVariableDeclaration(node) && ts.isIdentifier(node.name) && node.name.text === RESULT_BINDING) {
      found = true;
    }
    if (
      ts.isBinaryExpression(node) &&
      node.operatorToken.kind === ts.SyntaxKind.EqualsToken &&
      ts.isIdentifier(node.left) &&
      node.left.text === RESULT_BINDING
    ) {
      found = true;
    }
  });
  return found;
}

export function normalizeResultShape(): ts.TransformerFactory<ts.SourceFile> {
  return (context) => {
    const f = context.factory;

    const visit = (node: ts.Node): ts.Node => {
      if (ts.isFunctionLike(node) || ts.isClassLike(node)) return node;
      if (ts.isReturnStatement(node) && node.expression && ts.isIdentifier(node.expression)) {
        const shorthand = f.createShorthandPropertyAssignment(node.expression.text);
        return f.updateReturnStatement(node, f.createObjectLiteralExpression([shorthand], false));
      }
      return ts.visitEachChild(node, visit, context);
    };

    return (sourceFile) => {
      const rewritten = ts.visitEachChild(sourceFile, visit, context);
      if (hasTopLevelReturn(sourceFile) || !assignsResult(sourceFile)) {
        return rewritten;
      }
      const trailing = f.createReturnStatement(f.createIdentifier(RESULT_BINDING));
      return f.updateSourceFile(rewritten, [...rewritten.statements, trailing]);
    };
  };
}

/**
 * Apply the result-shape rewrite to an already rewritten tree
 */
export function normalizeScript(sourceFile: ts.SourceFile): ts.SourceFile {
  return ts.transform(sourceFile, [normalizeResultShape()]).transformed[0];
}
