/**
 * Execution Supervisor
 *
 * Enforces the complexity ceiling, derives the time budget, compiles the
 * rewritten tree into one async unit of work and runs it inside a fresh
 * vm context built from the capability table.
 */

import vm from "vm";
import { ts } from "ts-morph";
import { ComplexityLimitError, ScriptTimeoutError, StructuralError, hasErrorCode, isErrorLike } from "../errors";
import type { ToolscriptLogger } from "../logger";
import type { CancellationToken } from "./cancellation";
import { CHECKPOINT_BINDING, CapabilityTable, UNIT_NAME } from "./capabilities";

export interface TimeoutPolicy {
  minTimeoutMs: number;
  perCallTimeoutMs: number;
}

export interface CompiledUnit {
  script: vm.Script;
  code: string;
}

const UNIT_FILE_NAME = "toolscript-unit.js";
const VM_TIMEOUT_CODE = "ERR_SCRIPT_EXECUTION_TIMEOUT";

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });

export function computeTimeoutMs(calls: number, policy: TimeoutPolicy): number {
  return Math.max(policy.minTimeoutMs, calls * policy.perCallTimeoutMs);
}

/**
 * @throws ComplexityLimitError when the script makes more calls than allowed
 */
export function assertWithinCeiling(calls: number, maxCalls: number): void {
  if (calls > maxCalls) {
    throw new ComplexityLimitError(calls, maxCalls);
  }
}

/**
 * Put a deadline checkpoint at the top of every loop body. Code resumed
 * after a suspension is outside the vm timeout, and a spinning loop never
 * lets the timer fire.
 */
export function instrumentLoops(checkpointName: string = CHECKPOINT_BINDING): ts.TransformerFactory<ts.SourceFile> {
  return (context) => {
    const f = context.factory;
    const guard = () => f.createExpressionStatement(f.createCallExpression(f.createIdentifier(checkpointName), undefined, []));
    const guarded = (body: ts.Statement): ts.Statement =>
      ts.isBlock(body) ? f.updateBlock(body, [guard(), ...body.statements]) : f.createBlock([guard(), body], true);

    const visit = (node: ts.Node): ts.Node => {
      const visited = ts.visitEachChild(node, visit, context);
      if (ts.isWhileStatement(visited)) {
        return f.updateWhileStatement(visited, visited.expression, guarded(visited.statement));
      }
      if (ts.isDoStatement(visited)) {
        return f.updateDoStatement(visited, guarded(visited.statement), visited.expression);
      }
      if (ts.isForStatement(visited)) {
        return f.updateForStatement(visited, visited.initializer, visited.condition, visited.incrementor, guarded(visited.statement));
      }
      if (ts.isForInStatement(visited)) {
        return f.updateForInStatement(visited, visited.initializer, visited.expression, guarded(visited.statement));
      }
      if (ts.isForOfStatement(visited)) {
        return f.updateForOfStatement(visited, visited.awaitModifier, visited.initializer, visited.expression, guarded(visited.statement));
      }
      return visited;
    };

    return (sourceFile) => ts.visitEachChild(sourceFile, visit, context);
  };
}

/**
 * `(async function __main() { <statements> })();`
 */
export function wrapAsUnitOfWork(): ts.TransformerFactory<ts.SourceFile> {
  return (context) => (sourceFile) => {
    const f = context.factory;
    const unit = f.createFunctionExpression(
      [f.createModifier(ts.SyntaxKind.AsyncKeyword)],
      undefined,
      UNIT_NAME,
      undefined,
      [],
      undefined,
      f.createBlock(sourceFile.statements, true)
    );
    const call = f.createCallExpression(f.createParenthesizedExpression(unit), undefined, []);
    return f.updateSourceFile(sourceFile, [f.createExpressionStatement(call)]);
  };
}

/**
 * Print, strip type syntax and compile once
 * @throws StructuralError when the engine rejects the generated code
 */
export function compileUnit(sourceFile: ts.SourceFile): CompiledUnit {
  const wrapped = ts.transform(sourceFile, [instrumentLoops(), wrapAsUnitOfWork()]).transformed[0];
  const { outputText } = ts.transpileModule(printer.printFile(wrapped), {
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.CommonJS,
      moduleDetection: ts.ModuleDetectionKind.Legacy,
      // Sloppy mode: `result = 5` without a declaration must still bind
      alwaysStrict: false,
    },
  });

  try {
    return { script: new vm.Script(outputText, { filename: UNIT_FILE_NAME }), code: outputText };
  } catch (e) {
    if (isErrorLike(e) && e.name === "SyntaxError") {
      throw new StructuralError(`SyntaxError: ${e.message}`);
    }
    throw e;
  }
}

export class ExecutionSupervisor {
  constructor(private logger: ToolscriptLogger) {}

  /**
   * Run a compiled unit against a capability table until it settles or
   * the token's budget runs out
   * @throws ScriptTimeoutError when the budget is exhausted
   */
  async run(unit: CompiledUnit, table: CapabilityTable, token: CancellationToken): Promise<unknown> {
    const context = vm.createContext(
      { ...table.bindings, [CHECKPOINT_BINDING]: () => token.throwIfCancelled() },
      { name: "toolscript", codeGeneration: { strings: false, wasm: false } }
    );

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        token.cancel();
        reject(new ScriptTimeoutError(token.timeoutMs));
      }, token.timeoutMs);
    });

    try {
      let pending: unknown;
      try {
        pending = unit.script.runInContext(context, { timeout: token.timeoutMs });
      } catch (e) {
        if (hasErrorCode(e, VM_TIMEOUT_CODE)) {
          token.cancel();
          throw new ScriptTimeoutError(token.timeoutMs);
        }
        throw e;
      }

      const settled = Promise.resolve(pending);
      void settled.then(
        () => this.noteLateSettlement(token, "resolved"),
        () => this.noteLateSettlement(token, "rejected")
      );

      return await Promise.race([settled, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private noteLateSettlement(token: CancellationToken, outcome: string): void {
    if (token.isCancelled) {
      this.logger.debug("Script settled after cancellation", { outcome });
    }
  }
}
