/**
 * Sandbox engine: the request pipeline
 *
 * parse → complexity ceiling → capabilities → rewrite → compile → run →
 * serialize → persist. Every failure comes back as a classified
 * ExecutionResult; script errors never escape as exceptions.
 */

import { ulid } from "ulid";
import type { SandboxConfig } from "../config";
import type { EventBus } from "../eventBus";
import type { ToolscriptLogger } from "../logger";
import type { SessionStore } from "../storage/sessionStore";
import type { ExecutionFailure, ExecutionRequest, ExecutionResult, JsonObject, Timing, ToolDescriptor, ToolRegistry } from "../types";
import { CancellationToken } from "./cancellation";
import { buildCapabilityTable } from "./capabilities";
import { ClassifiedError, classifyError } from "./classifier";
import { startTiming } from "./envelope";
import { normalizeScript } from "./normalizer";
import { parseScript, rewriteScript } from "./preprocessor";
import { detectFailure, serializeResult } from "./serializer";
import { ExecutionSupervisor, assertWithinCeiling, compileUnit, computeTimeoutMs } from "./supervisor";

export interface SandboxEngineOptions {
  registry: ToolRegistry;
  sessionStore: SessionStore;
  config: SandboxConfig;
  logger: ToolscriptLogger;
  eventBus: EventBus;
}

const LISTED_TOOL_LIMIT = 10;

export class SandboxEngine {
  private registry: ToolRegistry;
  private sessionStore: SessionStore;
  private config: SandboxConfig;
  private logger: ToolscriptLogger;
  private eventBus: EventBus;
  private supervisor: ExecutionSupervisor;

  constructor(options: SandboxEngineOptions) {
    this.registry = options.registry;
    this.sessionStore = options.sessionStore;
    this.config = options.config;
    this.logger = options.logger;
    this.eventBus = options.eventBus;
    this.supervisor = new ExecutionSupervisor(options.logger);
  }

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const timing = startTiming();
    const sessionId = request.sessionId ?? this.config.defaultSessionId;
    const requestId = ulid();
    const log = this.logger.child({ sessionId, requestId });
    let calls = 0;

    this.eventBus.emit("ScriptStartEvent", { sessionId, requestId });

    try {
      const parsed = parseScript(request.scriptText, log);
      calls = parsed.callCount;
      assertWithinCeiling(calls, this.config.maxCalls);

      const tools = this.registry.listTools();
      this.reportCapabilityGroups(tools, log);

      const session = await this.sessionStore.load(sessionId);
      const timeoutMs = computeTimeoutMs(calls, this.config);
      const token = new CancellationToken(timeoutMs);
      const table = buildCapabilityTable({ registry: this.registry, tools, token, logger: log, session });

      const unit = compileUnit(normalizeScript(rewriteScript(parsed, table.asyncNames)));
      log.debug("Running script", { calls, timeoutMs });

      const returned = await this.supervisor.run(unit, table, token);
      const outcome = returned === undefined && table.finalAnswer.isSet ? table.finalAnswer.value : returned;

      const result = serializeResult(outcome);
      const failure = detectFailure(outcome, result, this.config);
      if (failure) {
        return this.fail({ kind: "ToolFailureError", message: failure.message }, timing.finish(), { sessionId, requestId, calls }, log);
      }

      await this.sessionStore.save(sessionId, result);
      this.eventBus.emit("SessionSaveEvent", { sessionId, fields: Object.keys(result) });

      return this.succeed(result, calls, timeoutMs, timing.finish(), { sessionId, requestId }, log);
    } catch (e) {
      const classified = classifyError(e, { optionalCapabilityGroups: this.config.optionalCapabilityGroups });
      return this.fail(classified, timing.finish(), { sessionId, requestId, calls }, log);
    }
  }

  private succeed(
    result: JsonObject,
    calls: number,
    timeoutMs: number,
    timing: Timing,
    ids: { sessionId: string; requestId: string },
    log: ToolscriptLogger
  ): ExecutionResult {
    this.eventBus.emit("ScriptFinishEvent", { ...ids, calls, totalTime: timing.totalTime });
    log.traceScriptExecution(ids.sessionId, calls, Number(timing.totalTime) * 1000, true);
    return { status: "success", result, calls, timeoutMs, timing };
  }

  private fail(
    classified: ClassifiedError,
    timing: Timing,
    ids: { sessionId: string; requestId: string; calls: number },
    log: ToolscriptLogger
  ): ExecutionFailure {
    this.eventBus.emit("ScriptErrorEvent", { ...ids, kind: classified.kind, message: classified.message });
    log.traceScriptExecution(ids.sessionId, ids.calls, Number(timing.totalTime) * 1000, false);
    return {
      status: "error",
      kind: classified.kind,
      message: classified.message,
      ...(classified.traceback !== undefined ? { traceback: classified.traceback } : {}),
      timing,
    };
  }

  /**
   * Optional tool groups are only logged here; a script that uses a
   * missing one fails with a hint from the classifier
   */
  private reportCapabilityGroups(tools: ToolDescriptor[], log: ToolscriptLogger): void {
    const names = tools.map((tool) => tool.name);
    if (names.length === 0) {
      log.warn("No tools available, check the tool registry");
      return;
    }

    for (const group of this.config.optionalCapabilityGroups) {
      const available = group.tools.filter((name) => names.includes(name));
      if (available.length > 0) {
        log.debug(`${group.name} tools available: ${available.join(", ")}`, { group: group.name });
      } else {
        const listed = names.slice(0, LISTED_TOOL_LIMIT).join(", ");
        log.warn(`${group.name} tools not available`, {
          group: group.name,
          availableTools: names.length > LISTED_TOOL_LIMIT ? `${listed}...` : listed,
        });
      }
    }
  }
}
