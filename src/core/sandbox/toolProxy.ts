/**
 * Tool Proxy Factory
 *
 * One async function per registered tool. Scripts call proxies with
 * positional arguments; the proxy forwards them to the registry unchanged
 * and hands back the raw value.
 */

import { ToolArgumentError, ToolNotFoundError, isErrorLike } from "../errors";
import type { ToolscriptLogger } from "../logger";
import type { ToolRegistry } from "../types";
import type { CancellationToken } from "./cancellation";

export type ToolProxy = ((...args: unknown[]) => Promise<unknown>) & { readonly toolName: string };

export function isToolProxy(value: unknown): value is ToolProxy {
  return typeof value === "function" && "toolName" in value && typeof value.toolName === "string";
}

export function makeToolProxy(
  registry: ToolRegistry,
  toolName: string,
  token: CancellationToken,
  logger?: ToolscriptLogger
): ToolProxy {
  const proxy = async (...args: unknown[]): Promise<unknown> => {
    token.throwIfCancelled();
    const started = Date.now();
    const settle = (success: boolean, error?: string) => {
      logger?.traceToolExecution(toolName, args, Date.now() - started, success, error);
      if (token.isCancelled) {
        logger?.debug("Tool call settled after cancellation", { toolName });
      }
    };
    const pending = registry.invoke(toolName, ...args);
    void pending.then(
      () => settle(true),
      (e: unknown) => settle(false, isErrorLike(e) ? e.message : String(e))
    );
    return token.race(pending);
  };
  return Object.freeze(Object.assign(proxy, { toolName }));
}

export function createToolProxies(
  registry: ToolRegistry,
  toolNames: Iterable<string>,
  token: CancellationToken,
  logger?: ToolscriptLogger
): Map<string, ToolProxy> {
  const proxies = new Map<string, ToolProxy>();
  for (const name of toolNames) {
    proxies.set(name, makeToolProxy(registry, name, token, logger));
  }
  return proxies;
}

interface PlannedCall {
  proxy: ToolProxy;
  args: unknown[];
}

function planCall(call: unknown, index: number, proxies: ReadonlyMap<string, ToolProxy>): PlannedCall {
  if (!Array.isArray(call) || call.length === 0) {
    throw new ToolArgumentError("parallel", `parallel() call ${index} must be an array of [tool, ...args]`);
  }
  const entries: unknown[] = call;
  const [target, ...args] = entries;

  const name = typeof target === "string" ? target : isToolProxy(target) ? target.toolName : undefined;
  if (name === undefined) {
    throw new ToolArgumentError("parallel", `parallel() call ${index} must start with a tool or tool name`);
  }

  const proxy = proxies.get(name);
  if (!proxy) {
    throw new ToolNotFoundError(name);
  }
  return { proxy, args };
}

/**
 * `parallel([search, "a"], ["fetch_page", url])` runs every call at once
 * and resolves to their results in input order. All calls are checked
 * before any of them starts.
 */
export function makeParallel(
  proxies: ReadonlyMap<string, ToolProxy>,
  token: CancellationToken
): (...calls: unknown[]) => Promise<unknown[]> {
  return async (...calls) => {
    token.throwIfCancelled();
    const planned = calls.map((call, index) => planCall(call, index, proxies));
    return token.race(Promise.all(planned.map(({ proxy, args }) => proxy(...args))));
  };
}
