export { SandboxEngine } from "./engine";
export type { SandboxEngineOptions } from "./engine";
export { CancellationToken } from "./cancellation";
export {
  CapabilityTableBuilder,
  FinalAnswerSlot,
  RESERVED_NAMES,
  buildCapabilityTable,
} from "./capabilities";
export type { CapabilityKind, CapabilityTable } from "./capabilities";
export { classifyError } from "./classifier";
export type { ClassifiedError, ClassifierContext } from "./classifier";
export { formatTimestamp, elapsedSeconds, toEnvelope } from "./envelope";
export { normalizeScript, normalizeResultShape } from "./normalizer";
export { parseScript, rewriteScript, printScript, normalizeFraming, repairStringDelimiters } from "./preprocessor";
export type { ParsedScript } from "./preprocessor";
export { LIBRARIES } from "./libraries";
export { PRIMITIVES } from "./primitives";
export { classifyValue, serializeValue, serializeResult, detectFailure } from "./serializer";
export type { ToolValue, FailureRules, DetectedFailure } from "./serializer";
export { ExecutionSupervisor, computeTimeoutMs, assertWithinCeiling, compileUnit } from "./supervisor";
export type { CompiledUnit, TimeoutPolicy } from "./supervisor";
export { makeToolProxy, createToolProxies, makeParallel, isToolProxy } from "./toolProxy";
export type { ToolProxy } from "./toolProxy";
