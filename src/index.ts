export * from "./core/types.js";
export * from "./core/errors.js";
export { LockTable, DEFAULT_LOCK_TIMEOUT_MS, type LockHandle, type AcquireOptions, type LockTableOptions } from "./core/lockTable.js";
export {
    TaskPlanner,
    buildFallbackPlan,
    buildPlannerMessages,
    extractPlanJson,
    parsePlanResponse,
    DEFAULT_MAX_TASKS,
    DEFAULT_PLANNER_SYSTEM_PROMPT,
    type ParsedPlan,
    type PlanParseFailure,
    type PlanParseOutcome,
    type PlanSource,
    type TaskPlannerOptions,
} from "./core/planner.js";
export { Coordinator, CANCELLED_MESSAGE, type CoordinatorOptions, type ExecuteOptions } from "./core/coordinator.js";
export { checkDeclaredOrder, buildBatches, orderByDependencies, type OrderWarning } from "./core/scheduler.js";
export * from "./core/events.js";
export { NdjsonEventSink, HttpEventSink, FanoutEventSink, deliver, type HttpEventSinkOptions } from "./core/eventSinks.js";
export { ToolExecutor, globToRegExp, DEFAULT_BASH_TIMEOUT_MS } from "./core/toolExecutor.js";
export type { ReadFileResult, WriteFileResult, ListFilesResult, BashResult } from "./core/toolExecutor.js";
export { RemoteToolClient, RemoteToolError, type RemoteToolClientOptions } from "./core/toolClient.js";
export { ExecCompletionModel, DEFAULT_MODEL_COMMAND, type ExecCompletionModelOptions } from "./core/completion.js";
export { failedResult, verifyClaimedFiles, VERIFICATION_FAILED_MESSAGE } from "./core/results.js";
export { readTasksFile, validateTasksFile } from "./core/tasksFile.js";
export { RunHistory, combineContext, planningSummary, resultSummary, type HistoryEntry } from "./core/runHistory.js";
export { loadConfigFile, readConfigFile, resolveConfig, validateConfig, type ResolvedConfig, type TaskgateConfigFile } from "./core/config.js";
export { createRootLogger, resolveLogConfig, silentLogger, type Logger } from "./core/logger.js";
export { LocalWorker, type LocalWorkerOptions } from "./workers/localWorker.js";
export { RemoteToolWorker, type RemoteToolWorkerOptions } from "./workers/remoteToolWorker.js";
export { buildWorkerPrompt, parseWorkerResponse } from "./workers/shared.js";
