import { Command } from "commander";
import path from "node:path";
import { Coordinator } from "../core/coordinator.js";
import { formatCliError, errorMessage } from "../core/errors.js";
import { deliver, FanoutEventSink, HttpEventSink, NdjsonEventSink } from "../core/eventSinks.js";
import type { EventSink, PlanCreatedEvent } from "../core/events.js";
import type { ResolvedConfig } from "../core/config.js";
import type { Logger } from "../core/logger.js";
import { createRunDir, ensureDir, writeJson } from "../core/paths.js";
import { TaskPlanner } from "../core/planner.js";
import { combineContext, planningSummary, resultSummary } from "../core/runHistory.js";
import { orderByDependencies } from "../core/scheduler.js";
import { readTasksFile } from "../core/tasksFile.js";
import type { CompletionModel, TaskSpec, WorkerResult } from "../core/types.js";
import { specsToTasksFile } from "../schemas/plan.js";
import {
    addConfigOptions,
    createModel,
    createWorker,
    loadCliContext,
    openHistory,
    parseIntOption,
    readMaybeFile,
    recordHistory,
    type CommonOpts,
} from "./context.js";

type RunCliOpts = CommonOpts & {
    tasks?: string;
    context?: string;
    topoOrder?: boolean;
    workingDir?: string;
    skipVerify?: boolean;
    skipHistory?: boolean;
};

export type RunParams = {
    request?: string;
    /** 指定されたら Planner を通さずにこのタスクを使う */
    tasks?: TaskSpec[];
    contextSummary?: string;
    topoOrder?: boolean;
    workingDir: string;
    config: ResolvedConfig;
    logger: Logger;
    model: CompletionModel;
    signal?: AbortSignal;
};

export type RunSummary = {
    runDir: string;
    source: PlanCreatedEvent["source"];
    tasks: TaskSpec[];
    results: WorkerResult[];
};

async function planTasks(
    p: RunParams,
    contextSummary: string
): Promise<{ tasks: TaskSpec[]; source: PlanCreatedEvent["source"]; reason?: string }> {
    if (p.tasks) return { tasks: p.tasks, source: "file" };
    const request = p.request?.trim();
    if (!request) throw new Error("request is required (or pass --tasks <file>)");

    const planner = new TaskPlanner(p.model, {
        maxTasks: p.config.maxTasks,
        systemPrompt: p.config.systemPrompt,
        logger: p.logger.child({ component: "planner" }),
    });
    const tasks = await planner.plan(request, contextSummary);
    const outcome = planner.lastOutcome;
    if (outcome?.source === "fallback") return { tasks, source: "fallback", reason: outcome.reason };
    return { tasks, source: "model" };
}

/**
 * 計画 → 実行 → 成果物の書き出し。
 * <stateDir>/runs/run-<ts>/ に plan.json, events.ndjson, results.json を置き、
 * <stateDir>/runs/latest.json で最新の run を指す。
 * 履歴が有効なら過去の依頼を計画の context に足し、今回の結果を <stateDir>/context.jsonl に残す。
 */
export async function executeRun(p: RunParams): Promise<RunSummary> {
    const workingDir = path.resolve(p.workingDir);
    const stateDir = path.resolve(workingDir, p.config.stateDir);
    const history = openHistory(stateDir, p.config, p.logger);
    const planned = await planTasks(p, combineContext(history?.summary(), p.contextSummary));
    const tasks = p.topoOrder ? orderByDependencies(planned.tasks) : planned.tasks;

    ensureDir(stateDir);
    const runDir = createRunDir(stateDir);
    const ndjson = new NdjsonEventSink(path.join(runDir, "events.ndjson"), p.logger.child({ component: "events" }));
    const sinks: EventSink[] = [ndjson];
    if (p.config.eventsUrl) {
        sinks.push(
            new HttpEventSink({
                url: p.config.eventsUrl,
                sourceApp: p.config.sourceApp,
                sessionId: path.basename(runDir),
                logger: p.logger.child({ component: "events" }),
            })
        );
    }
    const events = sinks.length === 1 ? ndjson : new FanoutEventSink(sinks, { logger: p.logger });

    try {
        writeJson(path.join(runDir, "plan.json"), {
            source: planned.source,
            ...(planned.reason ? { reason: planned.reason } : {}),
            ...specsToTasksFile(tasks),
        });
        writeJson(path.join(stateDir, "runs", "latest.json"), { runDir });
        await deliver(
            events,
            {
                t: Date.now(),
                type: "plan_created",
                taskIds: tasks.map((t) => t.taskId),
                source: planned.source,
                ...(planned.reason ? { reason: planned.reason } : {}),
            },
            p.logger
        );

        const coordinator = new Coordinator(createWorker(p.config, p.model, p.logger), {
            events,
            logger: p.logger.child({ component: "coordinator" }),
            lockTimeoutMs: p.config.lockTimeoutMs,
            lockExpiryMs: p.config.lockExpiryMs,
        });
        const results = await coordinator.executeTasks(tasks, workingDir, { signal: p.signal });
        writeJson(path.join(runDir, "results.json"), { results });
        recordHistory(
            history,
            {
                request: p.request?.trim() || `tasks file (${tasks.length} tasks)`,
                plan: planningSummary(tasks),
                results: results.map(resultSummary),
            },
            p.logger
        );
        return { runDir, source: planned.source, tasks, results };
    } finally {
        await ndjson.close();
    }
}

function summarize(summary: RunSummary): string {
    const lines = summary.results.map((r) => {
        const mark = r.success ? "✓" : "✗";
        const files = [...r.filesCreated, ...r.filesModified];
        const detail = r.success ? (files.length ? files.join(", ") : "no files") : r.errors.join("; ");
        return `${mark} ${r.taskId}: ${detail}`;
    });
    const ok = summary.results.filter((r) => r.success).length;
    lines.push(`${ok}/${summary.results.length} tasks succeeded (plan: ${summary.source})`);
    return lines.join("\n");
}

export function cmdRun() {
    const cmd = new Command("run");
    cmd
        .description("Plan a request (or load --tasks) and execute the tasks under file locks")
        .argument("[request]", "Natural-language request (text or file path)")
        .option("--tasks <file>", "Tasks file (JSON) to execute instead of planning")
        .option("--context <fileOrText>", "Context summary passed to the planner")
        .option("--max-tasks <n>", "Maximum number of planned tasks", parseIntOption)
        .option("--model-cmd <command>", "Model command line (prompt is appended as the last argument)")
        .option("--worker <kind>", "Worker kind: local|remote")
        .option("--tool-endpoint <url>", "Base URL of the remote tool endpoint")
        .option("--events-url <url>", "POST coordinator events to this URL")
        .option("--lock-timeout <ms>", "Lock acquisition timeout (ms)", parseIntOption)
        .option("--lock-expiry <ms>", "Lock expiry while a task runs (ms)", parseIntOption)
        .option("--skip-verify", "Skip checking claimed files on disk")
        .option("--topo-order", "Reorder tasks by declared dependencies before executing", false)
        .option("--working-dir <dir>", "Directory the tasks operate in (default: cwd)")
        .option("--skip-history", "Neither read nor record the run history in <stateDir>/context.jsonl");
    addConfigOptions(cmd);
    cmd.action(async (request: string | undefined, opts: RunCliOpts) => {
        const ctx = loadCliContext({
            ...opts,
            verify: opts.skipVerify ? false : undefined,
            history: opts.skipHistory ? false : undefined,
        });
        const workingDir = path.resolve(ctx.cwd, opts.workingDir ?? ".");
        const controller = new AbortController();
        const onSigint = () => controller.abort(new Error("interrupted"));
        process.once("SIGINT", onSigint);
        try {
            const summary = await executeRun({
                request: readMaybeFile(request),
                tasks: opts.tasks ? readTasksFile(path.resolve(ctx.cwd, opts.tasks)) : undefined,
                contextSummary: readMaybeFile(opts.context),
                topoOrder: opts.topoOrder,
                workingDir,
                config: ctx.config,
                logger: ctx.logger,
                model: createModel(ctx.config, workingDir),
                signal: controller.signal,
            });
            process.stderr.write(summarize(summary) + "\n");
            process.stdout.write(JSON.stringify({ runDir: summary.runDir, results: summary.results }, null, 2) + "\n");
            process.exitCode = summary.results.every((r) => r.success) ? 0 : 1;
        } catch (err) {
            console.error(formatCliError("run", errorMessage(err)));
            process.exitCode = 1;
        } finally {
            process.off("SIGINT", onSigint);
        }
    });
    return cmd;
}
