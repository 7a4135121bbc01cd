import path from "node:path";
import { deliver } from "./eventSinks.js";
import type { CoordinatorEvent, EventSink } from "./events.js";
import { errorMessage, LockTimeoutError } from "./errors.js";
import { DEFAULT_LOCK_TIMEOUT_MS, LockTable } from "./lockTable.js";
import { silentLogger, type Logger } from "./logger.js";
import { failedResult } from "./results.js";
import { checkDeclaredOrder } from "./scheduler.js";
import type { TaskSpec, Worker, WorkerResult } from "./types.js";

export const CANCELLED_MESSAGE = "Cancelled before execution";

export type CoordinatorOptions = {
    lockTable?: LockTable;
    events?: EventSink;
    logger?: Logger;
    lockTimeoutMs?: number;
    /** 設定するとタスク実行中のロックにも期限が付く */
    lockExpiryMs?: number;
};

export type ExecuteOptions = {
    signal?: AbortSignal;
};

/**
 * タスクをリスト順に 1 件ずつ実行する。
 * 各タスクの files をロックしてから Worker を呼び、どの経路で抜けてもロックを解放する。
 * 個々の失敗は WorkerResult に畳み込み、executeTasks 自体は投げない。
 */
export class Coordinator {
    readonly lockTable: LockTable;
    private readonly log: Logger;
    private readonly events?: EventSink;
    private readonly lockTimeoutMs: number;
    private readonly lockExpiryMs?: number;

    constructor(private readonly worker: Worker, opts: CoordinatorOptions = {}) {
        this.log = opts.logger ?? silentLogger();
        this.lockTable = opts.lockTable ?? new LockTable({ logger: this.log });
        this.events = opts.events;
        this.lockTimeoutMs = opts.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
        this.lockExpiryMs = opts.lockExpiryMs;
    }

    async executeTasks(
        tasks: readonly TaskSpec[],
        workingDir: string,
        opts: ExecuteOptions = {}
    ): Promise<WorkerResult[]> {
        // dependencies は並べ替えに使わない。食い違いは知らせるだけ
        for (const w of checkDeclaredOrder(tasks)) {
            this.log.warn(w, "declared dependency does not precede task; executing in given order");
            await this.emit({ t: Date.now(), type: "plan_order_warning", ...w });
        }

        const results: WorkerResult[] = [];
        for (const task of tasks) {
            if (opts.signal?.aborted) {
                results.push(failedResult(task.taskId, [CANCELLED_MESSAGE], `Cancelled: ${errorMessage(opts.signal.reason)}`));
                continue;
            }
            results.push(await this.runTask(task, workingDir, opts.signal));
        }
        return results;
    }

    private async runTask(task: TaskSpec, workingDir: string, signal?: AbortSignal): Promise<WorkerResult> {
        this.log.info({ taskId: task.taskId }, `executing task: ${task.description}`);
        await this.emit({
            t: Date.now(),
            type: "task_assigned",
            taskId: task.taskId,
            workerId: this.worker.id,
            description: task.description,
        });

        const keys = task.files.map((f) => path.resolve(workingDir, f));
        try {
            return await this.lockTable.withLocks(
                keys,
                { timeoutMs: this.lockTimeoutMs, expiryMs: this.lockExpiryMs, signal },
                async () => {
                    const result = await this.invokeWorker(task, workingDir);
                    await this.emit({
                        t: Date.now(),
                        type: "worker_completed",
                        taskId: task.taskId,
                        success: result.success,
                        filesModified: result.filesModified,
                        filesCreated: result.filesCreated,
                        errors: result.errors,
                    });
                    return result;
                }
            );
        } catch (err) {
            // invokeWorker は投げないので、ここに来るのはロック取得の失敗だけ
            if (err instanceof LockTimeoutError) {
                const file = task.files[keys.indexOf(err.key)] ?? err.key;
                const msg = `Could not acquire lock for ${file}: ${err.message}`;
                this.log.error({ taskId: task.taskId, file }, msg);
                return failedResult(task.taskId, [msg], `Lock timeout: ${err.message}`);
            }
            this.log.error({ taskId: task.taskId, err: errorMessage(err) }, "task aborted while acquiring locks");
            return failedResult(task.taskId, [errorMessage(err)], `Exception: ${errorMessage(err)}`);
        }
    }

    private async invokeWorker(task: TaskSpec, workingDir: string): Promise<WorkerResult> {
        try {
            const result = await this.worker.execute(task, workingDir);
            if (result.taskId !== task.taskId) {
                this.log.warn({ taskId: task.taskId, reported: result.taskId }, "worker reported a different task id");
                return { ...result, taskId: task.taskId };
            }
            return result;
        } catch (err) {
            this.log.error({ taskId: task.taskId, err: errorMessage(err) }, "task failed with exception");
            return failedResult(task.taskId, [errorMessage(err)], `Exception: ${errorMessage(err)}`);
        }
    }

    private async emit(event: CoordinatorEvent) {
        if (this.events) await deliver(this.events, event, this.log);
    }
}
