import fs from "node:fs";
import path from "node:path";
import { silentLogger, type Logger } from "../core/logger.js";
import { isSafeRelativeUnder } from "../core/paths.js";
import { RemoteToolClient, type RemoteToolClientOptions } from "../core/toolClient.js";
import type { CompletionModel, TaskSpec, ToolAction, Worker, WorkerResult } from "../core/types.js";
import { runWorkerTask } from "./shared.js";

export type RemoteToolWorkerOptions = Omit<RemoteToolClientOptions, "workingDir" | "logger"> & {
    verifyOutputs?: boolean;
    logger?: Logger;
};

type ActionOutcome = {
    trace: string[];
    errors: string[];
    created: Set<string>;
    modified: Set<string>;
};

/**
 * モデルが申告したツール操作を RemoteToolClient で実際に実行する Worker。
 * files_created / files_modified は実行できた操作から組み立て直す。
 */
export class RemoteToolWorker implements Worker {
    readonly id: string;
    private readonly verifyOutputs: boolean;
    private readonly log: Logger;

    constructor(private readonly model: CompletionModel, private readonly opts: RemoteToolWorkerOptions = {}) {
        this.id = `remote:${model.id}`;
        this.verifyOutputs = opts.verifyOutputs ?? true;
        this.log = opts.logger ?? silentLogger();
    }

    execute(task: TaskSpec, workingDir: string): Promise<WorkerResult> {
        this.log.info({ taskId: task.taskId, model: this.model.id, endpoint: this.opts.baseUrl ?? null }, "executing task");
        const client = new RemoteToolClient({ ...this.opts, workingDir, logger: this.log });
        return runWorkerTask(task, workingDir, {
            model: this.model,
            verifyOutputs: this.verifyOutputs,
            log: this.log,
            handleTools: async (actions, result, dir) => {
                const outcome = await executeToolActions(actions, client, dir);
                result.filesCreated = [...outcome.created].sort();
                result.filesModified = [...outcome.modified].sort();
                if (outcome.errors.length) {
                    this.log.warn({ taskId: task.taskId, errors: outcome.errors }, "tool execution encountered errors");
                    result.errors.push(...outcome.errors);
                    result.success = false;
                }
                return outcome.trace;
            },
        });
    }
}

function existedBefore(workingDir: string, rel: string): boolean {
    return isSafeRelativeUnder(workingDir, rel) && fs.existsSync(path.resolve(workingDir, rel));
}

export async function executeToolActions(
    actions: ToolAction[],
    client: RemoteToolClient,
    workingDir: string
): Promise<ActionOutcome> {
    const outcome: ActionOutcome = { trace: [], errors: [], created: new Set(), modified: new Set() };

    for (const action of actions) {
        const file = action.file ?? action.path;
        switch (action.tool) {
            case "write_file": {
                if (!file) {
                    outcome.errors.push("write_file missing path");
                    break;
                }
                const existed = existedBefore(workingDir, file);
                const res = await client.writeFile(file, action.content ?? "");
                if (res.success) {
                    outcome.trace.push(`✓ write_file -> ${file}`);
                    // 同じタスク内で先に作ったファイルへの再書き込みは created のまま
                    if (existed && !outcome.created.has(file)) outcome.modified.add(file);
                    else outcome.created.add(file);
                } else {
                    outcome.errors.push(res.error ?? `write_file failed for ${file}`);
                }
                break;
            }
            case "read_file": {
                if (!file) {
                    outcome.errors.push("read_file missing path");
                    break;
                }
                const res = await client.readFile(file);
                if (res.success) {
                    outcome.trace.push(`✓ read_file -> ${file} (${Math.min(res.content.length, 120)} preview characters)`);
                } else {
                    outcome.errors.push(res.error ?? `read_file failed for ${file}`);
                }
                break;
            }
            case "list_files": {
                const directory = action.directory ?? action.path ?? ".";
                const pattern = action.pattern ?? "*";
                const res = await client.listFiles(directory, pattern);
                if (res.success) {
                    outcome.trace.push(`✓ list_files -> ${directory} (${res.count} items matching '${pattern}')`);
                } else {
                    outcome.errors.push(res.error ?? `list_files failed for ${directory}`);
                }
                break;
            }
            case "execute_bash": {
                const command = action.command ?? "";
                if (!command) {
                    outcome.errors.push("execute_bash missing command");
                    break;
                }
                const res = await client.executeBash(command);
                if (res.success) {
                    outcome.trace.push(`✓ execute_bash -> ${command.slice(0, 60)}`);
                    if (res.stdout.trim()) outcome.trace.push(res.stdout.trim());
                } else {
                    outcome.errors.push(`execute_bash failed for ${command}: exit ${res.returnCode}`);
                    if (res.stderr.trim()) outcome.trace.push(res.stderr.trim());
                }
                break;
            }
            default:
                outcome.trace.push(`ℹ Unsupported tool '${action.tool}', skipping execution`);
        }
    }
    return outcome;
}
