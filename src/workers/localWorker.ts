import { silentLogger, type Logger } from "../core/logger.js";
import { ToolExecutor } from "../core/toolExecutor.js";
import type { CompletionModel, TaskSpec, ToolAction, Worker, WorkerResult } from "../core/types.js";
import { runWorkerTask } from "./shared.js";

export type LocalWorkerOptions = {
    verifyOutputs?: boolean;
    logger?: Logger;
};

/**
 * モデルが「実行した」と申告したツール操作を、再実行せずにディスク上で確認するだけの Worker。
 */
export class LocalWorker implements Worker {
    readonly id: string;
    private readonly verifyOutputs: boolean;
    private readonly log: Logger;

    constructor(private readonly model: CompletionModel, opts: LocalWorkerOptions = {}) {
        this.id = `local:${model.id}`;
        this.verifyOutputs = opts.verifyOutputs ?? true;
        this.log = opts.logger ?? silentLogger();
    }

    execute(task: TaskSpec, workingDir: string): Promise<WorkerResult> {
        this.log.info({ taskId: task.taskId, model: this.model.id }, "executing task");
        return runWorkerTask(task, workingDir, {
            model: this.model,
            verifyOutputs: this.verifyOutputs,
            log: this.log,
            handleTools: async (actions, _result, dir) => verifyToolActions(actions, new ToolExecutor(dir, { logger: this.log })),
        });
    }
}

export function verifyToolActions(actions: ToolAction[], tools: ToolExecutor): string[] {
    const trace: string[] = [];
    for (const action of actions) {
        const file = action.file ?? action.path;
        switch (action.tool) {
            case "write_file": {
                if (!file) break;
                const read = tools.readFile(file);
                trace.push(read.success
                    ? `✓ Verified: ${file} exists and is readable`
                    : `✗ Warning: ${file} was claimed but doesn't exist`);
                break;
            }
            case "read_file": {
                if (!file) break;
                const read = tools.readFile(file);
                trace.push(read.success
                    ? `✓ Verified: ${file} read successfully (${read.size} bytes)`
                    : `✗ Warning: ${file} cannot be read`);
                break;
            }
            case "execute_bash": {
                // シェルコマンドは安全に再実行できないので記録だけ
                if (action.command) trace.push(`✓ Bash command reported: ${action.command.slice(0, 50)}`);
                break;
            }
            case "list_files": {
                const listed = tools.listFiles(action.directory ?? ".", action.pattern ?? "*");
                trace.push(listed.success
                    ? `✓ Directory listing: ${listed.count} files`
                    : `✗ Warning: ${listed.error ?? "directory listing failed"}`);
                break;
            }
            default:
                trace.push(`ℹ Unsupported tool '${action.tool}', not verified`);
        }
    }
    return trace;
}
