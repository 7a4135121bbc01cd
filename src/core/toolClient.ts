import crypto from "node:crypto";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import {
    DEFAULT_BASH_TIMEOUT_MS,
    ToolExecutor,
    type BashResult,
    type ListFilesResult,
    type ReadFileResult,
    type WriteFileResult,
} from "./toolExecutor.js";

export type RemoteToolClientOptions = {
    workingDir: string;
    /** 未設定ならリモートを使わず常にローカル実行 */
    baseUrl?: string;
    sessionId?: string;
    provider?: string;
    model?: string;
    agent?: string;
    timeoutMs?: number;
    executor?: ToolExecutor;
    logger?: Logger;
};

const RemoteResponseSchema = z.object({
    success: z.boolean(),
    error: z.string().optional(),
    result: z
        .object({
            output: z.string().catch(""),
            metadata: z.record(z.unknown()).catch({}),
        })
        .optional(),
});

export type RemoteToolOutput = {
    output: string;
    metadata: Record<string, unknown>;
};

export const DEFAULT_REMOTE_TIMEOUT_MS = 30_000;
/** bash はコマンド自体のタイムアウトにこの分を上乗せして待つ */
export const BASH_TIMEOUT_MARGIN_MS = 5_000;

/** 接続前に失敗した（サーバーにリクエストが届いていない）エラーコード */
const CONNECT_ERROR_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN", "EHOSTUNREACH", "ENETUNREACH"]);

function errorCode(err: unknown): string | undefined {
    if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
    return typeof err.code === "string" ? err.code : undefined;
}

/** fetch は接続エラーを TypeError の cause（AggregateError のこともある）に包んで投げる */
export function isConnectFailure(err: unknown): boolean {
    const seen = new Set<unknown>();
    const stack: unknown[] = [err];
    while (stack.length > 0) {
        const cur = stack.pop();
        if (cur === undefined || seen.has(cur)) continue;
        seen.add(cur);
        const code = errorCode(cur);
        if (code && CONNECT_ERROR_CODES.has(code)) return true;
        if (cur instanceof AggregateError) stack.push(...cur.errors);
        if (cur instanceof Error) stack.push(cur.cause);
    }
    return false;
}

export class RemoteToolError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "RemoteToolError";
    }
}

/** tree 形式の一覧出力からファイル名だけを拾う（末尾 / はディレクトリ） */
export function parseRemoteListing(output: string): string[] {
    return output
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line && !line.endsWith("/"));
}

/**
 * ツール操作を HTTP のツール実行エンドポイントへ中継する。
 * エンドポイントが未設定か接続できないときだけローカルの ToolExecutor で実行する。
 * 送信後の失敗はローカルで再実行せず、その操作の失敗として返す。
 */
export class RemoteToolClient {
    readonly sessionId: string;
    private readonly executor: ToolExecutor;
    private readonly log: Logger;

    constructor(private readonly opts: RemoteToolClientOptions) {
        this.sessionId = opts.sessionId ?? `taskgate-${crypto.randomUUID().slice(0, 8)}`;
        this.executor = opts.executor ?? new ToolExecutor(opts.workingDir, { logger: opts.logger });
        this.log = opts.logger ?? silentLogger();
    }

    get remoteEnabled(): boolean {
        return Boolean(this.opts.baseUrl);
    }

    async writeFile(filePath: string, content: string): Promise<WriteFileResult> {
        const remote = await this.tryRemote("write", { filePath, content });
        if (remote === undefined) return this.executor.writeFile(filePath, content);
        if (remote instanceof RemoteToolError) {
            return { success: false, verified: false, size: 0, error: remote.message };
        }
        return { success: true, verified: false, size: content.length };
    }

    async readFile(filePath: string): Promise<ReadFileResult> {
        const remote = await this.tryRemote("read", { filePath });
        if (remote === undefined) return this.executor.readFile(filePath);
        if (remote instanceof RemoteToolError) {
            return { success: false, exists: false, content: "", size: 0, error: remote.message };
        }
        return { success: true, exists: true, content: remote.output, size: remote.output.length };
    }

    async listFiles(directory = ".", pattern = "*"): Promise<ListFilesResult> {
        const remote = await this.tryRemote("list", { path: directory, pattern });
        if (remote === undefined) return this.executor.listFiles(directory, pattern);
        if (remote instanceof RemoteToolError) {
            return { success: false, files: [], count: 0, error: remote.message };
        }
        const files = parseRemoteListing(remote.output);
        const count = typeof remote.metadata.count === "number" ? remote.metadata.count : files.length;
        return { success: true, files, count };
    }

    async executeBash(command: string, timeoutMs = DEFAULT_BASH_TIMEOUT_MS): Promise<BashResult> {
        const remote = await this.tryRemote("bash", { command, timeout: timeoutMs }, timeoutMs + BASH_TIMEOUT_MARGIN_MS);
        if (remote === undefined) return this.executor.executeBash(command, timeoutMs);
        if (remote instanceof RemoteToolError) {
            return { success: false, stdout: "", stderr: remote.message, returnCode: -1 };
        }
        const exit = typeof remote.metadata.exit === "number" ? remote.metadata.exit : 0;
        return { success: exit === 0, stdout: remote.output, stderr: "", returnCode: exit };
    }

    /**
     * undefined: リクエストが届かなかった（ローカルへフォールバック）
     * RemoteToolError: リクエストは届いた。タイムアウト・HTTP エラー・ツール失敗を含む
     */
    private async tryRemote(
        tool: string,
        args: Record<string, unknown>,
        minTimeoutMs = 0
    ): Promise<RemoteToolOutput | RemoteToolError | undefined> {
        if (!this.opts.baseUrl) return undefined;
        const url = new URL(`${this.opts.baseUrl.replace(/\/+$/, "")}/tool/execute`);
        url.searchParams.set("directory", this.opts.workingDir);
        const body = {
            tool,
            provider: this.opts.provider ?? "",
            model: this.opts.model ?? "",
            args,
            sessionID: this.sessionId,
            agent: this.opts.agent ?? "build",
            extra: {},
        };
        const timeoutMs = Math.max(this.opts.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS, minTimeoutMs);

        let res: Response;
        try {
            res = await fetch(url, {
                method: "POST",
                headers: { "content-type": "application/json" },
                body: JSON.stringify(body),
                signal: AbortSignal.timeout(timeoutMs),
            });
        } catch (err) {
            if (isConnectFailure(err)) {
                this.log.warn({ tool, err: errorMessage(err) }, "remote tool endpoint unavailable; executing locally");
                return undefined;
            }
            this.log.warn({ tool, err: errorMessage(err) }, "remote tool call failed after it was sent");
            return new RemoteToolError(`remote ${tool} failed: ${errorMessage(err)}`);
        }
        if (!res.ok) {
            return new RemoteToolError(`remote ${tool} failed: HTTP ${res.status} ${res.statusText}`);
        }

        let data: unknown;
        try {
            data = await res.json();
        } catch (err) {
            return new RemoteToolError(`remote ${tool} returned invalid JSON: ${errorMessage(err)}`);
        }
        const parsed = RemoteResponseSchema.safeParse(data);
        if (!parsed.success) {
            return new RemoteToolError(`remote ${tool} returned an unexpected payload`);
        }
        if (!parsed.data.success) {
            return new RemoteToolError(parsed.data.error ?? `remote ${tool} failed`);
        }
        return parsed.data.result ?? { output: "", metadata: {} };
    }
}
