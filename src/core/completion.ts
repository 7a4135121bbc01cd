import { execa } from "execa";
import stripAnsi from "strip-ansi";
import type { ChatMessage, CompletionModel } from "./types.js";

export const DEFAULT_MODEL_COMMAND = "ollama run qwen2.5-coder:14b-instruct";
export const DEFAULT_MODEL_TIMEOUT_MS = 300_000;

export type ExecCompletionModelOptions = {
    /** 例: "ollama run qwen2.5-coder:14b-instruct"。プロンプトは最後の引数として渡す */
    command?: string;
    timeoutMs?: number;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
};

export function renderMessages(messages: ChatMessage[]): string {
    return messages.map((m) => m.content.trim()).filter(Boolean).join("\n\n");
}

function buildSpawnArgs(command: string) {
    const [cmd, ...args] = command.trim().split(/\s+/);
    if (!cmd) throw new Error("model command is empty");
    // テスト用スタブなど .js はそのまま node で起動する
    if (cmd.endsWith(".js")) {
        return { file: process.execPath, args: [cmd, ...args] };
    }
    return { file: cmd, args };
}

/** ローカルのモデル CLI を 1 回起動して標準出力を応答として返す */
export class ExecCompletionModel implements CompletionModel {
    readonly id: string;
    private readonly command: string;
    private readonly timeoutMs: number;

    constructor(private readonly opts: ExecCompletionModelOptions = {}) {
        this.command = opts.command ?? DEFAULT_MODEL_COMMAND;
        this.timeoutMs = opts.timeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
        this.id = this.command;
    }

    async invoke(messages: ChatMessage[]): Promise<{ content: string }> {
        const { file, args } = buildSpawnArgs(this.command);
        const res = await execa(file, [...args, renderMessages(messages)], {
            cwd: this.opts.cwd,
            env: this.opts.env,
            timeout: this.timeoutMs,
            reject: false,
        });
        if (res.timedOut) {
            throw new Error(`model command timed out after ${this.timeoutMs / 1000}s: ${this.command}`);
        }
        if (res.exitCode !== 0) {
            const detail = stripAnsi(res.stderr).trim() || `exit code ${res.exitCode ?? "unknown"}`;
            throw new Error(`model command failed: ${detail}`);
        }
        return { content: stripAnsi(res.stdout).trim() };
    }
}
