import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { TaskSpec, WorkerResult } from "./types.js";

export const HISTORY_FILE_NAME = "context.jsonl";
export const DEFAULT_HISTORY_ENTRIES = 5;

const HistoryEntrySchema = z.object({
    t: z.number(),
    request: z.string(),
    plan: z.string(),
    results: z.array(z.string()).default([]),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export function planningSummary(tasks: readonly TaskSpec[]): string {
    return `Planned ${tasks.length} tasks: ${tasks.map((t) => t.taskId).join(", ")}`;
}

export function resultSummary(result: WorkerResult): string {
    let line = `Task ${result.taskId}: ${result.success ? "SUCCESS" : "FAILED"}`;
    if (result.errors.length) line += ` Errors: ${result.errors.join(", ")}`;
    return line;
}

/** 明示の --context と履歴の要約をつなぐ（履歴が先） */
export function combineContext(...parts: Array<string | undefined>): string {
    return parts
        .map((p) => p?.trim() ?? "")
        .filter(Boolean)
        .join("\n\n");
}

export type RunHistoryOptions = {
    /** 要約に含める直近の件数 */
    entries?: number;
    logger?: Logger;
};

/**
 * <stateDir>/context.jsonl に 1 run 1 行で依頼と結果の要約を残し、
 * 次回の計画に渡す context summary を組み立てる。
 */
export class RunHistory {
    readonly filepath: string;
    private readonly entries: number;
    private readonly log: Logger;

    constructor(stateDir: string, opts: RunHistoryOptions = {}) {
        this.filepath = path.join(stateDir, HISTORY_FILE_NAME);
        this.entries = opts.entries ?? DEFAULT_HISTORY_ENTRIES;
        this.log = opts.logger ?? silentLogger();
    }

    /** 壊れた行は読み飛ばす */
    read(): HistoryEntry[] {
        if (!fs.existsSync(this.filepath)) return [];
        const out: HistoryEntry[] = [];
        for (const line of fs.readFileSync(this.filepath, "utf8").split(/\r?\n/)) {
            if (!line.trim()) continue;
            let obj: unknown;
            try {
                obj = JSON.parse(line);
            } catch (err) {
                this.log.warn({ file: this.filepath, err: errorMessage(err) }, "skipping unreadable history line");
                continue;
            }
            const parsed = HistoryEntrySchema.safeParse(obj);
            if (parsed.success) out.push(parsed.data);
            else this.log.warn({ file: this.filepath }, "skipping malformed history entry");
        }
        return out;
    }

    append(entry: Omit<HistoryEntry, "t"> & { t?: number }): void {
        const record: HistoryEntry = { t: entry.t ?? Date.now(), request: entry.request, plan: entry.plan, results: entry.results };
        fs.mkdirSync(path.dirname(this.filepath), { recursive: true });
        fs.appendFileSync(this.filepath, JSON.stringify(record) + "\n", "utf8");
        this.log.debug({ file: this.filepath }, "recorded run history");
    }

    /** 直近 entries 件を古い順に並べた要約。履歴がなければ空文字 */
    summary(): string {
        const recent = this.read().slice(-this.entries);
        if (recent.length === 0) return "";
        const lines = ["Previous requests:"];
        for (const e of recent) {
            lines.push(`- ${e.request}`, `  ${e.plan}`);
            for (const r of e.results) lines.push(`  ${r}`);
        }
        return lines.join("\n");
    }
}
