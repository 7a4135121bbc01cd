import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_STATE_DIR } from "../core/config.js";
import { formatCliError, errorMessage } from "../core/errors.js";
import { eventTaskId, parseEventLine } from "../core/events.js";
import { findLatestRunDir } from "../core/paths.js";
import { parseIntOption } from "./context.js";

type TailOpts = {
    task?: string;              // taskId or "all"
    type?: string;              // csv: task_assigned,worker_completed,plan_created,plan_order_warning
    events?: string;            // events.ndjson を直接指定
    duration?: number;          // フォロー時間(ms)。未指定なら非フォローで即終了
    interval?: number;          // ポーリング間隔(ms)
    stateDir?: string;
};

export type TailFilter = {
    task?: string;
    types: Set<string> | null;
};

const LatestSchema = z.object({ runDir: z.string().min(1) });

export function resolveEventsFile(opts: Pick<TailOpts, "events" | "stateDir">, cwd: string): string {
    if (opts.events) return path.resolve(cwd, opts.events);
    const stateDir = path.resolve(cwd, opts.stateDir ?? DEFAULT_STATE_DIR);
    const latest = path.join(stateDir, "runs", "latest.json");
    let runDir: string | null = null;
    if (fs.existsSync(latest)) {
        runDir = LatestSchema.parse(JSON.parse(fs.readFileSync(latest, "utf8"))).runDir;
    } else {
        runDir = findLatestRunDir(stateDir);
    }
    if (!runDir) {
        throw new Error(`no run found under ${stateDir}. Provide --events <file> or --state-dir <dir>.`);
    }
    const ev = path.join(runDir, "events.ndjson");
    if (!fs.existsSync(ev)) {
        throw new Error(`events.ndjson not found at ${ev}`);
    }
    return ev;
}

export function parseTypes(v?: string): Set<string> | null {
    if (!v) return null;
    const s = new Set<string>();
    for (const t of v.split(",").map((x) => x.trim()).filter(Boolean)) s.add(t);
    return s;
}

/** plan_created はタスクに紐づかないので --task 指定時も通す */
export function matches(line: string, filter: TailFilter): boolean {
    const ev = parseEventLine(line);
    if (!ev) return false;
    if (filter.types && !filter.types.has(ev.type)) return false;
    const id = eventTaskId(ev);
    if (filter.task && filter.task !== "all" && id !== null && id !== filter.task) return false;
    return true;
}

function collect(text: string, filter: TailFilter, out: string[]) {
    for (const ln of text.split(/\r?\n/)) {
        if (!ln.trim()) continue;
        if (matches(ln, filter)) out.push(ln);
    }
}

export function tailOnce(evFile: string, filter: TailFilter): string[] {
    if (!fs.existsSync(evFile)) return [];
    const out: string[] = [];
    collect(fs.readFileSync(evFile, "utf8"), filter, out);
    return out;
}

export async function tailFollow(
    evFile: string,
    filter: TailFilter,
    durationMs: number,
    intervalMs: number
): Promise<string[]> {
    let pos = 0;
    let pending = "";
    const lines: string[] = [];
    const start = Date.now();

    // まずは既存分を読む
    if (fs.existsSync(evFile)) {
        const buf = fs.readFileSync(evFile);
        pos = buf.length;
        const text = buf.toString("utf8");
        const cut = text.lastIndexOf("\n") + 1;
        collect(text.slice(0, cut), filter, lines);
        pending = text.slice(cut);
    }

    while (Date.now() - start < durationMs) {
        await new Promise((r) => setTimeout(r, intervalMs));
        if (!fs.existsSync(evFile)) continue;
        const st = fs.statSync(evFile);
        if (st.size <= pos) continue;
        const fd = fs.openSync(evFile, "r");
        try {
            const len = st.size - pos;
            const buf = Buffer.allocUnsafe(len);
            fs.readSync(fd, buf, 0, len, pos);
            pos = st.size;
            // 書きかけの行は次の読み込みまで持ち越す
            const text = pending + buf.toString("utf8");
            const cut = text.lastIndexOf("\n") + 1;
            collect(text.slice(0, cut), filter, lines);
            pending = text.slice(cut);
        } finally {
            fs.closeSync(fd);
        }
    }
    if (pending.trim() && matches(pending, filter)) lines.push(pending);
    return lines;
}

export function cmdTail() {
    const cmd = new Command("tail");
    cmd
        .description("Print (or follow) a run's events.ndjson filtered by task/type")
        .option("--task <id|all>", "Task ID to filter (default: all)", "all")
        .option("--type <csv>", "Filter types: task_assigned,worker_completed,plan_created,plan_order_warning")
        .option("--events <file>", "Path to events.ndjson (otherwise uses <state-dir>/runs/latest.json)")
        .option("--state-dir <dir>", "State directory (default: ./.taskgate)")
        .option("--duration <ms>", "Follow duration milliseconds (if omitted, just prints current contents and exit)", parseIntOption)
        .option("--interval <ms>", "Polling interval milliseconds", parseIntOption, 100)
        .action(async (opts: TailOpts) => {
            try {
                const evFile = resolveEventsFile(opts, process.cwd());
                const filter: TailFilter = { task: opts.task, types: parseTypes(opts.type) };
                const outLines =
                    typeof opts.duration === "number" && Number.isFinite(opts.duration)
                        ? await tailFollow(evFile, filter, opts.duration, opts.interval ?? 100)
                        : tailOnce(evFile, filter);
                if (outLines.length) process.stdout.write(outLines.join("\n") + "\n");
            } catch (e) {
                console.error(formatCliError("tail", errorMessage(e)));
                process.exitCode = 1;
            }
        });
    return cmd;
}
