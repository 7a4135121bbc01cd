import stripAnsi from "strip-ansi";
import { TestRunSchema, ToolActionSchema, WorkerPayloadSchema, type WorkerPayload } from "../schemas/plan.js";
import { errorMessage, WorkerResponseParseError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { failedResult, verifyClaimedFiles } from "../core/results.js";
import type { CompletionModel, TaskSpec, TestRun, ToolAction, WorkerResult } from "../core/types.js";

export const RAW_RESPONSE_PREVIEW = 500;

export function buildWorkerPrompt(task: TaskSpec): string {
    const parts = [`Task ID: ${task.taskId}`, `Description: ${task.description}`, ""];

    if (task.files.length) {
        parts.push("Files to work with:", ...task.files.map((f) => `  - ${f}`), "");
    }
    if (task.successCriteria.length) {
        parts.push("Success criteria:", ...task.successCriteria.map((c) => `  - ${c}`), "");
    }

    parts.push(
        "AVAILABLE TOOLS:",
        "You have access to the following tools to execute this task:",
        "",
        "1. read_file(file_path): Read a file's contents",
        "   Example: read_file('config.json')",
        "",
        "2. write_file(file_path, content): Write content to a file",
        "   Example: write_file('hello.txt', 'Hello')",
        "",
        "3. execute_bash(command): Execute a bash command",
        "   Example: execute_bash('ls -la')",
        "",
        "4. list_files(directory, pattern): List files in a directory",
        "   Example: list_files('.', '*.md')",
        "",
        "TOOL USAGE INSTRUCTIONS:",
        "- Use tools to actually perform file operations and run commands",
        "- After using tools, verify the results",
        "- Include tool usage in your logs",
        "",
        "Execute this task and return a JSON response with this exact format:",
        "{",
        '  "success": true/false,',
        '  "tools_used": [{"tool": "tool_name", "file": "file_path", "content": "written content", "command": "shell command", "result": "success/failure"}],',
        '  "files_modified": ["list of file paths"],',
        '  "files_created": ["list of new file paths"],',
        '  "tests_run": [{"name": "test name", "status": "passed/failed", "duration_ms": 123}],',
        '  "verification_passed": true/false,',
        '  "errors": ["list of error messages"],',
        '  "logs": "execution log text including tool usage"',
        "}",
        "",
        "IMPORTANT:",
        "- Verify all changes before claiming success",
        "- Read files back after writing to confirm",
        "- Run tests if applicable",
        "- Report actual errors, not assumptions",
        "",
        "Begin execution:"
    );
    return parts.join("\n");
}

/** start 位置の { か [ に対応する閉じ括弧の位置。文字列リテラル内は無視する */
function findJsonEnd(text: string, start: number): number {
    const stack: string[] = [];
    let inString = false;
    let escaped = false;
    for (let i = start; i < text.length; i++) {
        const c = text[i];
        if (inString) {
            if (escaped) escaped = false;
            else if (c === "\\") escaped = true;
            else if (c === '"') inString = false;
            continue;
        }
        if (c === '"') inString = true;
        else if (c === "{") stack.push("}");
        else if (c === "[") stack.push("]");
        else if (c === "}" || c === "]") {
            if (stack.pop() !== c) return -1;
            if (stack.length === 0) return i;
        }
    }
    return -1;
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function scanForObject(text: string): Record<string, unknown> | null {
    for (let i = 0; i < text.length; i++) {
        const c = text[i];
        if (c !== "{" && c !== "[") continue;
        const end = findJsonEnd(text, i);
        if (end === -1) continue;
        let value: unknown;
        try {
            value = JSON.parse(text.slice(i, end + 1));
        } catch {
            continue;
        }
        if (isRecord(value)) return value;
        if (Array.isArray(value)) {
            const first = value.find(isRecord);
            if (first) return first;
        }
        // 中身に object が無い配列は読み飛ばす
        i = end;
    }
    return null;
}

/**
 * モデル出力から最初の JSON object を取り出す。
 * ANSI エスケープを除き、``` フェンスがあれば中身を先に試す。
 */
export function parseWorkerResponse(text: string): Record<string, unknown> {
    const clean = stripAnsi(text).trim();
    const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(clean);
    const found = (fenced ? scanForObject(fenced[1]) : null) ?? scanForObject(clean);
    if (!found) {
        throw new WorkerResponseParseError("No JSON object found in worker response", text);
    }
    return found;
}

export function coerceWorkerPayload(data: Record<string, unknown>): WorkerPayload {
    return WorkerPayloadSchema.parse(data);
}

export function toolActions(raw: unknown[], log?: Logger): ToolAction[] {
    const actions: ToolAction[] = [];
    raw.forEach((entry, index) => {
        const parsed = ToolActionSchema.safeParse(entry);
        if (parsed.success && parsed.data.tool) actions.push(parsed.data);
        else log?.debug({ index }, "ignoring malformed tools_used entry");
    });
    return actions;
}

function testRuns(raw: unknown[]): TestRun[] {
    return raw.flatMap((entry) => {
        const parsed = TestRunSchema.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
    });
}

export function payloadToResult(taskId: string, payload: WorkerPayload): WorkerResult {
    return {
        taskId,
        success: payload.success,
        filesModified: [...new Set(payload.files_modified)],
        filesCreated: [...new Set(payload.files_created)],
        testsRun: testRuns(payload.tests_run),
        verificationPassed: payload.verification_passed,
        errors: [...payload.errors],
        logs: payload.logs,
    };
}

export function appendToolTrace(result: WorkerResult, trace: string[]) {
    if (trace.length === 0) return;
    result.logs += `${result.logs ? "\n\n" : ""}Tool Execution Results:\n${trace.join("\n")}`;
}

/** 各 Worker 固有の tools_used 処理。trace 行を返す */
export type ToolActionHandler = (
    actions: ToolAction[],
    result: WorkerResult,
    workingDir: string
) => Promise<string[]>;

export type WorkerRunDeps = {
    model: CompletionModel;
    verifyOutputs: boolean;
    log: Logger;
    handleTools: ToolActionHandler;
};

/**
 * プロンプト生成 → モデル呼び出し → 応答解析 → ツール処理 → ファイル検証。
 * 例外はすべて success=false の WorkerResult に変換する。
 */
export async function runWorkerTask(task: TaskSpec, workingDir: string, deps: WorkerRunDeps): Promise<WorkerResult> {
    let raw = "";
    try {
        const response = await deps.model.invoke([{ role: "user", content: buildWorkerPrompt(task) }]);
        raw = response.content;
        const payload = coerceWorkerPayload(parseWorkerResponse(raw));
        const result = payloadToResult(task.taskId, payload);

        const actions = toolActions(payload.tools_used, deps.log);
        if (actions.length) {
            appendToolTrace(result, await deps.handleTools(actions, result, workingDir));
        }
        if (deps.verifyOutputs) verifyClaimedFiles(result, workingDir, deps.log);
        return result;
    } catch (err) {
        if (err instanceof WorkerResponseParseError) {
            deps.log.error({ taskId: task.taskId, err: err.message }, "worker returned invalid JSON");
            return failedResult(
                task.taskId,
                [`Invalid JSON response: ${err.message}`],
                `Raw response: ${raw.slice(0, RAW_RESPONSE_PREVIEW)}`
            );
        }
        deps.log.error({ taskId: task.taskId, err: errorMessage(err) }, "worker execution failed");
        return failedResult(task.taskId, [errorMessage(err)], `Exception: ${errorMessage(err)}`);
    }
}
