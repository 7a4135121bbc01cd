import { PlanEntrySchema, PlanEnvelopeSchema } from "../schemas/plan.js";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ChatMessage, CompletionModel, TaskSpec } from "./types.js";

export const DEFAULT_MAX_TASKS = 6;

export const DEFAULT_PLANNER_SYSTEM_PROMPT = [
    "You are a senior software architect who coordinates multiple coding agents.",
    "Break the user's request into atomic tasks. For each task provide:",
    "- description: short imperative sentence",
    "- files: list of files to read/write (empty list allowed)",
    "- success_criteria: bullet-style list of verifiable checks",
    "- budget: estimated token/effort budget (small, medium, large)",
    "- dependencies: optional list of task_ids this task depends on",
    "Return JSON with the schema:",
    "{",
    '  "tasks": [',
    "     {",
    '       "task_id": "T1",',
    '       "description": "...",',
    '       "files": ["path/to/file"],',
    '       "success_criteria": ["..."],',
    '       "budget": "medium",',
    '       "dependencies": ["T0"]',
    "     }",
    "  ]",
    "}",
    "Keep tasks between 1 and 6 items. Respond with JSON only.",
].join("\n");

const FALLBACK_FILE_EXTENSIONS = [".py", ".md", ".json", ".yaml", ".yml", ".txt"];

export type PlanInput = {
    request: string;
    contextSummary?: string;
    maxTasks?: number;
    systemPrompt?: string;
};

export type ParsedPlan = { ok: true; tasks: TaskSpec[]; skipped: string[] };
export type PlanParseFailure = { ok: false; reason: string };
export type PlanParseOutcome = ParsedPlan | PlanParseFailure;

export type PlanSource =
    | { source: "model"; skipped: string[] }
    | { source: "fallback"; reason: string };

export function buildPlannerMessages(p: PlanInput): ChatMessage[] {
    return [
        { role: "system", content: p.systemPrompt ?? DEFAULT_PLANNER_SYSTEM_PROMPT },
        {
            role: "user",
            content: JSON.stringify({
                user_request: p.request,
                context_summary: p.contextSummary ?? "",
                max_tasks: p.maxTasks ?? DEFAULT_MAX_TASKS,
            }),
        },
    ];
}

/**
 * 応答テキストから JSON 部分を取り出す。
 * ```json フェンス → 汎用 ``` フェンス → 先頭が { でなければ最初の { から最後の } まで、の順。
 */
export function extractPlanJson(raw: string): string {
    let text = raw;
    const jsonFence = text.indexOf("```json");
    if (jsonFence !== -1) {
        const start = jsonFence + "```json".length;
        const end = text.indexOf("```", start);
        text = end === -1 ? text.slice(start) : text.slice(start, end);
    } else {
        const fence = text.indexOf("```");
        if (fence !== -1) {
            const start = fence + 3;
            const end = text.indexOf("```", start);
            text = end === -1 ? text.slice(start) : text.slice(start, end);
        }
    }
    text = text.trim();
    if (text && !text.startsWith("{")) {
        const first = text.indexOf("{");
        const last = text.lastIndexOf("}");
        if (first !== -1 && last > first) text = text.slice(first, last + 1);
    }
    return text;
}

function assertMaxTasks(maxTasks: number): void {
    if (!Number.isInteger(maxTasks) || maxTasks < 1) {
        throw new RangeError(`maxTasks must be a positive integer (got ${maxTasks})`);
    }
}

export function parsePlanResponse(raw: string, maxTasks = DEFAULT_MAX_TASKS): PlanParseOutcome {
    assertMaxTasks(maxTasks);
    const text = extractPlanJson(raw);
    if (!text) return { ok: false, reason: "planner returned empty response" };

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (err) {
        return { ok: false, reason: `planner returned invalid JSON: ${errorMessage(err)}` };
    }
    const envelope = PlanEnvelopeSchema.safeParse(data);
    if (!envelope.success) {
        return { ok: false, reason: "planner response has no tasks array" };
    }

    const tasks: TaskSpec[] = [];
    const skipped: string[] = [];
    const seen = new Set<string>();
    envelope.data.tasks.slice(0, maxTasks).forEach((entry, index) => {
        const parsed = PlanEntrySchema.safeParse(entry);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue?.path.length ? issue.path.join(".") : "<entry>";
            skipped.push(`tasks[${index}] ${where}: ${issue?.message ?? "invalid entry"}`);
            return;
        }
        const e = parsed.data;
        // 位置から振り直すのは未指定か重複のときだけ
        let taskId = e.task_id || `T${index + 1}`;
        if (seen.has(taskId)) taskId = `T${index + 1}`;
        while (seen.has(taskId)) taskId = `${taskId}_${index + 1}`;
        seen.add(taskId);
        tasks.push({
            taskId,
            description: e.description,
            files: e.files,
            successCriteria: e.success_criteria,
            budget: e.budget,
            dependencies: e.dependencies,
        });
    });

    if (tasks.length === 0) {
        return { ok: false, reason: skipped.length ? `no usable tasks (${skipped.join("; ")})` : "planner returned no tasks" };
    }
    return { ok: true, tasks, skipped };
}

/** どのパスでも失敗したときに使う、決定的な 1 タスクの計画 */
export function buildFallbackPlan(request: string): TaskSpec[] {
    const files: string[] = [];
    for (const token of request.split(/\s+/)) {
        if (!token.includes("/")) continue;
        if (!FALLBACK_FILE_EXTENSIONS.some((ext) => token.endsWith(ext))) continue;
        if (!files.includes(token)) files.push(token);
    }
    return [
        {
            taskId: "T1",
            description: `Implement user request: ${request}`,
            files,
            successCriteria: ["Request completed and verified"],
            budget: "medium",
            dependencies: [],
        },
    ];
}

export type TaskPlannerOptions = {
    maxTasks?: number;
    systemPrompt?: string;
    logger?: Logger;
};

export class TaskPlanner {
    private readonly maxTasks: number;
    private readonly systemPrompt?: string;
    private readonly log: Logger;
    private outcome?: PlanSource;

    constructor(private readonly model: CompletionModel, opts: TaskPlannerOptions = {}) {
        this.maxTasks = opts.maxTasks ?? DEFAULT_MAX_TASKS;
        assertMaxTasks(this.maxTasks);
        this.systemPrompt = opts.systemPrompt;
        this.log = opts.logger ?? silentLogger();
    }

    /** 直近の plan() が モデル由来か fallback か */
    get lastOutcome(): PlanSource | undefined {
        return this.outcome;
    }

    async plan(request: string, contextSummary = ""): Promise<TaskSpec[]> {
        const messages = buildPlannerMessages({
            request,
            contextSummary,
            maxTasks: this.maxTasks,
            systemPrompt: this.systemPrompt,
        });

        let raw: string;
        try {
            const response = await this.model.invoke(messages);
            raw = response.content;
        } catch (err) {
            return this.fallback(request, `planner model invocation failed: ${errorMessage(err)}`);
        }
        this.log.debug({ raw }, "planner raw response");

        const parsed = parsePlanResponse(raw, this.maxTasks);
        if (!parsed.ok) {
            this.log.debug({ raw: raw.slice(0, 500) }, "unusable planner response");
            return this.fallback(request, parsed.reason);
        }
        for (const note of parsed.skipped) {
            this.log.warn({ note }, "skipped malformed task entry");
        }
        this.outcome = { source: "model", skipped: parsed.skipped };
        return parsed.tasks;
    }

    private fallback(request: string, reason: string): TaskSpec[] {
        this.log.error({ reason }, "planning failed; using fallback plan");
        this.outcome = { source: "fallback", reason };
        return buildFallbackPlan(request);
    }
}
