// src/schemas/plan.ts
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { TaskSpec, TestRun } from "../core/types.js";

export const BudgetSchema = z.enum(["small", "medium", "large"]);

/** モデルが数値や真偽値を混ぜてきても文字列として受ける */
const ScalarText = z
    .union([z.string(), z.number(), z.boolean()])
    .transform((v) => String(v).trim());

/** 単一文字列は 1 要素の配列、null/undefined は空配列として扱う */
export const StringListSchema = z
    .preprocess(
        (v) => (v === undefined || v === null ? [] : typeof v === "string" ? [v] : v),
        z.array(ScalarText)
    )
    .transform((xs) => xs.filter((x) => x.length > 0));

/** 順序付き集合。最初に現れた位置を残して重複を落とす */
export const UniqueStringListSchema = StringListSchema.transform((xs) => [...new Set(xs)]);

const OptionalId = z
    .union([z.string(), z.number()])
    .transform((v) => String(v).trim())
    .optional()
    .catch(undefined);

// ---------- Planner の応答 ----------

export const PlanEntrySchema = z.object({
    task_id: OptionalId,
    description: z.string().trim().min(1, "description must be non-empty"),
    files: UniqueStringListSchema,
    success_criteria: StringListSchema,
    budget: z
        .preprocess((v) => (typeof v === "string" ? v.trim().toLowerCase() : v), BudgetSchema)
        .catch("medium"),
    dependencies: UniqueStringListSchema,
});

export type PlanEntry = z.infer<typeof PlanEntrySchema>;

export const PlanEnvelopeSchema = z.object({
    tasks: z.array(z.unknown()),
});

// ---------- Worker の応答 ----------

const OptionalText = z.string().optional().catch(undefined);

export const ToolActionSchema = z.object({
    tool: z.string().transform((v) => v.trim().toLowerCase()),
    file: OptionalText,
    path: OptionalText,
    content: OptionalText,
    command: OptionalText,
    directory: OptionalText,
    pattern: OptionalText,
    result: OptionalText,
});

export const TestRunSchema = z
    .object({
        name: z.string().catch(""),
        status: z.string().catch("unknown"),
        duration_ms: z.number().catch(0),
    })
    .transform((t): TestRun => ({ name: t.name, status: t.status, durationMs: t.duration_ms }));

export const WorkerPayloadSchema = z.object({
    success: z.boolean().catch(false),
    tools_used: z.array(z.unknown()).catch([]),
    files_modified: StringListSchema.catch([]),
    files_created: StringListSchema.catch([]),
    tests_run: z.array(z.unknown()).catch([]),
    verification_passed: z.boolean().catch(false),
    errors: StringListSchema.catch([]),
    logs: z.string().catch(""),
});

export type WorkerPayload = z.infer<typeof WorkerPayloadSchema>;

// ---------- --tasks で渡すタスクファイル ----------

export const TasksFileTaskSchema = z
    .object({
        task_id: z.string().min(1),
        description: z.string().min(1),
        files: z.array(z.string()).optional(),
        success_criteria: z.array(z.string()).optional(),
        budget: BudgetSchema.optional(),
        dependencies: z.array(z.string()).optional(),
    })
    .strict();

export const TasksFileSchema = z
    .object({
        tasks: z.array(TasksFileTaskSchema).min(1),
    })
    .strict();

export type TasksFile = z.infer<typeof TasksFileSchema>;

export function tasksFileToSpecs(file: TasksFile): TaskSpec[] {
    return file.tasks.map((t) => ({
        taskId: t.task_id,
        description: t.description,
        files: [...new Set(t.files ?? [])],
        successCriteria: t.success_criteria ?? [],
        budget: t.budget ?? "medium",
        dependencies: [...new Set(t.dependencies ?? [])],
    }));
}

/** TaskSpec を --tasks で読み戻せる snake_case の形にする */
export function specsToTasksFile(tasks: readonly TaskSpec[]): TasksFile {
    return {
        tasks: tasks.map((t) => ({
            task_id: t.taskId,
            description: t.description,
            files: [...t.files],
            success_criteria: [...t.successCriteria],
            budget: t.budget,
            dependencies: [...t.dependencies],
        })),
    };
}

export function tasksFileJsonSchema() {
    return zodToJsonSchema(TasksFileSchema, { $refStrategy: "none" });
}

export function workerResultJsonSchema() {
    return zodToJsonSchema(WorkerPayloadSchema, { $refStrategy: "none", effectStrategy: "input" });
}

/** Zod → JSON Schema を生成してファイルへ書き出し */
export function writeJsonSchemaFile(destPath: string, schema: object) {
    fs.mkdirSync(path.dirname(destPath), { recursive: true });
    fs.writeFileSync(destPath, JSON.stringify(schema, null, 2), "utf8");
}
