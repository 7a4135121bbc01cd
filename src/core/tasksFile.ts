import fs from "node:fs";
import type { ValidateFunction } from "ajv";
import { tasksFileJsonSchema, tasksFileToSpecs, TasksFileSchema, type TasksFile } from "../schemas/plan.js";
import { errorMessage, TasksFileValidationError } from "./errors.js";
import { assertValid, compileSchema } from "./schema.js";
import type { TaskSpec } from "./types.js";

let validator: ValidateFunction | undefined;

function tasksFileValidator(): ValidateFunction {
    validator ??= compileSchema(tasksFileJsonSchema());
    return validator;
}

/** JSON Schema (Ajv) で形を確かめてから zod で TaskSpec に変換する */
export function validateTasksFile(candidate: unknown): TaskSpec[] {
    try {
        assertValid<TasksFile>(tasksFileValidator(), candidate);
    } catch (err) {
        throw new TasksFileValidationError(`Invalid tasks file: ${errorMessage(err)}`, err);
    }
    const parsed = TasksFileSchema.safeParse(candidate);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        const where = first?.path.length ? first.path.join(".") : "<root>";
        throw new TasksFileValidationError(`Invalid tasks file at ${where}: ${first?.message ?? "invalid"}`, parsed.error);
    }
    const specs = tasksFileToSpecs(parsed.data);
    const seen = new Set<string>();
    for (const entry of specs) {
        if (seen.has(entry.taskId)) {
            throw new TasksFileValidationError(`Invalid tasks file: duplicate task_id ${entry.taskId}`);
        }
        seen.add(entry.taskId);
    }
    return specs;
}

export function readTasksFile(filePath: string): TaskSpec[] {
    let data: unknown;
    try {
        data = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
        throw new TasksFileValidationError(`Failed to read tasks file at ${filePath}: ${errorMessage(err)}`, err);
    }
    return validateTasksFile(data);
}
