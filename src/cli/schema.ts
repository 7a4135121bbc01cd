import { Command } from "commander";
import path from "node:path";
import { tasksFileJsonSchema, workerResultJsonSchema, writeJsonSchemaFile } from "../schemas/plan.js";

export const SCHEMA_FILES = {
    tasks: "tasks.schema.json",
    workerResult: "worker-result.schema.json",
} as const;

/** --tasks のファイル形式と Worker 応答の形を JSON Schema として書き出す */
export function writeSchemas(outDir: string): string[] {
    const tasksPath = path.join(outDir, SCHEMA_FILES.tasks);
    const resultPath = path.join(outDir, SCHEMA_FILES.workerResult);
    writeJsonSchemaFile(tasksPath, tasksFileJsonSchema());
    writeJsonSchemaFile(resultPath, workerResultJsonSchema());
    return [tasksPath, resultPath];
}

export function cmdSchema() {
    const cmd = new Command("schema");
    cmd
        .description("Write JSON Schemas for the tasks file and the worker response")
        .option("--out <dir>", "Output directory", ".taskgate/schemas")
        .action((opts: { out: string }) => {
            const files = writeSchemas(path.resolve(opts.out));
            process.stdout.write(JSON.stringify({ files }, null, 2) + "\n");
        });
    return cmd;
}
