import { Command } from "commander";
import fs from "node:fs";
import { z } from "zod";
import { cmdPlan } from "./plan.js";
import { cmdRun } from "./run.js";
import { cmdSchema } from "./schema.js";
import { cmdTail } from "./tail.js";

const PackageInfoSchema = z.object({
    name: z.string().optional(),
    version: z.string().default("0.0.0"),
    description: z.string().optional(),
});

// src/cli/ からも dist/cli/ からも 2 つ上がパッケージのルート
function readPackageInfo() {
    const pkgUrl = new URL("../../package.json", import.meta.url);
    if (!fs.existsSync(pkgUrl)) return PackageInfoSchema.parse({});
    return PackageInfoSchema.parse(JSON.parse(fs.readFileSync(pkgUrl, "utf8")));
}

export function createProgram(): Command {
    const { name, version, description } = readPackageInfo();
    const program = new Command();
    program
        .name(name || "taskgate")
        .description(description || "taskgate CLI: plan requests into tasks and run them under per-file locks")
        .version(version);

    program.addCommand(cmdPlan());
    program.addCommand(cmdRun());
    program.addCommand(cmdTail());
    program.addCommand(cmdSchema());

    return program;
}
