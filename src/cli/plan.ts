import { Command } from "commander";
import path from "node:path";
import { writeFileUtf8 } from "../core/paths.js";
import { TaskPlanner } from "../core/planner.js";
import { combineContext, planningSummary } from "../core/runHistory.js";
import { specsToTasksFile } from "../schemas/plan.js";
import {
    addConfigOptions,
    createModel,
    loadCliContext,
    openHistory,
    parseIntOption,
    readMaybeFile,
    recordHistory,
    type CommonOpts,
} from "./context.js";

type PlanCliOpts = CommonOpts & {
    context?: string;
    out?: string;
    skipHistory?: boolean;
};

export function cmdPlan() {
    const cmd = new Command("plan");
    cmd
        .description("Break a request into tasks and print them as a tasks file (JSON)")
        .argument("<request>", "Natural-language request (text or file path)")
        .option("--context <fileOrText>", "Context summary passed to the planner")
        .option("--max-tasks <n>", "Maximum number of planned tasks", parseIntOption)
        .option("--model-cmd <command>", "Model command line (prompt is appended as the last argument)")
        .option("--out <file>", "Also write the tasks file here (usable with run --tasks)")
        .option("--skip-history", "Neither read nor record the run history in <stateDir>/context.jsonl");
    addConfigOptions(cmd);
    cmd.action(async (requestArg: string, opts: PlanCliOpts) => {
        const ctx = loadCliContext({ ...opts, history: opts.skipHistory ? false : undefined });
        const request = (readMaybeFile(requestArg) ?? "").trim();
        if (!request) {
            throw new Error("request is required (text or file path)");
        }

        const planner = new TaskPlanner(createModel(ctx.config, ctx.cwd), {
            maxTasks: ctx.config.maxTasks,
            systemPrompt: ctx.config.systemPrompt,
            logger: ctx.logger.child({ component: "planner" }),
        });
        const history = openHistory(path.resolve(ctx.cwd, ctx.config.stateDir), ctx.config, ctx.logger);
        const tasks = await planner.plan(request, combineContext(history?.summary(), readMaybeFile(opts.context)));
        recordHistory(history, { request, plan: planningSummary(tasks), results: [] }, ctx.logger);
        const outcome = planner.lastOutcome;
        if (outcome?.source === "fallback") {
            process.stderr.write(`plan source: fallback (${outcome.reason})\n`);
        } else if (outcome?.skipped.length) {
            process.stderr.write(`plan source: model (skipped ${outcome.skipped.length} malformed entries)\n`);
        }

        const text = JSON.stringify(specsToTasksFile(tasks), null, 2) + "\n";
        if (opts.out) writeFileUtf8(path.resolve(ctx.cwd, opts.out), text);
        process.stdout.write(text);
    });
    return cmd;
}
