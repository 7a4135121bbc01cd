import fs from "node:fs";
import path from "node:path";
import { InvalidArgumentError, type Command } from "commander";
import { ExecCompletionModel } from "../core/completion.js";
import { loadConfigFile, positiveInt, resolveConfig, type ConfigOverrides, type ResolvedConfig } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import { createRootLogger, type Logger } from "../core/logger.js";
import { RunHistory } from "../core/runHistory.js";
import type { CompletionModel, Worker } from "../core/types.js";
import { LocalWorker } from "../workers/localWorker.js";
import { RemoteToolWorker } from "../workers/remoteToolWorker.js";

export type CommonOpts = ConfigOverrides & {
    config?: string;
};

export type CliContext = {
    cwd: string;
    config: ResolvedConfig;
    logger: Logger;
};

export function parseIntOption(v: string): number {
    const parsed = positiveInt.safeParse(/^\d+$/.test(v.trim()) ? Number(v) : Number.NaN);
    if (!parsed.success) {
        throw new InvalidArgumentError("Must be a positive integer.");
    }
    return parsed.data;
}

export function addConfigOptions(cmd: Command): Command {
    return cmd
        .option("--config <file>", "Config file (default: ./taskgate.config.json when present)")
        .option("--state-dir <dir>", "Directory for run artifacts (default: ./.taskgate)");
}

export function loadCliContext(opts: CommonOpts, cwd = process.cwd(), env: NodeJS.ProcessEnv = process.env): CliContext {
    const file = loadConfigFile(cwd, opts.config);
    const config = resolveConfig(file, env, opts);
    return { cwd, config, logger: createRootLogger(config.log) };
}

/** パスとして存在すればファイルの中身、そうでなければ値そのもの */
export function readMaybeFile(v?: string): string | undefined {
    if (!v) return;
    const p = path.resolve(String(v));
    if (fs.existsSync(p) && fs.statSync(p).isFile()) return fs.readFileSync(p, "utf8");
    return v;
}

export function createModel(config: ResolvedConfig, cwd: string): CompletionModel {
    return new ExecCompletionModel({ command: config.modelCommand, timeoutMs: config.modelTimeoutMs, cwd });
}

export function createWorker(config: ResolvedConfig, model: CompletionModel, logger: Logger): Worker {
    const log = logger.child({ component: "worker" });
    if (config.worker === "remote") {
        return new RemoteToolWorker(model, {
            baseUrl: config.toolEndpoint,
            provider: config.provider,
            agent: config.agent,
            timeoutMs: config.toolTimeoutMs,
            verifyOutputs: config.verifyOutputs,
            logger: log,
        });
    }
    return new LocalWorker(model, { verifyOutputs: config.verifyOutputs, logger: log });
}

export function openHistory(stateDir: string, config: ResolvedConfig, logger: Logger): RunHistory | undefined {
    if (!config.history.enabled) return undefined;
    return new RunHistory(stateDir, { entries: config.history.entries, logger: logger.child({ component: "history" }) });
}

export function recordHistory(history: RunHistory | undefined, entry: Parameters<RunHistory["append"]>[0], logger: Logger) {
    if (!history) return;
    try {
        history.append(entry);
    } catch (err) {
        logger.warn({ file: history.filepath, err: errorMessage(err) }, "failed to record run history");
    }
}
