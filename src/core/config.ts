import fs from "node:fs";
import path from "node:path";
import { z, ZodError } from "zod";
import { DEFAULT_MODEL_COMMAND, DEFAULT_MODEL_TIMEOUT_MS } from "./completion.js";
import { ConfigValidationError, errorMessage } from "./errors.js";
import { DEFAULT_LOCK_TIMEOUT_MS } from "./lockTable.js";
import { LOG_LEVELS, resolveLogConfig, type ResolvedLogConfig } from "./logger.js";
import { DEFAULT_MAX_TASKS } from "./planner.js";
import { DEFAULT_HISTORY_ENTRIES } from "./runHistory.js";

export const CONFIG_FILE_NAME = "taskgate.config.json";
export const DEFAULT_STATE_DIR = ".taskgate";

export const positiveInt = z.number().int().positive();

const configSchema = z
    .object({
        stateDir: z.string().min(1).optional(),
        model: z
            .object({
                command: z.string().min(1).optional(),
                timeoutMs: positiveInt.optional(),
            })
            .strict()
            .optional(),
        planner: z
            .object({
                maxTasks: positiveInt.optional(),
                systemPrompt: z.string().min(1).optional(),
            })
            .strict()
            .optional(),
        worker: z
            .object({
                kind: z.enum(["local", "remote"]).optional(),
                verifyOutputs: z.boolean().optional(),
                toolEndpoint: z.string().url().optional(),
                provider: z.string().optional(),
                agent: z.string().optional(),
                timeoutMs: positiveInt.optional(),
            })
            .strict()
            .optional(),
        locks: z
            .object({
                timeoutMs: positiveInt.optional(),
                expiryMs: positiveInt.optional(),
            })
            .strict()
            .optional(),
        events: z
            .object({
                httpUrl: z.string().url().optional(),
                sourceApp: z.string().min(1).optional(),
            })
            .strict()
            .optional(),
        history: z
            .object({
                enabled: z.boolean().optional(),
                entries: positiveInt.optional(),
            })
            .strict()
            .optional(),
        log: z
            .object({
                level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
                format: z.enum(["pretty", "json"]).optional(),
            })
            .strict()
            .optional(),
    })
    .strict();

export type TaskgateConfigFile = z.infer<typeof configSchema>;

export type WorkerKind = "local" | "remote";

export type ResolvedConfig = {
    stateDir: string;
    modelCommand: string;
    modelTimeoutMs: number;
    maxTasks: number;
    systemPrompt?: string;
    worker: WorkerKind;
    verifyOutputs: boolean;
    toolEndpoint?: string;
    provider?: string;
    agent?: string;
    toolTimeoutMs?: number;
    lockTimeoutMs: number;
    lockExpiryMs?: number;
    eventsUrl?: string;
    sourceApp: string;
    history: { enabled: boolean; entries: number };
    log: ResolvedLogConfig;
};

/** コマンドラインから来る上書き。未指定は undefined */
export type ConfigOverrides = {
    stateDir?: string;
    modelCmd?: string;
    maxTasks?: number;
    worker?: string;
    toolEndpoint?: string;
    lockTimeout?: number;
    lockExpiry?: number;
    eventsUrl?: string;
    verify?: boolean;
    history?: boolean;
};

export function validateConfig(candidate: unknown): TaskgateConfigFile {
    try {
        return configSchema.parse(candidate);
    } catch (err) {
        if (err instanceof ZodError) {
            const first = err.issues[0];
            const pathStr = first?.path.length ? first.path.join(".") : "<root>";
            throw new ConfigValidationError(`Config validation failed at ${pathStr}: ${first?.message ?? err.message}`, err);
        }
        throw new ConfigValidationError("Config validation failed", err);
    }
}

export function readConfigFile(filePath: string): TaskgateConfigFile {
    try {
        const raw = fs.readFileSync(filePath, "utf8");
        return validateConfig(JSON.parse(raw));
    } catch (err) {
        if (err instanceof ConfigValidationError) throw err;
        throw new ConfigValidationError(`Failed to read config at ${filePath}: ${errorMessage(err)}`, err);
    }
}

/**
 * --config が無ければ cwd の taskgate.config.json を探す。
 * 明示されたファイルが無いのはエラー、既定の場所に無いのは空設定。
 */
export function loadConfigFile(cwd: string, explicit?: string): TaskgateConfigFile {
    if (explicit) return readConfigFile(path.resolve(cwd, explicit));
    const candidate = path.join(cwd, CONFIG_FILE_NAME);
    return fs.existsSync(candidate) ? readConfigFile(candidate) : {};
}

function parseWorkerKind(v: string | undefined): WorkerKind | undefined {
    if (v === undefined) return undefined;
    if (v === "local" || v === "remote") return v;
    throw new ConfigValidationError(`Unknown worker kind: ${v} (expected local or remote)`);
}

function checkOverride(flag: string, value: number | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = positiveInt.safeParse(value);
    if (!parsed.success) {
        throw new ConfigValidationError(`${flag} must be a positive integer (got ${value})`);
    }
    return parsed.data;
}

/** 優先順位: フラグ > 環境変数 > 設定ファイル > 既定値 */
export function resolveConfig(
    file: TaskgateConfigFile,
    env: NodeJS.ProcessEnv,
    overrides: ConfigOverrides = {}
): ResolvedConfig {
    const toolEndpoint = overrides.toolEndpoint ?? (env.TASKGATE_TOOL_ENDPOINT || undefined) ?? file.worker?.toolEndpoint;
    const worker = parseWorkerKind(overrides.worker) ?? file.worker?.kind ?? (toolEndpoint ? "remote" : "local");
    const log = resolveLogConfig(env, file.log);
    const maxTasks = checkOverride("--max-tasks", overrides.maxTasks);
    const lockTimeout = checkOverride("--lock-timeout", overrides.lockTimeout);
    const lockExpiry = checkOverride("--lock-expiry", overrides.lockExpiry);
    if (env.TASKGATE_LOG && !(LOG_LEVELS as readonly string[]).includes(env.TASKGATE_LOG)) {
        throw new ConfigValidationError(`TASKGATE_LOG must be one of ${LOG_LEVELS.join(", ")}`);
    }

    return {
        stateDir: overrides.stateDir ?? file.stateDir ?? DEFAULT_STATE_DIR,
        modelCommand: overrides.modelCmd ?? (env.TASKGATE_MODEL_CMD || undefined) ?? file.model?.command ?? DEFAULT_MODEL_COMMAND,
        modelTimeoutMs: file.model?.timeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS,
        maxTasks: maxTasks ?? file.planner?.maxTasks ?? DEFAULT_MAX_TASKS,
        systemPrompt: file.planner?.systemPrompt,
        worker,
        verifyOutputs: overrides.verify ?? file.worker?.verifyOutputs ?? true,
        toolEndpoint,
        provider: file.worker?.provider,
        agent: file.worker?.agent,
        toolTimeoutMs: file.worker?.timeoutMs,
        lockTimeoutMs: lockTimeout ?? file.locks?.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS,
        lockExpiryMs: lockExpiry ?? file.locks?.expiryMs,
        eventsUrl: overrides.eventsUrl ?? file.events?.httpUrl,
        sourceApp: file.events?.sourceApp ?? "taskgate",
        history: {
            enabled: overrides.history ?? file.history?.enabled ?? true,
            entries: file.history?.entries ?? DEFAULT_HISTORY_ENTRIES,
        },
        log,
    };
}
