import { pino, destination, type Logger } from "pino";

export type { Logger };

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type LogFormat = "pretty" | "json";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export interface ResolvedLogConfig {
    level: LogLevel;
    format: LogFormat;
}

function isLogLevel(v: string | undefined): v is LogLevel {
    return v !== undefined && (LOG_LEVELS as readonly string[]).includes(v);
}

export function resolveLogConfig(
    env: NodeJS.ProcessEnv,
    fromFile?: Partial<ResolvedLogConfig>
): ResolvedLogConfig {
    const envLevel = env.TASKGATE_LOG;
    const envFormat = env.TASKGATE_LOG_FORMAT;
    const level: LogLevel = isLogLevel(envLevel) ? envLevel : fromFile?.level ?? "warn";
    const format: LogFormat =
        envFormat === "json" || envFormat === "pretty" ? envFormat : fromFile?.format ?? "pretty";
    return { level, format };
}

export function createRootLogger(config: ResolvedLogConfig): Logger {
    if (config.level === "silent") return silentLogger();
    // 標準出力は結果 JSON 用に空けておき、ログは stderr へ
    if (config.format === "pretty") {
        return pino({
            level: config.level,
            transport: {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    singleLine: true,
                    ignore: "pid,hostname",
                    destination: 2,
                },
            },
        });
    }
    return pino({ level: config.level }, destination(2));
}

/** ライブラリとして使う場合の既定。呼び出し側が logger を渡さなければ何も出さない */
export function silentLogger(): Logger {
    return pino({ level: "silent" });
}
