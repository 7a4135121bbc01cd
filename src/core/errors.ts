export function formatCliError(cmd: string, reason: string, hint?: string) {
    return [
        `[taskgate ${cmd}]`,
        reason.trim(),
        hint ? `Hint: ${hint.trim()}` : ""
    ].filter(Boolean).join(" ");
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function chainCause(target: Error, cause: unknown) {
    if (cause && typeof cause === "object") {
        target.cause = cause;
    }
    if (cause instanceof Error && cause.stack && !target.stack?.includes(cause.stack)) {
        target.stack += `\nCaused by: ${cause.stack}`;
    }
}

export class LockTimeoutError extends Error {
    readonly key: string;
    readonly timeoutMs: number;
    constructor(key: string, timeoutMs: number) {
        super(`Could not acquire lock for ${key} within ${timeoutMs / 1000}s`);
        this.name = "LockTimeout";
        this.key = key;
        this.timeoutMs = timeoutMs;
    }
}

export class WorkerResponseParseError extends Error {
    readonly raw: string;
    constructor(message: string, raw: string) {
        super(message);
        this.name = "WorkerResponseParseError";
        this.raw = raw;
    }
}

export class ConfigValidationError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = "ConfigValidationError";
        chainCause(this, cause);
    }
}

export class TasksFileValidationError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = "TasksFileValidationError";
        chainCause(this, cause);
    }
}
