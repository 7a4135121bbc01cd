import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "./errors.js";
import type { CoordinatorEvent, EventSink } from "./events.js";
import { silentLogger, type Logger } from "./logger.js";

/** events.ndjson へ 1 行 1 イベントで追記する */
export class NdjsonEventSink implements EventSink {
    private readonly ws: fs.WriteStream;

    constructor(
        readonly filepath: string,
        log: Logger = silentLogger()
    ) {
        fs.mkdirSync(path.dirname(filepath), { recursive: true });
        this.ws = fs.createWriteStream(filepath, { flags: "a" });
        this.ws.on("error", (err) => log.error({ file: filepath, err: errorMessage(err) }, "failed to write events file"));
    }

    emit(event: CoordinatorEvent) {
        this.ws.write(JSON.stringify(event) + "\n");
    }

    async close() {
        await new Promise<void>((r) => this.ws.end(r));
    }
}

const HOOK_EVENT_TYPES: Record<CoordinatorEvent["type"], string> = {
    task_assigned: "TaskAssigned",
    worker_completed: "WorkerCompleted",
    plan_created: "TaskPlanned",
    plan_order_warning: "PlanOrderWarning",
};

export type HttpEventSinkOptions = {
    url: string;
    sourceApp?: string;
    sessionId?: string;
    timeoutMs?: number;
    logger?: Logger;
};

/** 観測サーバへ POST する。届かなくても例外にはしない */
export class HttpEventSink implements EventSink {
    private readonly log: Logger;

    constructor(private readonly opts: HttpEventSinkOptions) {
        this.log = opts.logger ?? silentLogger();
    }

    async emit(event: CoordinatorEvent): Promise<void> {
        const { t, type, ...payload } = event;
        const body: Record<string, unknown> = {
            source_app: this.opts.sourceApp ?? "taskgate",
            hook_event_type: HOOK_EVENT_TYPES[type],
            payload: { ...payload, timestamp: t },
        };
        if (this.opts.sessionId) body.session_id = this.opts.sessionId;
        try {
            const res = await fetch(this.opts.url, {
                method: "POST",
                headers: { "content-type": "application/json" },
                body: JSON.stringify(body),
                signal: AbortSignal.timeout(this.opts.timeoutMs ?? 2_000),
            });
            if (!res.ok) throw new Error(`HTTP ${res.status}`);
            this.log.debug({ type }, "sent observability event");
        } catch (err) {
            this.log.warn({ type, err: errorMessage(err) }, "failed to send observability event");
        }
    }
}

export class FanoutEventSink implements EventSink {
    private readonly log: Logger;

    constructor(private readonly sinks: EventSink[], opts: { logger?: Logger } = {}) {
        this.log = opts.logger ?? silentLogger();
    }

    async emit(event: CoordinatorEvent): Promise<void> {
        await Promise.all(this.sinks.map((sink) => deliver(sink, event, this.log)));
    }
}

/** sink が同期で投げても非同期で reject しても握りつぶしてログに残す */
export async function deliver(sink: EventSink, event: CoordinatorEvent, log: Logger): Promise<void> {
    try {
        await sink.emit(event);
    } catch (err) {
        log.warn({ type: event.type, err: errorMessage(err) }, "event sink failed");
    }
}
