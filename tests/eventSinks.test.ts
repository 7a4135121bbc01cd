import { describe, it, expect } from "vitest";
import fs from "node:fs";
import http from "node:http";
import { pino } from "pino";
import { FanoutEventSink, HttpEventSink, NdjsonEventSink } from "../src/core/eventSinks.js";
import { eventTaskId, isCoordinatorEvent, parseEventLine, type CoordinatorEvent, type EventSink } from "../src/core/events.js";
import { withTmp } from "./helpers/tmp.js";

const assigned: CoordinatorEvent = { t: 1, type: "task_assigned", taskId: "T1", workerId: "w", description: "d" };
const planned: CoordinatorEvent = { t: 2, type: "plan_created", taskIds: ["T1"], source: "model" };

describe("event parsing", () => {
    it("accepts known events and rejects everything else", () => {
        expect(parseEventLine(JSON.stringify(assigned))).toEqual(assigned);
        expect(parseEventLine('{"t":1,"type":"stdout"}')).toBeNull();
        expect(parseEventLine("not json")).toBeNull();
        expect(isCoordinatorEvent({ t: 1, type: "worker_completed", taskId: "T1", success: "yes" })).toBe(false);
    });

    it("maps events to their task id", () => {
        expect(eventTaskId(assigned)).toBe("T1");
        expect(eventTaskId(planned)).toBeNull();
    });
});

describe("NdjsonEventSink", () => {
    it("appends one JSON line per event", async () => {
        await withTmp(async ({ path }) => {
            const file = path("runs", "r1", "events.ndjson");
            const sink = new NdjsonEventSink(file);
            sink.emit(assigned);
            sink.emit(planned);
            await sink.close();
            expect(fs.readFileSync(file, "utf8")).toBe(`${JSON.stringify(assigned)}\n${JSON.stringify(planned)}\n`);
        });
    });

    it("logs a write failure instead of crashing", async () => {
        await withTmp(async ({ path }) => {
            const lines: string[] = [];
            const logger = pino({ level: "error" }, { write: (msg: string) => void lines.push(msg) });
            fs.mkdirSync(path("events.ndjson"));
            const sink = new NdjsonEventSink(path("events.ndjson"), logger);
            sink.emit(assigned);
            await sink.close();
            await new Promise((r) => setTimeout(r, 20));
            expect(lines.length).toBeGreaterThanOrEqual(1);
            expect(JSON.parse(lines[0])).toMatchObject({ level: 50, file: path("events.ndjson"), msg: "failed to write events file" });
        });
    });
});

describe("HttpEventSink", () => {
    it("posts the hook envelope", async () => {
        const bodies: unknown[] = [];
        const server = http.createServer((req, res) => {
            let raw = "";
            req.on("data", (c: Buffer) => (raw += c.toString("utf8")));
            req.on("end", () => {
                bodies.push(JSON.parse(raw));
                res.writeHead(200).end("{}");
            });
        });
        await new Promise<void>((r) => server.listen(0, "127.0.0.1", r));
        try {
            const addr = server.address();
            if (!addr || typeof addr === "string") throw new Error("no port");
            const sink = new HttpEventSink({ url: `http://127.0.0.1:${addr.port}/events`, sessionId: "run-1" });
            await sink.emit(assigned);
            expect(bodies).toEqual([
                {
                    source_app: "taskgate",
                    hook_event_type: "TaskAssigned",
                    payload: { taskId: "T1", workerId: "w", description: "d", timestamp: 1 },
                    session_id: "run-1",
                },
            ]);
        } finally {
            await new Promise<void>((r) => server.close(() => r()));
        }
    });

    it("swallows delivery failures", async () => {
        const sink = new HttpEventSink({ url: "http://127.0.0.1:9/events", timeoutMs: 1_000 });
        await expect(sink.emit(assigned)).resolves.toBeUndefined();
    });
});

describe("FanoutEventSink", () => {
    it("delivers to every sink even when one throws", async () => {
        const got: string[] = [];
        const good: EventSink = { emit: (e) => void got.push(e.type) };
        const bad: EventSink = {
            emit: () => {
                throw new Error("down");
            },
        };
        await new FanoutEventSink([bad, good]).emit(assigned);
        expect(got).toEqual(["task_assigned"]);
    });
});
