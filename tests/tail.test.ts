import { describe, it, expect } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { parseTypes, resolveEventsFile, tailFollow, tailOnce } from "../src/cli/tail.js";
import { withTmp } from "./helpers/tmp.js";

const line = (o: object) => JSON.stringify(o);

const EVENTS = [
    { t: 1, type: "plan_created", taskIds: ["T1", "T2"], source: "model" },
    { t: 2, type: "task_assigned", taskId: "T1", workerId: "w", description: "a" },
    { t: 3, type: "worker_completed", taskId: "T1", success: true, filesModified: [], filesCreated: [], errors: [] },
    { t: 4, type: "task_assigned", taskId: "T2", workerId: "w", description: "b" },
    { t: 5, type: "stdout", taskId: "T2" },
];

describe("taskgate tail", () => {
    it("filters by --task and --type (no follow)", async () => {
        await withTmp(async ({ write }) => {
            const events = write("events.ndjson", EVENTS.map(line).join("\n") + "\n");

            const t1 = tailOnce(events, { task: "T1", types: null });
            expect(t1).toEqual([line(EVENTS[0]), line(EVENTS[1]), line(EVENTS[2])]);

            const assigned = tailOnce(events, { task: "all", types: parseTypes("task_assigned, worker_completed") });
            expect(assigned).toEqual([line(EVENTS[1]), line(EVENTS[2]), line(EVENTS[3])]);
        });
    });

    it("follows appended lines within the duration window", async () => {
        await withTmp(async ({ write }) => {
            const events = write("events.ndjson", line(EVENTS[1]) + "\n");
            setTimeout(() => fs.appendFileSync(events, line(EVENTS[3]) + "\n"), 80);
            const follow = await tailFollow(events, { types: parseTypes("task_assigned") }, 300, 50);
            expect(follow).toEqual([line(EVENTS[1]), line(EVENTS[3])]);
        });
    });

    it("resolves events.ndjson through latest.json", async () => {
        await withTmp(async ({ dir, write }) => {
            const runDir = path.join(dir, ".taskgate", "runs", "run-1");
            write(".taskgate/runs/run-1/events.ndjson", "");
            write(".taskgate/runs/latest.json", JSON.stringify({ runDir }));
            expect(resolveEventsFile({}, dir)).toBe(path.join(runDir, "events.ndjson"));
            expect(resolveEventsFile({ events: "x.ndjson" }, dir)).toBe(path.join(dir, "x.ndjson"));
        });
    });

    it("falls back to the newest run directory and errors when none exists", async () => {
        await withTmp(async ({ dir, write }) => {
            expect(() => resolveEventsFile({ stateDir: "state" }, dir)).toThrow(/^no run found under /);
            write("state/runs/run-100/events.ndjson", "");
            write("state/runs/run-200/events.ndjson", "");
            expect(resolveEventsFile({ stateDir: "state" }, dir)).toBe(path.join(dir, "state", "runs", "run-200", "events.ndjson"));
        });
    });
});
