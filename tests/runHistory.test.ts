import { describe, it, expect } from "vitest";
import fs from "node:fs";
import { combineContext, planningSummary, resultSummary, RunHistory } from "../src/core/runHistory.js";
import { failedResult } from "../src/core/results.js";
import { task } from "./helpers/stubs.js";
import { withTmp } from "./helpers/tmp.js";

describe("run history", () => {
    it("formats planning and result lines", () => {
        expect(planningSummary([task("T1"), task("T2")])).toBe("Planned 2 tasks: T1, T2");
        expect(resultSummary(failedResult("T2", ["boom", "bang"]))).toBe("Task T2: FAILED Errors: boom, bang");
        expect(resultSummary({ ...failedResult("T1", []), success: true })).toBe("Task T1: SUCCESS");
    });

    it("joins history and explicit context, skipping blanks", () => {
        expect(combineContext(undefined, " given ")).toBe("given");
        expect(combineContext("past", "", "given")).toBe("past\n\ngiven");
        expect(combineContext("", undefined)).toBe("");
    });

    it("appends entries and summarizes the most recent ones", async () => {
        await withTmp(async ({ path }) => {
            const history = new RunHistory(path("state"), { entries: 2 });
            expect(history.summary()).toBe("");
            history.append({ t: 1, request: "first", plan: "Planned 1 tasks: T1", results: [] });
            history.append({ t: 2, request: "second", plan: "Planned 1 tasks: T1", results: ["Task T1: SUCCESS"] });
            history.append({ t: 3, request: "third", plan: "Planned 2 tasks: T1, T2", results: ["Task T1: SUCCESS", "Task T2: FAILED"] });

            expect(history.filepath).toBe(path("state", "context.jsonl"));
            expect(history.read().map((e) => e.request)).toEqual(["first", "second", "third"]);
            expect(history.summary()).toBe(
                [
                    "Previous requests:",
                    "- second",
                    "  Planned 1 tasks: T1",
                    "  Task T1: SUCCESS",
                    "- third",
                    "  Planned 2 tasks: T1, T2",
                    "  Task T1: SUCCESS",
                    "  Task T2: FAILED",
                ].join("\n")
            );
        });
    });

    it("skips unreadable and malformed lines", async () => {
        await withTmp(async ({ path, write }) => {
            write(
                "state/context.jsonl",
                ['{"t":1,"request":"ok","plan":"Planned 0 tasks: "}', "{broken", '{"t":"x"}', ""].join("\n")
            );
            const history = new RunHistory(path("state"));
            expect(history.read()).toEqual([{ t: 1, request: "ok", plan: "Planned 0 tasks: ", results: [] }]);
            expect(fs.existsSync(history.filepath)).toBe(true);
        });
    });
});
