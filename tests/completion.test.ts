import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { ExecCompletionModel, renderMessages } from "../src/core/completion.js";

const FAKE_MODEL = fileURLToPath(new URL("./fixtures/fake-model.js", import.meta.url));

describe("ExecCompletionModel", () => {
    it("joins messages into one prompt", () => {
        expect(
            renderMessages([
                { role: "system", content: " sys " },
                { role: "user", content: "" },
                { role: "user", content: "ask" },
            ])
        ).toBe("sys\n\nask");
    });

    it("passes the prompt as the last argument and strips ANSI from stdout", async () => {
        const model = new ExecCompletionModel({ command: FAKE_MODEL, timeoutMs: 10_000 });
        expect(model.id).toBe(FAKE_MODEL);
        const res = await model.invoke([{ role: "user", content: "hello model" }]);
        expect(JSON.parse(res.content)).toEqual({ length: 11, head: "hello model" });
    });

    it("throws with stderr when the command fails", async () => {
        const model = new ExecCompletionModel({ command: FAKE_MODEL, timeoutMs: 10_000 });
        await expect(model.invoke([{ role: "user", content: "PLEASE FAIL" }])).rejects.toThrow("model command failed: boom");
    });

    it("rejects an empty command", async () => {
        await expect(new ExecCompletionModel({ command: "   " }).invoke([])).rejects.toThrow("model command is empty");
    });
});
