import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import http from "node:http";
import { isConnectFailure, parseRemoteListing, RemoteToolClient } from "../src/core/toolClient.js";
import { withTmp } from "./helpers/tmp.js";

type Recorded = { url: string; body: Record<string, unknown> };

/** 127.0.0.1 に立てるツール実行エンドポイントのスタブ */
function startToolServer(handler: (body: Record<string, unknown>) => { status: number; json: unknown }) {
    const requests: Recorded[] = [];
    const server = http.createServer((req, res) => {
        let raw = "";
        req.on("data", (c: Buffer) => (raw += c.toString("utf8")));
        req.on("end", () => {
            const body: Record<string, unknown> = JSON.parse(raw);
            requests.push({ url: req.url ?? "", body });
            const out = handler(body);
            res.writeHead(out.status, { "content-type": "application/json" });
            res.end(JSON.stringify(out.json));
        });
    });
    return { server, requests };
}

describe("parseRemoteListing", () => {
    it("drops directories and blank lines", () => {
        expect(parseRemoteListing("src/\n  a.ts\n\n  b.ts\r\n")).toEqual(["a.ts", "b.ts"]);
    });
});

describe("isConnectFailure", () => {
    it("looks through fetch's cause chain for connection error codes", () => {
        const refused = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
        expect(isConnectFailure(new TypeError("fetch failed", { cause: refused }))).toBe(true);
        expect(isConnectFailure(new TypeError("fetch failed", { cause: new AggregateError([refused]) }))).toBe(true);
        expect(isConnectFailure(Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" }))).toBe(false);
        expect(isConnectFailure(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))).toBe(false);
    });
});

describe("RemoteToolClient", () => {
    const { server, requests } = startToolServer((body) => {
        const args = body.args;
        const command = typeof args === "object" && args !== null && "command" in args ? args.command : undefined;
        switch (body.tool) {
            case "read":
                return { status: 200, json: { success: true, result: { output: "remote text", metadata: {} } } };
            case "write":
                return { status: 200, json: { success: true, result: { output: "", metadata: {} } } };
            case "list":
                return { status: 200, json: { success: true, result: { output: "docs/\n  a.md\n  b.md\n", metadata: { count: 2 } } } };
            case "bash":
                return { status: 200, json: { success: true, result: { output: `ran ${String(command)}`, metadata: { exit: command === "false" ? 1 : 0 } } } };
            default:
                return { status: 200, json: { success: false, error: `unknown tool ${String(body.tool)}` } };
        }
    });
    let baseUrl = "";

    beforeAll(async () => {
        await new Promise<void>((r) => server.listen(0, "127.0.0.1", r));
        const addr = server.address();
        if (!addr || typeof addr === "string") throw new Error("tool server has no port");
        baseUrl = `http://127.0.0.1:${addr.port}/api/`;
    });

    afterAll(async () => {
        await new Promise<void>((r) => server.close(() => r()));
    });

    it("posts tool calls to the endpoint with session metadata", async () => {
        await withTmp(async ({ dir }) => {
            const client = new RemoteToolClient({ workingDir: dir, baseUrl, sessionId: "sess-1", provider: "p", model: "m" });
            expect(client.remoteEnabled).toBe(true);
            const read = await client.readFile("a.txt");
            expect(read).toEqual({ success: true, exists: true, content: "remote text", size: 11 });

            const last = requests[requests.length - 1];
            expect(last.url).toBe(`/api/tool/execute?directory=${encodeURIComponent(dir)}`);
            expect(last.body).toEqual({
                tool: "read",
                provider: "p",
                model: "m",
                args: { filePath: "a.txt" },
                sessionID: "sess-1",
                agent: "build",
                extra: {},
            });
        });
    });

    it("maps write, list and bash responses", async () => {
        await withTmp(async ({ dir, path }) => {
            const client = new RemoteToolClient({ workingDir: dir, baseUrl });
            expect(client.sessionId).toMatch(/^taskgate-[0-9a-f]{8}$/);
            expect(await client.writeFile("w.txt", "abc")).toEqual({ success: true, verified: false, size: 3 });
            // リモートで書いたのでローカルには作られない
            expect(fs.existsSync(path("w.txt"))).toBe(false);
            expect(await client.listFiles("docs", "*.md")).toEqual({ success: true, files: ["a.md", "b.md"], count: 2 });
            expect(await client.executeBash("true")).toEqual({ success: true, stdout: "ran true", stderr: "", returnCode: 0 });
            expect(await client.executeBash("false")).toEqual({ success: false, stdout: "ran false", stderr: "", returnCode: 1 });
        });
    });

    it("falls back to local execution when the endpoint is unreachable", async () => {
        await withTmp(async ({ dir, path }) => {
            const client = new RemoteToolClient({ workingDir: dir, baseUrl: "http://127.0.0.1:9", timeoutMs: 2_000 });
            const res = await client.writeFile("local.txt", "kept");
            expect(res.success).toBe(true);
            expect(fs.readFileSync(path("local.txt"), "utf8")).toBe("kept");
        });
    });

    it("executes locally when no endpoint is configured", async () => {
        await withTmp(async ({ dir, write }) => {
            write("here.txt", "local");
            const client = new RemoteToolClient({ workingDir: dir });
            expect(client.remoteEnabled).toBe(false);
            expect((await client.readFile("here.txt")).content).toBe("local");
        });
    });
});

describe("RemoteToolClient after the request was sent", () => {
    const calls: string[] = [];
    const server = http.createServer((req, res) => {
        let raw = "";
        req.on("data", (c: Buffer) => (raw += c.toString("utf8")));
        req.on("end", () => {
            const body: Record<string, unknown> = JSON.parse(raw);
            const tool = String(body.tool);
            calls.push(tool);
            if (tool === "read") {
                res.writeHead(503, { "content-type": "application/json" });
                res.end("{}");
                return;
            }
            setTimeout(() => {
                res.writeHead(200, { "content-type": "application/json" });
                res.end(JSON.stringify({ success: true, result: { output: "slow", metadata: { exit: 0 } } }));
            }, 400);
        });
    });
    let baseUrl = "";

    beforeAll(async () => {
        await new Promise<void>((r) => server.listen(0, "127.0.0.1", r));
        const addr = server.address();
        if (!addr || typeof addr === "string") throw new Error("tool server has no port");
        baseUrl = `http://127.0.0.1:${addr.port}`;
    });

    afterAll(async () => {
        server.closeAllConnections();
        await new Promise<void>((r) => server.close(() => r()));
    });

    it("reports a timed out write as failed without writing locally", async () => {
        await withTmp(async ({ dir, path }) => {
            calls.length = 0;
            const client = new RemoteToolClient({ workingDir: dir, baseUrl, timeoutMs: 100 });
            const res = await client.writeFile("twice.txt", "x");
            expect(res.success).toBe(false);
            expect(res.error).toMatch(/^remote write failed: /);
            expect(calls).toEqual(["write"]);
            expect(fs.existsSync(path("twice.txt"))).toBe(false);
        });
    });

    it("reports an HTTP error as failed without reading locally", async () => {
        await withTmp(async ({ dir, write }) => {
            write("here.txt", "local");
            const client = new RemoteToolClient({ workingDir: dir, baseUrl, timeoutMs: 1_000 });
            const res = await client.readFile("here.txt");
            expect(res).toEqual({
                success: false,
                exists: false,
                content: "",
                size: 0,
                error: "remote read failed: HTTP 503 Service Unavailable",
            });
        });
    });

    it("waits for a bash command at least as long as its own timeout", async () => {
        await withTmp(async ({ dir, path }) => {
            calls.length = 0;
            const client = new RemoteToolClient({ workingDir: dir, baseUrl, timeoutMs: 100 });
            const res = await client.executeBash("echo x >> marker.txt", 50);
            expect(res).toEqual({ success: true, stdout: "slow", stderr: "", returnCode: 0 });
            expect(calls).toEqual(["bash"]);
            expect(fs.existsSync(path("marker.txt"))).toBe(false);
        });
    });
});
