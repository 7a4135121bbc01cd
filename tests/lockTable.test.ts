import { describe, it, expect } from "vitest";
import path from "node:path";
import { LockTable } from "../src/core/lockTable.js";
import { LockTimeoutError } from "../src/core/errors.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("LockTable", () => {
    it("normalizes keys to absolute paths", () => {
        const table = new LockTable();
        expect(table.normalizeKey("a/../b.txt")).toBe(path.resolve("b.txt"));
    });

    it("grants a free key immediately and releases it", async () => {
        const table = new LockTable();
        const handle = await table.acquire("/tmp/x.txt");
        expect(handle.key).toBe(path.resolve("/tmp/x.txt"));
        expect(table.isLocked("/tmp/x.txt")).toBe(true);
        table.release("/tmp/x.txt");
        expect(table.isLocked("/tmp/x.txt")).toBe(false);
        expect(table.size).toBe(0);
    });

    it("treats differently spelled paths as the same key", async () => {
        const table = new LockTable();
        await table.acquire("/tmp/dir/../f.txt");
        expect(table.isLocked("/tmp/f.txt")).toBe(true);
    });

    it("times out with LockTimeoutError while the key is held", async () => {
        const table = new LockTable();
        await table.acquire("/tmp/held.txt");
        const started = Date.now();
        const err = await table.acquire("/tmp/held.txt", { timeoutMs: 80 }).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(LockTimeoutError);
        expect(err).toMatchObject({ name: "LockTimeout", key: path.resolve("/tmp/held.txt"), timeoutMs: 80 });
        expect(String(err)).toContain("within 0.08s");
        expect(Date.now() - started).toBeGreaterThanOrEqual(70);
    });

    it("wakes a waiter as soon as the holder releases", async () => {
        const table = new LockTable();
        const first = await table.acquire("/tmp/w.txt");
        const waiting = table.acquire("/tmp/w.txt", { timeoutMs: 2_000 });
        setTimeout(() => first.release(), 30);
        const started = Date.now();
        const second = await waiting;
        expect(Date.now() - started).toBeLessThan(1_000);
        expect(second.acquiredAt).toBeGreaterThanOrEqual(first.acquiredAt);
        expect(table.isLocked("/tmp/w.txt")).toBe(true);
    });

    it("grants the key once the holder's expiry passes", async () => {
        const table = new LockTable();
        await table.acquire("/tmp/e.txt", { expiryMs: 50 });
        const started = Date.now();
        const handle = await table.acquire("/tmp/e.txt", { timeoutMs: 2_000 });
        expect(handle.key).toBe(path.resolve("/tmp/e.txt"));
        expect(Date.now() - started).toBeLessThan(1_000);
    });

    it("does not block a caller on a different key", async () => {
        const table = new LockTable();
        await table.acquire("f1.txt");
        const started = Date.now();
        const other = await table.acquire("f2.txt", { timeoutMs: 50 });
        expect(other.key).toBe(path.resolve("f2.txt"));
        expect(Date.now() - started).toBeLessThan(40);
        expect(table.isLocked("f1.txt")).toBe(true);
        expect(table.size).toBe(2);
    });

    it("rejects a timeout or expiry that cannot bound the wait", async () => {
        const table = new LockTable();
        await table.acquire("/tmp/nan.txt");
        await expect(table.acquire("/tmp/nan.txt", { timeoutMs: Number.NaN })).rejects.toThrow(RangeError);
        await expect(table.acquire("/tmp/nan.txt", { timeoutMs: -1 })).rejects.toThrow(RangeError);
        await expect(table.acquire("/tmp/nan.txt", { timeoutMs: Number.POSITIVE_INFINITY })).rejects.toThrow(RangeError);
        await expect(table.acquire("/tmp/other.txt", { expiryMs: Number.NaN })).rejects.toThrow(RangeError);
        expect(table.isLocked("/tmp/other.txt")).toBe(false);
    });

    it("purges expired records in isLocked and cleanupExpired", async () => {
        let now = 1_000;
        const table = new LockTable({ now: () => now });
        await table.acquire("/tmp/a", { expiryMs: 100 });
        await table.acquire("/tmp/b", { expiryMs: 100 });
        await table.acquire("/tmp/c");
        now = 1_099;
        expect(table.isLocked("/tmp/a")).toBe(true);
        now = 1_100;
        expect(table.isLocked("/tmp/a")).toBe(false);
        expect(table.cleanupExpired()).toBe(1);
        expect(table.size).toBe(1);
        expect(table.isLocked("/tmp/c")).toBe(true);
    });

    it("does not let a stale handle release a re-granted lock", async () => {
        let now = 0;
        const table = new LockTable({ now: () => now });
        const stale = await table.acquire("/tmp/s", { expiryMs: 10 });
        now = 20;
        const fresh = await table.acquire("/tmp/s");
        stale.release();
        expect(table.isLocked("/tmp/s")).toBe(true);
        fresh.release();
        fresh.release();
        expect(table.isLocked("/tmp/s")).toBe(false);
    });

    it("treats releasing an unknown key as a no-op", () => {
        const table = new LockTable();
        expect(() => table.release("/tmp/never")).not.toThrow();
        expect(table.size).toBe(0);
    });

    it("rejects promptly when the signal aborts during a wait", async () => {
        const table = new LockTable();
        await table.acquire("/tmp/ab");
        const controller = new AbortController();
        const pending = table.acquire("/tmp/ab", { timeoutMs: 5_000, signal: controller.signal });
        setTimeout(() => controller.abort(new Error("stop")), 20);
        const started = Date.now();
        await expect(pending).rejects.toThrow("stop");
        expect(Date.now() - started).toBeLessThan(1_000);
    });

    it("withLock releases on return and on throw", async () => {
        const table = new LockTable();
        const value = await table.withLock("/tmp/wl", {}, async () => {
            expect(table.isLocked("/tmp/wl")).toBe(true);
            return 42;
        });
        expect(value).toBe(42);
        expect(table.isLocked("/tmp/wl")).toBe(false);

        await expect(
            table.withLock("/tmp/wl", {}, () => {
                throw new Error("inner");
            })
        ).rejects.toThrow("inner");
        expect(table.isLocked("/tmp/wl")).toBe(false);
    });

    it("withLocks releases already acquired keys when a later key times out", async () => {
        const table = new LockTable();
        await table.acquire("/tmp/k2");
        let ran = false;
        const err = await table
            .withLocks(["/tmp/k1", "/tmp/k2"], { timeoutMs: 30 }, () => {
                ran = true;
            })
            .catch((e: unknown) => e);
        expect(err).toBeInstanceOf(LockTimeoutError);
        expect(ran).toBe(false);
        expect(table.isLocked("/tmp/k1")).toBe(false);
        expect(table.isLocked("/tmp/k2")).toBe(true);
    });

    it("withLocks locks duplicate keys once", async () => {
        const table = new LockTable();
        const seen = await table.withLocks(["/tmp/d", "/tmp/x/../d"], { timeoutMs: 30 }, (handles) => handles.length);
        expect(seen).toBe(1);
        expect(table.size).toBe(0);
    });

    it("serializes two holders of the same key", async () => {
        const table = new LockTable();
        const order: string[] = [];
        const job = (name: string) =>
            table.withLock("/tmp/serial", { timeoutMs: 2_000 }, async () => {
                order.push(`${name}:start`);
                await sleep(20);
                order.push(`${name}:end`);
            });
        await Promise.all([job("a"), job("b")]);
        expect(order).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    });
});
