import path from "node:path";
import { LockTimeoutError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export const DEFAULT_LOCK_TIMEOUT_MS = 5_000;

type LockRecord = {
    key: string;
    acquiredAt: number;
    expiryMs?: number;
    token: symbol;
};

export type LockHandle = {
    readonly key: string;
    readonly acquiredAt: number;
    readonly expiryMs?: number;
    /** 何度呼んでもよい。自分が取得したレコードだけを消す */
    release(): void;
};

export type AcquireOptions = {
    timeoutMs?: number;
    /** 省略時は期限なし（明示的に release されるまで保持） */
    expiryMs?: number;
    signal?: AbortSignal;
};

export type LockTableOptions = {
    logger?: Logger;
    now?: () => number;
};

/**
 * リソースキー（正規化した絶対パス）ごとの排他ロック表。
 * プロセス内のみ。待機は release 通知・保持者の期限・タイムアウトのいずれかで起きる。
 */
export class LockTable {
    private records = new Map<string, LockRecord>();
    private waiters = new Map<string, Set<() => void>>();
    private readonly log: Logger;
    private readonly now: () => number;

    constructor(opts: LockTableOptions = {}) {
        this.log = opts.logger ?? silentLogger();
        this.now = opts.now ?? Date.now;
    }

    normalizeKey(key: string): string {
        return path.resolve(key);
    }

    get size(): number {
        return this.records.size;
    }

    async acquire(key: string, opts: AcquireOptions = {}): Promise<LockHandle> {
        const normalized = this.normalizeKey(key);
        const timeoutMs = opts.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
        if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
            throw new RangeError(`Lock timeout must be a finite, non-negative number of ms (got ${timeoutMs})`);
        }
        if (opts.expiryMs !== undefined && (!Number.isFinite(opts.expiryMs) || opts.expiryMs <= 0)) {
            throw new RangeError(`Lock expiry must be a finite, positive number of ms (got ${opts.expiryMs})`);
        }
        const deadline = this.now() + timeoutMs;

        for (;;) {
            opts.signal?.throwIfAborted();
            const holder = this.liveRecord(normalized);
            if (!holder) {
                return this.insert(normalized, opts.expiryMs);
            }
            const remaining = deadline - this.now();
            if (remaining <= 0) {
                throw new LockTimeoutError(normalized, timeoutMs);
            }
            let waitMs = remaining;
            if (holder.expiryMs !== undefined) {
                const untilExpiry = holder.acquiredAt + holder.expiryMs - this.now();
                waitMs = Math.min(waitMs, Math.max(0, untilExpiry));
            }
            await this.waitForChange(normalized, waitMs, opts.signal);
        }
    }

    release(key: string): void {
        const normalized = this.normalizeKey(key);
        if (this.records.delete(normalized)) {
            this.log.debug({ key: normalized }, "released lock");
            this.notify(normalized);
        } else {
            // エラー経路での二重解放は想定内
            this.log.warn({ key: normalized }, "attempted to release non-existent lock");
        }
    }

    isLocked(key: string): boolean {
        return this.liveRecord(this.normalizeKey(key)) !== undefined;
    }

    cleanupExpired(): number {
        let removed = 0;
        for (const [key, record] of [...this.records]) {
            if (this.isExpired(record)) {
                this.records.delete(key);
                this.log.debug({ key }, "cleaned up expired lock");
                this.notify(key);
                removed++;
            }
        }
        return removed;
    }

    /** スコープ付き取得。fn が正常終了・例外・中断のどれで抜けても解放する */
    async withLock<T>(key: string, opts: AcquireOptions, fn: (handle: LockHandle) => Promise<T> | T): Promise<T> {
        const handle = await this.acquire(key, opts);
        try {
            return await fn(handle);
        } finally {
            handle.release();
        }
    }

    /**
     * 複数キーを順に取得する。途中で失敗したら取得済みのものを解放して投げ直す。
     * 同じファイルが重複して渡されても 1 回だけ取得する。
     */
    async withLocks<T>(
        keys: readonly string[],
        opts: AcquireOptions,
        fn: (handles: LockHandle[]) => Promise<T> | T
    ): Promise<T> {
        const unique = [...new Set(keys.map((k) => this.normalizeKey(k)))];
        const handles: LockHandle[] = [];
        try {
            for (const key of unique) {
                handles.push(await this.acquire(key, opts));
            }
            return await fn(handles);
        } finally {
            for (const handle of handles.reverse()) handle.release();
        }
    }

    private isExpired(record: LockRecord): boolean {
        if (record.expiryMs === undefined) return false;
        return this.now() - record.acquiredAt >= record.expiryMs;
    }

    private liveRecord(key: string): LockRecord | undefined {
        const record = this.records.get(key);
        if (!record) return undefined;
        if (this.isExpired(record)) {
            this.records.delete(key);
            this.log.debug({ key }, "removing expired lock");
            return undefined;
        }
        return record;
    }

    private insert(key: string, expiryMs: number | undefined): LockHandle {
        const record: LockRecord = { key, acquiredAt: this.now(), expiryMs, token: Symbol(key) };
        this.records.set(key, record);
        this.log.debug({ key, expiryMs }, "acquired lock");

        let released = false;
        return {
            key,
            acquiredAt: record.acquiredAt,
            expiryMs,
            release: () => {
                if (released) return;
                released = true;
                const current = this.records.get(key);
                if (current?.token !== record.token) {
                    // 期限切れで既に他者へ渡っている
                    this.log.debug({ key }, "lock lease already gone; skipping release");
                    return;
                }
                this.records.delete(key);
                this.log.debug({ key }, "released lock");
                this.notify(key);
            },
        };
    }

    private notify(key: string) {
        const set = this.waiters.get(key);
        if (!set) return;
        for (const wake of [...set]) wake();
    }

    private waitForChange(key: string, ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            let set = this.waiters.get(key);
            if (!set) {
                set = new Set();
                this.waiters.set(key, set);
            }
            const waiting = set;
            const cleanup = () => {
                clearTimeout(timer);
                waiting.delete(wake);
                if (waiting.size === 0) this.waiters.delete(key);
                signal?.removeEventListener("abort", onAbort);
            };
            const wake = () => {
                cleanup();
                resolve();
            };
            const onAbort = () => {
                cleanup();
                reject(signal?.reason);
            };
            const timer = setTimeout(wake, ms);
            waiting.add(wake);
            signal?.addEventListener("abort", onAbort, { once: true });
        });
    }
}
