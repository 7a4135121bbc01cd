import fs from "node:fs";
import path from "node:path";
import { execa } from "execa";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { isSafeRelativeUnder, toPosix } from "./paths.js";

export type ReadFileResult = {
    success: boolean;
    exists: boolean;
    content: string;
    size: number;
    error?: string;
};

export type WriteFileResult = {
    success: boolean;
    /** 書き込み後に読み戻した内容が一致したか */
    verified: boolean;
    size: number;
    error?: string;
};

export type ListFilesResult = {
    success: boolean;
    files: string[];
    count: number;
    error?: string;
};

export type BashResult = {
    success: boolean;
    stdout: string;
    stderr: string;
    returnCode: number;
};

export const DEFAULT_BASH_TIMEOUT_MS = 60_000;

/** 1 セグメント内の * と ?、セグメントをまたぐ ** に対応する */
export function globToRegExp(pattern: string): RegExp {
    let re = "";
    const p = toPosix(pattern);
    for (let i = 0; i < p.length; i++) {
        const c = p[i];
        if (c === "*") {
            if (p[i + 1] === "*") {
                if (p[i + 2] === "/") {
                    re += "(?:.*/)?";
                    i += 2;
                } else {
                    re += ".*";
                    i += 1;
                }
            } else {
                re += "[^/]*";
            }
        } else if (c === "?") {
            re += "[^/]";
        } else {
            re += c.replace(/[.+^${}()|[\]\\]/g, "\\$&");
        }
    }
    return new RegExp(`^${re}$`);
}

function walk(dir: string, rel: string, recursive: boolean, out: string[]) {
    for (const ent of fs.readdirSync(dir, { withFileTypes: true })) {
        const childRel = rel ? `${rel}/${ent.name}` : ent.name;
        out.push(childRel);
        if (recursive && ent.isDirectory()) {
            walk(path.join(dir, ent.name), childRel, recursive, out);
        }
    }
}

/** 作業ディレクトリに閉じたファイル/シェル操作。失敗は例外ではなく結果で返す */
export class ToolExecutor {
    private readonly log: Logger;

    constructor(readonly workingDir: string, opts: { logger?: Logger } = {}) {
        this.log = opts.logger ?? silentLogger();
    }

    private resolve(rel: string): string | null {
        if (!isSafeRelativeUnder(this.workingDir, rel)) return null;
        return path.resolve(this.workingDir, rel);
    }

    readFile(filePath: string): ReadFileResult {
        const abs = this.resolve(filePath);
        if (!abs) {
            return { success: false, exists: false, content: "", size: 0, error: `Unsafe path outside working directory: ${filePath}` };
        }
        try {
            if (!fs.existsSync(abs)) {
                return { success: false, exists: false, content: "", size: 0, error: `File does not exist: ${filePath}` };
            }
            const content = fs.readFileSync(abs, "utf8");
            return { success: true, exists: true, content, size: content.length };
        } catch (err) {
            this.log.error({ file: filePath, err: errorMessage(err) }, "failed to read file");
            return { success: false, exists: false, content: "", size: 0, error: errorMessage(err) };
        }
    }

    writeFile(filePath: string, content: string): WriteFileResult {
        const abs = this.resolve(filePath);
        if (!abs) {
            return { success: false, verified: false, size: 0, error: `Unsafe path outside working directory: ${filePath}` };
        }
        try {
            fs.mkdirSync(path.dirname(abs), { recursive: true });
            fs.writeFileSync(abs, content, "utf8");
            const verified = fs.readFileSync(abs, "utf8") === content;
            return { success: true, verified, size: content.length };
        } catch (err) {
            this.log.error({ file: filePath, err: errorMessage(err) }, "failed to write file");
            return { success: false, verified: false, size: 0, error: errorMessage(err) };
        }
    }

    listFiles(directory = ".", pattern = "*"): ListFilesResult {
        const abs = this.resolve(directory);
        if (!abs) {
            return { success: false, files: [], count: 0, error: `Unsafe path outside working directory: ${directory}` };
        }
        try {
            if (!fs.existsSync(abs) || !fs.statSync(abs).isDirectory()) {
                return { success: false, files: [], count: 0, error: `Directory does not exist: ${directory}` };
            }
            const recursive = pattern.includes("/") || pattern.includes("**");
            const entries: string[] = [];
            walk(abs, "", recursive, entries);
            const re = globToRegExp(pattern);
            const files = entries
                .filter((rel) => re.test(rel))
                .map((rel) => toPosix(path.relative(this.workingDir, path.join(abs, rel))))
                .sort();
            return { success: true, files, count: files.length };
        } catch (err) {
            this.log.error({ directory, err: errorMessage(err) }, "failed to list files");
            return { success: false, files: [], count: 0, error: errorMessage(err) };
        }
    }

    async executeBash(command: string, timeoutMs = DEFAULT_BASH_TIMEOUT_MS): Promise<BashResult> {
        this.log.info({ command }, "executing shell command");
        try {
            const res = await execa(command, {
                shell: true,
                cwd: this.workingDir,
                timeout: timeoutMs,
                reject: false,
            });
            if (res.timedOut) {
                return { success: false, stdout: res.stdout, stderr: `Command timed out after ${timeoutMs / 1000}s`, returnCode: -1 };
            }
            const returnCode = res.exitCode ?? -1;
            return { success: returnCode === 0, stdout: res.stdout, stderr: res.stderr, returnCode };
        } catch (err) {
            this.log.error({ command, err: errorMessage(err) }, "shell command failed");
            return { success: false, stdout: "", stderr: errorMessage(err), returnCode: -1 };
        }
    }
}
