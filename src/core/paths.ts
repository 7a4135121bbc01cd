import fs from "node:fs";
import path from "node:path";

export function toPosix(value: string): string {
    return value.replace(/\\+/g, "/");
}

export function ensureDir(p: string) {
    fs.mkdirSync(p, { recursive: true });
}

export function writeFileUtf8(p: string, text: string) {
    ensureDir(path.dirname(p));
    fs.writeFileSync(p, text, "utf8");
}

export function writeJson(p: string, value: unknown) {
    writeFileUtf8(p, JSON.stringify(value, null, 2) + "\n");
}

/** <stateDir>/runs/run-<ts> を作って返す */
export function createRunDir(stateDir: string) {
    const ts = Date.now();
    const dir = path.join(stateDir, "runs", `run-${ts}`);
    ensureDir(dir);
    return dir;
}

export function findLatestRunDir(stateDir: string): string | null {
    const base = path.join(stateDir, "runs");
    if (!fs.existsSync(base)) return null;
    const names = fs
        .readdirSync(base)
        .filter((n) => n.startsWith("run-"))
        .map((n) => ({ n, t: Number(n.slice("run-".length)) }))
        .filter((x) => !Number.isNaN(x.t))
        .sort((a, b) => b.t - a.t);
    if (names.length === 0) return null;
    return path.join(base, names[0].n);
}

export function isSafeRelativeUnder(base: string, rel: string): boolean {
    if (!rel || rel.trim() === "") return false;
    if (path.isAbsolute(rel)) return false;
    const normalizedBase = path.resolve(base);
    const target = path.resolve(normalizedBase, rel);
    const relative = path.relative(normalizedBase, target);
    if (!relative) return true;
    return !relative.startsWith("..") && !path.isAbsolute(relative);
}
