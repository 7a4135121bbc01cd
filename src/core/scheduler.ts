import type { TaskSpec } from "./types.js";

export type OrderWarning = {
    taskId: string;
    dependency: string;
    problem: "unknown" | "later" | "self";
};

/**
 * 宣言された dependencies をリスト順と照合する。並べ替えはしない。
 * Coordinator は Planner の順序を信頼して実行するので、食い違いは警告として返すだけ。
 */
export function checkDeclaredOrder(tasks: readonly TaskSpec[]): OrderWarning[] {
    const position = new Map<string, number>(tasks.map((t, i) => [t.taskId, i]));
    const warnings: OrderWarning[] = [];
    tasks.forEach((t, i) => {
        for (const d of t.dependencies) {
            const at = position.get(d);
            if (d === t.taskId) warnings.push({ taskId: t.taskId, dependency: d, problem: "self" });
            else if (at === undefined) warnings.push({ taskId: t.taskId, dependency: d, problem: "unknown" });
            else if (at > i) warnings.push({ taskId: t.taskId, dependency: d, problem: "later" });
        }
    });
    return warnings;
}

/**
 * 依存関係に基づき、同時実行できるタスク群（バッチ）に分割する。
 * トポロジカル順序。各バッチ内は元の並び順を保つ。循環や未知の依存があれば例外。
 */
export function buildBatches(tasks: readonly TaskSpec[]): TaskSpec[][] {
    const byId = new Map<string, TaskSpec>(tasks.map(t => [t.taskId, t]));
    const order = new Map<string, number>(tasks.map((t, i) => [t.taskId, i]));
    const indeg = new Map<string, number>();
    const adj = new Map<string, Set<string>>();

    // 初期化
    for (const t of tasks) {
        indeg.set(t.taskId, 0);
        adj.set(t.taskId, new Set());
    }
    for (const t of tasks) {
        for (const d of new Set(t.dependencies)) {
            const edges = adj.get(d);
            if (!edges) throw new Error(`dependency not found: ${t.taskId} -> ${d}`);
            indeg.set(t.taskId, (indeg.get(t.taskId) ?? 0) + 1);
            edges.add(t.taskId);
        }
    }

    const byOrder = (a: TaskSpec, b: TaskSpec) => (order.get(a.taskId) ?? 0) - (order.get(b.taskId) ?? 0);
    const layers: TaskSpec[][] = [];
    let ready = tasks.filter(t => (indeg.get(t.taskId) ?? 0) === 0);

    let visited = 0;
    while (ready.length > 0) {
        layers.push(ready);
        const next: TaskSpec[] = [];
        for (const u of ready) {
            visited++;
            for (const v of adj.get(u.taskId) ?? []) {
                const deg = (indeg.get(v) ?? 0) - 1;
                indeg.set(v, deg);
                const task = byId.get(v);
                if (deg === 0 && task) next.push(task);
            }
        }
        ready = next.sort(byOrder);
    }

    if (visited !== tasks.length) {
        throw new Error("cycle detected in dependencies");
    }
    return layers;
}

/** run --topo-order 用。明示的に指定されたときだけ使う */
export function orderByDependencies(tasks: readonly TaskSpec[]): TaskSpec[] {
    return buildBatches(tasks).flat();
}
