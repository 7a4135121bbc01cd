export type TaskAssignedEvent = {
    t: number;
    type: "task_assigned";
    taskId: string;
    workerId: string;
    description: string;
};

export type WorkerCompletedEvent = {
    t: number;
    type: "worker_completed";
    taskId: string;
    success: boolean;
    filesModified: string[];
    filesCreated: string[];
    errors: string[];
};

export type PlanCreatedEvent = {
    t: number;
    type: "plan_created";
    taskIds: string[];
    source: "model" | "fallback" | "file";
    reason?: string;
};

export type PlanOrderWarningEvent = {
    t: number;
    type: "plan_order_warning";
    taskId: string;
    dependency: string;
    problem: "unknown" | "later" | "self";
};

export type CoordinatorEvent =
    | TaskAssignedEvent
    | WorkerCompletedEvent
    | PlanCreatedEvent
    | PlanOrderWarningEvent;

export type CoordinatorEventType = CoordinatorEvent["type"];

export const EVENT_TYPES: readonly CoordinatorEventType[] = [
    "task_assigned",
    "worker_completed",
    "plan_created",
    "plan_order_warning",
];

/** 配信は fire-and-forget。失敗しても呼び出し元の処理は止めない */
export interface EventSink {
    emit(event: CoordinatorEvent): void | Promise<void>;
}

function isObject(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null;
}

function isStringArray(v: unknown): v is string[] {
    return Array.isArray(v) && v.every((x) => typeof x === "string");
}

export function isCoordinatorEvent(u: unknown): u is CoordinatorEvent {
    if (!isObject(u)) return false;
    if (typeof u.t !== "number" || typeof u.type !== "string") return false;
    switch (u.type) {
        case "task_assigned":
            return typeof u.taskId === "string" && typeof u.workerId === "string" && typeof u.description === "string";
        case "worker_completed":
            return (
                typeof u.taskId === "string" &&
                typeof u.success === "boolean" &&
                isStringArray(u.filesModified) &&
                isStringArray(u.errors)
            );
        case "plan_created":
            return isStringArray(u.taskIds) && typeof u.source === "string";
        case "plan_order_warning":
            return typeof u.taskId === "string" && typeof u.dependency === "string";
        default:
            return false;
    }
}

export function parseEventLine(line: string): CoordinatorEvent | null {
    try {
        const obj: unknown = JSON.parse(line);
        return isCoordinatorEvent(obj) ? obj : null;
    } catch {
        return null;
    }
}

/** イベントに紐づくタスク ID（plan_created は複数タスクにまたがるので null） */
export function eventTaskId(ev: CoordinatorEvent): string | null {
    return ev.type === "plan_created" ? null : ev.taskId;
}
