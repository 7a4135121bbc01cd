export type Budget = "small" | "medium" | "large";

export const BUDGETS: readonly Budget[] = ["small", "medium", "large"];

/** Planner が生成する 1 単位の作業。生成後は変更しない。 */
export type TaskSpec = {
    readonly taskId: string;
    readonly description: string;
    /** 作業ディレクトリからの相対パス。読み書き対象（空でもよい） */
    readonly files: readonly string[];
    readonly successCriteria: readonly string[];
    readonly budget: Budget;
    /** 記録のみ。Coordinator はこの順序を強制しない */
    readonly dependencies: readonly string[];
};

export type TestRun = {
    name: string;
    status: string;
    durationMs: number;
};

export type WorkerResult = {
    taskId: string;
    success: boolean;
    filesModified: string[];
    filesCreated: string[];
    testsRun: TestRun[];
    verificationPassed: boolean;
    errors: string[];
    logs: string;
};

/** Worker がモデル応答の tools_used から受け取る 1 件のツール操作 */
export type ToolAction = {
    tool: string;
    file?: string;
    path?: string;
    content?: string;
    command?: string;
    directory?: string;
    pattern?: string;
    result?: string;
};

export type ChatMessage = {
    role: "system" | "user";
    content: string;
};

export interface CompletionModel {
    /** ログや task_assigned イベントで使う識別子 */
    readonly id: string;
    invoke(messages: ChatMessage[]): Promise<{ content: string }>;
}

export interface Worker {
    readonly id: string;
    execute(task: TaskSpec, workingDir: string): Promise<WorkerResult>;
}
