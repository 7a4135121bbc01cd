import fs from "node:fs";
import path from "node:path";
import { silentLogger, type Logger } from "./logger.js";
import { isSafeRelativeUnder } from "./paths.js";
import type { WorkerResult } from "./types.js";

export const VERIFICATION_FAILED_MESSAGE = "Verification failed: claimed files do not exist";

export function failedResult(taskId: string, errors: string[], logs = ""): WorkerResult {
    return {
        taskId,
        success: false,
        filesModified: [],
        filesCreated: [],
        testsRun: [],
        verificationPassed: false,
        errors,
        logs,
    };
}

function existsUnder(workingDir: string, rel: string): boolean {
    return isSafeRelativeUnder(workingDir, rel) && fs.existsSync(path.resolve(workingDir, rel));
}

/**
 * 申告されたファイルをディスクと突き合わせ、存在しないものを落とす。
 * 申告があったのに 1 つも残らなければ、自己申告の success に関わらず検証失敗にする。
 */
export function verifyClaimedFiles(result: WorkerResult, workingDir: string, log: Logger = silentLogger()): WorkerResult {
    const claimed = result.filesModified.length + result.filesCreated.length > 0;
    const keep = (kind: string) => (rel: string) => {
        if (existsUnder(workingDir, rel)) return true;
        log.warn({ taskId: result.taskId, file: rel }, `claimed ${kind} file does not exist`);
        return false;
    };
    result.filesModified = result.filesModified.filter(keep("modified"));
    result.filesCreated = result.filesCreated.filter(keep("created"));

    if (claimed && result.filesModified.length === 0 && result.filesCreated.length === 0) {
        result.verificationPassed = false;
        if (!result.errors.includes(VERIFICATION_FAILED_MESSAGE)) {
            result.errors.push(VERIFICATION_FAILED_MESSAGE);
        }
        result.logs += `${result.logs ? "\n\n" : ""}Verification: none of the claimed files exist under ${workingDir}`;
    }
    return result;
}
