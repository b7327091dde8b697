/**
 * Per-call tool artifacts:
 *
 *   <tool_runs_dir>/<uuid>/call.json    what was asked and why
 *   <tool_runs_dir>/<uuid>/stdout.txt
 *   <tool_runs_dir>/<uuid>/stderr.txt
 */

import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { ToolError, errorMessage, toError } from "@ember/core";

const SAFE_RUN_ID = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/** Whether `id` can be used as a single path segment. */
export function isSafeRunId(id: string): boolean {
	return SAFE_RUN_ID.test(id);
}

/** Contents of `call.json`. */
export interface CallRecord {
	timestamp: string;
	/** Id the model gave the call; may repeat across turns. */
	tool_call_id: string;
	tool: string;
	args: Record<string, unknown>;
	user_message: string;
	assistant_text: string;
}

export interface ToolRunStore {
	/** Fresh directory name for one execution. */
	newRunId(): string;
	/** @throws {ToolError} On I/O failure. */
	write(runId: string, record: CallRecord, stdout: string, stderr: string): void;
	/** Captured stdout, or undefined for an unknown or unsafe id. */
	readStdout(runId: string): string | undefined;
	/** Directory of one run. */
	runDir(runId: string): string;
}

/**
 * @param root - Getter for the runs directory, read on every call so a
 *   `tool_runs_dir` change applies to the next run.
 */
export function createToolRunStore(root: () => string): ToolRunStore {
	const runDir = (runId: string) => path.join(root(), runId);

	return {
		newRunId() {
			return randomUUID();
		},

		write(runId, record, stdout, stderr) {
			const dir = runDir(runId);
			try {
				fs.mkdirSync(dir, { recursive: true });
				fs.writeFileSync(path.join(dir, "call.json"), JSON.stringify(record, null, 2) + "\n", "utf-8");
				fs.writeFileSync(path.join(dir, "stdout.txt"), stdout, "utf-8");
				fs.writeFileSync(path.join(dir, "stderr.txt"), stderr, "utf-8");
			} catch (err) {
				throw new ToolError(`failed to record tool output in ${dir}: ${errorMessage(err)}`, record.tool, toError(err));
			}
		},

		readStdout(runId) {
			if (!isSafeRunId(runId)) return undefined;
			const file = path.join(runDir(runId), "stdout.txt");
			try {
				return fs.readFileSync(file, "utf-8");
			} catch {
				return undefined;
			}
		},

		runDir,
	};
}
