/**
 * Shell execution for skill tools and skill scripts.
 *
 * Commands run under `/bin/sh -c` in their own process group, so a
 * timeout takes down the shell and everything it started.
 */

import { spawn } from "node:child_process";
import { ToolError } from "@ember/core";

export interface ShellOptions {
	command: string;
	cwd: string;
	timeoutMs: number;
	/** Reported on spawn failures. */
	toolName: string;
}

export interface ShellOutput {
	stdout: string;
	stderr: string;
	/** -1 when the process was ended by a signal. */
	exitCode: number;
	timedOut: boolean;
}

/**
 * Quote a value for `/bin/sh`: wrap it in single quotes and turn each
 * embedded `'` into `'\''`.
 */
export function shellQuote(value: string): string {
	return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Run `command` and collect its output.
 *
 * @throws {ToolError} When the shell cannot be started (e.g. missing cwd).
 */
export function runShell(opts: ShellOptions): Promise<ShellOutput> {
	return new Promise<ShellOutput>((resolve, reject) => {
		const stdout: Buffer[] = [];
		const stderr: Buffer[] = [];
		let timedOut = false;

		const proc = spawn("/bin/sh", ["-c", opts.command], {
			cwd: opts.cwd,
			detached: true,
			stdio: ["ignore", "pipe", "pipe"],
		});

		// SIGTERM to the shell alone does not reach its children.
		const killGroup = (sig: NodeJS.Signals) => {
			try {
				if (proc.pid) process.kill(-proc.pid, sig);
			} catch {
				proc.kill(sig);
			}
		};

		let forceKill: NodeJS.Timeout | undefined;
		const timer = setTimeout(() => {
			timedOut = true;
			killGroup("SIGTERM");
			forceKill = setTimeout(() => killGroup("SIGKILL"), 500);
		}, opts.timeoutMs);

		proc.stdout.on("data", (data: Buffer) => stdout.push(data));
		proc.stderr.on("data", (data: Buffer) => stderr.push(data));

		proc.on("close", (code) => {
			clearTimeout(timer);
			if (forceKill) clearTimeout(forceKill);

			let err = Buffer.concat(stderr).toString("utf-8");
			if (timedOut) {
				const secs = Math.round(opts.timeoutMs / 1000);
				err += `${err && !err.endsWith("\n") ? "\n" : ""}[timed out after ${secs}s]\n`;
			}
			resolve({
				stdout: Buffer.concat(stdout).toString("utf-8"),
				stderr: err,
				exitCode: code ?? -1,
				timedOut,
			});
		});

		proc.on("error", (error) => {
			clearTimeout(timer);
			reject(new ToolError(`failed to run ${opts.toolName}: ${error.message}`, opts.toolName, error));
		});
	});
}
