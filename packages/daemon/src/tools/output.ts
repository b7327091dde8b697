/**
 * What the model sees of a tool run: a bounded summary, and pages of the
 * full stdout on request.
 */

import type { ShellOutput } from "./shell.js";

/** Split text into lines; a trailing newline adds no empty line. */
export function splitLines(text: string): string[] {
	if (text === "") return [];
	const lines = text.split("\n");
	if (lines[lines.length - 1] === "") lines.pop();
	return lines;
}

export interface SummaryLimits {
	/** Head of stdout shown before the truncation notice. */
	maxLines: number;
	/** Head of stderr shown. */
	maxStderrLines: number;
}

/**
 * Build the tool result returned to the model.
 *
 * Prefixed with the run id so the model can page the full output.
 */
export function formatToolSummary(runId: string, output: ShellOutput, limits: SummaryLimits): string {
	const lines = splitLines(output.stdout);
	let summary: string;
	if (lines.length > limits.maxLines) {
		summary =
			lines.slice(0, limits.maxLines).join("\n") +
			`\n... [output truncated: showing ${limits.maxLines} of ${lines.length} lines. ` +
			`Use paginate_tool_output with tool_call_uuid "${runId}" to read more]`;
	} else {
		summary = output.stdout;
	}

	if (output.stderr !== "") {
		summary += `\n[stderr]\n${splitLines(output.stderr).slice(0, limits.maxStderrLines).join("\n")}`;
	}
	if (output.exitCode !== 0) {
		summary += `\n[exit code: ${output.exitCode}]`;
	}
	return `[tool_call_uuid: ${runId}]\n${summary}`;
}

export interface PageRequest {
	offset: number;
	limit: number;
	/** Case-sensitive substring filter. */
	search?: string;
}

/** Lines `[offset, min(offset + limit, total))`, with a notice when more remain. */
export function pageLines(stdout: string, request: PageRequest): string {
	let lines = splitLines(stdout);
	if (request.search !== undefined && request.search !== "") {
		const needle = request.search;
		lines = lines.filter((line) => line.includes(needle));
	}

	const total = lines.length;
	const start = Math.min(request.offset, total);
	const end = Math.min(request.offset + request.limit, total);
	let page = lines.slice(start, end).join("\n");
	if (end < total) {
		page += `\n... [more available: lines ${request.offset}-${end} of ${total}. Use offset=${end} to continue]`;
	}
	return page;
}
