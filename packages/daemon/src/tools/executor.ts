/**
 * Tool executor: resolves a model-issued tool call to a built-in handler
 * or a skill's shell command and runs it.
 *
 * Failures never throw: they come back as `error: ...` result strings so
 * the model can read them and carry on.
 */

import fs from "node:fs";
import path from "node:path";
import { createLogger, errorMessage, expandHome } from "@ember/core";
import type { ToolCall } from "@ember/llm";
import { PAGINATE_TOOL_NAME, RUN_SKILL_SCRIPT_TOOL_NAME } from "@ember/sessions";
import type { Skill, SkillToolDefinition } from "@ember/skills";
import type { ToolRunStore } from "./artifacts.js";
import { formatToolSummary, pageLines } from "./output.js";
import { runShell, shellQuote } from "./shell.js";

const log = createLogger("daemon:tools");

/** Default page size of `paginate_tool_output`. */
export const DEFAULT_PAGE_LIMIT = 50;

export interface ToolLimits {
	maxLines: number;
	maxStderrLines: number;
	timeoutSecs: number;
}

/** Catalog lookup `run_skill_script` resolves skills through. */
export interface SkillLookup {
	get(name: string): Skill | undefined;
}

/** What the exchange knows when a call is made; recorded in `call.json`. */
export interface ToolCallContext {
	/** Skills whose tools were offered this turn. */
	skills: readonly Skill[];
	userMessage: string;
	assistantText: string;
}

export interface ToolExecution {
	/** Artifact directory name, for calls that ran a command. Unique per execution. */
	runId?: string;
	/** Text returned to the model. */
	result: string;
}

export interface ToolExecutor {
	execute(call: ToolCall, ctx: ToolCallContext): Promise<ToolExecution>;
}

export interface ToolExecutorOptions {
	catalog: SkillLookup;
	store: ToolRunStore;
	/** Read per call so settings changes apply. */
	limits: () => ToolLimits;
}

type Args = Record<string, unknown>;

/** Thrown inside the executor; surfaces as `error: <message>`. */
class ToolFailure extends Error {}

function parseCallArguments(call: ToolCall): Args {
	if (call.arguments.trim() === "") return {};
	let parsed: unknown;
	try {
		parsed = JSON.parse(call.arguments);
	} catch (err) {
		throw new ToolFailure(`invalid arguments for ${call.name}: ${errorMessage(err)}`);
	}
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		throw new ToolFailure(`invalid arguments for ${call.name}: expected a JSON object`);
	}
	return { ...parsed };
}

function requireString(args: Args, key: string): string {
	const value = args[key];
	if (typeof value !== "string" || value === "") {
		throw new ToolFailure(`missing ${key}`);
	}
	return value;
}

function nonNegativeInt(value: unknown, fallback: number): number {
	return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : fallback;
}

function argText(value: unknown): string {
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "boolean") return String(value);
	return JSON.stringify(value);
}

/**
 * Substitute `{{param}}` placeholders with shell-quoted argument values.
 * A missing or null argument becomes `''`.
 */
export function renderExecTemplate(exec: string, args: Args): string {
	return exec.replace(/\{\{\s*([A-Za-z0-9_-]+)\s*\}\}/g, (_match, name: string) => {
		const value = args[name];
		return value === undefined || value === null ? "''" : shellQuote(argText(value));
	});
}

/** Find a declared tool among the skills offered this turn. */
function findSkillTool(skills: readonly Skill[], name: string): { skill: Skill; tool: SkillToolDefinition } | undefined {
	for (const skill of skills) {
		const tool = skill.tools.find((t) => t.name === name);
		if (tool) return { skill, tool };
	}
	return undefined;
}

export function createToolExecutor(options: ToolExecutorOptions): ToolExecutor {
	const { catalog, store } = options;

	async function runCommand(
		call: ToolCall,
		args: Args,
		command: string,
		cwd: string,
		ctx: ToolCallContext,
	): Promise<ToolExecution> {
		const limits = options.limits();
		const runId = store.newRunId();
		log.info("Running tool", { tool: call.name, runId, cwd });

		const output = await runShell({ command, cwd, timeoutMs: limits.timeoutSecs * 1000, toolName: call.name });
		store.write(
			runId,
			{
				timestamp: new Date().toISOString(),
				tool_call_id: call.id,
				tool: call.name,
				args,
				user_message: ctx.userMessage,
				assistant_text: ctx.assistantText,
			},
			output.stdout,
			output.stderr,
		);
		if (output.exitCode !== 0) {
			log.debug("Tool exited non-zero", { tool: call.name, runId, exitCode: output.exitCode });
		}
		return {
			runId,
			result: formatToolSummary(runId, output, { maxLines: limits.maxLines, maxStderrLines: limits.maxStderrLines }),
		};
	}

	function paginate(args: Args): ToolExecution {
		const uuid = requireString(args, "tool_call_uuid");
		const stdout = store.readStdout(uuid);
		if (stdout === undefined) {
			throw new ToolFailure(`no output found for tool call ${uuid}`);
		}
		const search = typeof args.search === "string" ? args.search : undefined;
		return {
			result: pageLines(stdout, {
				offset: nonNegativeInt(args.offset, 0),
				limit: nonNegativeInt(args.limit, DEFAULT_PAGE_LIMIT),
				search,
			}),
		};
	}

	async function runSkillScript(call: ToolCall, args: Args, ctx: ToolCallContext): Promise<ToolExecution> {
		const skillName = requireString(args, "skill_name");
		const scriptName = requireString(args, "script_name");
		const skill = catalog.get(skillName);
		if (!skill) {
			throw new ToolFailure(`skill not found: ${skillName}`);
		}

		const scriptsDir = path.resolve(skill.path, "scripts");
		const scriptPath = path.resolve(scriptsDir, scriptName);
		if (!scriptPath.startsWith(scriptsDir + path.sep) || !fs.statSync(scriptPath, { throwIfNoEntry: false })?.isFile()) {
			throw new ToolFailure(`script not found: ${scriptName}`);
		}

		const scriptArgs = Array.isArray(args.args) ? args.args.map(argText) : [];
		const command = [scriptPath, ...scriptArgs].map(shellQuote).join(" ");
		return runCommand(call, args, command, skill.path, ctx);
	}

	async function runSkillTool(call: ToolCall, args: Args, ctx: ToolCallContext): Promise<ToolExecution> {
		const found = findSkillTool(ctx.skills, call.name);
		if (!found) {
			throw new ToolFailure(`unknown tool ${call.name}`);
		}
		const { skill, tool } = found;
		if (!tool.exec) {
			throw new ToolFailure(`tool ${call.name} has no exec command`);
		}
		const cwd = tool.workingDir ? path.resolve(skill.path, expandHome(tool.workingDir)) : skill.path;
		return runCommand(call, args, renderExecTemplate(tool.exec, args), cwd, ctx);
	}

	return {
		async execute(call, ctx) {
			try {
				const args = parseCallArguments(call);
				switch (call.name) {
					case PAGINATE_TOOL_NAME:
						return paginate(args);
					case RUN_SKILL_SCRIPT_TOOL_NAME:
						return await runSkillScript(call, args, ctx);
					default:
						return await runSkillTool(call, args, ctx);
				}
			} catch (err) {
				log.warn("Tool call failed", { tool: call.name, toolCallId: call.id, error: errorMessage(err) });
				return { result: `error: ${errorMessage(err)}` };
			}
		},
	};
}
