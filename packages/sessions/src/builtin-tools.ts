import type { ToolSchema } from "@ember/llm";

export const PAGINATE_TOOL_NAME = "paginate_tool_output";
export const RUN_SKILL_SCRIPT_TOOL_NAME = "run_skill_script";

/** Tools every turn offers, after the skill tools. */
export const BUILTIN_TOOLS: readonly ToolSchema[] = Object.freeze([
	{
		name: PAGINATE_TOOL_NAME,
		description:
			"Paginates the output of a previous tool call. Use this to see more lines, a specific range, or search for text in the full output of a tool.",
		parameters: {
			type: "object",
			properties: {
				tool_call_uuid: { type: "string", description: "The UUID of the tool call to paginate." },
				offset: { type: "integer", description: "Starting line number (0-indexed)." },
				limit: { type: "integer", description: "Number of lines to return." },
				search: { type: "string", description: "Optional search term to filter lines." },
			},
			required: ["tool_call_uuid"],
		},
	},
	{
		name: RUN_SKILL_SCRIPT_TOOL_NAME,
		description:
			"Executes a script from an active skill's 'scripts' directory. Provide the skill name, script name (with extension), and an optional 'args' array.",
		parameters: {
			type: "object",
			properties: {
				skill_name: { type: "string", description: "The name of the skill containing the script." },
				script_name: {
					type: "string",
					description: "The name of the script file (e.g., 'browser-active.sh').",
				},
				args: {
					type: "array",
					items: { type: "string" },
					description: "Arguments to pass to the script.",
				},
			},
			required: ["skill_name", "script_name"],
		},
	},
]);
