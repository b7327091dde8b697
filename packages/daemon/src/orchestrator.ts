/**
 * ToolOrchestrator: the bounded model/tool loop behind `session send`.
 *
 *   AWAIT_MODEL → STREAMING → DECIDE → EXECUTING_TOOLS → AWAIT_MODEL
 *                                    ↘ TERMINATED
 *
 * Each turn streams one model response. Text is forwarded as it arrives;
 * tool calls are collected and run in order once the turn ends, and their
 * results go back to the model on the next turn. The loop stops when a
 * turn asks for no tools, on a stream error, or after `maxTurns`.
 */

import { createLogger, errorMessage } from "@ember/core";
import { parseArguments } from "@ember/llm";
import type { ChatMessage, LlmGateway, ToolCall } from "@ember/llm";
import type { AssembledContext } from "@ember/sessions";
import type { ToolExecutor } from "./tools/executor.js";
import type { Reply } from "./protocol.js";

const log = createLogger("daemon:orchestrator");

export const MAX_TURNS = 10;
/** Characters of a tool result echoed to the client. */
export const TOOL_RESULT_PREVIEW_CHARS = 200;

export interface ExchangeOptions {
	gateway: LlmGateway;
	executor: ToolExecutor;
	sessionId: string;
	model: string;
	context: AssembledContext;
	/** The user message that started the exchange. */
	userMessage: string;
	emit: (reply: Reply) => void;
	maxTurns?: number;
}

export interface ExchangeResult {
	/** Text of every turn, concatenated. */
	text: string;
	turns: number;
	/** Set when the exchange ended on a stream error. */
	error?: string;
}

export function previewToolResult(result: string): string {
	return result.length > TOOL_RESULT_PREVIEW_CHARS ? result.slice(0, TOOL_RESULT_PREVIEW_CHARS) : result;
}

/** Run the exchange. Never throws; stream errors are emitted and returned. */
export async function runExchange(opts: ExchangeOptions): Promise<ExchangeResult> {
	const maxTurns = opts.maxTurns ?? MAX_TURNS;
	const messages: ChatMessage[] = [...opts.context.messages];
	const elog = log.withContext({ sessionId: opts.sessionId });
	let response = "";

	for (let turn = 1; turn <= maxTurns; turn++) {
		let turnText = "";
		const calls: ToolCall[] = [];

		try {
			const stream = await opts.gateway.streamChat(opts.model, messages, opts.context.tools);
			for await (const event of stream) {
				if (event.type === "text") {
					if (event.text === "") continue;
					turnText += event.text;
					opts.emit({ event: "response", session_id: opts.sessionId, delta: event.text, done: false });
				} else {
					calls.push({ id: event.id, name: event.name, arguments: event.arguments });
				}
			}
		} catch (err) {
			const message = errorMessage(err);
			elog.error("LLM Stream Error occurred.", err, { turn });
			opts.emit({ error: `LLM Stream Error: ${message}`, session_id: opts.sessionId });
			return { text: response + turnText, turns: turn, error: message };
		}

		response += turnText;
		if (calls.length === 0) {
			return { text: response, turns: turn };
		}

		messages.push({ role: "assistant", content: turnText, toolCalls: calls });
		for (const call of calls) {
			const { result } = await opts.executor.execute(call, {
				skills: opts.context.skills,
				userMessage: opts.userMessage,
				assistantText: turnText,
			});
			opts.emit({
				event: "tool_call",
				session_id: opts.sessionId,
				tool: call.name,
				tool_call_id: call.id,
				args: parseArguments(call.arguments),
				result: previewToolResult(result),
			});
			messages.push({ role: "tool", content: result, toolCallId: call.id, name: call.name });
		}
	}

	elog.warn("Tool loop reached its turn limit", { maxTurns });
	return { text: response, turns: maxTurns };
}
