/**
 * xAI adapter (OpenAI-compatible chat completions over SSE).
 */

import { randomUUID } from "node:crypto";
import { createLogger, isRecord } from "@ember/core";
import { readSseData } from "../framing.js";
import { asArray, asRecord, asString, tryParseJson } from "../json.js";
import type { ChatMessage, LlmEvent, ProviderAdapter, ProviderRequest, ToolSchema } from "../types.js";
import { toOllamaTools } from "./ollama.js";

const log = createLogger("llm:xai");

// ─── Request ────────────────────────────────────────────────────────────────

interface XaiMessage {
	role: ChatMessage["role"];
	content: string;
	tool_calls?: Array<{
		id: string;
		type: "function";
		function: { name: string; arguments: string };
	}>;
	tool_call_id?: string;
}

function buildMessages(messages: ChatMessage[]): XaiMessage[] {
	return messages.map((msg) => {
		if (msg.role === "tool") {
			return { role: "tool", tool_call_id: msg.toolCallId ?? "", content: msg.content };
		}
		const out: XaiMessage = { role: msg.role, content: msg.content };
		if (msg.toolCalls && msg.toolCalls.length > 0) {
			out.tool_calls = msg.toolCalls.map((tc) => ({
				id: tc.id,
				type: "function" as const,
				function: { name: tc.name, arguments: tc.arguments },
			}));
		}
		return out;
	});
}

function buildRequest(baseUrl: string, model: string, messages: ChatMessage[], tools: ToolSchema[]): ProviderRequest {
	const body: Record<string, unknown> = {
		model,
		messages: buildMessages(messages),
		stream: true,
	};
	if (tools.length > 0) {
		// Same function-tool shape as Ollama.
		body.tools = toOllamaTools(tools);
	}
	return { url: `${baseUrl}/xai/v1/chat/completions`, body };
}

// ─── Stream ─────────────────────────────────────────────────────────────────

interface PartialToolCall {
	id: string;
	name: string;
	arguments: string;
}

/**
 * Merge `delta.tool_calls` fragments into `pending`, keyed by index.
 * Ids and names arrive once; argument text arrives in pieces.
 */
export function accumulateToolCalls(pending: Map<number, PartialToolCall>, fragments: unknown[]): void {
	for (const raw of fragments) {
		const fragment = asRecord(raw);
		if (!fragment) continue;
		const index = typeof fragment.index === "number" ? fragment.index : pending.size;
		const fn = asRecord(fragment.function);
		const entry = pending.get(index) ?? { id: "", name: "", arguments: "" };
		const id = asString(fragment.id);
		const name = asString(fn?.name);
		if (id) entry.id = id;
		if (name) entry.name = name;
		entry.arguments += asString(fn?.arguments) ?? "";
		pending.set(index, entry);
	}
}

async function* decode(body: ReadableStream<Uint8Array>): AsyncGenerator<LlmEvent> {
	const pending = new Map<number, PartialToolCall>();

	for await (const data of readSseData(body)) {
		if (data === "" || data === "[DONE]") continue;

		const parsed = tryParseJson(data);
		if (!parsed.ok || !isRecord(parsed.value)) {
			log.debug("Unparseable chunk", { data });
			yield { type: "text", text: "" };
			continue;
		}

		const choice = asRecord(asArray(parsed.value.choices)[0]);
		const delta = asRecord(choice?.delta);
		if (!delta) continue;

		const content = asString(delta.content);
		if (content !== undefined) {
			yield { type: "text", text: content };
		}
		accumulateToolCalls(pending, asArray(delta.tool_calls));
	}

	const ordered = [...pending.entries()].sort(([a], [b]) => a - b);
	for (const [, call] of ordered) {
		if (!call.name) continue;
		yield {
			type: "tool_call",
			id: call.id || `call_${randomUUID()}`,
			name: call.name,
			arguments: call.arguments,
		};
	}
}

export const xaiAdapter: ProviderAdapter = {
	id: "xai",
	name: "xAI",
	buildRequest,
	decode,
};
