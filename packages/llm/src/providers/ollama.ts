/**
 * Ollama adapter.
 *
 * Chat: `POST {base}/ollama/api/chat`, streamed as newline-delimited JSON,
 * one object per line. Tool call arguments travel as objects.
 * Embeddings: `POST {base}/ollama/api/embeddings`.
 */

import { randomUUID } from "node:crypto";
import { createLogger, isRecord } from "@ember/core";
import { readLines } from "../framing.js";
import { asArray, asRecord, asString, parseArguments, tryParseJson } from "../json.js";
import type {
	ChatMessage,
	EmbeddingAdapter,
	LlmEvent,
	ProviderAdapter,
	ProviderRequest,
	ToolSchema,
} from "../types.js";

const log = createLogger("llm:ollama");

interface OllamaMessage {
	role: ChatMessage["role"];
	content: string;
	tool_calls?: Array<{
		function: { name: string; arguments: Record<string, unknown> };
	}>;
}

interface OllamaTool {
	type: "function";
	function: { name: string; description: string; parameters: Record<string, unknown> };
}

/** Convert uniform messages into Ollama chat messages. */
function buildMessages(messages: ChatMessage[]): OllamaMessage[] {
	return messages.map((msg) => {
		const out: OllamaMessage = { role: msg.role, content: msg.content };
		if (msg.toolCalls && msg.toolCalls.length > 0) {
			out.tool_calls = msg.toolCalls.map((tc) => ({
				function: { name: tc.name, arguments: parseArguments(tc.arguments) },
			}));
		}
		return out;
	});
}

export function toOllamaTools(tools: ToolSchema[]): OllamaTool[] {
	return tools.map((t) => ({
		type: "function" as const,
		function: { name: t.name, description: t.description, parameters: t.parameters },
	}));
}

function buildRequest(baseUrl: string, model: string, messages: ChatMessage[], tools: ToolSchema[]): ProviderRequest {
	const body: Record<string, unknown> = {
		model,
		messages: buildMessages(messages),
		stream: true,
	};
	if (tools.length > 0) {
		body.tools = toOllamaTools(tools);
	}
	return { url: `${baseUrl}/ollama/api/chat`, body };
}

/**
 * Decode one NDJSON line.
 *
 * Content yields a text event (possibly empty); `done` with no content
 * and unparseable lines yield an empty text event.
 */
export function decodeOllamaLine(line: string): LlmEvent[] {
	const parsed = tryParseJson(line);
	if (!parsed.ok || !isRecord(parsed.value)) {
		log.debug("Unparseable chunk", { line });
		return [{ type: "text", text: "" }];
	}

	const events: LlmEvent[] = [];
	const message = asRecord(parsed.value.message);
	const content = asString(message?.content);
	if (content !== undefined) {
		events.push({ type: "text", text: content });
	}

	for (const raw of asArray(message?.tool_calls)) {
		const fn = asRecord(asRecord(raw)?.function);
		const name = asString(fn?.name);
		if (!fn || !name) continue;
		const args = fn.arguments;
		events.push({
			type: "tool_call",
			id: asString(asRecord(raw)?.id) ?? `call_${randomUUID()}`,
			name,
			arguments: typeof args === "string" ? args : JSON.stringify(args ?? {}),
		});
	}

	if (events.length === 0) {
		events.push({ type: "text", text: "" });
	}
	return events;
}

async function* decode(body: ReadableStream<Uint8Array>): AsyncGenerator<LlmEvent> {
	for await (const line of readLines(body)) {
		if (!line.trim()) continue;
		yield* decodeOllamaLine(line.trim());
	}
}

const embeddings: EmbeddingAdapter = {
	buildRequest(baseUrl, model, text) {
		return { url: `${baseUrl}/ollama/api/embeddings`, body: { model, prompt: text } };
	},

	parseResponse(json) {
		const embedding = isRecord(json) ? json.embedding : undefined;
		if (!Array.isArray(embedding)) {
			throw new Error(`Invalid response from Ollama embeddings: ${JSON.stringify(json)}`);
		}
		return embedding.filter((n): n is number => typeof n === "number");
	},
};

export const ollamaAdapter: ProviderAdapter = {
	id: "ollama",
	name: "Ollama",
	buildRequest,
	decode,
	embeddings,
};
