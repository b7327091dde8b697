/**
 * Google Gemini adapter.
 *
 * `streamGenerateContent` answers with one JSON array whose elements
 * arrive over time; each element is decoded as it closes.
 */

import { randomUUID } from "node:crypto";
import { createLogger, isRecord } from "@ember/core";
import { readJsonArrayItems } from "../framing.js";
import { asArray, asRecord, asString, parseArguments, tryParseJson } from "../json.js";
import type { ChatMessage, LlmEvent, ProviderAdapter, ProviderRequest, ToolSchema } from "../types.js";

const log = createLogger("llm:gemini");

// ─── Request ────────────────────────────────────────────────────────────────

type GeminiPart =
	| { text: string }
	| { functionCall: { name: string; args: Record<string, unknown> } }
	| { functionResponse: { name: string; response: { content: string } } };

interface GeminiContent {
	role: "user" | "model";
	parts: GeminiPart[];
}

function toContent(msg: ChatMessage): GeminiContent {
	const role = msg.role === "assistant" ? "model" : "user";

	if (msg.role === "tool") {
		return {
			role,
			parts: [{ functionResponse: { name: msg.name ?? "", response: { content: msg.content } } }],
		};
	}

	const parts: GeminiPart[] = [];
	if (msg.content || !msg.toolCalls?.length) {
		parts.push({ text: msg.content });
	}
	for (const tc of msg.toolCalls ?? []) {
		parts.push({ functionCall: { name: tc.name, args: parseArguments(tc.arguments) } });
	}
	return { role, parts };
}

function buildRequest(baseUrl: string, model: string, messages: ChatMessage[], tools: ToolSchema[]): ProviderRequest {
	const body: Record<string, unknown> = { contents: messages.map(toContent) };
	if (tools.length > 0) {
		body.tools = [
			{
				functionDeclarations: tools.map((t) => ({
					name: t.name,
					description: t.description,
					parameters: t.parameters,
				})),
			},
		];
	}
	return { url: `${baseUrl}/gemini/v1beta/models/${model}:streamGenerateContent`, body };
}

// ─── Stream ─────────────────────────────────────────────────────────────────

/** Decode one array element into events. */
export function decodeGeminiItem(item: string): LlmEvent[] {
	const parsed = tryParseJson(item);
	if (!parsed.ok || !isRecord(parsed.value)) {
		log.debug("Unparseable chunk", { item });
		return [{ type: "text", text: "" }];
	}

	const events: LlmEvent[] = [];
	for (const candidate of asArray(parsed.value.candidates)) {
		const content = asRecord(asRecord(candidate)?.content);
		for (const rawPart of asArray(content?.parts)) {
			const part = asRecord(rawPart);
			if (!part) continue;

			const text = asString(part.text);
			if (text !== undefined) {
				events.push({ type: "text", text });
			}

			const call = asRecord(part.functionCall);
			const name = asString(call?.name);
			if (call && name) {
				events.push({
					type: "tool_call",
					id: `call_${randomUUID()}`,
					name,
					arguments: JSON.stringify(call.args ?? {}),
				});
			}
		}
	}
	return events;
}

async function* decode(body: ReadableStream<Uint8Array>): AsyncGenerator<LlmEvent> {
	for await (const item of readJsonArrayItems(body)) {
		yield* decodeGeminiItem(item);
	}
}

export const geminiAdapter: ProviderAdapter = {
	id: "gemini",
	name: "Google Gemini",
	buildRequest,
	decode,
};
