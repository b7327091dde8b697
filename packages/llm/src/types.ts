/**
 * @ember/llm: uniform message, tool and stream types.
 *
 * Every provider adapter translates these into its own wire format and
 * decodes its own stream back into {@link LlmEvent}s.
 */

// ─── Messages ───────────────────────────────────────────────────────────────

export type ChatRole = "system" | "user" | "assistant" | "tool";

/** One model-issued tool invocation. `arguments` is JSON text. */
export interface ToolCall {
	id: string;
	name: string;
	arguments: string;
}

/** A single context entry sent to the model. */
export interface ChatMessage {
	role: ChatRole;
	content: string;
	/** Tool calls recorded on an assistant entry. */
	toolCalls?: ToolCall[];
	/** Id of the call a tool entry answers. */
	toolCallId?: string;
	/** Tool name on a tool entry. */
	name?: string;
}

/** A tool the model may call, described by a JSON Schema. */
export interface ToolSchema {
	name: string;
	description: string;
	parameters: Record<string, unknown>;
}

// ─── Streaming ──────────────────────────────────────────────────────────────

/** A normalized unit of a streamed model turn. */
export type LlmEvent =
	| { type: "text"; text: string }
	| { type: "tool_call"; id: string; name: string; arguments: string };

// ─── Providers ──────────────────────────────────────────────────────────────

/** `provider/model` split into its parts. */
export interface ModelId {
	provider: string;
	model: string;
}

/** A provider-specific HTTP request. */
export interface ProviderRequest {
	url: string;
	body: Record<string, unknown>;
}

export interface EmbeddingAdapter {
	buildRequest(baseUrl: string, model: string, text: string): ProviderRequest;
	/** Extract the vector from the decoded JSON response. */
	parseResponse(json: unknown): number[];
}

/**
 * One provider variant.
 *
 * Adding a provider means writing one of these and registering it.
 */
export interface ProviderAdapter {
	id: string;
	name: string;
	buildRequest(baseUrl: string, model: string, messages: ChatMessage[], tools: ToolSchema[]): ProviderRequest;
	/** Decode a streaming response body into events. */
	decode(body: ReadableStream<Uint8Array>): AsyncIterable<LlmEvent>;
	/** Present only on providers with an embedding endpoint. */
	embeddings?: EmbeddingAdapter;
}
