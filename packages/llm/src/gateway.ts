/**
 * LlmGateway: one streaming chat call and one embedding call, routed by
 * `provider/model` id through the provider registry.
 *
 * Stateless per call. Model ids are validated before anything touches
 * the network.
 */

import { ProviderError, StreamError, createLogger, errorMessage, toError } from "@ember/core";
import { parseModelId } from "./model-id.js";
import { createDefaultRegistry } from "./provider-registry.js";
import type { ProviderRegistry } from "./provider-registry.js";
import type { ChatMessage, LlmEvent, ProviderAdapter, ToolSchema } from "./types.js";

const log = createLogger("llm:gateway");

export interface LlmGatewayOptions {
	/** Proxy base URL, or a getter so settings changes apply to the next call. */
	baseUrl: string | (() => string);
	/** Defaults to ollama, xai and gemini. */
	registry?: ProviderRegistry;
	/** Defaults to the global `fetch`. */
	fetch?: typeof fetch;
}

export interface LlmGateway {
	/** Embed `text` with `modelId` (ollama only). */
	embed(modelId: string, text: string): Promise<number[]>;
	/**
	 * Start a streaming chat turn.
	 *
	 * Resolves once the upstream answered OK; iteration yields decoded
	 * events and throws if the transport fails mid-stream.
	 */
	streamChat(modelId: string, messages: ChatMessage[], tools: ToolSchema[]): Promise<AsyncIterable<LlmEvent>>;
}

export function createLlmGateway(options: LlmGatewayOptions): LlmGateway {
	const registry = options.registry ?? createDefaultRegistry();
	const doFetch = options.fetch ?? fetch;
	const baseUrl = (): string => {
		const raw = typeof options.baseUrl === "function" ? options.baseUrl() : options.baseUrl;
		return raw.replace(/\/+$/, "");
	};

	function resolve(modelId: string): { adapter: ProviderAdapter; model: string } {
		const { provider, model } = parseModelId(modelId);
		const adapter = registry.get(provider);
		if (!adapter) {
			throw new ProviderError(`Unknown provider: ${provider}`, provider);
		}
		return { adapter, model };
	}

	async function post(url: string, body: Record<string, unknown>, provider: string): Promise<Response> {
		try {
			return await doFetch(url, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify(body),
			});
		} catch (err) {
			throw new ProviderError(`Failed to connect to ${url}: ${errorMessage(err)}`, provider, undefined, toError(err));
		}
	}

	return {
		async embed(modelId, text) {
			const { adapter, model } = resolve(modelId);
			if (!adapter.embeddings) {
				throw new ProviderError(`Embeddings not implemented for provider: ${adapter.id}`, adapter.id);
			}

			const request = adapter.embeddings.buildRequest(baseUrl(), model, text);
			const response = await post(request.url, request.body, adapter.id);
			if (!response.ok) {
				const detail = await response.text();
				throw new ProviderError(
					`Embeddings request failed: ${request.url} - ${detail}`,
					adapter.id,
					response.status,
				);
			}
			const json: unknown = await response.json();
			return adapter.embeddings.parseResponse(json);
		},

		async streamChat(modelId, messages, tools) {
			const { adapter, model } = resolve(modelId);
			const request = adapter.buildRequest(baseUrl(), model, messages, tools);
			log.debug("Streaming chat", { provider: adapter.id, model, messages: messages.length, tools: tools.length });

			const response = await post(request.url, request.body, adapter.id);
			if (!response.ok) {
				const detail = await response.text();
				throw new ProviderError(`LLM request failed: ${request.url} - ${detail}`, adapter.id, response.status);
			}
			if (!response.body) {
				throw new StreamError(`Empty response body from ${request.url}`);
			}
			return adapter.decode(response.body);
		},
	};
}
