// @ember/llm: provider gateway
export type {
	ChatRole,
	ChatMessage,
	ToolCall,
	ToolSchema,
	LlmEvent,
	ModelId,
	ProviderRequest,
	ProviderAdapter,
	EmbeddingAdapter,
} from "./types.js";

export { createLlmGateway } from "./gateway.js";
export type { LlmGateway, LlmGatewayOptions } from "./gateway.js";
export { createProviderRegistry, createDefaultRegistry } from "./provider-registry.js";
export type { ProviderRegistry } from "./provider-registry.js";
export { parseModelId } from "./model-id.js";
export { readLines, readSseData, readJsonArrayItems } from "./framing.js";
export { parseArguments } from "./json.js";
export * from "./providers/index.js";
