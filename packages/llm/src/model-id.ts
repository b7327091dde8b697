import { ProviderError } from "@ember/core";
import type { ModelId } from "./types.js";

/**
 * Split `provider/model` on the first slash.
 *
 * The model part may itself contain slashes (`ollama/library/llama3`).
 *
 * @throws {ProviderError} When there is no slash.
 */
export function parseModelId(id: string): ModelId {
	const slash = id.indexOf("/");
	if (slash < 0) {
		throw new ProviderError("Invalid model format. Expected 'provider/model'", "unknown");
	}
	return { provider: id.slice(0, slash), model: id.slice(slash + 1) };
}
