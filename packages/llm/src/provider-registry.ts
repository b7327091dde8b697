/**
 * Provider registry: stores and retrieves ProviderAdapters by ID.
 */

import { geminiAdapter, ollamaAdapter, xaiAdapter } from "./providers/index.js";
import type { ProviderAdapter } from "./types.js";

export interface ProviderRegistry {
	/** Register an adapter. Overwrites any existing adapter with the same ID. */
	register(provider: ProviderAdapter): void;
	/** Returns `undefined` if not found. */
	get(id: string): ProviderAdapter | undefined;
}

/**
 * Create an empty provider registry.
 *
 * @example
 * ```ts
 * const registry = createProviderRegistry();
 * registry.register(ollamaAdapter);
 * registry.get("ollama")?.buildRequest(base, "llama3.2", messages, []);
 * ```
 */
export function createProviderRegistry(): ProviderRegistry {
	const providers = new Map<string, ProviderAdapter>();

	return {
		register(provider: ProviderAdapter): void {
			providers.set(provider.id, provider);
		},

		get(id: string): ProviderAdapter | undefined {
			return providers.get(id);
		},
	};
}

/** A registry holding ollama, xai and gemini. */
export function createDefaultRegistry(): ProviderRegistry {
	const registry = createProviderRegistry();
	registry.register(ollamaAdapter);
	registry.register(xaiAdapter);
	registry.register(geminiAdapter);
	return registry;
}
