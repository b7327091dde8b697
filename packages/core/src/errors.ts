/**
 * Typed error hierarchy for Ember.
 *
 * All Ember errors extend {@link EmberError} with a machine-readable
 * `code` string so the protocol layer can report failures uniformly.
 */

/**
 * Base error class for all Ember errors.
 *
 * Carries a machine-readable `code` field (e.g. `"PROVIDER_ERROR"`) in
 * addition to the human-readable `message`.
 */
export class EmberError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "EmberError";
		this.code = code;
	}
}

/**
 * Error from an LLM provider (ollama, xai, gemini).
 *
 * Includes the `provider` name and optional HTTP `statusCode`.
 */
export class ProviderError extends EmberError {
	readonly provider: string;
	readonly statusCode?: number;

	constructor(message: string, provider: string, statusCode?: number, cause?: Error) {
		super(message, "PROVIDER_ERROR", cause);
		this.name = "ProviderError";
		this.provider = provider;
		this.statusCode = statusCode;
	}
}

/**
 * Configuration error (unreadable settings file, unknown key, invalid value).
 */
export class ConfigError extends EmberError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

/**
 * Error during tool execution. Tool failures are normally turned into
 * textual results; this is raised only where a caller asks for it.
 */
export class ToolError extends EmberError {
	readonly toolName: string;

	constructor(message: string, toolName: string, cause?: Error) {
		super(message, "TOOL_ERROR", cause);
		this.name = "ToolError";
		this.toolName = toolName;
	}
}

/**
 * Error related to session operations (storage failure, empty transcript).
 */
export class SessionError extends EmberError {
	constructor(message: string, cause?: Error) {
		super(message, "SESSION_ERROR", cause);
		this.name = "SessionError";
	}
}

/**
 * Error during streaming (connection drop, body missing).
 */
export class StreamError extends EmberError {
	constructor(message: string, cause?: Error) {
		super(message, "STREAM_ERROR", cause);
		this.name = "StreamError";
	}
}

/**
 * Malformed client input on the socket protocol.
 */
export class ProtocolError extends EmberError {
	constructor(message: string) {
		super(message, "PROTOCOL_ERROR");
		this.name = "ProtocolError";
	}
}

/**
 * Error loading or resolving a skill.
 */
export class SkillError extends EmberError {
	readonly skillName: string;

	constructor(message: string, skillName: string, cause?: Error) {
		super(message, "SKILL_ERROR", cause);
		this.name = "SkillError";
		this.skillName = skillName;
	}
}

/** Normalize an unknown thrown value to an Error. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

/** Human-readable message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
