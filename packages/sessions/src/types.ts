import type { ChatMessage, ToolSchema } from "@ember/llm";
import type { Skill } from "@ember/skills";

export type MessageRole = "user" | "assistant";

/** One `history.jsonl` line. */
export interface TranscriptMessage {
	role: MessageRole;
	content: string;
	/** ISO-8601. */
	timestamp: string;
	/** Skills active when the message was written. */
	skills: string[];
}

/** Everything one model turn needs. */
export interface AssembledContext {
	/** System prompt followed by the transcript. */
	messages: ChatMessage[];
	/** Manually active skills first, then selected ones. */
	skills: Skill[];
	/** Skill tools followed by the built-ins. */
	tools: ToolSchema[];
}

/** The settings context assembly reads. */
export interface ContextSettings {
	rag_model: string;
	banned_skills: readonly string[];
}

/** Catalog lookups a session needs. */
export interface SkillSource {
	get(name: string): Skill | undefined;
	select(message: string, embeddingModel: string): Promise<Skill[]>;
}

export interface HistoryPage {
	messages: TranscriptMessage[];
	total: number;
}
