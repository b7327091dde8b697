// @ember/sessions: transcripts, sessions and the registry
export type {
	MessageRole,
	TranscriptMessage,
	AssembledContext,
	ContextSettings,
	SkillSource,
	HistoryPage,
} from "./types.js";
export { Session } from "./session.js";
export type { SessionOptions } from "./session.js";
export { SessionManager } from "./session-manager.js";
export type { SessionManagerOptions, BroadcastEvent } from "./session-manager.js";
export { openTranscriptStore, parseTranscriptLine, isValidSessionId } from "./transcript-store.js";
export type { TranscriptStore } from "./transcript-store.js";
export { BUILTIN_TOOLS, PAGINATE_TOOL_NAME, RUN_SKILL_SCRIPT_TOOL_NAME } from "./builtin-tools.js";
export { buildSystemPrompt, SYSTEM_PROMPT_PREAMBLE } from "./prompt.js";
