import type { SettingsStore } from "@ember/core";
import type { LlmGateway } from "@ember/llm";
import type { SessionManager } from "@ember/sessions";
import type { SkillCatalog } from "@ember/skills";
import type { ToolExecutor } from "./tools/executor.js";

/** Shared daemon services every command handler works against. */
export interface DaemonContext {
	settings: SettingsStore;
	sessions: SessionManager;
	catalog: SkillCatalog;
	gateway: LlmGateway;
	executor: ToolExecutor;
}
