/**
 * Session: one conversation.
 *
 * Owns the in-memory transcript mirrored by `history.jsonl`, the manually
 * active skills and the model id. Each session has its own read/write
 * lock: context assembly and reads share it, mutations hold it alone.
 */

import { RwLock, SessionError, createLogger } from "@ember/core";
import type { Logger } from "@ember/core";
import type { ChatMessage, ToolSchema } from "@ember/llm";
import type { Skill } from "@ember/skills";
import { BUILTIN_TOOLS } from "./builtin-tools.js";
import { buildSystemPrompt } from "./prompt.js";
import { openTranscriptStore } from "./transcript-store.js";
import type { TranscriptStore } from "./transcript-store.js";
import type {
	AssembledContext,
	ContextSettings,
	HistoryPage,
	MessageRole,
	SkillSource,
	TranscriptMessage,
} from "./types.js";

export interface SessionOptions {
	/** Model for a new session, `provider/model`. */
	model: string;
	/** Skills active from the start. */
	initialSkills?: readonly string[];
}

export class Session {
	readonly id: string;
	private readonly store: TranscriptStore;
	private readonly messages: TranscriptMessage[];
	private readonly active: string[];
	private model: string;
	private readonly lock = new RwLock();
	private readonly log: Logger;

	private constructor(id: string, store: TranscriptStore, messages: TranscriptMessage[], options: SessionOptions) {
		this.id = id;
		this.store = store;
		this.messages = messages;
		this.active = [...(options.initialSkills ?? [])];
		this.model = options.model;
		this.log = createLogger("sessions:session").withContext({ sessionId: id });
	}

	/**
	 * Open `<root>/<id>`, creating its directories and loading any
	 * existing transcript.
	 *
	 * @throws {SessionError} On an invalid id or I/O failure.
	 */
	static open(root: string, id: string, options: SessionOptions): Session {
		const store = openTranscriptStore(root, id);
		const messages = store.load();
		const session = new Session(id, store, messages, options);
		session.log.info("Session initialized", {
			historyLength: messages.length,
			activeSkills: session.active.length,
			model: options.model,
		});
		return session;
	}

	/** Session directory. */
	get dir(): string {
		return this.store.dir;
	}

	get memoryDir(): string {
		return this.store.memoryDir;
	}

	// ─── Writes ─────────────────────────────────────────────────────────────

	async appendUserMessage(text: string, tags: readonly string[]): Promise<TranscriptMessage> {
		return this.lock.write(() => {
			this.store.logActivity(`User: ${text}`);
			return this.append("user", text, tags);
		});
	}

	async appendAssistantMessage(text: string, tags: readonly string[]): Promise<TranscriptMessage> {
		return this.lock.write(() => {
			const message = this.append("assistant", text, tags);
			this.store.logActivity(`Assistant: ${text}`);
			return message;
		});
	}

	private append(role: MessageRole, content: string, tags: readonly string[]): TranscriptMessage {
		const message: TranscriptMessage = {
			role,
			content,
			timestamp: new Date().toISOString(),
			skills: [...tags],
		};
		this.store.append(message);
		this.messages.push(message);
		return message;
	}

	/** Activate a skill. Returns false if it was already active. */
	async addSkill(name: string): Promise<boolean> {
		return this.lock.write(() => {
			if (this.active.includes(name)) return false;
			this.active.push(name);
			return true;
		});
	}

	/**
	 * Deactivate a skill and strip its tag from every message, rewriting
	 * the transcript.
	 */
	async removeSkill(name: string): Promise<void> {
		await this.lock.write(() => {
			const index = this.active.indexOf(name);
			if (index >= 0) this.active.splice(index, 1);
			for (const message of this.messages) {
				message.skills = message.skills.filter((s) => s !== name);
			}
			this.store.rewrite(this.messages);
			this.log.debug("Removed skill", { skill: name });
		});
	}

	async setModel(model: string): Promise<void> {
		await this.lock.write(() => {
			this.model = model;
		});
	}

	// ─── Reads ──────────────────────────────────────────────────────────────

	getModel(): string {
		return this.model;
	}

	/** Active skill names in activation order. */
	async activeSkills(): Promise<string[]> {
		return this.lock.read(() => [...this.active]);
	}

	/** A slice of the transcript and its total length. */
	async history(offset = 0, limit = 20): Promise<HistoryPage> {
		return this.lock.read(() => {
			const start = Math.max(0, offset);
			const end = Math.max(start, start + Math.max(0, limit));
			return {
				messages: this.messages.slice(start, end).map((m) => ({ ...m, skills: [...m.skills] })),
				total: this.messages.length,
			};
		});
	}

	get length(): number {
		return this.messages.length;
	}

	/**
	 * Build the messages, skills and tools for the next model turn.
	 *
	 * @throws {SessionError} When the transcript is empty.
	 */
	async assembleContext(catalog: SkillSource, settings: ContextSettings): Promise<AssembledContext> {
		return this.lock.read(async () => {
			const last = this.messages.at(-1);
			if (!last) {
				throw new SessionError("No history found");
			}

			const skills: Skill[] = [];
			for (const name of this.active) {
				const skill = catalog.get(name);
				if (skill) skills.push(skill);
			}

			const dynamic = await catalog.select(last.content, settings.rag_model);
			for (const skill of dynamic) {
				if (this.active.includes(skill.name) || settings.banned_skills.includes(skill.name)) continue;
				if (skills.some((s) => s.name === skill.name)) continue;
				skills.push(skill);
			}

			const tools: ToolSchema[] = [];
			for (const skill of skills) {
				for (const tool of skill.tools) {
					tools.push({ name: tool.name, description: tool.description, parameters: tool.parameters });
				}
			}
			tools.push(...BUILTIN_TOOLS);

			if (skills.length > 0) {
				this.log.info("Activating skills", { skills: skills.map((s) => s.name) });
			} else {
				this.log.debug("No relevant skills found for message");
			}

			const messages: ChatMessage[] = [{ role: "system", content: buildSystemPrompt(skills) }];
			for (const message of this.messages) {
				messages.push({ role: message.role, content: message.content });
			}
			return { messages, skills, tools };
		});
	}
}
