import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError, createSettingsStore } from "@ember/core";
import type { LlmEvent, LlmGateway } from "@ember/llm";
import { SessionManager } from "@ember/sessions";
import { createSkillCatalog } from "@ember/skills";
import type { Skill } from "@ember/skills";
import { createToolExecutor, createToolRunStore, dispatchCommand, parseCommandLine } from "@ember/daemon";
import type { DaemonContext, Reply } from "@ember/daemon";

const JOKES: Skill = {
	name: "joke-teller",
	description: "Tells funny programming jokes.",
	instructions: "Tell a short joke.",
	tools: [],
	path: "/skills/joke-teller",
};

async function noEmbeddings(): Promise<number[]> {
	throw new Error("no embeddings here");
}

function answering(...chunks: string[]): LlmGateway {
	return {
		embed: noEmbeddings,
		async streamChat() {
			const events: LlmEvent[] = chunks.map((text) => ({ type: "text", text }));
			return (async function* () {
				yield* events;
			})();
		},
	};
}

describe("command handlers", () => {
	let home: string;
	let ctx: DaemonContext;

	async function send(line: string): Promise<Reply[]> {
		const replies: Reply[] = [];
		await dispatchCommand(parseCommandLine(line), ctx, (r) => replies.push(r));
		return replies;
	}

	function command(cmd: string, args: Record<string, unknown>): string {
		return JSON.stringify({ command: cmd, arguments: args });
	}

	beforeEach(() => {
		home = fs.mkdtempSync(path.join(os.tmpdir(), "ember-handlers-"));
		const settings = createSettingsStore({}, path.join(home, "config", "settings.json"));
		const catalog = createSkillCatalog([JOKES], { embed: noEmbeddings });
		ctx = {
			settings,
			catalog,
			sessions: new SessionManager({
				root: path.join(home, "sessions"),
				defaultModel: () => settings.current().default_model,
			}),
			gateway: answering("Why ", "not?"),
			executor: createToolExecutor({
				catalog,
				store: createToolRunStore(() => path.join(home, "tool-runs")),
				limits: () => ({ maxLines: 50, maxStderrLines: 10, timeoutSecs: 5 }),
			}),
		};
	});

	afterEach(() => {
		ctx.sessions.close();
		fs.rmSync(home, { recursive: true, force: true });
	});

	function savedSettings(): Record<string, unknown> {
		const parsed: unknown = JSON.parse(fs.readFileSync(path.join(home, "config", "settings.json"), "utf-8"));
		return typeof parsed === "object" && parsed !== null ? { ...parsed } : {};
	}

	describe("session", () => {
		it("should create a session with the default or a given model", async () => {
			expect(await send(command("session", { action: "create", session_id: "a" }))).toEqual([
				{ event: "created", session_id: "a", model: "ollama/llama3.2" },
			]);
			expect(await send(command("session", { action: "create", session_id: "a", model: "xai/grok-2" }))).toEqual([
				{ event: "created", session_id: "a", model: "xai/grok-2" },
			]);
		});

		it("should reject a malformed model", async () => {
			await expect(send(command("session", { action: "create", session_id: "a", model: "grok" }))).rejects.toThrow(
				"Invalid model format. Expected 'provider/model'",
			);
		});

		it("should stream a reply and record both messages", async () => {
			const replies = await send(command("session", { action: "send", session_id: "a", message: "hello" }));
			expect(replies).toEqual([
				{ event: "response", session_id: "a", delta: "Thinking...", done: false },
				{ event: "response", session_id: "a", delta: "Why ", done: false },
				{ event: "response", session_id: "a", delta: "not?", done: false },
				{ event: "response", session_id: "a", delta: "", done: true },
			]);

			const [history] = await send(command("session", { action: "history", session_id: "a" }));
			expect(history).toMatchObject({ event: "history", session_id: "a", total: 2, offset: 0, limit: 20 });
			const session = await ctx.sessions.getOrCreate("a");
			const page = await session.history(0, 10);
			expect(page.messages.map((m) => [m.role, m.content])).toEqual([
				["user", "hello"],
				["assistant", "Why not?"],
			]);
		});

		it("should announce skills picked for the message", async () => {
			const replies = await send('{"action":"send","session_id":"a","message":"ask the joke-teller"}');
			expect(replies[0]).toEqual({
				event: "skill_used",
				session_id: "a",
				skill: "joke-teller",
				result: "Skill instructions injected.",
			});
			expect(replies[1]).toEqual({ event: "response", session_id: "a", delta: "Thinking...", done: false });
		});

		it("should page history", async () => {
			const session = await ctx.sessions.getOrCreate("a");
			for (let i = 0; i < 3; i++) await session.appendUserMessage(`m${i}`, []);
			const [reply] = await send(command("session", { action: "history", session_id: "a", offset: 1, limit: 1 }));
			expect(reply).toMatchObject({ total: 3, offset: 1, limit: 1 });
			expect(reply.history).toEqual([expect.objectContaining({ role: "user", content: "m1" })]);
		});

		it("should list and delete sessions", async () => {
			await send(command("session", { action: "create", session_id: "a" }));
			expect(await send(command("session", { action: "list" }))).toEqual([{ event: "list", sessions: ["a"] }]);
			expect(await send(command("session", { action: "delete", session_id: "a" }))).toEqual([
				{ event: "deleted", session_id: "a" },
			]);
			expect(await send(command("session", { action: "list" }))).toEqual([{ event: "list", sessions: [] }]);
		});

		it("should reject unknown actions and missing arguments", async () => {
			await expect(send(command("session", { action: "fly" }))).rejects.toThrow("Unknown action: fly");
			await expect(send(command("session", { action: "send", session_id: "a" }))).rejects.toThrow("Missing message");
		});
	});

	describe("config", () => {
		it("should set, persist and read back a value", async () => {
			expect(await send(command("config", { action: "set", key: "tool_timeout_secs", value: 30 }))).toEqual([
				{ event: "config_updated", key: "tool_timeout_secs", value: 30 },
			]);
			expect(await send(command("config", { action: "get", key: "tool_timeout_secs" }))).toEqual([
				{ event: "config_value", key: "tool_timeout_secs", value: 30 },
			]);
			expect(savedSettings().tool_timeout_secs).toBe(30);
		});

		it("should reject invalid values and unknown keys", async () => {
			await expect(send(command("config", { action: "set", key: "tool_timeout_secs", value: 0 }))).rejects.toThrow(
				ConfigError,
			);
			await expect(send(command("config", { action: "get", key: "colour" }))).rejects.toThrow(
				"Unknown config key: colour",
			);
			await expect(send(command("config", { action: "set", key: "log_level" }))).rejects.toThrow("Missing value");
		});

		it("should list every option", async () => {
			const [reply] = await send(command("config", { action: "list" }));
			expect(reply.event).toBe("config_list");
			expect(reply.options).toEqual(ctx.settings.all());
		});

		it("should reject unknown actions", async () => {
			await expect(send(command("config", { action: "reset" }))).rejects.toThrow("Unknown config action: reset");
		});
	});

	describe("skill", () => {
		it("should add, list and remove active skills", async () => {
			expect(await send(command("skill", { action: "add", session_id: "a", skill: "joke-teller" }))).toEqual([
				{ event: "skill_added", session_id: "a", skill: "joke-teller" },
			]);
			expect(await send(command("skill", { action: "list", session_id: "a" }))).toEqual([
				{ event: "skill_list", session_id: "a", active_skills: ["joke-teller"] },
			]);
			expect(await send('{"action":"skill_remove","session_id":"a","skill":"joke-teller"}')).toEqual([
				{ event: "skill_removed", session_id: "a", skill: "joke-teller" },
			]);
			expect(await send(command("skill", { action: "list", session_id: "a" }))).toEqual([
				{ event: "skill_list", session_id: "a", active_skills: [] },
			]);
		});

		it("should search the catalog", async () => {
			expect(await send(command("skill", { action: "search", session_id: "a", query: "the joke-teller please" }))).toEqual([
				{
					event: "skill_search_results",
					session_id: "a",
					results: [{ name: "joke-teller", description: "Tells funny programming jokes." }],
				},
			]);
		});

		it("should ban once and unban, persisting both", async () => {
			await send(command("skill", { action: "ban", session_id: "a", skill: "joke-teller" }));
			expect(await send(command("skill", { action: "ban", session_id: "a", skill: "joke-teller" }))).toEqual([
				{ event: "skill_banned", session_id: "a", skill: "joke-teller" },
			]);
			expect(savedSettings().banned_skills).toEqual(["joke-teller"]);

			expect(await send(command("skill", { action: "unban", session_id: "a", skill: "joke-teller" }))).toEqual([
				{ event: "skill_unbanned", session_id: "a", skill: "joke-teller" },
			]);
			expect(savedSettings().banned_skills).toEqual([]);
		});

		it("should require a session and a skill name", async () => {
			await expect(send(command("skill", { action: "list" }))).rejects.toThrow("Missing session_id");
			await expect(send(command("skill", { action: "add", session_id: "a" }))).rejects.toThrow("Missing skill name");
			await expect(send(command("skill", { action: "juggle", session_id: "a" }))).rejects.toThrow(
				"Unknown skill action: juggle",
			);
		});
	});
});
