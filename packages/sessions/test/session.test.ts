import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { SessionError } from "@ember/core";
import type { Skill } from "@ember/skills";
import { BUILTIN_TOOLS, Session, buildSystemPrompt, parseTranscriptLine } from "@ember/sessions";
import type { SkillSource } from "@ember/sessions";

function skill(name: string, tools: Skill["tools"] = []): Skill {
	return { name, description: `${name} skill`, instructions: `Use ${name}.`, tools, path: `/skills/${name}` };
}

/** Catalog stand-in whose selection is fixed. */
function fixedCatalog(skills: Skill[], selected: string[]): SkillSource & { queries: string[] } {
	const queries: string[] = [];
	return {
		queries,
		get: (name) => skills.find((s) => s.name === name),
		select: async (message) => {
			queries.push(message);
			return skills.filter((s) => selected.includes(s.name));
		},
	};
}

const SETTINGS = { rag_model: "ollama/nomic-embed-text", banned_skills: [] };

describe("Session", () => {
	let root: string;

	beforeEach(() => {
		root = fs.mkdtempSync(path.join(os.tmpdir(), "ember-sessions-"));
	});

	afterEach(() => {
		fs.rmSync(root, { recursive: true, force: true });
	});

	describe("open", () => {
		it("should create the session and memory directories", () => {
			const session = Session.open(root, "alpha", { model: "ollama/llama3.2" });
			expect(session.dir).toBe(path.join(root, "alpha"));
			expect(fs.statSync(path.join(root, "alpha", "memory")).isDirectory()).toBe(true);
			expect(session.getModel()).toBe("ollama/llama3.2");
			expect(session.length).toBe(0);
		});

		it("should reject ids that are not plain names", () => {
			expect(() => Session.open(root, "../escape", { model: "ollama/llama3.2" })).toThrow(SessionError);
			expect(() => Session.open(root, "", { model: "ollama/llama3.2" })).toThrow("Invalid session id: ");
		});

		it("should start with the initial skills active", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2", initialSkills: ["joke-teller"] });
			expect(await session.activeSkills()).toEqual(["joke-teller"]);
		});
	});

	describe("transcript", () => {
		it("should reload the same messages", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2" });
			for (let i = 0; i < 5; i++) {
				await session.appendUserMessage(`question ${i}`, ["a"]);
				await session.appendAssistantMessage(`answer ${i}`, []);
			}
			const before = await session.history(0, 100);

			const reopened = Session.open(root, "s", { model: "ollama/llama3.2" });
			const after = await reopened.history(0, 100);
			expect(after.total).toBe(10);
			expect(after.messages).toEqual(before.messages);
		});

		it("should write one JSON object per line", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2" });
			const written = await session.appendUserMessage("hello", ["joke-teller"]);
			const lines = fs.readFileSync(path.join(root, "s", "history.jsonl"), "utf-8").split("\n");
			expect(lines).toHaveLength(2);
			expect(lines[1]).toBe("");
			expect(JSON.parse(lines[0])).toEqual({
				role: "user",
				content: "hello",
				timestamp: written.timestamp,
				skills: ["joke-teller"],
			});
		});

		it("should log user and assistant activity", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2" });
			await session.appendUserMessage("ping", []);
			await session.appendAssistantMessage("pong", []);
			const lines = fs.readFileSync(path.join(root, "s", "activity.log"), "utf-8").trimEnd().split("\n");
			expect(lines).toHaveLength(2);
			expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] User: ping$/);
			expect(lines[1]).toMatch(/^\[[^\]]+\] Assistant: pong$/);
		});

		it("should skip unreadable lines when loading", () => {
			const dir = path.join(root, "s");
			fs.mkdirSync(dir, { recursive: true });
			fs.writeFileSync(
				path.join(dir, "history.jsonl"),
				[
					JSON.stringify({ role: "user", content: "one", timestamp: "t1", skills: [] }),
					"{ not json",
					JSON.stringify({ role: "robot", content: "bad role" }),
					JSON.stringify({ role: "assistant", content: "two", timestamp: "t2" }),
				].join("\n"),
			);
			const session = Session.open(root, "s", { model: "ollama/llama3.2" });
			expect(session.length).toBe(2);
		});

		it("should page history", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2" });
			for (let i = 0; i < 5; i++) await session.appendUserMessage(`m${i}`, []);
			const page = await session.history(3, 20);
			expect(page.total).toBe(5);
			expect(page.messages.map((m) => m.content)).toEqual(["m3", "m4"]);
			expect((await session.history(10, 5)).messages).toEqual([]);
		});
	});

	describe("skills", () => {
		it("should add a skill once", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2" });
			expect(await session.addSkill("a")).toBe(true);
			expect(await session.addSkill("a")).toBe(false);
			expect(await session.activeSkills()).toEqual(["a"]);
		});

		it("should strip the tag from every message on removal and persist it", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2", initialSkills: ["a", "b"] });
			await session.appendUserMessage("x", ["a", "b"]);
			await session.appendAssistantMessage("y", ["a"]);
			await session.appendUserMessage("z", ["b"]);

			await session.removeSkill("a");
			expect(await session.activeSkills()).toEqual(["b"]);

			const reopened = Session.open(root, "s", { model: "ollama/llama3.2" });
			const { messages } = await reopened.history(0, 10);
			expect(messages.map((m) => m.skills)).toEqual([["b"], [], ["b"]]);
			expect(messages.filter((m) => m.skills.includes("a"))).toHaveLength(0);
			expect(fs.readdirSync(path.join(root, "s")).filter((f) => f.endsWith(".tmp"))).toEqual([]);
		});

		it("should change the model", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2" });
			await session.setModel("xai/grok-2");
			expect(session.getModel()).toBe("xai/grok-2");
		});
	});

	describe("assembleContext", () => {
		it("should fail on an empty transcript", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2" });
			await expect(session.assembleContext(fixedCatalog([], []), SETTINGS)).rejects.toThrow("No history found");
		});

		it("should put active skills first, then selected ones that are not active or banned", async () => {
			const tool = { name: "t_b", description: "tool b", parameters: { type: "object" } };
			const catalog = fixedCatalog([skill("a"), skill("b", [tool]), skill("c"), skill("d")], ["b", "c", "d"]);
			const session = Session.open(root, "s", { model: "ollama/llama3.2", initialSkills: ["b", "missing"] });
			await session.appendUserMessage("first", []);
			await session.appendUserMessage("latest", []);

			const ctx = await session.assembleContext(catalog, { rag_model: "m", banned_skills: ["d"] });

			expect(catalog.queries).toEqual(["latest"]);
			expect(ctx.skills.map((s) => s.name)).toEqual(["b", "c"]);
			expect(ctx.tools.map((t) => t.name)).toEqual(["t_b", "paginate_tool_output", "run_skill_script"]);
			expect(ctx.messages).toEqual([
				{ role: "system", content: buildSystemPrompt(ctx.skills) },
				{ role: "user", content: "first" },
				{ role: "user", content: "latest" },
			]);
		});

		it("should offer only the built-in tools when no skill applies", async () => {
			const session = Session.open(root, "s", { model: "ollama/llama3.2" });
			await session.appendUserMessage("hi", []);
			const ctx = await session.assembleContext(fixedCatalog([], []), SETTINGS);
			expect(ctx.skills).toEqual([]);
			expect(ctx.tools).toEqual([...BUILTIN_TOOLS]);
			expect(ctx.messages[0]).toEqual({
				role: "system",
				content: "You are Ember, a persistent, proactive LLM agent.\n",
			});
		});
	});
});

describe("buildSystemPrompt", () => {
	it("should list each skill's instructions", () => {
		expect(buildSystemPrompt([skill("a"), skill("b")])).toBe(
			"You are Ember, a persistent, proactive LLM agent.\n\n# Enabled Skills:\n## a\nUse a.\n## b\nUse b.\n",
		);
	});
});

describe("parseTranscriptLine", () => {
	it("should default missing skills and timestamp", () => {
		expect(parseTranscriptLine('{"role":"assistant","content":"x"}')).toEqual({
			role: "assistant",
			content: "x",
			timestamp: "",
			skills: [],
		});
	});

	it("should reject non-messages", () => {
		expect(parseTranscriptLine("[]")).toBeUndefined();
		expect(parseTranscriptLine('{"role":"user"}')).toBeUndefined();
	});
});
