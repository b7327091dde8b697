import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { MemoryEmbeddingCache, SqliteEmbeddingCache, contentHash } from "@ember/skills";
import type { EmbeddingCache } from "@ember/skills";

describe.each([
	["memory", () => new MemoryEmbeddingCache()],
	["sqlite", () => new SqliteEmbeddingCache(":memory:")],
] as const)("%s embedding cache", (_name, create) => {
	let cache: EmbeddingCache;

	beforeEach(() => {
		cache = create();
	});

	afterEach(() => {
		cache.close();
	});

	it("should key entries by model and name", () => {
		cache.set("ollama/a", "skill", { hash: "h1", vector: [0.25, -1.5] });
		expect(cache.get("ollama/a", "skill")).toEqual({ hash: "h1", vector: [0.25, -1.5] });
		expect(cache.get("ollama/b", "skill")).toBeUndefined();
		expect(cache.get("ollama/a", "other")).toBeUndefined();
	});

	it("should replace an existing entry", () => {
		cache.set("m", "s", { hash: "old", vector: [1] });
		cache.set("m", "s", { hash: "new", vector: [2, 3] });
		expect(cache.get("m", "s")).toEqual({ hash: "new", vector: [2, 3] });
		expect(cache.size()).toBe(1);
	});

	it("should clear all entries", () => {
		cache.set("m", "a", { hash: "h", vector: [1] });
		cache.set("m", "b", { hash: "h", vector: [1] });
		cache.clear();
		expect(cache.size()).toBe(0);
	});
});

describe("SqliteEmbeddingCache", () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "ember-embeddings-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("should keep vectors across reopen", () => {
		const dbPath = path.join(dir, "nested", "embeddings.db");
		const first = new SqliteEmbeddingCache(dbPath);
		first.set("ollama/nomic-embed-text", "joke-teller", { hash: contentHash("x"), vector: [0.1, 0.2, 0.3] });
		first.close();

		const second = new SqliteEmbeddingCache(dbPath);
		expect(second.get("ollama/nomic-embed-text", "joke-teller")).toEqual({
			hash: contentHash("x"),
			vector: [0.1, 0.2, 0.3],
		});
		second.close();
	});

	it("should tolerate a second close", () => {
		const cache = new SqliteEmbeddingCache(":memory:");
		cache.close();
		expect(() => cache.close()).not.toThrow();
	});
});

describe("contentHash", () => {
	it("should be stable and content-sensitive", () => {
		expect(contentHash("a: b")).toBe(contentHash("a: b"));
		expect(contentHash("a: b")).not.toBe(contentHash("a: c"));
		expect(contentHash("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
	});
});
