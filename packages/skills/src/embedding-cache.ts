/**
 * Embedding cache keyed by (embedding model, skill name).
 *
 * Each entry stores the vector and a hash of the text it was computed
 * from, so the `rehash` policy can spot stale entries.
 *
 * Two backends:
 *   - {@link MemoryEmbeddingCache}: a Map, lost on exit.
 *   - {@link SqliteEmbeddingCache}: better-sqlite3 table
 *     `skill_embeddings(model, name, hash, vector BLOB)`.
 */

import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { createLogger } from "@ember/core";

const log = createLogger("skills:embedding-cache");

export interface CachedEmbedding {
	/** Hash of the embedded text. */
	hash: string;
	vector: number[];
}

export interface EmbeddingCache {
	get(model: string, name: string): CachedEmbedding | undefined;
	set(model: string, name: string, entry: CachedEmbedding): void;
	/** Number of cached entries. */
	size(): number;
	clear(): void;
	close(): void;
}

/** Hash of the text a skill is embedded from. */
export function contentHash(text: string): string {
	return createHash("sha256").update(text).digest("hex");
}

// ─── Memory ─────────────────────────────────────────────────────────────────

export class MemoryEmbeddingCache implements EmbeddingCache {
	private readonly entries = new Map<string, CachedEmbedding>();

	private key(model: string, name: string): string {
		return `${model}\u0000${name}`;
	}

	get(model: string, name: string): CachedEmbedding | undefined {
		return this.entries.get(this.key(model, name));
	}

	set(model: string, name: string, entry: CachedEmbedding): void {
		this.entries.set(this.key(model, name), { hash: entry.hash, vector: [...entry.vector] });
	}

	size(): number {
		return this.entries.size;
	}

	clear(): void {
		this.entries.clear();
	}

	close(): void {
		this.entries.clear();
	}
}

// ─── SQLite ─────────────────────────────────────────────────────────────────

/** Pragmas applied on open. */
const PRAGMAS: Record<string, string | number> = {
	journal_mode: "WAL",
	synchronous: "NORMAL",
	busy_timeout: 5000,
};

const SCHEMA = `
CREATE TABLE IF NOT EXISTS skill_embeddings (
	model  TEXT NOT NULL,
	name   TEXT NOT NULL,
	hash   TEXT NOT NULL,
	vector BLOB NOT NULL,
	PRIMARY KEY (model, name)
)`;

/** Vectors are stored as little-endian float64. */
function encodeVector(vector: number[]): Buffer {
	return Buffer.from(new Float64Array(vector).buffer);
}

function decodeVector(blob: Buffer): number[] {
	// Copy first: the Buffer may sit at an offset that is not 8-byte aligned.
	const bytes = new Uint8Array(blob);
	return Array.from(new Float64Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 8)));
}

function isRow(row: unknown): row is { hash: string; vector: Buffer } {
	if (typeof row !== "object" || row === null) return false;
	return "hash" in row && typeof row.hash === "string" && "vector" in row && Buffer.isBuffer(row.vector);
}

export class SqliteEmbeddingCache implements EmbeddingCache {
	private readonly db: BetterSqlite3.Database;
	private readonly selectStmt: BetterSqlite3.Statement;
	private readonly upsertStmt: BetterSqlite3.Statement;
	private readonly countStmt: BetterSqlite3.Statement;
	private closed = false;

	/** @param dbPath - Database file; its directory is created. Use ":memory:" in tests. */
	constructor(readonly dbPath: string) {
		if (dbPath !== ":memory:") {
			fs.mkdirSync(path.dirname(dbPath), { recursive: true });
		}
		this.db = new Database(dbPath);
		for (const [key, value] of Object.entries(PRAGMAS)) {
			this.db.pragma(`${key} = ${value}`);
		}
		this.db.exec(SCHEMA);

		this.selectStmt = this.db.prepare("SELECT hash, vector FROM skill_embeddings WHERE model = ? AND name = ?");
		this.upsertStmt = this.db.prepare(
			`INSERT INTO skill_embeddings (model, name, hash, vector) VALUES (?, ?, ?, ?)
			 ON CONFLICT (model, name) DO UPDATE SET hash = excluded.hash, vector = excluded.vector`,
		);
		this.countStmt = this.db.prepare("SELECT COUNT(*) AS n FROM skill_embeddings");
		log.debug("Opened embedding cache", { path: dbPath });
	}

	get(model: string, name: string): CachedEmbedding | undefined {
		const row: unknown = this.selectStmt.get(model, name);
		if (!isRow(row)) return undefined;
		return { hash: row.hash, vector: decodeVector(row.vector) };
	}

	set(model: string, name: string, entry: CachedEmbedding): void {
		this.upsertStmt.run(model, name, entry.hash, encodeVector(entry.vector));
	}

	size(): number {
		const row: unknown = this.countStmt.get();
		if (typeof row === "object" && row !== null && "n" in row && typeof row.n === "number") {
			return row.n;
		}
		return 0;
	}

	clear(): void {
		this.db.exec("DELETE FROM skill_embeddings");
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;
		this.db.close();
	}
}
