/**
 * @module catalog
 * @description The loaded skill set and the embedding-based selector.
 *
 * ## Selection
 *
 * 1. Embed the message. If that fails, fall back to skills whose
 *    lower-cased name occurs in the lower-cased message (catalog order).
 * 2. Under the catalog write lock, make sure every skill has a cached
 *    vector of `"{name}: {description}"`. With the `rehash` policy an
 *    entry whose content hash changed is embedded again. A failure skips
 *    only that skill.
 * 3. Score by cosine similarity, keep scores above the threshold, sort
 *    descending (stable, so ties keep catalog order) and truncate.
 *
 * @packageDocumentation
 */

import { RwLock, createLogger, errorMessage } from "@ember/core";
import type { EmbeddingCachePolicy } from "@ember/core";
import { cosineSimilarity } from "./cosine.js";
import { MemoryEmbeddingCache, contentHash } from "./embedding-cache.js";
import type { EmbeddingCache } from "./embedding-cache.js";
import type { Embedder, Skill } from "./types.js";

const log = createLogger("skills:catalog");

/** Minimum similarity a skill needs to be selected (exclusive). */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.4;
/** Maximum skills returned per selection. */
export const DEFAULT_SELECTION_LIMIT = 3;

/** What sessions need from the catalog when assembling context. */
export interface SkillSelector {
	/** Skills relevant to `message`, best first. */
	select(message: string, embeddingModel: string): Promise<Skill[]>;
}

export interface ScoredSkill {
	skill: Skill;
	score: number;
}

export interface SkillCatalog extends SkillSelector {
	get(name: string): Skill | undefined;
	has(name: string): boolean;
	/** All skills in catalog order. */
	list(): Skill[];
	readonly size: number;
	/** Same semantics as {@link SkillSelector.select}; backs `skill search`. */
	search(query: string, embeddingModel: string): Promise<Skill[]>;
	/** Ranked skills with their scores; empty on embedding failure. */
	rank(message: string, embeddingModel: string): Promise<ScoredSkill[]>;
	/** Release the embedding cache. */
	close(): void;
}

export interface SkillCatalogOptions {
	embed: Embedder;
	/** Defaults to an in-memory cache. */
	cache?: EmbeddingCache;
	/** Read on every selection so settings changes apply. Defaults to `keep`. */
	policy?: () => EmbeddingCachePolicy;
	threshold?: number;
	limit?: number;
}

/** Text a skill is embedded from. */
export function skillEmbeddingText(skill: Skill): string {
	return `${skill.name}: ${skill.description}`;
}

export function createSkillCatalog(skills: Skill[], options: SkillCatalogOptions): SkillCatalog {
	const byName = new Map<string, Skill>();
	for (const skill of skills) {
		byName.delete(skill.name);
		byName.set(skill.name, skill);
	}
	const ordered = [...byName.values()];

	const cache = options.cache ?? new MemoryEmbeddingCache();
	const policy = options.policy ?? (() => "keep" as const);
	const threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
	const limit = options.limit ?? DEFAULT_SELECTION_LIMIT;
	const lock = new RwLock();

	function keywordFallback(message: string): Skill[] {
		const lower = message.toLowerCase();
		return ordered.filter((s) => lower.includes(s.name.toLowerCase()));
	}

	async function ensureVectors(model: string): Promise<void> {
		const rehash = policy() === "rehash";
		for (const skill of ordered) {
			const text = skillEmbeddingText(skill);
			const hash = contentHash(text);
			const cached = cache.get(model, skill.name);
			if (cached && (!rehash || cached.hash === hash)) continue;

			try {
				const vector = await options.embed(model, text);
				cache.set(model, skill.name, { hash, vector });
			} catch (err) {
				log.debug("Skill embedding failed", { skill: skill.name, error: errorMessage(err) });
			}
		}
	}

	async function embedQuery(message: string, model: string): Promise<number[] | undefined> {
		try {
			return await options.embed(model, message);
		} catch (err) {
			log.debug("Message embedding failed, using keyword match", { error: errorMessage(err) });
			return undefined;
		}
	}

	async function scoreAll(query: number[], model: string): Promise<ScoredSkill[]> {
		await lock.write(() => ensureVectors(model));
		return lock.read(() => {
			const scored: ScoredSkill[] = [];
			for (const skill of ordered) {
				const cached = cache.get(model, skill.name);
				if (!cached) continue;
				scored.push({ skill, score: cosineSimilarity(query, cached.vector) });
			}
			return scored;
		});
	}

	function top(scored: ScoredSkill[]): ScoredSkill[] {
		return scored
			.filter((s) => s.score > threshold)
			.sort((a, b) => b.score - a.score)
			.slice(0, limit);
	}

	async function rank(message: string, model: string): Promise<ScoredSkill[]> {
		const query = await embedQuery(message, model);
		if (!query) return [];
		return top(await scoreAll(query, model));
	}

	async function select(message: string, model: string): Promise<Skill[]> {
		const query = await embedQuery(message, model);
		if (!query) return keywordFallback(message);
		return top(await scoreAll(query, model)).map((s) => s.skill);
	}

	return {
		get: (name) => byName.get(name),
		has: (name) => byName.has(name),
		list: () => [...ordered],
		get size() {
			return ordered.length;
		},
		select,
		search: select,
		rank,
		close: () => cache.close(),
	};
}
