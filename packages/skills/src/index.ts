// @ember/skills: skill loading and selection
export type { Skill, SkillToolDefinition, SkillLoadResult, Embedder } from "./types.js";
export { loadSkills, parseSkillFile, splitFrontmatter } from "./loader.js";
export { ensureDefaultSkills } from "./defaults.js";
export { cosineSimilarity } from "./cosine.js";
export { MemoryEmbeddingCache, SqliteEmbeddingCache, contentHash } from "./embedding-cache.js";
export type { EmbeddingCache, CachedEmbedding } from "./embedding-cache.js";
export {
	createSkillCatalog,
	skillEmbeddingText,
	DEFAULT_SIMILARITY_THRESHOLD,
	DEFAULT_SELECTION_LIMIT,
} from "./catalog.js";
export type { SkillCatalog, SkillCatalogOptions, SkillSelector, ScoredSkill } from "./catalog.js";
