/**
 * Skill types.
 *
 * A skill is a directory holding a `SKILL.md` (YAML frontmatter plus a
 * markdown body of instructions) and optionally a `scripts/` folder.
 */

/** A tool declared in a skill's frontmatter. */
export interface SkillToolDefinition {
	name: string;
	description: string;
	/** JSON Schema of the arguments. */
	parameters: Record<string, unknown>;
	/** Shell template with `{{param}}` placeholders. */
	exec?: string;
	/** Working directory for `exec`, `~`-expanded. Defaults to the skill directory. */
	workingDir?: string;
}

export interface Skill {
	/** Unique key. */
	name: string;
	description: string;
	/** Markdown body injected into the system prompt. */
	instructions: string;
	tools: SkillToolDefinition[];
	/** Absolute path of the skill directory. */
	path: string;
}

/** Result of scanning skill directories. */
export interface SkillLoadResult {
	skills: Skill[];
	/** Paths that were skipped, with reasons. */
	skipped: Array<{ path: string; reason: string }>;
}

/** Turns text into a vector with the given embedding model id. */
export type Embedder = (model: string, text: string) => Promise<number[]>;
