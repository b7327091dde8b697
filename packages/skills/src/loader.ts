/**
 * @module loader
 * @description Discovers skills from `SKILL.md` files.
 *
 * Scans each directory for `* /SKILL.md` (one level deep) and parses the
 * YAML frontmatter with js-yaml:
 *
 * ```markdown
 * ---
 * name: web-browsing
 * description: Inspect the active browser tab.
 * tools:
 *   - name: open_url
 *     description: Open a URL
 *     parameters: { type: object, properties: { url: { type: string } } }
 *     exec: xdg-open {{url}}
 * ---
 * Instructions for the model...
 * ```
 *
 * @packageDocumentation
 */

import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { SkillError, createLogger, errorMessage, expandHome, isRecord, toError } from "@ember/core";
import type { Skill, SkillLoadResult, SkillToolDefinition } from "./types.js";

const log = createLogger("skills:loader");

const EMPTY_PARAMETERS: Record<string, unknown> = { type: "object", properties: {} };

/**
 * Split a SKILL.md into raw frontmatter and body.
 * Returns null when the file does not open with a `---` block.
 */
export function splitFrontmatter(content: string): { frontmatter: string; body: string } | null {
	const text = content.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n");
	if (!text.startsWith("---\n")) return null;
	const end = text.indexOf("\n---", 3);
	if (end < 0) return null;
	const frontmatter = text.slice(4, end);
	const afterFence = text.indexOf("\n", end + 4);
	const body = afterFence < 0 ? "" : text.slice(afterFence + 1);
	return { frontmatter, body };
}

function parseTool(raw: unknown, index: number, skillName: string): SkillToolDefinition {
	if (!isRecord(raw)) {
		throw new SkillError(`tools[${index}] must be a mapping`, skillName);
	}
	if (typeof raw.name !== "string" || raw.name.trim() === "") {
		throw new SkillError(`tools[${index}] is missing 'name'`, skillName);
	}
	const tool: SkillToolDefinition = {
		name: raw.name.trim(),
		description: typeof raw.description === "string" ? raw.description.trim() : "",
		parameters: isRecord(raw.parameters) ? raw.parameters : EMPTY_PARAMETERS,
	};
	if (typeof raw.exec === "string") tool.exec = raw.exec;
	if (typeof raw.working_dir === "string") tool.workingDir = raw.working_dir;
	return tool;
}

/**
 * Parse the text of one SKILL.md.
 *
 * @param skillDir - Directory the file lives in; becomes {@link Skill.path}.
 * @throws {SkillError} On missing frontmatter or required fields.
 */
export function parseSkillFile(content: string, skillDir: string): Skill {
	const folder = path.basename(skillDir);
	const parts = splitFrontmatter(content);
	if (!parts) {
		throw new SkillError("no YAML frontmatter", folder);
	}

	let meta: unknown;
	try {
		meta = yaml.load(parts.frontmatter);
	} catch (err) {
		throw new SkillError(`invalid YAML frontmatter: ${errorMessage(err)}`, folder, toError(err));
	}
	if (!isRecord(meta)) {
		throw new SkillError("frontmatter must be a mapping", folder);
	}
	if (typeof meta.name !== "string" || meta.name.trim() === "") {
		throw new SkillError("frontmatter missing 'name'", folder);
	}
	const name = meta.name.trim();
	if (typeof meta.description !== "string") {
		throw new SkillError("frontmatter missing 'description'", name);
	}

	let tools: SkillToolDefinition[] = [];
	if (meta.tools !== undefined && meta.tools !== null) {
		if (!Array.isArray(meta.tools)) {
			throw new SkillError("'tools' must be a list", name);
		}
		tools = meta.tools.map((t, i) => parseTool(t, i, name));
	}

	return {
		name,
		description: meta.description.trim(),
		instructions: parts.body.trim(),
		tools,
		path: skillDir,
	};
}

/**
 * Load every skill found under `dirs`.
 *
 * Missing directories are ignored. Later skills replace earlier ones with
 * the same name.
 */
export function loadSkills(dirs: string[]): SkillLoadResult {
	const byName = new Map<string, Skill>();
	const skipped: SkillLoadResult["skipped"] = [];

	for (const rawDir of dirs) {
		const dir = path.resolve(expandHome(rawDir));
		if (!fs.existsSync(dir)) {
			log.debug("Skills directory not found", { dir });
			continue;
		}

		let entries: fs.Dirent[];
		try {
			entries = fs.readdirSync(dir, { withFileTypes: true });
		} catch (err) {
			log.warn("Cannot read skills directory", { dir, error: errorMessage(err) });
			continue;
		}
		entries.sort((a, b) => a.name.localeCompare(b.name));

		for (const entry of entries) {
			if (entry.name.startsWith(".")) continue;
			const skillDir = path.join(dir, entry.name);
			if (!entry.isDirectory() && !(entry.isSymbolicLink() && isDirectory(skillDir))) continue;

			const skillMd = path.join(skillDir, "SKILL.md");
			if (!fs.existsSync(skillMd)) continue;

			let skill: Skill;
			try {
				skill = parseSkillFile(fs.readFileSync(skillMd, "utf-8"), skillDir);
			} catch (err) {
				const reason = errorMessage(err);
				log.warn("Skipping invalid skill", { path: skillMd, reason });
				skipped.push({ path: skillMd, reason });
				continue;
			}

			if (skill.name !== entry.name) {
				log.warn("Skill name does not match its folder", { name: skill.name, folder: entry.name });
			}
			if (byName.has(skill.name)) {
				log.warn("Duplicate skill name, keeping the last one loaded", { name: skill.name, path: skillDir });
				byName.delete(skill.name);
			}
			byName.set(skill.name, skill);
		}
	}

	const skills = [...byName.values()];
	log.info("Loaded skills", { count: skills.length, skipped: skipped.length });
	return { skills, skipped };
}

function isDirectory(p: string): boolean {
	try {
		return fs.statSync(p).isDirectory();
	} catch {
		return false;
	}
}
