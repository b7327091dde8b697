import fs from "node:fs";
import path from "node:path";
import { createLogger, expandHome } from "@ember/core";

const log = createLogger("skills:defaults");

const JOKE_TELLER = `---
name: joke-teller
description: Tells funny programming jokes. Use when user asks for a laugh.
---

# Joke Teller Instructions

You are a comedian specialized in programming humor.
When the user asks for a joke, provide one related to:
- off-by-one errors
- JavaScript equality
- naming things

Keep it short and punchy.
`;

/**
 * Seed a fresh skills directory with the `joke-teller` example.
 *
 * Does nothing when `dir` already exists.
 *
 * @returns true if the directory was created.
 */
export function ensureDefaultSkills(dir: string): boolean {
	const root = expandHome(dir);
	if (fs.existsSync(root)) return false;

	const jokeDir = path.join(root, "joke-teller");
	fs.mkdirSync(jokeDir, { recursive: true });
	fs.writeFileSync(path.join(jokeDir, "SKILL.md"), JOKE_TELLER);
	log.info("Created default skill", { path: jokeDir });
	return true;
}
