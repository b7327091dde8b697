import type { Skill } from "@ember/skills";

export const SYSTEM_PROMPT_PREAMBLE = "You are Ember, a persistent, proactive LLM agent.\n";

/** The system prompt: preamble, then each skill's instructions under its own heading. */
export function buildSystemPrompt(skills: readonly Skill[]): string {
	let prompt = SYSTEM_PROMPT_PREAMBLE;
	if (skills.length > 0) {
		prompt += "\n# Enabled Skills:\n";
		for (const skill of skills) {
			prompt += `## ${skill.name}\n${skill.instructions}\n`;
		}
	}
	return prompt;
}
