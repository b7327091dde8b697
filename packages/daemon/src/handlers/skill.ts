import { ProtocolError } from "@ember/core";
import type { DaemonContext } from "../context.js";
import { requireString } from "../protocol.js";
import type { Reply } from "../protocol.js";

/**
 * `skill` command: add, remove, list, search, ban, unban.
 *
 * Every action names a session; it is created if it does not exist yet.
 */
export async function handleSkillAction(
	action: string,
	args: Record<string, unknown>,
	ctx: DaemonContext,
	reply: (r: Reply) => void,
): Promise<void> {
	const sessionId = requireString(args, "session_id");
	const session = await ctx.sessions.getOrCreate(sessionId);

	switch (action) {
		case "add": {
			const skill = requireString(args, "skill", "skill name");
			await session.addSkill(skill);
			reply({ event: "skill_added", session_id: sessionId, skill });
			return;
		}

		case "remove": {
			const skill = requireString(args, "skill", "skill name");
			await session.removeSkill(skill);
			reply({ event: "skill_removed", session_id: sessionId, skill });
			return;
		}

		case "list":
			reply({ event: "skill_list", session_id: sessionId, active_skills: await session.activeSkills() });
			return;

		case "search": {
			const query = requireString(args, "query");
			const found = await ctx.catalog.search(query, ctx.settings.current().rag_model);
			reply({
				event: "skill_search_results",
				session_id: sessionId,
				results: found.map((s) => ({ name: s.name, description: s.description })),
			});
			return;
		}

		case "ban": {
			const skill = requireString(args, "skill", "skill name");
			const banned = ctx.settings.current().banned_skills;
			if (!banned.includes(skill)) {
				ctx.settings.set("banned_skills", [...banned, skill]);
			}
			reply({ event: "skill_banned", session_id: sessionId, skill });
			return;
		}

		case "unban": {
			const skill = requireString(args, "skill", "skill name");
			ctx.settings.set(
				"banned_skills",
				ctx.settings.current().banned_skills.filter((s) => s !== skill),
			);
			reply({ event: "skill_unbanned", session_id: sessionId, skill });
			return;
		}

		default:
			throw new ProtocolError(`Unknown skill action: ${action}`);
	}
}
