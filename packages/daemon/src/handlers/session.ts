import { ProtocolError, createLogger } from "@ember/core";
import { parseModelId } from "@ember/llm";
import type { DaemonContext } from "../context.js";
import { runExchange } from "../orchestrator.js";
import { optionalCount, optionalString, requireString } from "../protocol.js";
import type { Reply } from "../protocol.js";

const log = createLogger("daemon:session");

const DEFAULT_HISTORY_LIMIT = 20;

/** `session` command: create, send, list, delete, history. */
export async function handleSessionAction(
	action: string,
	args: Record<string, unknown>,
	ctx: DaemonContext,
	reply: (r: Reply) => void,
): Promise<void> {
	switch (action) {
		case "create": {
			const sessionId = requireString(args, "session_id");
			const model = optionalString(args, "model");
			if (model !== undefined) parseModelId(model);

			const session = await ctx.sessions.getOrCreate(sessionId, model);
			if (model !== undefined && session.getModel() !== model) {
				await session.setModel(model);
			}
			reply({ event: "created", session_id: sessionId, model: session.getModel() });
			return;
		}

		case "send": {
			const sessionId = requireString(args, "session_id");
			const message = requireString(args, "message");
			await sendMessage(sessionId, message, ctx, reply);
			return;
		}

		case "list":
			reply({ event: "list", sessions: await ctx.sessions.list() });
			return;

		case "delete": {
			const sessionId = requireString(args, "session_id");
			await ctx.sessions.delete(sessionId);
			reply({ event: "deleted", session_id: sessionId });
			return;
		}

		case "history": {
			const sessionId = requireString(args, "session_id");
			const limit = optionalCount(args, "limit", DEFAULT_HISTORY_LIMIT);
			const offset = optionalCount(args, "offset", 0);
			const session = await ctx.sessions.getOrCreate(sessionId);
			const page = await session.history(offset, limit);
			reply({
				event: "history",
				session_id: sessionId,
				history: page.messages,
				total: page.total,
				offset,
				limit,
			});
			return;
		}

		default:
			throw new ProtocolError(`Unknown action: ${action}`);
	}
}

/**
 * One `send`: record the user message, assemble context, run the tool
 * loop and record the answer.
 */
async function sendMessage(
	sessionId: string,
	message: string,
	ctx: DaemonContext,
	reply: (r: Reply) => void,
): Promise<void> {
	const session = await ctx.sessions.getOrCreate(sessionId);
	const slog = log.withContext({ sessionId });

	await session.appendUserMessage(message, await session.activeSkills());
	const context = await session.assembleContext(ctx.catalog, ctx.settings.current());

	if (context.skills.length > 0) {
		slog.info("LLM starting generation with skills enabled.", { skills: context.skills.map((s) => s.name) });
	} else {
		slog.info("LLM starting generation (no skills).");
	}
	for (const skill of context.skills) {
		reply({ event: "skill_used", session_id: sessionId, skill: skill.name, result: "Skill instructions injected." });
	}

	reply({ event: "response", session_id: sessionId, delta: "Thinking...", done: false });
	const result = await runExchange({
		gateway: ctx.gateway,
		executor: ctx.executor,
		sessionId,
		model: session.getModel(),
		context,
		userMessage: message,
		emit: reply,
	});
	reply({ event: "response", session_id: sessionId, delta: "", done: true });

	if (result.error === undefined || result.text !== "") {
		await session.appendAssistantMessage(result.text, await session.activeSkills());
	}
	slog.debug("Exchange finished", { turns: result.turns, chars: result.text.length });
}
