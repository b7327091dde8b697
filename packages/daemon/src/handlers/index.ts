import type { DaemonContext } from "../context.js";
import type { Reply, RoutedCommand } from "../protocol.js";
import { handleConfigAction } from "./config.js";
import { handleSessionAction } from "./session.js";
import { handleSkillAction } from "./skill.js";

export { handleConfigAction, handleSessionAction, handleSkillAction };

/** Run a routed command, writing its replies through `reply`. */
export function dispatchCommand(cmd: RoutedCommand, ctx: DaemonContext, reply: (r: Reply) => void): Promise<void> {
	switch (cmd.handler) {
		case "session":
			return handleSessionAction(cmd.action, cmd.args, ctx, reply);
		case "config":
			return handleConfigAction(cmd.action, cmd.args, ctx, reply);
		case "skill":
			return handleSkillAction(cmd.action, cmd.args, ctx, reply);
	}
}
