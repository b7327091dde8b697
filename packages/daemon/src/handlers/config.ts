import { ProtocolError } from "@ember/core";
import type { DaemonContext } from "../context.js";
import { requireString } from "../protocol.js";
import type { Reply } from "../protocol.js";

/** `config` command: get, set, list. Every `set` is saved. */
export async function handleConfigAction(
	action: string,
	args: Record<string, unknown>,
	ctx: DaemonContext,
	reply: (r: Reply) => void,
): Promise<void> {
	switch (action) {
		case "set": {
			const key = requireString(args, "key");
			const value = args.value;
			if (value === undefined || value === null) {
				throw new ProtocolError("Missing value");
			}
			ctx.settings.set(key, value);
			reply({ event: "config_updated", key, value: ctx.settings.get(key) });
			return;
		}

		case "get": {
			const key = requireString(args, "key");
			reply({ event: "config_value", key, value: ctx.settings.get(key) });
			return;
		}

		case "list": {
			const options: Record<string, unknown> = {};
			for (const key of ctx.settings.keys()) {
				options[key] = ctx.settings.get(key);
			}
			reply({ event: "config_list", options });
			return;
		}

		default:
			throw new ProtocolError(`Unknown config action: ${action}`);
	}
}
