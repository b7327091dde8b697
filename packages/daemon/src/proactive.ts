/**
 * Proactive loop: a self re-arming timer that periodically reaches out
 * to connected clients.
 *
 * The interval is read again before every sleep, so a
 * `proactive_interval_secs` change applies from the next tick.
 */

import { createLogger } from "@ember/core";
import type { SessionManager } from "@ember/sessions";

const log = createLogger("daemon:proactive");

export const PROACTIVE_MESSAGE = "Proactive check: System operational.";

export interface ProactiveLoopOptions {
	sessions: Pick<SessionManager, "ids" | "publish">;
	intervalSecs: () => number;
}

export interface ProactiveLoop {
	/** Clear the pending timer. Idempotent. */
	stop(): void;
	readonly running: boolean;
}

/** Broadcast one proactive event for the first in-memory session, if any. */
export function proactiveTick(sessions: ProactiveLoopOptions["sessions"]): boolean {
	const [first] = sessions.ids();
	let sent = false;
	if (first !== undefined) {
		sessions.publish({ event: "proactive", session_id: first, message: PROACTIVE_MESSAGE });
		sent = true;
	}
	log.debug("Proactive loop tick");
	return sent;
}

export function startProactiveLoop(opts: ProactiveLoopOptions): ProactiveLoop {
	let timer: NodeJS.Timeout | undefined;
	let stopped = false;

	const arm = () => {
		const secs = Math.max(1, opts.intervalSecs());
		timer = setTimeout(() => {
			proactiveTick(opts.sessions);
			if (!stopped) arm();
		}, secs * 1000);
	};
	arm();

	return {
		stop() {
			stopped = true;
			if (timer) clearTimeout(timer);
			timer = undefined;
		},
		get running() {
			return !stopped;
		},
	};
}
