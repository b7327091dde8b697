import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PROACTIVE_MESSAGE, proactiveTick, startProactiveLoop } from "@ember/daemon";

function fakeSessions(ids: string[]) {
	return { ids: () => [...ids], publish: vi.fn(() => 1) };
}

describe("proactive loop", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("should broadcast for the first in-memory session", () => {
		const sessions = fakeSessions(["work", "home"]);
		expect(proactiveTick(sessions)).toBe(true);
		expect(sessions.publish).toHaveBeenCalledWith({ event: "proactive", session_id: "work", message: PROACTIVE_MESSAGE });
	});

	it("should stay quiet with no sessions", () => {
		const sessions = fakeSessions([]);
		expect(proactiveTick(sessions)).toBe(false);
		expect(sessions.publish).not.toHaveBeenCalled();
	});

	it("should re-read the interval before each sleep", () => {
		const sessions = fakeSessions(["work"]);
		let interval = 5;
		const loop = startProactiveLoop({ sessions, intervalSecs: () => interval });
		interval = 10;

		vi.advanceTimersByTime(4999);
		expect(sessions.publish).toHaveBeenCalledTimes(0);
		vi.advanceTimersByTime(1);
		expect(sessions.publish).toHaveBeenCalledTimes(1);

		vi.advanceTimersByTime(9999);
		expect(sessions.publish).toHaveBeenCalledTimes(1);
		vi.advanceTimersByTime(1);
		expect(sessions.publish).toHaveBeenCalledTimes(2);

		loop.stop();
		expect(loop.running).toBe(false);
		vi.advanceTimersByTime(60_000);
		expect(sessions.publish).toHaveBeenCalledTimes(2);
	});
});
