/**
 * Line protocol.
 *
 * Every inbound line is one JSON object, either the command envelope
 *
 *   {"command": "session", "arguments": {"action": "send", ...}}
 *
 * or the legacy flat form
 *
 *   {"action": "send", ...}          → session handler
 *   {"action": "skill_add", ...}     → skill handler, action "add"
 *
 * Every outbound line is one JSON object: an `event` reply, a broadcast,
 * or `{"error": "..."}`.
 */

import { ProtocolError, errorMessage, isRecord } from "@ember/core";

/** One outbound line. */
export type Reply = Record<string, unknown>;

export type HandlerName = "session" | "config" | "skill";

export interface RoutedCommand {
	handler: HandlerName;
	action: string;
	args: Record<string, unknown>;
}

const HANDLERS: readonly HandlerName[] = ["session", "config", "skill"];

function isHandlerName(name: string): name is HandlerName {
	return HANDLERS.some((h) => h === name);
}

/**
 * Parse and route one line.
 *
 * @throws {ProtocolError} `Invalid JSON or Command format: ...`,
 *   `Unknown command: ...` or `Missing action in <command> arguments`.
 */
export function parseCommandLine(line: string): RoutedCommand {
	let raw: unknown;
	try {
		raw = JSON.parse(line);
	} catch (err) {
		throw new ProtocolError(`Invalid JSON or Command format: ${errorMessage(err)}`);
	}
	if (!isRecord(raw)) {
		throw new ProtocolError("Invalid JSON or Command format: expected a JSON object");
	}

	if (typeof raw.command === "string" && "arguments" in raw) {
		const command = raw.command;
		if (!isHandlerName(command)) {
			throw new ProtocolError(`Unknown command: ${command}`);
		}
		const args = isRecord(raw.arguments) ? raw.arguments : {};
		if (typeof args.action !== "string") {
			throw new ProtocolError(`Missing action in ${command} arguments`);
		}
		return { handler: command, action: args.action, args };
	}

	if (typeof raw.action === "string") {
		const action = raw.action;
		const args = { ...raw };
		delete args.action;
		if (action.startsWith("skill_")) {
			return { handler: "skill", action: action.slice("skill_".length), args };
		}
		return { handler: "session", action, args };
	}

	throw new ProtocolError(
		'Invalid JSON or Command format: expected {"command", "arguments"} or {"action", ...}',
	);
}

// ─── Argument access ────────────────────────────────────────────────────────

/** @throws {ProtocolError} `Missing <label>` unless `args[key]` is a string. */
export function requireString(args: Record<string, unknown>, key: string, label: string = key): string {
	const value = args[key];
	if (typeof value !== "string") {
		throw new ProtocolError(`Missing ${label}`);
	}
	return value;
}

export function optionalString(args: Record<string, unknown>, key: string): string | undefined {
	const value = args[key];
	return typeof value === "string" ? value : undefined;
}

/** A non-negative integer argument, or the fallback. */
export function optionalCount(args: Record<string, unknown>, key: string, fallback: number): number {
	const value = args[key];
	return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : fallback;
}
