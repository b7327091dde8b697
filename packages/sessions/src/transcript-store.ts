/**
 * File layout of one session:
 *
 *   <root>/<id>/history.jsonl   one TranscriptMessage per line, append-only
 *   <root>/<id>/activity.log    `[timestamp] User: ...` lines
 *   <root>/<id>/memory/
 *
 * The only non-append write is {@link TranscriptStore.rewrite}, which goes
 * through a temp file and a rename.
 */

import fs from "node:fs";
import path from "node:path";
import { SessionError, createLogger, errorMessage, toError } from "@ember/core";
import type { MessageRole, TranscriptMessage } from "./types.js";

const log = createLogger("sessions:store");

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Session ids become directory names, so only plain names are accepted. */
export function isValidSessionId(id: string): boolean {
	return SAFE_ID.test(id) && id !== "." && id !== "..";
}

function isRole(value: unknown): value is MessageRole {
	return value === "user" || value === "assistant";
}

/** Parse one history line; undefined when it is not a transcript message. */
export function parseTranscriptLine(line: string): TranscriptMessage | undefined {
	let raw: unknown;
	try {
		raw = JSON.parse(line);
	} catch {
		return undefined;
	}
	if (typeof raw !== "object" || raw === null) return undefined;
	if (!("role" in raw) || !isRole(raw.role)) return undefined;
	if (!("content" in raw) || typeof raw.content !== "string") return undefined;

	const timestamp = "timestamp" in raw && typeof raw.timestamp === "string" ? raw.timestamp : "";
	const skills =
		"skills" in raw && Array.isArray(raw.skills)
			? raw.skills.filter((s): s is string => typeof s === "string")
			: [];
	return { role: raw.role, content: raw.content, timestamp, skills };
}

export interface TranscriptStore {
	readonly dir: string;
	readonly historyPath: string;
	readonly activityPath: string;
	readonly memoryDir: string;
	/** Read every parseable message. Bad lines are skipped with a warning. */
	load(): TranscriptMessage[];
	append(message: TranscriptMessage): void;
	/** Replace the whole transcript atomically. */
	rewrite(messages: readonly TranscriptMessage[]): void;
	logActivity(text: string, at?: Date): void;
}

/**
 * Open (creating if needed) the store for `<root>/<id>`.
 *
 * @throws {SessionError} On an unsafe id or when the directories cannot be created.
 */
export function openTranscriptStore(root: string, id: string): TranscriptStore {
	if (!isValidSessionId(id)) {
		throw new SessionError(`Invalid session id: ${id}`);
	}
	const dir = path.join(root, id);
	const historyPath = path.join(dir, "history.jsonl");
	const activityPath = path.join(dir, "activity.log");
	const memoryDir = path.join(dir, "memory");

	try {
		fs.mkdirSync(memoryDir, { recursive: true });
	} catch (err) {
		throw new SessionError(`Failed to create session directory ${dir}: ${errorMessage(err)}`, toError(err));
	}

	function io<T>(what: string, fn: () => T): T {
		try {
			return fn();
		} catch (err) {
			throw new SessionError(`Failed to ${what} for session ${id}: ${errorMessage(err)}`, toError(err));
		}
	}

	return {
		dir,
		historyPath,
		activityPath,
		memoryDir,

		load() {
			if (!fs.existsSync(historyPath)) return [];
			const content = io("read history", () => fs.readFileSync(historyPath, "utf-8"));
			const messages: TranscriptMessage[] = [];
			const lines = content.split("\n");
			for (let i = 0; i < lines.length; i++) {
				const line = lines[i].trim();
				if (!line) continue;
				const msg = parseTranscriptLine(line);
				if (msg) messages.push(msg);
				else log.warn("Skipping unreadable history line", { sessionId: id, line: i + 1 });
			}
			return messages;
		},

		append(message) {
			io("append history", () => fs.appendFileSync(historyPath, `${JSON.stringify(message)}\n`, "utf-8"));
		},

		rewrite(messages) {
			const tmpPath = `${historyPath}.${process.pid}.tmp`;
			const body = messages.map((m) => `${JSON.stringify(m)}\n`).join("");
			io("rewrite history", () => {
				fs.writeFileSync(tmpPath, body, "utf-8");
				fs.renameSync(tmpPath, historyPath);
			});
		},

		logActivity(text, at = new Date()) {
			io("write activity log", () => fs.appendFileSync(activityPath, `[${at.toISOString()}] ${text}\n`, "utf-8"));
		},
	};
}
