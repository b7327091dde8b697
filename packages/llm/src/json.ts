/** Narrowing helpers for decoded provider JSON. */

import { isRecord } from "@ember/core";

export function asRecord(value: unknown): Record<string, unknown> | undefined {
	return isRecord(value) ? value : undefined;
}

export function asArray(value: unknown): unknown[] {
	return Array.isArray(value) ? value : [];
}

export function asString(value: unknown): string | undefined {
	return typeof value === "string" ? value : undefined;
}

/** Parse JSON, returning undefined instead of throwing. */
export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
	try {
		return { ok: true, value: JSON.parse(text) };
	} catch {
		return { ok: false };
	}
}

/** Parse tool-call argument text into an object; non-object JSON is wrapped as `{ raw }`. */
export function parseArguments(text: string): Record<string, unknown> {
	if (text.trim() === "") return {};
	const parsed = tryParseJson(text);
	if (parsed.ok && isRecord(parsed.value)) return parsed.value;
	return { raw: text };
}
