/**
 * Stream framing for provider response bodies.
 *
 * Network chunks do not respect frame boundaries, so every reader here
 * buffers across chunks and yields only complete frames:
 *
 * - {@link readLines}: newline-delimited frames (NDJSON, SSE lines).
 * - {@link readSseData}: the `data:` payloads of an SSE stream.
 * - {@link readJsonArrayItems}: the elements of a streamed top-level
 *   JSON array (`[{...},\r\n{...}]`), found by brace depth.
 */

async function* decodeChunks(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
	const reader = body.getReader();
	const decoder = new TextDecoder();
	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;
			yield decoder.decode(value, { stream: true });
		}
		const tail = decoder.decode();
		if (tail) yield tail;
	} finally {
		reader.releaseLock();
	}
}

/** Yield each line (without its terminator). A final unterminated line is yielded too. */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
	let buffer = "";
	for await (const chunk of decodeChunks(body)) {
		buffer += chunk;
		const lines = buffer.split("\n");
		buffer = lines.pop() ?? "";
		for (const line of lines) {
			yield line.endsWith("\r") ? line.slice(0, -1) : line;
		}
	}
	if (buffer.length > 0) {
		yield buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
	}
}

/**
 * Yield the payload of each SSE `data:` line.
 *
 * Each data line is a frame of its own; `event:`, `id:` and comment lines
 * are skipped. The `[DONE]` sentinel is passed through for the caller.
 */
export async function* readSseData(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
	for await (const line of readLines(body)) {
		if (!line.startsWith("data:")) continue;
		yield line.slice(5).trim();
	}
}

/**
 * Yield each top-level element of a streamed JSON array as raw text.
 *
 * Array brackets, commas and whitespace between elements are dropped.
 * Object elements end at their matching closing brace (string-aware);
 * anything else runs to the next top-level separator. The text is not
 * parsed here, so malformed elements still reach the caller.
 */
export async function* readJsonArrayItems(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
	let item = "";
	let depth = 0;
	let inString = false;
	let escaped = false;

	for await (const chunk of decodeChunks(body)) {
		for (const ch of chunk) {
			if (depth === 0 && !inString) {
				if (ch === "[" || ch === "]" || ch === "," || ch.trim() === "") {
					if (item.trim()) {
						yield item.trim();
						item = "";
					}
					continue;
				}
			}

			item += ch;

			if (inString) {
				if (escaped) escaped = false;
				else if (ch === "\\") escaped = true;
				else if (ch === "\"") inString = false;
				continue;
			}

			if (ch === "\"") {
				inString = true;
			} else if (ch === "{") {
				depth++;
			} else if (ch === "}") {
				depth = Math.max(0, depth - 1);
				if (depth === 0) {
					yield item.trim();
					item = "";
				}
			}
		}
	}

	if (item.trim()) {
		yield item.trim();
	}
}
