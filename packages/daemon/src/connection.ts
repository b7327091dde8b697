/**
 * One client connection.
 *
 * Lines are read as they arrive and each command runs as its own task,
 * so a long `send` never blocks the next command. Two writers share the
 * socket: one drains this connection's reply queue, the other its
 * broadcast subscription. Each writes whole lines, so events interleave
 * only at line boundaries.
 *
 * A writer stops pulling while the socket buffer is full. Broadcasts then
 * back up in the bounded subscription, which drops its oldest events.
 */

import type { Socket } from "node:net";
import { AsyncQueue, createLogger, errorMessage } from "@ember/core";
import type { DaemonContext } from "./context.js";
import { dispatchCommand } from "./handlers/index.js";
import { parseCommandLine } from "./protocol.js";
import type { Reply, RoutedCommand } from "./protocol.js";

const log = createLogger("daemon:connection");

const NEWLINE = 0x0a;

/** Reassembles newline-delimited lines across chunk boundaries. */
export class LineSplitter {
	private buffer: Buffer = Buffer.alloc(0);

	/** Complete lines in `chunk` plus what was buffered, without their terminators. */
	push(chunk: Buffer): string[] {
		this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
		const lines: string[] = [];
		let start = 0;
		let idx = this.buffer.indexOf(NEWLINE, start);
		while (idx !== -1) {
			lines.push(stripCr(this.buffer.subarray(start, idx).toString("utf8")));
			start = idx + 1;
			idx = this.buffer.indexOf(NEWLINE, start);
		}
		this.buffer = this.buffer.subarray(start);
		return lines;
	}

	/** The unterminated tail, if any. */
	flush(): string | undefined {
		if (this.buffer.length === 0) return undefined;
		const rest = stripCr(this.buffer.toString("utf8"));
		this.buffer = Buffer.alloc(0);
		return rest;
	}
}

function stripCr(line: string): string {
	return line.endsWith("\r") ? line.slice(0, -1) : line;
}

export interface Connection {
	readonly id: number;
	/** Settles once the socket closed, both writers stopped and every command finished. */
	readonly done: Promise<void>;
	/** Broadcasts lost because this client read too slowly. */
	readonly droppedBroadcasts: number;
	destroy(): void;
}

export function serveConnection(socket: Socket, ctx: DaemonContext, id: number): Connection {
	const clog = log.withContext({ connection: id });
	const replies = new AsyncQueue<Reply>();
	const broadcasts = ctx.sessions.subscribe();
	const inflight = new Set<Promise<void>>();
	const splitter = new LineSplitter();

	const writable = () =>
		new Promise<void>((resolve) => {
			const ready = () => {
				socket.off("drain", ready);
				socket.off("close", ready);
				resolve();
			};
			socket.on("drain", ready);
			socket.on("close", ready);
		});
	const write = async (reply: Reply) => {
		if (socket.destroyed || !socket.writable) return;
		if (socket.writableNeedDrain) await writable();
		if (socket.destroyed || !socket.writable) return;
		if (!socket.write(JSON.stringify(reply) + "\n")) await writable();
	};
	const drain = async (source: AsyncIterable<Reply>) => {
		for await (const reply of source) await write(reply);
	};
	const writers = Promise.all([drain(replies), drain(broadcasts)]);

	const handleLine = (line: string) => {
		if (line.trim() === "") return;

		let command: RoutedCommand;
		try {
			command = parseCommandLine(line);
		} catch (err) {
			replies.push({ error: errorMessage(err) });
			return;
		}

		const task = dispatchCommand(command, ctx, (reply) => {
			replies.push(reply);
		}).catch((err: unknown) => {
			clog.error("Command processing error", err, { command: command.handler, action: command.action });
			replies.push({ error: errorMessage(err) });
		});
		inflight.add(task);
		void task.then(() => inflight.delete(task));
	};

	socket.on("data", (chunk: Buffer) => {
		for (const line of splitter.push(chunk)) handleLine(line);
	});
	socket.on("end", () => {
		const rest = splitter.flush();
		if (rest !== undefined) handleLine(rest);
	});
	socket.on("error", (err) => {
		clog.debug("Socket error", { error: err.message });
	});

	const closed = new Promise<void>((resolve) => {
		socket.once("close", () => {
			broadcasts.unsubscribe();
			replies.close();
			resolve();
		});
	});

	clog.debug("Client connected");
	const done = closed
		.then(() => writers)
		.then(() => Promise.all([...inflight]))
		.then(() => {
			clog.debug("Client disconnected");
		});

	return {
		id,
		done,
		get droppedBroadcasts() {
			return broadcasts.dropped;
		},
		destroy() {
			socket.destroy();
		},
	};
}
