/**
 * ProtocolServer: Unix socket listener.
 *
 * A stale socket file is removed before binding; the socket is made
 * world read/writable once bound.
 */

import fs from "node:fs";
import net from "node:net";
import path from "node:path";
import { createLogger, errorMessage } from "@ember/core";
import { serveConnection } from "./connection.js";
import type { Connection } from "./connection.js";
import type { DaemonContext } from "./context.js";

const log = createLogger("daemon:server");

const SOCKET_MODE = 0o666;

export interface ProtocolServerOptions {
	socketPath: string;
	context: DaemonContext;
}

export interface ProtocolServer {
	listen(): Promise<void>;
	/** Stop accepting, drop every connection and remove the socket file. */
	close(): Promise<void>;
	/** Bound socket path, or null when not listening. */
	readonly address: string | null;
	readonly connectionCount: number;
}

export function createProtocolServer(opts: ProtocolServerOptions): ProtocolServer {
	const { socketPath, context } = opts;
	const connections = new Map<number, Connection>();
	let nextId = 1;
	let bound: string | null = null;

	const server = net.createServer((socket) => {
		const id = nextId++;
		const conn = serveConnection(socket, context, id);
		connections.set(id, conn);
		void conn.done.then(() => connections.delete(id));
	});

	return {
		async listen() {
			if (fs.existsSync(socketPath)) {
				fs.rmSync(socketPath, { force: true });
				log.debug("Removed stale socket", { path: socketPath });
			}
			fs.mkdirSync(path.dirname(socketPath), { recursive: true });

			await new Promise<void>((resolve, reject) => {
				server.once("error", reject);
				server.listen(socketPath, () => {
					server.off("error", reject);
					resolve();
				});
			});
			fs.chmodSync(socketPath, SOCKET_MODE);
			server.on("error", (err) => {
				log.error("Accept error", err);
			});
			bound = socketPath;
			log.info(`Listening on ${socketPath}`);
		},

		async close() {
			if (!bound) return;
			for (const conn of connections.values()) conn.destroy();
			await new Promise<void>((resolve) => {
				server.close((err) => {
					if (err) log.warn("Listener close failed", { error: errorMessage(err) });
					resolve();
				});
			});
			fs.rmSync(socketPath, { force: true });
			bound = null;
			log.info("Server closed");
		},

		get address() {
			return bound;
		},

		get connectionCount() {
			return connections.size;
		},
	};
}
