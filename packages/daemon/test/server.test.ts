import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import http from "node:http";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { createSettingsStore } from "@ember/core";
import { SessionManager } from "@ember/sessions";
import { createSkillCatalog } from "@ember/skills";
import { LineSplitter, serveConnection, startDaemon } from "@ember/daemon";
import type { Connection, DaemonContext, RunningDaemon } from "@ember/daemon";

describe("LineSplitter", () => {
	it("should reassemble lines split across chunks", () => {
		const splitter = new LineSplitter();
		expect(splitter.push(Buffer.from('{"a":'))).toEqual([]);
		expect(splitter.push(Buffer.from('1}\n{"b"'))).toEqual(['{"a":1}']);
		expect(splitter.push(Buffer.from(":2}\n"))).toEqual(['{"b":2}']);
		expect(splitter.flush()).toBeUndefined();
	});

	it("should strip carriage returns", () => {
		expect(new LineSplitter().push(Buffer.from("one\r\ntwo\n"))).toEqual(["one", "two"]);
	});

	it("should not break a multibyte character split across chunks", () => {
		const bytes = Buffer.from("héllo\n");
		const splitter = new LineSplitter();
		expect(splitter.push(bytes.subarray(0, 2))).toEqual([]);
		expect(splitter.push(bytes.subarray(2))).toEqual(["héllo"]);
	});

	it("should flush an unterminated tail", () => {
		const splitter = new LineSplitter();
		splitter.push(Buffer.from("a\nrest"));
		expect(splitter.flush()).toBe("rest");
		expect(splitter.flush()).toBeUndefined();
	});
});

describe("serveConnection", () => {
	let home: string;
	let socketPath: string;
	let ctx: DaemonContext;
	let server: net.Server;
	let conn: Connection | undefined;

	beforeEach(async () => {
		home = fs.mkdtempSync(path.join(os.tmpdir(), "ember-conn-"));
		socketPath = path.join(home, "conn.sock");
		const settings = createSettingsStore({}, path.join(home, "settings.json"));
		ctx = {
			settings,
			catalog: createSkillCatalog([], { embed: async () => [] }),
			sessions: new SessionManager({
				root: path.join(home, "sessions"),
				defaultModel: () => settings.current().default_model,
			}),
			gateway: {
				embed: async () => [],
				streamChat: () => Promise.reject(new Error("no chat in this test")),
			},
			executor: { execute: async () => ({ result: "" }) },
		};
		conn = undefined;
		server = net.createServer((socket) => {
			conn = serveConnection(socket, ctx, 1);
		});
		await new Promise<void>((resolve) => server.listen(socketPath, () => resolve()));
	});

	afterEach(async () => {
		ctx.sessions.close();
		await new Promise<void>((resolve) => server.close(() => resolve()));
		fs.rmSync(home, { recursive: true, force: true });
	});

	it("should drop the oldest broadcasts for a client that stops reading", async () => {
		const client = net.createConnection(socketPath);
		await new Promise<void>((resolve) => client.once("connect", () => resolve()));
		client.pause();
		await vi.waitFor(() => expect(ctx.sessions.subscriberCount).toBe(1));

		const message = "x".repeat(16 * 1024);
		for (let i = 0; i < 400; i++) {
			ctx.sessions.publish({ event: "proactive", session_id: "s1", message });
			await new Promise((resolve) => setImmediate(resolve));
		}
		expect(conn?.droppedBroadcasts).toBeGreaterThan(0);

		client.destroy();
		await conn?.done;
		expect(ctx.sessions.subscriberCount).toBe(0);
	});

	it("should not drop broadcasts for a client that keeps reading", async () => {
		const client = net.createConnection(socketPath);
		let received = 0;
		const splitter = new LineSplitter();
		client.on("data", (chunk: Buffer) => {
			received += splitter.push(chunk).length;
		});
		await new Promise<void>((resolve) => client.once("connect", () => resolve()));
		await vi.waitFor(() => expect(ctx.sessions.subscriberCount).toBe(1));

		for (let i = 0; i < 50; i++) {
			ctx.sessions.publish({ event: "proactive", session_id: "s1", message: `m${i}` });
			await new Promise((resolve) => setImmediate(resolve));
		}
		await vi.waitFor(() => expect(received).toBe(50));
		expect(conn?.droppedBroadcasts).toBe(0);
		client.destroy();
	});
});

/** In-process stand-in for the LLM proxy: every chat streams "Hello there". */
function startProxy(): Promise<http.Server> {
	const server = http.createServer((req, res) => {
		req.resume();
		req.on("end", () => {
			if (req.method === "POST" && req.url === "/ollama/api/chat") {
				res.writeHead(200, { "Content-Type": "application/x-ndjson" });
				res.write('{"message":{"role":"assistant","content":"Hello"}}\n');
				res.write('{"message":{"role":"assistant","content":" there"}}\n');
				res.end('{"done":true}\n');
				return;
			}
			res.writeHead(404);
			res.end("not found");
		});
	});
	return new Promise((resolve) => {
		server.listen(0, "127.0.0.1", () => resolve(server));
	});
}

function proxyPort(server: http.Server): number {
	const addr = server.address();
	if (addr === null || typeof addr === "string") throw new Error("proxy not listening on TCP");
	return addr.port;
}

interface TestClient {
	lines: Array<Record<string, unknown>>;
	send(line: string): void;
	close(): void;
}

function connect(socketPath: string): Promise<TestClient> {
	return new Promise((resolve, reject) => {
		const socket = net.createConnection(socketPath);
		const splitter = new LineSplitter();
		const lines: Array<Record<string, unknown>> = [];
		socket.on("data", (chunk: Buffer) => {
			for (const line of splitter.push(chunk)) {
				const parsed: unknown = JSON.parse(line);
				if (typeof parsed === "object" && parsed !== null) lines.push({ ...parsed });
			}
		});
		socket.once("error", reject);
		socket.once("connect", () => {
			resolve({
				lines,
				send: (line) => socket.write(line + "\n"),
				close: () => socket.destroy(),
			});
		});
	});
}

describe("daemon over a Unix socket", () => {
	let home: string;
	let savedHome: string | undefined;
	let proxy: http.Server;
	let daemon: RunningDaemon;
	let socketPath: string;

	beforeEach(async () => {
		savedHome = process.env.EMBER_HOME;
		home = fs.mkdtempSync(path.join(os.tmpdir(), "ember-daemon-"));
		process.env.EMBER_HOME = home;

		proxy = await startProxy();
		socketPath = path.join(home, "ember.sock");
		const configPath = path.join(home, "config", "settings.json");
		fs.mkdirSync(path.dirname(configPath), { recursive: true });
		fs.writeFileSync(
			configPath,
			JSON.stringify({
				proxy_url: `http://127.0.0.1:${proxyPort(proxy)}`,
				socket_path: socketPath,
				skills_dirs: [path.join(home, "skills")],
			}),
		);
		daemon = await startDaemon({ configPath, transports: [] });
	});

	afterEach(async () => {
		await daemon.shutdown();
		await new Promise<void>((resolve) => proxy.close(() => resolve()));
		if (savedHome === undefined) delete process.env.EMBER_HOME;
		else process.env.EMBER_HOME = savedHome;
		fs.rmSync(home, { recursive: true, force: true });
	});

	it("should create a session and stream an answer", async () => {
		const client = await connect(socketPath);
		client.send('{"command":"session","arguments":{"action":"create","session_id":"s1"}}');
		await vi.waitFor(() => expect(client.lines).toHaveLength(1));
		expect(client.lines[0]).toEqual({ event: "created", session_id: "s1", model: "ollama/llama3.2" });

		client.send('{"action":"send","session_id":"s1","message":"hello"}');
		await vi.waitFor(() => expect(client.lines.at(-1)).toMatchObject({ done: true }));
		expect(client.lines.slice(1)).toEqual([
			{ event: "response", session_id: "s1", delta: "Thinking...", done: false },
			{ event: "response", session_id: "s1", delta: "Hello", done: false },
			{ event: "response", session_id: "s1", delta: " there", done: false },
			{ event: "response", session_id: "s1", delta: "", done: true },
		]);

		const historyPath = path.join(home, "sessions", "s1", "history.jsonl");
		await vi.waitFor(() => {
			const records = fs
				.readFileSync(historyPath, "utf-8")
				.trim()
				.split("\n")
				.map((line): unknown => JSON.parse(line));
			expect(records).toEqual([
				expect.objectContaining({ role: "user", content: "hello" }),
				expect.objectContaining({ role: "assistant", content: "Hello there" }),
			]);
		});
		client.close();
	});

	it("should deliver broadcasts to every connection", async () => {
		const a = await connect(socketPath);
		const b = await connect(socketPath);
		await vi.waitFor(() => expect(daemon.context.sessions.subscriberCount).toBe(2));

		daemon.context.sessions.publish({ event: "proactive", session_id: "s1", message: "ping" });
		await vi.waitFor(() => {
			expect(a.lines).toEqual([{ event: "proactive", session_id: "s1", message: "ping" }]);
			expect(b.lines).toEqual([{ event: "proactive", session_id: "s1", message: "ping" }]);
		});
		a.close();
		b.close();
	});

	it("should answer a bad line with an error and keep the connection", async () => {
		const client = await connect(socketPath);
		client.send("this is not json");
		await vi.waitFor(() => expect(client.lines).toHaveLength(1));
		expect(String(client.lines[0].error)).toMatch(/^Invalid JSON or Command format: /);

		client.send('{"command":"session","arguments":{"action":"list"}}');
		await vi.waitFor(() => expect(client.lines).toHaveLength(2));
		expect(client.lines[1]).toEqual({ event: "list", sessions: [] });
		client.close();
	});

	it("should remove the socket file on shutdown", async () => {
		expect(fs.existsSync(socketPath)).toBe(true);
		expect(daemon.server.address).toBe(socketPath);
		await daemon.shutdown();
		expect(fs.existsSync(socketPath)).toBe(false);
		expect(daemon.server.address).toBeNull();
	});
});
