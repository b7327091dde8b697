/**
 * SessionManager: registry of live sessions plus the broadcast channel.
 *
 * The registry map has its own read/write lock; each session carries
 * another, so work on one session never blocks the others.
 */

import fs from "node:fs";
import path from "node:path";
import { Broadcaster, DEFAULT_BROADCAST_CAPACITY, RwLock, SessionError, createLogger, errorMessage, toError } from "@ember/core";
import type { Subscription } from "@ember/core";
import { Session } from "./session.js";
import { isValidSessionId } from "./transcript-store.js";

const log = createLogger("sessions:manager");

/** Out-of-band event sent to every connection. */
export type BroadcastEvent = Record<string, unknown>;

export interface SessionManagerOptions {
	/** `<home>/sessions`. Created on construction. */
	root: string;
	/** Read when a session is created. */
	defaultModel: () => string;
	/** Read when a session is created. */
	initialSkills?: () => readonly string[];
	/** Per-subscriber backlog. */
	broadcastCapacity?: number;
}

export class SessionManager {
	readonly root: string;
	private readonly sessions = new Map<string, Session>();
	private readonly lock = new RwLock();
	private readonly broadcaster: Broadcaster<BroadcastEvent>;
	private readonly options: SessionManagerOptions;

	/** @throws {SessionError} When the sessions root cannot be created. */
	constructor(options: SessionManagerOptions) {
		this.options = options;
		this.root = options.root;
		this.broadcaster = new Broadcaster(options.broadcastCapacity ?? DEFAULT_BROADCAST_CAPACITY);
		try {
			fs.mkdirSync(this.root, { recursive: true });
		} catch (err) {
			throw new SessionError(`Failed to create sessions root ${this.root}: ${errorMessage(err)}`, toError(err));
		}
	}

	/**
	 * Return the live session for `id`, loading or creating it on first use.
	 *
	 * @param model - Model for a newly created session; ignored if it exists.
	 */
	async getOrCreate(id: string, model?: string): Promise<Session> {
		const existing = await this.lock.read(() => this.sessions.get(id));
		if (existing) return existing;

		return this.lock.write(() => {
			const raced = this.sessions.get(id);
			if (raced) return raced;

			const session = Session.open(this.root, id, {
				model: model ?? this.options.defaultModel(),
				initialSkills: this.options.initialSkills?.() ?? [],
			});
			this.sessions.set(id, session);
			return session;
		});
	}

	/** The live session, if loaded. */
	async get(id: string): Promise<Session | undefined> {
		return this.lock.read(() => this.sessions.get(id));
	}

	/** Session ids on disk, then in-memory ids not yet on disk. */
	async list(): Promise<string[]> {
		const ids: string[] = [];
		try {
			const entries = fs.readdirSync(this.root, { withFileTypes: true });
			for (const entry of entries) {
				if (entry.isDirectory()) ids.push(entry.name);
			}
			ids.sort();
		} catch (err) {
			throw new SessionError(`Failed to list sessions in ${this.root}: ${errorMessage(err)}`, toError(err));
		}

		return this.lock.read(() => {
			for (const id of this.sessions.keys()) {
				if (!ids.includes(id)) ids.push(id);
			}
			return ids;
		});
	}

	/** Drop the session from memory, then delete its directory. Idempotent. */
	async delete(id: string): Promise<void> {
		if (!isValidSessionId(id)) {
			throw new SessionError(`Invalid session id: ${id}`);
		}
		await this.lock.write(() => {
			this.sessions.delete(id);
		});

		const dir = path.join(this.root, id);
		try {
			fs.rmSync(dir, { recursive: true, force: true });
		} catch (err) {
			throw new SessionError(`Failed to delete session ${id}: ${errorMessage(err)}`, toError(err));
		}
		log.info("Deleted session", { sessionId: id });
	}

	/** In-memory ids in load order. */
	ids(): string[] {
		return [...this.sessions.keys()];
	}

	// ─── Broadcast ──────────────────────────────────────────────────────────

	/** @returns the number of subscribers reached. */
	publish(event: BroadcastEvent): number {
		return this.broadcaster.publish(event);
	}

	subscribe(): Subscription<BroadcastEvent> {
		return this.broadcaster.subscribe();
	}

	get subscriberCount(): number {
		return this.broadcaster.subscriberCount;
	}

	/** End every subscription. */
	close(): void {
		this.broadcaster.close();
	}
}
