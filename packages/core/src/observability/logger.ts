/**
 * Structured logging for Ember.
 *
 * Loggers are named (`"daemon:server"`, `"llm:ollama"`) and carry a bag of
 * context fields. Entries fan out to the configured transports; the daemon
 * installs a console transport and a size-rotated JSON-lines file.
 * Library code only ever calls {@link createLogger}.
 */

import fs from "node:fs";
import path from "node:path";

// ─── Levels ──────────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

interface LevelStyle {
	label: string;
	color: string;
}

const LEVEL_STYLES: Record<LogLevel, LevelStyle> = {
	[LogLevel.DEBUG]: { label: "DEBUG", color: "\x1b[36m" },
	[LogLevel.INFO]: { label: "INFO", color: "\x1b[32m" },
	[LogLevel.WARN]: { label: "WARN", color: "\x1b[33m" },
	[LogLevel.ERROR]: { label: "ERROR", color: "\x1b[31m" },
	[LogLevel.FATAL]: { label: "FATAL", color: "\x1b[35;1m" },
};

const LEVELS_BY_NAME = new Map<string, LogLevel>([
	["debug", LogLevel.DEBUG],
	["info", LogLevel.INFO],
	["warn", LogLevel.WARN],
	["error", LogLevel.ERROR],
	["fatal", LogLevel.FATAL],
]);

/** Level for a name such as `"debug"` or `"WARN"`; undefined when unknown. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
	if (name === undefined) return undefined;
	return LEVELS_BY_NAME.get(name.trim().toLowerCase());
}

// ─── Entries & Transports ────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601. */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	/** Name of the emitting logger. */
	logger: string;
	message: string;
	context: Record<string, unknown>;
	error?: { name: string; message: string; stack?: string };
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Pin this logger's level. Unpinned loggers follow {@link configureLogging}. */
	level?: LogLevel;
	/** Pin this logger's transports. */
	transports?: LogTransport[];
	/** Fields added to every entry. */
	context?: Record<string, unknown>;
}

function toJsonLine(entry: LogEntry): string {
	const record: Record<string, unknown> = {
		timestamp: entry.timestamp,
		level: entry.levelName,
		logger: entry.logger,
		message: entry.message,
	};
	if (Object.keys(entry.context).length > 0) record.context = entry.context;
	if (entry.error) record.error = entry.error;
	return JSON.stringify(record) + "\n";
}

function outputFor(level: LogLevel): NodeJS.WriteStream {
	return level >= LogLevel.ERROR ? process.stderr : process.stdout;
}

/** Human-readable lines; colored when stdout is a TTY. ERROR and above go to stderr. */
export class ConsoleTransport implements LogTransport {
	private readonly colors: boolean;

	constructor(opts: { colors?: boolean } = {}) {
		this.colors = opts.colors ?? process.stdout.isTTY === true;
	}

	write(entry: LogEntry): void {
		const paint = (code: string, text: string) => (this.colors ? `${code}${text}\x1b[0m` : text);
		const parts = [
			paint("\x1b[2m", entry.timestamp.slice(11, 23)),
			paint(LEVEL_STYLES[entry.level].color, entry.levelName.padEnd(5)),
			paint("\x1b[1m", `[${entry.logger}]`),
			entry.message,
		];
		const fields = Object.entries(entry.context).map(([k, val]) => `${k}=${JSON.stringify(val)}`);
		if (fields.length > 0) parts.push(paint("\x1b[2m", fields.join(" ")));

		let text = parts.join(" ");
		if (entry.error) text += `\n  ${entry.error.name}: ${entry.error.message}`;
		outputFor(entry.level).write(text + "\n");
	}
}

export interface FileTransportOptions {
	filePath: string;
	/** Rotate once the file would grow past this. Default 10 MiB. */
	maxSizeBytes?: number;
	/** Rotated generations kept (`.1` is newest). Default 5. */
	maxFiles?: number;
}

/** JSON lines appended to a file, rotated by size. A log call never throws. */
export class FileTransport implements LogTransport {
	private readonly target: string;
	private readonly limit: number;
	private readonly generations: number;
	private size: number;
	private broken = false;

	constructor(opts: FileTransportOptions) {
		this.target = opts.filePath;
		this.limit = opts.maxSizeBytes ?? 10 * 1024 * 1024;
		this.generations = opts.maxFiles ?? 5;
		fs.mkdirSync(path.dirname(this.target), { recursive: true });
		this.size = fs.statSync(this.target, { throwIfNoEntry: false })?.size ?? 0;
	}

	write(entry: LogEntry): void {
		const line = toJsonLine(entry);
		const length = Buffer.byteLength(line);
		try {
			if (this.size > 0 && this.size + length > this.limit) this.rotate();
			fs.appendFileSync(this.target, line);
			this.size += length;
			this.broken = false;
		} catch (err) {
			this.complain(err);
		}
	}

	private rotate(): void {
		for (let gen = this.generations - 1; gen >= 1; gen--) {
			const older = `${this.target}.${gen}`;
			if (fs.existsSync(older)) fs.renameSync(older, `${this.target}.${gen + 1}`);
		}
		fs.renameSync(this.target, `${this.target}.1`);
		this.size = 0;
	}

	/** One stderr notice per streak of failures. */
	private complain(err: unknown): void {
		if (this.broken) return;
		this.broken = true;
		const reason = err instanceof Error ? err.message : String(err);
		process.stderr.write(`log file ${this.target} unavailable: ${reason}\n`);
	}
}

// ─── Global Defaults ─────────────────────────────────────────────────────────

let defaults: Pick<LoggerConfig, "level" | "transports"> = {};
const registry = new Set<WeakRef<Logger>>();

/**
 * Replace the global level and transports.
 *
 * Every live logger that did not pin its own values picks the change up,
 * so a `log_level` edit at runtime applies at once.
 */
export function configureLogging(config: Pick<LoggerConfig, "level" | "transports">): void {
	defaults = { ...config };
	for (const ref of registry) {
		const logger = ref.deref();
		if (logger) logger.refresh();
		else registry.delete(ref);
	}
}

/** Back to console output at INFO. */
export function resetLoggingConfig(): void {
	configureLogging({});
}

/** `LOG_LEVEL` wins, then the logger's pinned level, then the global one. */
function effectiveLevel(pinned: LogLevel | undefined): LogLevel {
	return parseLogLevel(process.env.LOG_LEVEL) ?? pinned ?? defaults.level ?? LogLevel.INFO;
}

function effectiveTransports(pinned: LogTransport[] | undefined): LogTransport[] {
	return pinned ?? defaults.transports ?? [new ConsoleTransport()];
}

function describeError(error: unknown): LogEntry["error"] {
	if (error instanceof Error) return { name: error.name, message: error.message, stack: error.stack };
	return { name: "Error", message: String(error) };
}

// ─── Logger ──────────────────────────────────────────────────────────────────

export class Logger {
	private level: LogLevel;
	private sinks: LogTransport[];
	private readonly fields: Record<string, unknown>;

	constructor(
		private readonly name: string,
		private readonly pinned: LoggerConfig = {},
	) {
		this.level = effectiveLevel(pinned.level);
		this.sinks = effectiveTransports(pinned.transports);
		this.fields = { ...pinned.context };
		registry.add(new WeakRef(this));
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log(LogLevel.DEBUG, message, undefined, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log(LogLevel.INFO, message, undefined, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log(LogLevel.WARN, message, undefined, context);
	}

	error(message: string, error?: unknown, context?: Record<string, unknown>): void {
		this.log(LogLevel.ERROR, message, error, context);
	}

	fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
		this.log(LogLevel.FATAL, message, error, context);
	}

	/** `<name>:<suffix>`, same pins and context. */
	child(suffix: string): Logger {
		return new Logger(`${this.name}:${suffix}`, { ...this.pinned, context: { ...this.fields } });
	}

	/** Same name with extra context fields. */
	withContext(context: Record<string, unknown>): Logger {
		return new Logger(this.name, { ...this.pinned, context: { ...this.fields, ...context } });
	}

	getLevel(): LogLevel {
		return this.level;
	}

	/** @internal Called by {@link configureLogging}. */
	refresh(): void {
		this.level = effectiveLevel(this.pinned.level);
		this.sinks = effectiveTransports(this.pinned.transports);
	}

	private log(level: LogLevel, message: string, error: unknown, context?: Record<string, unknown>): void {
		if (level < this.level) return;
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LEVEL_STYLES[level].label,
			logger: this.name,
			message,
			context: { ...this.fields, ...context },
		};
		if (error !== undefined) entry.error = describeError(error);
		for (const sink of this.sinks) sink.write(entry);
	}
}

/** Named logger following the global configuration. */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
