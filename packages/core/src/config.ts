import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError, errorMessage, toError } from "./errors.js";
import { createLogger } from "./observability/logger.js";
import { v, type ValidatorFn } from "./validation.js";

const log = createLogger("core:config");

// ─── Settings Schema ────────────────────────────────────────────────────────

export type LogLevelName = "debug" | "info" | "warn" | "error" | "fatal";
export type EmbeddingCachePolicy = "keep" | "rehash";

/** Daemon settings. Keys are snake_case because they travel on the wire verbatim. */
export interface Settings {
	socket_path: string;
	/** `provider/model` used for new sessions. */
	default_model: string;
	/** `provider/model` used for skill and message embeddings. */
	rag_model: string;
	skills_dirs: string[];
	/** Skills every new session starts with. */
	initial_skills: string[];
	/** Skills never selected dynamically. */
	banned_skills: string[];
	proactive_interval_secs: number;
	log_level: LogLevelName;
	proxy_url: string;
	/** Head of stdout shown to the model before the truncation notice. */
	tool_output_max_lines: number;
	tool_stderr_max_lines: number;
	tool_runs_dir: string;
	tool_timeout_secs: number;
	embedding_cache_policy: EmbeddingCachePolicy;
}

export type SettingKey = keyof Settings;

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
	socket_path: "/tmp/ember.sock",
	default_model: "ollama/llama3.2",
	rag_model: "ollama/nomic-embed-text",
	skills_dirs: ["~/.ember/skills", "/usr/share/ember/skills"],
	initial_skills: [],
	banned_skills: [],
	proactive_interval_secs: 300,
	log_level: "info",
	proxy_url: "http://localhost:8080",
	tool_output_max_lines: 50,
	tool_stderr_max_lines: 10,
	tool_runs_dir: "~/.ember/tool-runs",
	tool_timeout_secs: 120,
	embedding_cache_policy: "keep",
});

const MODEL_ID = /^[^/\s]+\/\S+$/;

const SETTING_VALIDATORS: { [K in SettingKey]: ValidatorFn<Settings[K]> } = {
	socket_path: v.string().min(1).validate,
	default_model: v.string().pattern(MODEL_ID).validate,
	rag_model: v.string().pattern(MODEL_ID).validate,
	skills_dirs: v.array(v.string().min(1).validate).validate,
	initial_skills: v.array(v.string().min(1).validate).validate,
	banned_skills: v.array(v.string().min(1).validate).validate,
	proactive_interval_secs: v.number().integer().min(1).validate,
	log_level: v.oneOf(["debug", "info", "warn", "error", "fatal"] as const).validate,
	proxy_url: v.string().pattern(/^https?:\/\//).validate,
	tool_output_max_lines: v.number().integer().min(1).validate,
	tool_stderr_max_lines: v.number().integer().min(0).validate,
	tool_runs_dir: v.string().min(1).validate,
	tool_timeout_secs: v.number().integer().min(1).validate,
	embedding_cache_policy: v.oneOf(["keep", "rehash"] as const).validate,
};

/** Every setting key, in declaration order. */
export const SETTING_KEYS: readonly SettingKey[] = [
	"socket_path",
	"default_model",
	"rag_model",
	"skills_dirs",
	"initial_skills",
	"banned_skills",
	"proactive_interval_secs",
	"log_level",
	"proxy_url",
	"tool_output_max_lines",
	"tool_stderr_max_lines",
	"tool_runs_dir",
	"tool_timeout_secs",
	"embedding_cache_policy",
];

export function isSettingKey(key: string): key is SettingKey {
	return SETTING_KEYS.some((k) => k === key);
}

function cloneSettings(settings: Readonly<Settings>): Settings {
	return {
		...settings,
		skills_dirs: [...settings.skills_dirs],
		initial_skills: [...settings.initial_skills],
		banned_skills: [...settings.banned_skills],
	};
}

/** Validate `raw` for `key` and write it into `target`. */
function assign<K extends SettingKey>(target: Settings, key: K, raw: unknown): void {
	const result = SETTING_VALIDATORS[key](raw);
	if (!result.valid) {
		throw new ConfigError(`Invalid value for ${key}: ${result.error}`);
	}
	target[key] = result.value;
}

// ─── Paths ──────────────────────────────────────────────────────────────────

function homeDir(): string {
	return process.env.HOME || process.env.USERPROFILE || os.homedir();
}

/**
 * Get the Ember home directory.
 *
 * Honors `EMBER_HOME` when set, otherwise `$HOME/.ember`.
 */
export function getEmberHome(): string {
	const override = process.env.EMBER_HOME?.trim();
	if (override) return override;
	return path.join(homeDir(), ".ember");
}

/**
 * Expand a leading `~` to the user's home directory.
 *
 * `~/.ember` paths resolve under {@link getEmberHome} so that an
 * `EMBER_HOME` override relocates the defaults as well.
 */
export function expandHome(p: string): string {
	if (p === "~") return homeDir();
	if (p.startsWith("~/.ember/") || p === "~/.ember") {
		return path.join(getEmberHome(), p.slice("~/.ember".length));
	}
	if (p.startsWith("~/")) return path.join(homeDir(), p.slice(2));
	return p;
}

/** Default on-disk location of the settings file. */
export function defaultSettingsPath(): string {
	return path.join(getEmberHome(), "config", "settings.json");
}

// ─── Store ──────────────────────────────────────────────────────────────────

export type SettingsListener = (key: SettingKey, value: unknown) => void;

/**
 * The daemon's single configuration handle.
 *
 * Every read goes through the same object that writes mutate. Each
 * persisted `set` is followed by {@link SettingsStore.save}.
 */
export interface SettingsStore {
	/** Backing file, or undefined for an in-memory store. */
	readonly filePath: string | undefined;
	/** Typed snapshot of the current settings. */
	current(): Readonly<Settings>;
	/** @throws {ConfigError} on unknown keys. */
	get(key: string): unknown;
	/**
	 * Validate and store a value, then save.
	 * Pass `{ persist: false }` for run-only overrides (CLI flags).
	 * @throws {ConfigError} on unknown keys or invalid values.
	 */
	set(key: string, value: unknown, opts?: { persist?: boolean }): void;
	keys(): SettingKey[];
	/** Copy of every key and value. */
	all(): Settings;
	save(): void;
	/** Subscribe to changes. Returns an unsubscribe function. */
	onChange(listener: SettingsListener): () => void;
}

/**
 * Create a settings store.
 *
 * @param initial - Values layered over {@link DEFAULT_SETTINGS}; validated.
 * @param filePath - Where {@link SettingsStore.save} writes. Omit for in-memory.
 */
export function createSettingsStore(initial: Record<string, unknown> = {}, filePath?: string): SettingsStore {
	const data = cloneSettings(DEFAULT_SETTINGS);
	for (const [key, value] of Object.entries(initial)) {
		if (!isSettingKey(key)) {
			log.warn("Ignoring unknown setting", { key });
			continue;
		}
		assign(data, key, value);
	}
	const listeners = new Set<SettingsListener>();

	function requireKey(key: string): SettingKey {
		if (!isSettingKey(key)) {
			throw new ConfigError(`Unknown config key: ${key}`);
		}
		return key;
	}

	const store: SettingsStore = {
		filePath,

		current() {
			return data;
		},

		get(key) {
			const k = requireKey(key);
			const value = data[k];
			return Array.isArray(value) ? [...value] : value;
		},

		set(key, value, opts) {
			const k = requireKey(key);
			assign(data, k, value);
			if (opts?.persist !== false) {
				store.save();
			}
			for (const listener of listeners) {
				listener(k, data[k]);
			}
		},

		keys() {
			return [...SETTING_KEYS];
		},

		all() {
			return cloneSettings(data);
		},

		save() {
			if (!filePath) return;
			try {
				fs.mkdirSync(path.dirname(filePath), { recursive: true });
				fs.writeFileSync(filePath, JSON.stringify(data, null, "\t") + "\n", "utf-8");
			} catch (err) {
				throw new ConfigError(`Failed to save settings to ${filePath}: ${errorMessage(err)}`, toError(err));
			}
		},

		onChange(listener) {
			listeners.add(listener);
			return () => {
				listeners.delete(listener);
			};
		},
	};

	return store;
}

/**
 * Load settings from disk, writing defaults first when the file is missing.
 *
 * @throws {ConfigError} if the file exists but is not a JSON object or holds invalid values.
 */
export function loadSettingsStore(filePath: string = defaultSettingsPath()): SettingsStore {
	if (!fs.existsSync(filePath)) {
		const store = createSettingsStore({}, filePath);
		store.save();
		log.info("Created default settings", { path: filePath });
		return store;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${filePath}: ${errorMessage(err)}`, toError(err));
	}
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		throw new ConfigError(`Settings file ${filePath} must contain a JSON object`);
	}
	return createSettingsStore({ ...parsed }, filePath);
}
