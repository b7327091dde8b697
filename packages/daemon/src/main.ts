/**
 * Daemon wiring: settings, logging, skills, gateway, sessions, tools,
 * proactive loop and the socket server, started in that order.
 */

import path from "node:path";
import {
	ConsoleTransport,
	FileTransport,
	configureLogging,
	createLogger,
	defaultSettingsPath,
	expandHome,
	getEmberHome,
	loadSettingsStore,
	parseLogLevel,
} from "@ember/core";
import type { LogTransport, SettingsStore } from "@ember/core";
import { createLlmGateway } from "@ember/llm";
import { SessionManager } from "@ember/sessions";
import { SqliteEmbeddingCache, createSkillCatalog, ensureDefaultSkills, loadSkills } from "@ember/skills";
import { USAGE, parseDaemonArgs } from "./args.js";
import type { DaemonArgs } from "./args.js";
import type { DaemonContext } from "./context.js";
import { startProactiveLoop } from "./proactive.js";
import type { ProactiveLoop } from "./proactive.js";
import { createProtocolServer } from "./server.js";
import type { ProtocolServer } from "./server.js";
import { createToolRunStore } from "./tools/artifacts.js";
import { createToolExecutor } from "./tools/executor.js";

const log = createLogger("daemon");

export interface DaemonOptions extends DaemonArgs {
	/** HTTP client for the LLM proxy. Defaults to the global `fetch`. */
	fetch?: typeof fetch;
	/** Log transports. Defaults to console plus `<home>/logs/ember.log`. */
	transports?: LogTransport[];
}

export interface RunningDaemon {
	context: DaemonContext;
	server: ProtocolServer;
	proactive: ProactiveLoop;
	/** Close the listener, remove the socket, stop timers and close the embedding database. */
	shutdown(): Promise<void>;
}

function applyLogging(settings: SettingsStore, transports: LogTransport[]): void {
	configureLogging({ level: parseLogLevel(settings.current().log_level), transports });
}

/**
 * Start the daemon.
 *
 * @throws When the settings cannot be loaded, the sessions root cannot be
 *   created or the socket cannot be bound.
 */
export async function startDaemon(opts: DaemonOptions = {}): Promise<RunningDaemon> {
	const home = getEmberHome();
	const settings = loadSettingsStore(opts.configPath ?? defaultSettingsPath());
	if (opts.socketPath) settings.set("socket_path", opts.socketPath, { persist: false });
	if (opts.logLevel) settings.set("log_level", opts.logLevel, { persist: false });

	const transports = opts.transports ?? [
		new ConsoleTransport(),
		new FileTransport({ filePath: path.join(home, "logs", "ember.log") }),
	];
	applyLogging(settings, transports);
	settings.onChange((key) => {
		if (key === "log_level") applyLogging(settings, transports);
	});
	log.info("Ember starting up...", { home });

	if (ensureDefaultSkills(path.join(home, "skills"))) {
		log.info("Created default skills", { dir: path.join(home, "skills") });
	}
	const loaded = loadSkills(settings.current().skills_dirs);
	for (const skipped of loaded.skipped) {
		log.warn("Skipped skill", { path: skipped.path, reason: skipped.reason });
	}
	log.info("Loaded skills", { count: loaded.skills.length });

	const gateway = createLlmGateway({ baseUrl: () => settings.current().proxy_url, fetch: opts.fetch });
	const catalog = createSkillCatalog(loaded.skills, {
		embed: (model, text) => gateway.embed(model, text),
		cache: new SqliteEmbeddingCache(path.join(home, "embeddings.db")),
		policy: () => settings.current().embedding_cache_policy,
	});

	const sessions = new SessionManager({
		root: path.join(home, "sessions"),
		defaultModel: () => settings.current().default_model,
		initialSkills: () => settings.current().initial_skills,
	});

	const executor = createToolExecutor({
		catalog,
		store: createToolRunStore(() => expandHome(settings.current().tool_runs_dir)),
		limits: () => {
			const s = settings.current();
			return {
				maxLines: s.tool_output_max_lines,
				maxStderrLines: s.tool_stderr_max_lines,
				timeoutSecs: s.tool_timeout_secs,
			};
		},
	});

	const context: DaemonContext = { settings, sessions, catalog, gateway, executor };
	const server = createProtocolServer({ socketPath: expandHome(settings.current().socket_path), context });
	try {
		await server.listen();
	} catch (err) {
		catalog.close();
		sessions.close();
		throw err;
	}

	const proactive = startProactiveLoop({
		sessions,
		intervalSecs: () => settings.current().proactive_interval_secs,
	});

	let shuttingDown: Promise<void> | undefined;
	const shutdown = () => {
		if (!shuttingDown) {
			shuttingDown = (async () => {
				proactive.stop();
				await server.close();
				sessions.close();
				catalog.close();
				log.info("Shutdown complete.");
			})();
		}
		return shuttingDown;
	};

	return { context, server, proactive, shutdown };
}

/** Process entry point. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
	const args = parseDaemonArgs(argv);
	if (args.help) {
		process.stdout.write(USAGE);
		return;
	}

	let daemon: RunningDaemon;
	try {
		daemon = await startDaemon(args);
	} catch (err) {
		log.fatal("Failed to start daemon", err);
		process.exit(1);
	}

	const onSignal = (signal: NodeJS.Signals) => {
		log.info(`Received ${signal}, shutting down...`);
		void daemon.shutdown().then(
			() => process.exit(0),
			(err: unknown) => {
				log.fatal("Shutdown failed", err);
				process.exit(1);
			},
		);
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);
}
