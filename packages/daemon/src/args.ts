/**
 * Command line of `ember-daemon`.
 *
 * Usage:
 *   ember-daemon [--config <path>] [--socket <path>] [--log-level <level>]
 *
 * Options:
 *   --config PATH      Settings file. Default: <home>/config/settings.json.
 *   --socket PATH      Socket path for this run; not saved.
 *   --log-level LEVEL  debug, info, warn, error or fatal; not saved.
 *   --help             Print this text and exit.
 */

import type { LogLevelName } from "@ember/core";

export interface DaemonArgs {
	configPath?: string;
	socketPath?: string;
	logLevel?: LogLevelName;
	help?: boolean;
}

export const USAGE = `Usage: ember-daemon [--config <path>] [--socket <path>] [--log-level <level>]

Options:
  --config PATH      Settings file (default: $EMBER_HOME/config/settings.json)
  --socket PATH      Socket path for this run
  --log-level LEVEL  debug, info, warn, error or fatal
  --help             Show this help
`;

const LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error", "fatal"];

function toLevel(value: string): LogLevelName | undefined {
	return LEVELS.find((l) => l === value.toLowerCase());
}

/** Unknown flags and bad values are reported on stderr and ignored. */
export function parseDaemonArgs(argv: string[] = process.argv.slice(2)): DaemonArgs {
	const opts: DaemonArgs = {};

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];

		if (arg === "--config" && i + 1 < argv.length) {
			opts.configPath = argv[++i];
		} else if (arg === "--socket" && i + 1 < argv.length) {
			opts.socketPath = argv[++i];
		} else if (arg === "--log-level" && i + 1 < argv.length) {
			const level = toLevel(argv[++i]);
			if (level) {
				opts.logLevel = level;
			} else {
				process.stderr.write(`Warning: --log-level must be one of ${LEVELS.join(", ")}, got "${argv[i]}". Using settings.\n`);
			}
		} else if (arg === "--help" || arg === "-h") {
			opts.help = true;
		} else {
			process.stderr.write(`Warning: ignoring unknown argument "${arg}".\n`);
		}
	}

	return opts;
}
