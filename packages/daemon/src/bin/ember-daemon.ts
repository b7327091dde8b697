#!/usr/bin/env node
/**
 * ember-daemon: start the Ember agent daemon.
 *
 * Usage:
 *   ember-daemon [--config <path>] [--socket <path>] [--log-level <level>]
 */
import { main } from "../main.js";

main().catch((err) => {
	console.error("Fatal:", err);
	process.exit(1);
});
