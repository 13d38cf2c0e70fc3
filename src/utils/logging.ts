/**
 * Logging setup for the CLI. Library packages only create loggers; sinks
 * are configured here, once, by the process entry point.
 */

import {configure, getConsoleSink} from "@logtape/logtape";
import type {LogLevel} from "./config.js";

export interface LoggingOptions {
	/** Lowest level logged under the "larder" category */
	level: LogLevel;
	/** Replace an existing configuration (default: true) */
	reset?: boolean;
}

export async function configureLogging(options: LoggingOptions): Promise<void> {
	await configure({
		reset: options.reset !== false,
		sinks: {console: getConsoleSink()},
		loggers: [
			{category: ["larder"], lowestLevel: options.level, sinks: ["console"]},
			{category: ["logtape", "meta"], lowestLevel: "warning", sinks: []},
		],
	});
}
