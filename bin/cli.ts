#!/usr/bin/env -S npx tsx

import {dirname} from "path";
import {fileURLToPath} from "url";
import {Command} from "commander";
import {getLogger} from "@logtape/logtape";
import {
	type ServeCommandOptions,
	cliOverrides,
	serveCommand,
} from "../src/commands/serve.js";
import {ConfigError, DEFAULTS, loadConfig} from "../src/utils/config.js";
import {configureLogging} from "../src/utils/logging.js";
import {readPackageVersion} from "../src/utils/project.js";

const logger = getLogger(["larder", "cli"]);

const program = new Command();

program
	.name("larder")
	.description("Static file server with conditional request support")
	.version(readPackageVersion(dirname(fileURLToPath(import.meta.url))));

/**
 * Serve command - serves a directory over HTTP
 */
program
	.command("serve [root]")
	.description("Serve the files below a directory")
	.option("-p, --port <port>", `Port to listen on (default: ${DEFAULTS.SERVER.PORT})`)
	.option("-h, --host <host>", `Host to bind to (default: ${DEFAULTS.SERVER.HOST})`)
	.option("--mount <path>", "URL path to serve the files under (default: /)")
	.option("--prefix <path>", "Subdirectory of the root to serve")
	.option("--cache-control <value>", "Cache-Control header for served files")
	.option("--no-etag", "Disable ETag generation")
	.option("-v, --verbose", "Verbose logging")
	.action(async (root: string | undefined, options: ServeCommandOptions) => {
		const config = loadConfig(process.cwd(), cliOverrides(root, options));
		await configureLogging({level: config.logLevel});
		await serveCommand(config);
	});

program.parseAsync().catch(async (error: unknown) => {
	if (error instanceof ConfigError) {
		process.stderr.write(`${error.message}\n`);
	} else {
		await configureLogging({level: "error"});
		logger.error("Failed to start: {error}", {error});
	}
	process.exitCode = 1;
});
