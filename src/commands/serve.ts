import {statSync} from "fs";
import {resolve} from "path";
import {getLogger} from "@logtape/logtape";
import {NodePlatform, type Server} from "@larder/platform-node";
import {type Middleware, staticFiles} from "@larder/staticfiles";
import type {ConfigInput, LarderConfig} from "../utils/config.js";

const logger = getLogger(["larder", "cli"]);

/** Options as commander parses them for `larder serve` */
export interface ServeCommandOptions {
	port?: string;
	host?: string;
	mount?: string;
	prefix?: string;
	cacheControl?: string;
	/** false only when --no-etag was given */
	etag?: boolean;
	verbose?: boolean;
}

/**
 * Map parsed CLI arguments onto config keys. Options that were not given
 * stay undefined so lower-precedence sources apply.
 */
export function cliOverrides(
	root: string | undefined,
	options: ServeCommandOptions,
): ConfigInput {
	return {
		root,
		port: options.port,
		host: options.host,
		mount: options.mount,
		prefix: options.prefix,
		cacheControl: options.cacheControl,
		etag: options.etag === false ? false : undefined,
		logLevel: options.verbose ? "debug" : undefined,
	};
}

export function createServeHandler(
	config: LarderConfig,
	cwd: string = process.cwd(),
): Middleware {
	return staticFiles({
		root: resolve(cwd, config.root),
		resourcePrefix: config.prefix,
		mount: config.mount,
		etag: config.etag,
		cacheControl: config.cacheControl,
	});
}

export async function serveCommand(
	config: LarderConfig,
	cwd: string = process.cwd(),
): Promise<Server> {
	const root = resolve(cwd, config.root);
	if (!isDirectory(root)) {
		logger.warn("Root {root} is not a directory; every request will 404", {
			root,
		});
	}

	const platform = new NodePlatform({port: config.port, host: config.host});
	const server = platform.createServer(createServeHandler(config, cwd));
	await server.listen();
	logger.info("Serving {root} at {url}", {
		root,
		url: `${server.url}/${config.mount.map(encodeURIComponent).join("/")}`,
	});

	const shutdown = (signal: NodeJS.Signals) => {
		logger.info("Received {signal}, shutting down", {signal});
		server.close().then(
			() => process.exit(0),
			(error: unknown) => {
				logger.error("Failed to close server: {error}", {error});
				process.exit(1);
			},
		);
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	return server;
}

function isDirectory(path: string): boolean {
	try {
		return statSync(path).isDirectory();
	} catch (error) {
		logger.debug("Cannot stat {path}: {error}", {path, error});
		return false;
	}
}
