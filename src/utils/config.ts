/**
 * Configuration loading
 *
 * Sources, highest precedence first:
 * - CLI options
 * - larder.json, or the "larder" key of package.json
 * - environment variables (LARDER_ROOT, LARDER_MOUNT, LARDER_PREFIX, PORT,
 *   HOST, LARDER_LOG_LEVEL, LARDER_CACHE_CONTROL, LARDER_ETAG)
 * - DEFAULTS
 */

import {readFileSync} from "fs";
import {join} from "path";
import {isSafeSegment, splitPath} from "@larder/filesystem";
import {z} from "zod";

/**
 * Default configuration constants
 * Used as CLI option defaults and internal constants
 */
export const DEFAULTS = {
	SERVER: {
		PORT: 3000,
		HOST: "localhost",
	},
	ROOT: ".",
	MOUNT: "/",
	LOG_LEVEL: "info",
} as const;

export const LOG_LEVELS = ["debug", "info", "warning", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const ENV_KEYS = {
	root: "LARDER_ROOT",
	mount: "LARDER_MOUNT",
	prefix: "LARDER_PREFIX",
	port: "PORT",
	host: "HOST",
	logLevel: "LARDER_LOG_LEVEL",
	cacheControl: "LARDER_CACHE_CONTROL",
	etag: "LARDER_ETAG",
} as const;

type ConfigKey = keyof typeof ENV_KEYS;

const CONFIG_KEYS = Object.keys(ENV_KEYS).filter(
	(key): key is ConfigKey => key in ENV_KEYS,
);

const segments = z
	.string()
	.transform(splitPath)
	.refine((path) => path.every(isSafeSegment), {
		message: "Path segments must not be empty, '.', '..' or contain separators",
	});

const ConfigSchema = z.object({
	root: z.string().min(1),
	mount: segments,
	prefix: segments,
	port: z.coerce.number().int().min(0).max(65535),
	host: z.string().min(1),
	logLevel: z.enum(LOG_LEVELS),
	cacheControl: z.string().min(1).optional(),
	etag: z.union([
		z.boolean(),
		z.enum(["true", "false"]).transform((value) => value === "true"),
	]),
});

export type LarderConfig = z.output<typeof ConfigSchema>;

/** Unvalidated values for any subset of the config keys */
export type ConfigInput = Partial<Record<ConfigKey, unknown>>;

export class ConfigError extends Error {
	readonly issues: readonly string[];

	constructor(issues: readonly string[]) {
		super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

/**
 * Read the JSON config for a project directory: larder.json if present,
 * otherwise the "larder" key of package.json, otherwise nothing.
 */
export function readConfigFile(cwd: string): ConfigInput {
	const standalone = readJSON(join(cwd, "larder.json"));
	if (standalone !== undefined) {
		return toConfigInput(standalone, "larder.json");
	}

	const pkgJSON = readJSON(join(cwd, "package.json"));
	if (isRecord(pkgJSON) && pkgJSON.larder !== undefined) {
		return toConfigInput(pkgJSON.larder, "package.json#larder");
	}

	return {};
}

/**
 * Load and validate the configuration.
 *
 * @throws ConfigError when a value fails validation
 */
export function loadConfig(
	cwd: string,
	overrides: ConfigInput = {},
	env: Record<string, string | undefined> = process.env,
): LarderConfig {
	const file = readConfigFile(cwd);
	const raw: ConfigInput = {};
	for (const key of CONFIG_KEYS) {
		const fromEnv = env[ENV_KEYS[key]];
		raw[key] =
			overrides[key] ?? file[key] ?? (fromEnv === "" ? undefined : fromEnv);
	}

	const result = ConfigSchema.safeParse({
		root: raw.root ?? DEFAULTS.ROOT,
		mount: raw.mount ?? DEFAULTS.MOUNT,
		prefix: raw.prefix ?? "",
		port: raw.port ?? DEFAULTS.SERVER.PORT,
		host: raw.host ?? DEFAULTS.SERVER.HOST,
		logLevel: raw.logLevel ?? DEFAULTS.LOG_LEVEL,
		cacheControl: raw.cacheControl,
		etag: raw.etag ?? true,
	});
	if (!result.success) {
		throw new ConfigError(
			result.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		);
	}

	return result.data;
}

function readJSON(path: string): unknown {
	let content: string;
	try {
		content = readFileSync(path, "utf-8");
	} catch (error) {
		// Only a missing file falls through to the next source
		if (isRecord(error) && error.code === "ENOENT") {
			return undefined;
		}
		throw error;
	}

	try {
		return JSON.parse(content);
	} catch (error) {
		throw new ConfigError([`${path}: ${String(error)}`]);
	}
}

function toConfigInput(value: unknown, source: string): ConfigInput {
	if (!isRecord(value)) {
		throw new ConfigError([`${source}: expected an object`]);
	}

	const unknownKeys = Object.keys(value).filter(
		(key) => !CONFIG_KEYS.some((known) => known === key),
	);
	if (unknownKeys.length > 0) {
		throw new ConfigError(
			unknownKeys.map((key) => `${source}: unknown key "${key}"`),
		);
	}

	const input: ConfigInput = {};
	for (const key of CONFIG_KEYS) {
		input[key] = value[key];
	}
	return input;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
