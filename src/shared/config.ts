import { ConfigError } from "../Errors";
import { join } from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

export const DEFAULT_MODEL = "claude-sonnet-4-20250514";

/**
 * Integer schema that accepts numeric strings from the environment
 */
function positiveInt(defaultValue: number) {
	return z.coerce.number().int().positive().default(defaultValue);
}

/**
 * Configuration schema definition
 */
const configSchema = {
	// Model-service credential. Optional here; required by loadOrganizerConfig at startup.
	ANTHROPIC_API_KEY: z.string().trim().min(1).optional(),

	// Model used for planning
	ORGANIZER_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),

	// Maximum output tokens for a single model turn
	ORGANIZER_MAX_TOKENS: positiveInt(4096),

	// Hard ceiling on model round trips in one run
	ORGANIZER_MAX_ITERATIONS: positiveInt(25),

	// Retries for a failed model request (0 disables retrying)
	ORGANIZER_MAX_RETRIES: z.coerce.number().int().min(0).default(3),

	// Base delay before the first retry, doubled on each following attempt
	ORGANIZER_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),

	// Log level for pino logger
	LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("warn"),
};

type ConfigSchema = typeof configSchema;
export type Config = {
	[K in keyof ConfigSchema]: z.infer<ConfigSchema[K]>;
};

/**
 * Load environment variables from .env files in the working directory.
 * Priority (highest to lowest):
 * 1. Process environment variables (e.g., from shell)
 * 2. .env.local
 * 3. .env
 */
function loadEnvFiles(): void {
	dotenv.config({ path: join(process.cwd(), ".env.local"), override: false, quiet: true });
	dotenv.config({ path: join(process.cwd(), ".env"), override: false, quiet: true });
}

function getEnvValue(key: string): string | undefined {
	const envValue = process.env[key];
	// Treat empty string as undefined so defaults apply
	return envValue === "" ? undefined : envValue;
}

function parseValue<S extends z.ZodTypeAny>(key: keyof ConfigSchema, schema: S): z.output<S> {
	const result = schema.safeParse(getEnvValue(key));
	if (!result.success) {
		const issue = result.error.issues[0]?.message ?? "invalid value";
		throw new ConfigError(`Invalid ${key}: ${issue}`);
	}
	return result.data;
}

/**
 * Parse environment variables and return validated config
 */
function createConfig(): Config {
	loadEnvFiles();

	return {
		ANTHROPIC_API_KEY: parseValue("ANTHROPIC_API_KEY", configSchema.ANTHROPIC_API_KEY),
		ORGANIZER_MODEL: parseValue("ORGANIZER_MODEL", configSchema.ORGANIZER_MODEL),
		ORGANIZER_MAX_TOKENS: parseValue("ORGANIZER_MAX_TOKENS", configSchema.ORGANIZER_MAX_TOKENS),
		ORGANIZER_MAX_ITERATIONS: parseValue("ORGANIZER_MAX_ITERATIONS", configSchema.ORGANIZER_MAX_ITERATIONS),
		ORGANIZER_MAX_RETRIES: parseValue("ORGANIZER_MAX_RETRIES", configSchema.ORGANIZER_MAX_RETRIES),
		ORGANIZER_RETRY_BACKOFF_MS: parseValue("ORGANIZER_RETRY_BACKOFF_MS", configSchema.ORGANIZER_RETRY_BACKOFF_MS),
		LOG_LEVEL: parseValue("LOG_LEVEL", configSchema.LOG_LEVEL),
	};
}

/**
 * Cached config instance
 */
let currentConfig: Config | undefined;

/**
 * Gets the current configuration object.
 * Config is created on first access and cached.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Resets the config cache (useful for testing)
 */
export function resetConfig(): void {
	currentConfig = undefined;
}

// =============================================================================
// Run configuration
// =============================================================================

export type Mode = "live" | "dry_run";

/**
 * Everything one organizer run needs, fixed for the run's duration.
 */
export interface OrganizerConfig {
	readonly directory: string;
	readonly mode: Mode;
	readonly apiKey: string;
	readonly model: string;
	readonly maxTokens: number;
	readonly maxIterations: number;
	readonly maxRetries: number;
	readonly retryBackoffMs: number;
}

export interface OrganizerOverrides {
	readonly model?: string;
	readonly maxIterations?: number;
}

/**
 * Combines the environment config with command-line choices into a frozen run config.
 * Throws ConfigError when the credential is missing.
 */
export function loadOrganizerConfig(params: {
	directory: string;
	dryRun: boolean;
	overrides?: OrganizerOverrides;
	env?: Config;
}): OrganizerConfig {
	const env = params.env ?? getConfig();
	if (!env.ANTHROPIC_API_KEY) {
		throw new ConfigError(
			"Missing ANTHROPIC_API_KEY. Export it in your shell or add ANTHROPIC_API_KEY=your_key to .env or .env.local.",
		);
	}

	const maxIterations = params.overrides?.maxIterations ?? env.ORGANIZER_MAX_ITERATIONS;
	if (!Number.isInteger(maxIterations) || maxIterations < 1) {
		throw new ConfigError(`Invalid max iterations: ${maxIterations}`);
	}

	const config: OrganizerConfig = {
		directory: params.directory,
		mode: params.dryRun ? "dry_run" : "live",
		apiKey: env.ANTHROPIC_API_KEY,
		model: params.overrides?.model ?? env.ORGANIZER_MODEL,
		maxTokens: env.ORGANIZER_MAX_TOKENS,
		maxIterations,
		maxRetries: env.ORGANIZER_MAX_RETRIES,
		retryBackoffMs: env.ORGANIZER_RETRY_BACKOFF_MS,
	};
	return Object.freeze(config);
}
