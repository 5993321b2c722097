import { version } from "../package.json";
import { type Confirmer, ConfirmationGate } from "./agent/ConfirmationGate";
import { LoopController } from "./agent/LoopController";
import { COLORS, ConsoleReporter, type Print, printColored } from "./console/ConsoleReporter";
import { ReadlineConfirmer } from "./console/ReadlineConfirmer";
import { ConfigError, errnoCode, errorMessage, OrganizerError } from "./Errors";
import { AnthropicClient } from "./providers/AnthropicClient";
import { type Config, loadOrganizerConfig, type OrganizerConfig } from "./shared/config";
import { getLog } from "./shared/logger";
import { createToolRegistry } from "./tools/ToolRegistry";
import { ORGANIZER_TOOLS } from "./tools/Tools";
import type { LLMClient } from "./Types";
import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";

const logger = getLog(import.meta);

// =============================================================================
// SECTION: Types
// =============================================================================

export interface OrganizeOptions {
	dryRun?: boolean;
	model?: string;
	maxIterations?: number;
}

/**
 * Seams for tests; each defaults to the real implementation.
 */
export interface OrganizeDeps {
	createClient?: (config: OrganizerConfig) => LLMClient;
	confirmer?: Confirmer;
	print?: Print;
	env?: Config;
}

// =============================================================================
// SECTION: Startup checks
// =============================================================================

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return parsed;
}

/**
 * The target must exist, be a directory, and be readable and traversable.
 */
async function checkDirectory(directory: string): Promise<void> {
	const absolute = path.resolve(directory);
	let isDirectory: boolean;
	try {
		isDirectory = (await stat(absolute)).isDirectory();
	} catch (err) {
		const code = errnoCode(err);
		if (code === "ENOENT" || code === "ENOTDIR") {
			throw new ConfigError(`Directory not found: ${directory}`);
		}
		throw new ConfigError(`Cannot access ${directory}: ${errorMessage(err)}`);
	}
	if (!isDirectory) {
		throw new ConfigError(`Not a directory: ${directory}`);
	}
	try {
		await access(absolute, constants.R_OK | constants.X_OK);
	} catch {
		throw new ConfigError(`Directory is not readable: ${directory}`);
	}
}

function createAnthropicClient(config: OrganizerConfig): LLMClient {
	return new AnthropicClient({
		apiKey: config.apiKey,
		model: config.model,
		maxTokens: config.maxTokens,
		maxRetries: config.maxRetries,
		retryBackoffMs: config.retryBackoffMs,
	});
}

// =============================================================================
// SECTION: Organize
// =============================================================================

/**
 * Runs the organizer on a directory and returns the process exit code.
 */
export async function organize(directory: string, options: OrganizeOptions, deps: OrganizeDeps = {}): Promise<number> {
	const print = deps.print ?? console.log;

	let config: OrganizerConfig;
	try {
		await checkDirectory(directory);
		config = loadOrganizerConfig({
			directory,
			dryRun: options.dryRun === true,
			overrides: {
				...(options.model ? { model: options.model } : {}),
				...(options.maxIterations !== undefined ? { maxIterations: options.maxIterations } : {}),
			},
			...(deps.env ? { env: deps.env } : {}),
		});
	} catch (err) {
		if (err instanceof OrganizerError) {
			printColored(COLORS.red, "[Error]", `${err.code}: ${err.message}`, print);
			return 1;
		}
		throw err;
	}

	logger.info("Organizing %s (mode=%s, model=%s)", directory, config.mode, config.model);

	const confirmer = deps.confirmer ?? new ReadlineConfirmer();

	const reporter = new ConsoleReporter(config.mode, print);
	const controller = new LoopController({
		config,
		client: (deps.createClient ?? createAnthropicClient)(config),
		registry: createToolRegistry(ORGANIZER_TOOLS),
		gate: new ConfirmationGate(config.mode, confirmer),
		observer: reporter,
	});

	reporter.start(directory);
	try {
		const outcome = await controller.run();
		reporter.finish(outcome);
		return outcome.status === "done" ? 0 : 1;
	} finally {
		if (confirmer instanceof ReadlineConfirmer) {
			confirmer.close();
		}
	}
}

// =============================================================================
// SECTION: Program
// =============================================================================

export function createProgram(deps: OrganizeDeps = {}): Command {
	const program = new Command();
	program
		.name("folder-agent")
		.description("Organize the files of a directory with an AI agent")
		.version(version)
		.argument("<directory>", "Directory to organize")
		.option("--dry-run", "Preview the plan without moving files or creating folders")
		.option("--model <id>", "Model to plan with (overrides ORGANIZER_MODEL)")
		.option("--max-iterations <n>", "Maximum model turns before giving up", parsePositiveInt)
		.action(async (directory: string, options: OrganizeOptions) => {
			process.exitCode = await organize(directory, options, deps);
		});
	return program;
}
