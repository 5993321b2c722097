import { type Config, getConfig } from "./config";
import pino from "pino";

// Diagnostics go to stderr. Model text, tool calls and prompts are printed on stdout by the
// console reporter.

const RESET = "\x1b[0m";

const LEVELS: ReadonlyMap<number, { label: string; color: string }> = new Map([
	[10, { label: "TRACE", color: "\x1b[90m" }],
	[20, { label: "DEBUG", color: "\x1b[36m" }],
	[30, { label: "INFO", color: "\x1b[32m" }],
	[40, { label: "WARN", color: "\x1b[33m" }],
	[50, { label: "ERROR", color: "\x1b[31m" }],
	[60, { label: "FATAL", color: "\x1b[35m" }],
]);

interface LogRecord {
	time?: number;
	level?: number;
	module?: string;
	msg?: string;
	err?: { message?: string } | string;
}

/**
 * "file:///…/tools/FileActions.ts" → "FileActions"; a bare name is returned as is.
 */
export function getModuleName(module: string | ImportMeta): string {
	const url = typeof module === "string" ? module : module.url;
	const fileName = url.slice(url.lastIndexOf("/") + 1);
	const dot = fileName.lastIndexOf(".");
	return dot > 0 ? fileName.slice(0, dot) : fileName;
}

function formatTime(timestamp: number): string {
	const date = new Date(timestamp);
	const pad = (n: number) => n.toString().padStart(2, "0");
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Renders one pino JSON record as a single colored line.
 */
export function formatRecord(record: LogRecord): string {
	const level = LEVELS.get(record.level ?? 30);
	const errText =
		record.err === undefined ? "" : ` (${typeof record.err === "string" ? record.err : (record.err.message ?? "")})`;
	return `${level?.color ?? ""}[${formatTime(record.time ?? Date.now())}] ${level?.label ?? "LOG"}${RESET} ${record.module ?? "unknown"} - ${record.msg ?? ""}${errText}\n`;
}

function stderrDestination(): pino.DestinationStream {
	return {
		write(chunk: string): void {
			try {
				process.stderr.write(formatRecord(JSON.parse(chunk)));
			} catch {
				process.stderr.write(chunk);
			}
		},
	};
}

let rootLogger: pino.Logger | undefined;

function resolveLevel(): Config["LOG_LEVEL"] {
	try {
		return getConfig().LOG_LEVEL;
	} catch {
		// A bad environment is reported by the CLI at startup; logging must not fail first
		return "warn";
	}
}

/**
 * Child logger tagged with the calling module, e.g. `const logger = getLog(import.meta)`.
 */
export function getLog(module: string | ImportMeta): pino.Logger {
	if (!rootLogger) {
		rootLogger = pino({ level: resolveLevel() }, stderrDestination());
	}
	return rootLogger.child({ module: getModuleName(module) });
}

export function logError(logger: pino.Logger, err: unknown, message: string): void {
	logger.error({ err: err instanceof Error ? err : String(err) }, message);
}

/** Drops the root logger so the next getLog picks up a changed LOG_LEVEL */
export function resetLogger(): void {
	rootLogger = undefined;
}
