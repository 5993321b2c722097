/**
 * Error taxonomy of the organizer.
 *
 * Tool-level failures (validation, not found, conflict, declined, I/O) are reported back to the
 * model as tool results and never abort a run. Run-level failures (transport, protocol, runaway
 * loop, configuration) end the run.
 */

export const TOOL_ERROR_CODES = [
	"VALIDATION_ERROR",
	"NOT_FOUND",
	"NOT_A_DIRECTORY",
	"PATH_CONFLICT",
	"USER_DECLINED",
	"PROTOCOL_ERROR",
	"IO_ERROR",
] as const;

export type ToolErrorCode = (typeof TOOL_ERROR_CODES)[number];

const toolErrorCodes: ReadonlySet<string> = new Set(TOOL_ERROR_CODES);

export function isToolErrorCode(code: string): code is ToolErrorCode {
	return toolErrorCodes.has(code);
}

export type RunErrorCode = "TRANSPORT_ERROR" | "PROTOCOL_ERROR" | "RUNAWAY_LOOP" | "CONFIG_ERROR" | "INTERNAL_ERROR";

export type OrganizerErrorCode = ToolErrorCode | RunErrorCode;

export class OrganizerError extends Error {
	readonly code: OrganizerErrorCode;
	readonly details: Record<string, unknown>;

	constructor(code: OrganizerErrorCode, message: string, details: Record<string, unknown> = {}) {
		super(message);
		this.name = "OrganizerError";
		this.code = code;
		this.details = details;
	}
}

export class ValidationError extends OrganizerError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("VALIDATION_ERROR", message, details);
		this.name = "ValidationError";
	}
}

export class NotFoundError extends OrganizerError {
	constructor(path: string) {
		super("NOT_FOUND", `No such file or directory: ${path}`, { path });
		this.name = "NotFoundError";
	}
}

export class NotADirectoryError extends OrganizerError {
	constructor(path: string) {
		super("NOT_A_DIRECTORY", `Not a directory: ${path}`, { path });
		this.name = "NotADirectoryError";
	}
}

export class PathConflictError extends OrganizerError {
	constructor(message: string, path: string) {
		super("PATH_CONFLICT", message, { path });
		this.name = "PathConflictError";
	}
}

export class UserDeclinedError extends OrganizerError {
	constructor(toolName: string) {
		super("USER_DECLINED", `The user declined ${toolName}. Do not retry the same action; adjust the plan instead.`, {
			toolName,
		});
		this.name = "UserDeclinedError";
	}
}

export class TransportError extends OrganizerError {
	readonly status: number | undefined;
	readonly attempts: number;

	constructor(message: string, options: { status?: number; attempts: number; cause?: unknown }) {
		super("TRANSPORT_ERROR", message, { status: options.status, attempts: options.attempts });
		this.name = "TransportError";
		this.status = options.status;
		this.attempts = options.attempts;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

export class ProtocolError extends OrganizerError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("PROTOCOL_ERROR", message, details);
		this.name = "ProtocolError";
	}
}

export class RunawayLoopError extends OrganizerError {
	constructor(maxIterations: number) {
		super("RUNAWAY_LOOP", `Stopped after ${maxIterations} model turns without the model finishing.`, {
			maxIterations,
		});
		this.name = "RunawayLoopError";
	}
}

export class ConfigError extends OrganizerError {
	constructor(message: string) {
		super("CONFIG_ERROR", message);
		this.name = "ConfigError";
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/** The errno code ("ENOENT", "EXDEV", ...) of a failed filesystem call */
export function errnoCode(err: unknown): string | undefined {
	if (err instanceof Error && "code" in err && typeof err.code === "string") {
		return err.code;
	}
	return;
}
