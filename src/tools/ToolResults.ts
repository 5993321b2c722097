import { errorMessage, isToolErrorCode, OrganizerError } from "../Errors";
import { getLog, logError } from "../shared/logger";
import type { ToolErrorResult, ToolSuccessResult } from "../Types";

const logger = getLog(import.meta);

export function toolSuccess<T>(data: T): ToolSuccessResult<T> {
	return { status: "ok", data };
}

export function simulatedSuccess<T>(data: T): ToolSuccessResult<T> {
	return { status: "ok", data, simulated: true };
}

/**
 * Converts a thrown error into the structured error the model sees.
 * Anything outside the tool error taxonomy is an unexpected I/O failure and is logged.
 */
export function toolFailure(err: unknown): ToolErrorResult {
	if (err instanceof OrganizerError && isToolErrorCode(err.code)) {
		return { status: "error", error: { code: err.code, message: err.message } };
	}
	logError(logger, err, "Tool action failed unexpectedly");
	return { status: "error", error: { code: "IO_ERROR", message: errorMessage(err) } };
}
