import type { ToolErrorCode } from "./Errors";

// ---- The LLM ----
// Provider-agnostic request/response shapes used by the loop controller and model clients.

export type StopReason = "tool_use" | "end_turn" | "other";

export type CreateTurnOptions = {
	system: string;
	turns: ReadonlyArray<Turn>;
	tools: ReadonlyArray<ToolDef>;
};

export interface LLMClient {
	createTurn(opts: CreateTurnOptions): Promise<ModelReply>;
}

/** What a model client returns for one request; the transcript turns it into a ModelTurn. */
export type ModelReply = {
	text?: string;
	toolCalls: Array<ToolCall>;
	stopReason: StopReason;
	/** Raw provider stop reason, kept for logs */
	providerStopReason?: string;
	usage?: { inputTokens?: number; outputTokens?: number };
};

// -- Tool Definitions --

export type JSONSchema = Record<string, unknown>;

export type ToolDef = {
	name: string;
	description: string;
	parameters: JSONSchema;
};

export type ToolCall = {
	readonly id: string;
	readonly name: string;
	readonly arguments: unknown;
};

// -- Tool Results --

export type ToolErrorResult = {
	status: "error";
	error: {
		code: ToolErrorCode;
		message: string;
	};
};

export type ToolSuccessResult<T = unknown> = {
	status: "ok";
	data: T;
	/** Set when the dry-run gate answered instead of the filesystem */
	simulated?: true;
};

export type ToolOutcome<T = unknown> = ToolSuccessResult<T> | ToolErrorResult;

// -- Transcript Turns --

export type UserTurn = { readonly role: "user"; readonly text: string };

export type ModelTurn = {
	readonly role: "model";
	readonly text?: string;
	readonly toolCalls: ReadonlyArray<ToolCall>;
	readonly stopReason: StopReason;
};

export type ToolResultTurn = {
	readonly role: "tool_result";
	readonly toolCallId: string;
	readonly toolName: string;
	readonly outcome: ToolOutcome;
};

export type Turn = UserTurn | ModelTurn | ToolResultTurn;
