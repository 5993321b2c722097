import { getLog } from "../shared/logger";
import type { CreateTurnOptions, LLMClient, ModelReply, StopReason, ToolCall, ToolDef, ToolOutcome, Turn } from "../Types";
import { type FailureClass, shouldRetryStatus, withRetry } from "./Retry";
import Anthropic, { APIConnectionError, APIError } from "@anthropic-ai/sdk";

const log = getLog(import.meta);

// =============================================================================
// SECTION: Types
// =============================================================================

/** The parts of a Messages API response block the organizer reads */
export interface ResponseBlock {
	type: string;
	text?: string;
	id?: string;
	name?: string;
	input?: unknown;
}

/** The parts of a Messages API response the organizer reads */
export interface MessageResponse {
	content: ReadonlyArray<ResponseBlock>;
	stop_reason: string | null;
	usage?: { input_tokens: number; output_tokens: number };
}

export type CreateMessage = (params: Anthropic.MessageCreateParamsNonStreaming) => Promise<MessageResponse>;

export interface AnthropicClientOptions {
	apiKey: string;
	model: string;
	maxTokens: number;
	maxRetries: number;
	retryBackoffMs: number;
	/** Replaces the SDK call, for tests */
	create?: CreateMessage;
	sleep?: (ms: number) => Promise<void>;
}

// =============================================================================
// SECTION: Request mapping
// =============================================================================

type ContentBlockParam = Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam | Anthropic.ToolResultBlockParam;

function toolResultContent(outcome: ToolOutcome): string {
	if (outcome.status === "error") {
		return JSON.stringify(outcome.error);
	}
	return JSON.stringify(outcome.simulated ? { simulated: true, result: outcome.data } : outcome.data);
}

function turnBlocks(turn: Turn): Array<ContentBlockParam> {
	switch (turn.role) {
		case "user":
			return [{ type: "text", text: turn.text }];
		case "tool_result":
			return [
				{
					type: "tool_result",
					tool_use_id: turn.toolCallId,
					content: toolResultContent(turn.outcome),
					is_error: turn.outcome.status === "error",
				},
			];
		case "model": {
			const blocks: Array<ContentBlockParam> = [];
			if (turn.text?.trim()) {
				blocks.push({ type: "text", text: turn.text });
			}
			for (const call of turn.toolCalls) {
				blocks.push({ type: "tool_use", id: call.id, name: call.name, input: call.arguments });
			}
			return blocks;
		}
	}
}

/**
 * Maps transcript turns to alternating Messages API messages.
 * Consecutive turns of one role share a message, so all results of one model turn travel together.
 * A model turn with nothing to say is left out; the API rejects empty content.
 */
export function toMessageParams(turns: ReadonlyArray<Turn>): Array<Anthropic.MessageParam> {
	const messages: Array<{ role: "user" | "assistant"; content: Array<ContentBlockParam> }> = [];
	for (const turn of turns) {
		const role = turn.role === "model" ? "assistant" : "user";
		const blocks = turnBlocks(turn);
		if (blocks.length === 0) {
			continue;
		}
		const last = messages[messages.length - 1];
		if (last && last.role === role) {
			last.content.push(...blocks);
		} else {
			messages.push({ role, content: blocks });
		}
	}
	return messages;
}

export function toAnthropicTools(tools: ReadonlyArray<ToolDef>): Array<Anthropic.Tool> {
	return tools.map(tool => ({
		name: tool.name,
		description: tool.description,
		input_schema: { ...tool.parameters, type: "object" as const },
	}));
}

// =============================================================================
// SECTION: Response mapping
// =============================================================================

export function normalizeStopReason(stopReason: string | null): StopReason {
	if (stopReason === "tool_use" || stopReason === "end_turn") {
		return stopReason;
	}
	return "other";
}

export function toModelReply(response: MessageResponse): ModelReply {
	const texts: Array<string> = [];
	const toolCalls: Array<ToolCall> = [];

	for (const block of response.content) {
		if (block.type === "text" && typeof block.text === "string") {
			texts.push(block.text);
		} else if (block.type === "tool_use" && typeof block.id === "string" && typeof block.name === "string") {
			toolCalls.push({ id: block.id, name: block.name, arguments: block.input ?? {} });
		}
	}

	const text = texts.join("\n");
	return {
		...(text ? { text } : {}),
		toolCalls,
		stopReason: normalizeStopReason(response.stop_reason),
		...(response.stop_reason ? { providerStopReason: response.stop_reason } : {}),
		...(response.usage
			? { usage: { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens } }
			: {}),
	};
}

export function classifyAnthropicError(err: unknown): FailureClass {
	if (err instanceof APIConnectionError) {
		return { retryable: true };
	}
	if (err instanceof APIError && typeof err.status === "number") {
		return { retryable: shouldRetryStatus(err.status), status: err.status };
	}
	return { retryable: false };
}

// =============================================================================
// SECTION: Client
// =============================================================================

/**
 * LLMClient over the Anthropic Messages API.
 * The SDK's own retries are disabled; failures are classified and retried by withRetry.
 */
export class AnthropicClient implements LLMClient {
	private readonly create: CreateMessage;

	constructor(private readonly options: AnthropicClientOptions) {
		if (options.create) {
			this.create = options.create;
		} else {
			const anthropic = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
			this.create = params => anthropic.messages.create(params);
		}
	}

	async createTurn(opts: CreateTurnOptions): Promise<ModelReply> {
		const params: Anthropic.MessageCreateParamsNonStreaming = {
			model: this.options.model,
			max_tokens: this.options.maxTokens,
			system: opts.system,
			tools: toAnthropicTools(opts.tools),
			messages: toMessageParams(opts.turns),
		};

		const response = await withRetry("Anthropic messages.create", () => this.create(params), {
			maxRetries: this.options.maxRetries,
			backoffMs: this.options.retryBackoffMs,
			classify: classifyAnthropicError,
			...(this.options.sleep ? { sleep: this.options.sleep } : {}),
		});

		const reply = toModelReply(response);
		log.debug(
			"Model replied: stop=%s toolCalls=%d inputTokens=%s outputTokens=%s",
			response.stop_reason,
			reply.toolCalls.length,
			reply.usage?.inputTokens,
			reply.usage?.outputTokens,
		);
		return reply;
	}
}
