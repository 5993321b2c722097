import { ProtocolError } from "../Errors";
import type { ModelReply, ModelTurn, ToolCall, ToolOutcome, ToolResultTurn, Turn, UserTurn } from "../Types";

/**
 * Append-only conversation record of one run.
 *
 * Every tool call of a model turn must be answered by exactly one tool result before the model is
 * asked again; the transcript refuses any sequence that breaks this.
 */
export class Transcript {
	private readonly entries: Array<Turn> = [];
	private readonly pending = new Map<string, string>();

	get turns(): ReadonlyArray<Turn> {
		return Object.freeze([...this.entries]);
	}

	get length(): number {
		return this.entries.length;
	}

	appendUser(text: string): void {
		this.assertComplete();
		const turn: UserTurn = { role: "user", text };
		this.entries.push(Object.freeze(turn));
	}

	appendModel(reply: ModelReply): ModelTurn {
		this.assertComplete();

		const toolCalls = reply.toolCalls.map(call =>
			Object.freeze({ id: call.id, name: call.name, arguments: deepFreeze(call.arguments) }),
		);
		const ids = new Set<string>();
		for (const call of toolCalls) {
			if (ids.has(call.id)) {
				throw new ProtocolError(`Duplicate tool call id in one response: ${call.id}`, { toolCallId: call.id });
			}
			ids.add(call.id);
		}

		const turn: ModelTurn = {
			role: "model",
			...(reply.text !== undefined ? { text: reply.text } : {}),
			toolCalls: Object.freeze(toolCalls),
			stopReason: reply.stopReason,
		};
		this.entries.push(Object.freeze(turn));
		for (const call of toolCalls) {
			this.pending.set(call.id, call.name);
		}
		return turn;
	}

	appendToolResult(call: ToolCall, outcome: ToolOutcome): void {
		if (!this.pending.has(call.id)) {
			throw new ProtocolError(`No unanswered tool call with id ${call.id}`, { toolCallId: call.id });
		}
		this.pending.delete(call.id);
		const turn: ToolResultTurn = {
			role: "tool_result",
			toolCallId: call.id,
			toolName: call.name,
			outcome,
		};
		this.entries.push(Object.freeze(turn));
	}

	pendingCallIds(): ReadonlyArray<string> {
		return [...this.pending.keys()];
	}

	/**
	 * Throws ProtocolError while any tool call is still unanswered.
	 */
	assertComplete(): void {
		if (this.pending.size > 0) {
			const ids = this.pendingCallIds();
			throw new ProtocolError(`Tool calls without results: ${ids.join(", ")}`, { toolCallIds: ids });
		}
	}
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}
