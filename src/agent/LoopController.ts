import { errorMessage, OrganizerError, ProtocolError, RunawayLoopError } from "../Errors";
import type { OrganizerConfig } from "../shared/config";
import { getLog, logError } from "../shared/logger";
import type { ActionContext } from "../tools/FileActions";
import type { ToolRegistry } from "../tools/ToolRegistry";
import { toolFailure } from "../tools/ToolResults";
import type { LLMClient, ModelTurn, ToolCall, ToolOutcome, Turn } from "../Types";
import type { ConfirmationGate } from "./ConfirmationGate";
import { organizeRequest, systemPrompt } from "./Prompts";
import { Transcript } from "./Transcript";
import path from "node:path";

const logger = getLog(import.meta);

// =============================================================================
// SECTION: Types
// =============================================================================

export type LoopState = "awaiting_model" | "awaiting_tool_results" | "done" | "failed";

export type RunOutcome =
	| {
			status: "done";
			finalText: string;
			iterations: number;
			transcript: ReadonlyArray<Turn>;
	  }
	| {
			status: "failed";
			error: OrganizerError;
			iterations: number;
			transcript: ReadonlyArray<Turn>;
	  };

/**
 * Progress callbacks for console output. All optional.
 */
export interface LoopObserver {
	onStateChange?(state: LoopState, previous: LoopState): void;
	onModelText?(text: string): void;
	onToolCall?(call: ToolCall): void;
	onToolResult?(call: ToolCall, outcome: ToolOutcome): void;
	onProtocolFault?(message: string): void;
}

export interface LoopControllerOptions {
	readonly config: Pick<OrganizerConfig, "directory" | "mode" | "maxIterations">;
	readonly client: LLMClient;
	readonly registry: ToolRegistry;
	readonly gate: ConfirmationGate;
	readonly observer?: LoopObserver;
}

// =============================================================================
// SECTION: Loop Controller
// =============================================================================

/**
 * Drives one organizer run: asks the model, dispatches the tool calls it makes, feeds the results
 * back and repeats until the model finishes or the run fails.
 *
 * Sequential by construction: one model request or one tool call is in flight at any time.
 */
export class LoopController {
	private state: LoopState = "awaiting_model";
	private iterations = 0;
	private started = false;
	private readonly transcript = new Transcript();
	/** Faults the model has already been told about */
	private readonly reportedFaults = new Set<string>();
	/** Faults raised since the last model request; the model sees them with the next one */
	private readonly pendingFaults = new Set<string>();
	private readonly context: ActionContext;

	constructor(private readonly options: LoopControllerOptions) {
		this.context = { root: path.resolve(options.config.directory) };
	}

	get currentState(): LoopState {
		return this.state;
	}

	async run(): Promise<RunOutcome> {
		if (this.started) {
			throw new Error("LoopController.run() may only be called once");
		}
		this.started = true;

		const { config, client, registry } = this.options;
		const system = systemPrompt(config.mode);
		this.transcript.appendUser(organizeRequest(config.directory));

		try {
			while (true) {
				if (this.iterations >= config.maxIterations) {
					throw new RunawayLoopError(config.maxIterations);
				}
				this.iterations++;

				this.transcript.assertComplete();
				for (const fingerprint of this.pendingFaults) {
					this.reportedFaults.add(fingerprint);
				}
				this.pendingFaults.clear();
				logger.debug("Model turn %d", this.iterations);
				const reply = await client.createTurn({
					system,
					turns: this.transcript.turns,
					tools: registry.definitions(),
				});
				const turn = this.transcript.appendModel(reply);
				if (turn.text) {
					this.options.observer?.onModelText?.(turn.text);
				}

				if (turn.toolCalls.length > 0) {
					await this.answerToolCalls(turn);
					continue;
				}

				const finalText = turn.text?.trim();
				if (turn.stopReason === "end_turn" && finalText) {
					this.transition("done");
					return {
						status: "done",
						finalText,
						iterations: this.iterations,
						transcript: this.transcript.turns,
					};
				}

				this.nudge(turn, reply.providerStopReason);
			}
		} catch (err) {
			const error =
				err instanceof OrganizerError
					? err
					: new OrganizerError("INTERNAL_ERROR", errorMessage(err), { cause: errorMessage(err) });
			if (!(err instanceof OrganizerError)) {
				logError(logger, err, "Organizer run crashed");
			}
			logger.debug("Run failed with %s: %s", error.code, error.message);
			this.transition("failed");
			return {
				status: "failed",
				error,
				iterations: this.iterations,
				transcript: this.transcript.turns,
			};
		}
	}

	private async answerToolCalls(turn: ModelTurn): Promise<void> {
		this.transition("awaiting_tool_results");
		for (const call of turn.toolCalls) {
			this.options.observer?.onToolCall?.(call);
			const outcome = await this.dispatch(call);
			this.transcript.appendToolResult(call, outcome);
			this.options.observer?.onToolResult?.(call, outcome);
		}
		this.transition("awaiting_model");
	}

	/**
	 * resolve → validate → gate → execute (or the gate's simulated/declined result)
	 */
	private async dispatch(call: ToolCall): Promise<ToolOutcome> {
		const { registry, gate } = this.options;

		if (!registry.resolve(call.name)) {
			const available = registry
				.definitions()
				.map(tool => tool.name)
				.join(", ");
			const fault = this.reportFault(
				`unknown_tool:${call.name}`,
				`Unknown tool: ${call.name}. Available tools: ${available}`,
			);
			return toolFailure(fault);
		}

		const validated = registry.validate(call.name, call.arguments, this.context);
		if (!validated.ok) {
			return toolFailure(validated.error);
		}

		const decision = await gate.authorize(validated.value);
		if (decision.decision === "deny") {
			return decision.result;
		}
		return validated.value.execute();
	}

	/**
	 * The model stopped without finishing and without asking for anything.
	 * Tell it once; the same fault a second time ends the run.
	 */
	private nudge(turn: ModelTurn, providerStopReason: string | undefined): void {
		const reason = providerStopReason ?? turn.stopReason;
		const fault = turn.text?.trim()
			? this.reportFault(
					`stopped:${reason}`,
					`Your last response stopped before you finished (stop reason: ${reason}). Continue where you left off.`,
				)
			: this.reportFault(
					"empty_response",
					"Your last response had neither text nor tool calls. Continue organizing, or reply with a summary if you are finished.",
				);
		this.transcript.appendUser(fault.message);
	}

	/**
	 * Records a protocol fault. Returns the error to report to the model, throws when the model
	 * already received the identical fault on an earlier request. Repeats within one response are
	 * answered alike, since the model has not seen the first report yet.
	 */
	private reportFault(fingerprint: string, message: string): ProtocolError {
		const error = new ProtocolError(message, { fingerprint });
		if (this.reportedFaults.has(fingerprint)) {
			throw new ProtocolError(`Repeated protocol fault: ${message}`, { fingerprint });
		}
		if (this.pendingFaults.has(fingerprint)) {
			return error;
		}
		this.pendingFaults.add(fingerprint);
		logger.info("Protocol fault reported to the model: %s", message);
		this.options.observer?.onProtocolFault?.(message);
		return error;
	}

	private transition(next: LoopState): void {
		const previous = this.state;
		if (previous === next) {
			return;
		}
		this.state = next;
		logger.debug("State %s -> %s", previous, next);
		this.options.observer?.onStateChange?.(next, previous);
	}
}
