import type { LoopObserver, RunOutcome } from "../agent/LoopController";
import type { Mode } from "../shared/config";
import type { ToolCall, ToolOutcome } from "../Types";

// ANSI colors for terminal output
export const COLORS = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	dim: "\x1b[2m",
	cyan: "\x1b[36m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	red: "\x1b[31m",
	blue: "\x1b[34m",
};

export type Print = (line: string) => void;

/**
 * Prints a colored message to the console.
 */
export function printColored(color: string, prefix: string, message: string, print: Print = console.log): void {
	print(`${color}${prefix}${COLORS.reset} ${message}`);
}

function formatArguments(args: unknown): string {
	return JSON.stringify(args);
}

/**
 * Short human-readable form of a tool result
 */
export function summarizeOutcome(outcome: ToolOutcome): string {
	if (outcome.status === "error") {
		return `${outcome.error.code}: ${outcome.error.message}`;
	}
	return JSON.stringify(outcome.data);
}

/**
 * Console progress output for one run, driven by the loop's observer callbacks.
 */
export class ConsoleReporter implements LoopObserver {
	constructor(
		private readonly mode: Mode,
		private readonly print: Print = console.log,
	) {}

	start(directory: string): void {
		const suffix = this.mode === "dry_run" ? ` ${COLORS.yellow}[DRY-RUN MODE]${COLORS.reset}` : "";
		this.print(`${COLORS.bold}Organizing ${directory}${COLORS.reset}${suffix}`);
		if (this.mode === "dry_run") {
			printColored(COLORS.yellow, "[Dry-run]", "No files will be moved and no folders created.", this.print);
		}
	}

	onModelText(text: string): void {
		printColored(COLORS.green, "[Agent]", text, this.print);
	}

	onToolCall(call: ToolCall): void {
		printColored(COLORS.cyan, "[Tool]", `${call.name} ${formatArguments(call.arguments)}`, this.print);
	}

	onToolResult(call: ToolCall, outcome: ToolOutcome): void {
		if (outcome.status === "error") {
			printColored(COLORS.red, "[Result]", `${call.name} failed - ${summarizeOutcome(outcome)}`, this.print);
		} else if (outcome.simulated) {
			printColored(COLORS.yellow, "[Dry-run]", `${call.name} would run: ${summarizeOutcome(outcome)}`, this.print);
		} else {
			printColored(COLORS.dim, "[Result]", summarizeOutcome(outcome), this.print);
		}
	}

	onProtocolFault(message: string): void {
		printColored(COLORS.yellow, "[Agent]", `Protocol problem reported to the model: ${message}`, this.print);
	}

	finish(outcome: RunOutcome): void {
		if (outcome.status === "done") {
			printColored(COLORS.green, "[Done]", `Agent finished after ${outcome.iterations} model turn(s)`, this.print);
		} else {
			printColored(COLORS.red, "[Failed]", `${outcome.error.code}: ${outcome.error.message}`, this.print);
		}
	}
}
