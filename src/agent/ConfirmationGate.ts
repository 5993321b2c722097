import { UserDeclinedError } from "../Errors";
import type { Mode } from "../shared/config";
import { getLog } from "../shared/logger";
import type { PreparedAction } from "../tools/Tools";
import { toolFailure } from "../tools/ToolResults";
import type { ToolOutcome } from "../Types";

const logger = getLog(import.meta);

/**
 * Asks the person running the organizer a yes/no question.
 */
export interface Confirmer {
	confirm(message: string): Promise<boolean>;
}

export type GateDecision =
	| { decision: "allow" }
	| { decision: "deny"; reason: "dry_run" | "user_declined"; result: ToolOutcome };

/**
 * One-line description of an action with its resolved arguments, e.g.
 * `move_file source=/data/a.txt destination=/data/docs/a.txt`
 */
export function describeAction(action: PreparedAction): string {
	const args = Object.entries(action.resolvedArgs)
		.map(([key, value]) => `${key}=${value}`)
		.join(" ");
	return args ? `${action.toolName} ${args}` : action.toolName;
}

/**
 * Decides whether a validated action may touch the filesystem.
 * Read-only actions pass straight through; mutating ones are simulated in dry-run mode and
 * confirmed by the user in live mode.
 */
export class ConfirmationGate {
	constructor(
		private readonly mode: Mode,
		private readonly confirmer: Confirmer,
	) {}

	async authorize(action: PreparedAction): Promise<GateDecision> {
		if (!action.mutating) {
			return { decision: "allow" };
		}

		if (this.mode === "dry_run") {
			logger.debug("Dry run: simulating %s", action.toolName);
			return { decision: "deny", reason: "dry_run", result: action.simulate() };
		}

		const approved = await this.confirmer.confirm(`Allow ${describeAction(action)}?`);
		if (approved) {
			return { decision: "allow" };
		}

		logger.info("User declined %s", action.toolName);
		return {
			decision: "deny",
			reason: "user_declined",
			result: toolFailure(new UserDeclinedError(action.toolName)),
		};
	}
}
