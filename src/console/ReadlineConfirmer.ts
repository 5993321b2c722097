import type { Confirmer } from "../agent/ConfirmationGate";
import { COLORS } from "./ConsoleReporter";
import readline from "node:readline";

/**
 * `y` and `yes` approve (any case); everything else declines.
 */
export function isAffirmative(answer: string): boolean {
	const normalized = answer.trim().toLowerCase();
	return normalized === "y" || normalized === "yes";
}

/**
 * Asks yes/no questions on the terminal. Lines typed ahead of a question answer it in order;
 * once input ends every question is declined.
 */
export class ReadlineConfirmer implements Confirmer {
	private rl: readline.Interface | undefined;
	private closed = false;
	private pending: ((approved: boolean) => void) | undefined;
	private readonly buffered: Array<string> = [];

	constructor(
		private readonly input: NodeJS.ReadableStream = process.stdin,
		private readonly output: NodeJS.WritableStream = process.stdout,
	) {}

	confirm(message: string): Promise<boolean> {
		this.ensureInterface();
		this.output.write(`${COLORS.yellow}[Confirm]${COLORS.reset} ${message} [y/N] `);

		const line = this.buffered.shift();
		if (line !== undefined) {
			return Promise.resolve(isAffirmative(line));
		}
		if (this.closed) {
			this.output.write("\n");
			return Promise.resolve(false);
		}
		return new Promise(resolve => {
			this.pending = resolve;
		});
	}

	close(): void {
		this.rl?.close();
	}

	private ensureInterface(): void {
		if (this.rl || this.closed) {
			return;
		}
		const rl = readline.createInterface({ input: this.input, terminal: false });
		rl.on("line", line => {
			const pending = this.pending;
			if (pending) {
				this.pending = undefined;
				pending(isAffirmative(line));
			} else {
				this.buffered.push(line);
			}
		});
		rl.on("close", () => {
			this.closed = true;
			this.rl = undefined;
			const pending = this.pending;
			if (pending) {
				this.pending = undefined;
				this.output.write("\n");
				pending(false);
			}
		});
		this.rl = rl;
	}
}
