import { TransportError } from "../Errors";
import type { Mode } from "../shared/config";
import { createToolRegistry } from "../tools/ToolRegistry";
import { ORGANIZER_TOOLS } from "../tools/Tools";
import type { CreateTurnOptions, LLMClient, ModelReply, ToolCall, ToolOutcome, Turn } from "../Types";
import { type Confirmer, ConfirmationGate } from "./ConfirmationGate";
import { LoopController, type LoopObserver } from "./LoopController";
import { organizeRequest, systemPrompt } from "./Prompts";
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// =============================================================================
// SECTION: Helpers
// =============================================================================

/**
 * LLMClient that plays back a fixed list of replies (or throws the errors in it).
 */
class ScriptedClient implements LLMClient {
	readonly requests: Array<CreateTurnOptions> = [];

	constructor(private readonly script: Array<ModelReply | Error>) {}

	createTurn(opts: CreateTurnOptions): Promise<ModelReply> {
		this.requests.push(opts);
		const next = this.script.shift();
		if (!next) {
			return Promise.reject(new Error("Script exhausted"));
		}
		return next instanceof Error ? Promise.reject(next) : Promise.resolve(next);
	}
}

function call(id: string, name: string, args: unknown): ToolCall {
	return { id, name, arguments: args };
}

function toolTurn(...calls: Array<ToolCall>): ModelReply {
	return { toolCalls: calls, stopReason: "tool_use" };
}

function finalTurn(text: string): ModelReply {
	return { text, toolCalls: [], stopReason: "end_turn" };
}

function toolResults(turns: ReadonlyArray<Turn>): Array<{ id: string; outcome: ToolOutcome }> {
	const results: Array<{ id: string; outcome: ToolOutcome }> = [];
	for (const turn of turns) {
		if (turn.role === "tool_result") {
			results.push({ id: turn.toolCallId, outcome: turn.outcome });
		}
	}
	return results;
}

async function exists(target: string): Promise<boolean> {
	try {
		await stat(target);
		return true;
	} catch {
		return false;
	}
}

// =============================================================================
// SECTION: Tests
// =============================================================================

describe("LoopController", () => {
	let root: string;

	beforeEach(async () => {
		root = await mkdtemp(join(tmpdir(), "folder-agent-loop-"));
		await writeFile(join(root, "a.txt"), "hello");
		await writeFile(join(root, "b.png"), "png");
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	function createController(options: {
		mode: Mode;
		client: LLMClient;
		confirmer?: Confirmer;
		maxIterations?: number;
		observer?: LoopObserver;
	}): LoopController {
		return new LoopController({
			config: { directory: root, mode: options.mode, maxIterations: options.maxIterations ?? 10 },
			client: options.client,
			registry: createToolRegistry(ORGANIZER_TOOLS),
			gate: new ConfirmationGate(options.mode, options.confirmer ?? { confirm: async () => true }),
			...(options.observer ? { observer: options.observer } : {}),
		});
	}

	test("dry run plays out the whole plan and leaves the filesystem untouched", async () => {
		const client = new ScriptedClient([
			toolTurn(call("c1", "list_directory", { path: "." })),
			toolTurn(
				call("c2", "create_folder", { path: "docs" }),
				call("c3", "move_file", { source: "a.txt", destination: "docs/a.txt" }),
			),
			finalTurn("Moved a.txt into docs."),
		]);
		const confirm = vi.fn(async () => true);
		const controller = createController({ mode: "dry_run", client, confirmer: { confirm } });

		const outcome = await controller.run();

		expect(outcome.status).toBe("done");
		if (outcome.status === "done") {
			expect(outcome.finalText).toBe("Moved a.txt into docs.");
			expect(outcome.iterations).toBe(3);
		}
		expect(controller.currentState).toBe("done");
		expect(confirm).not.toHaveBeenCalled();

		const results = toolResults(outcome.transcript);
		expect(results.map(result => result.id)).toEqual(["c1", "c2", "c3"]);
		expect(results[0]?.outcome).toEqual({
			status: "ok",
			data: {
				path: root,
				entries: [
					{ name: "a.txt", kind: "file", sizeBytes: 5, inferredType: "document", extension: ".txt" },
					{ name: "b.png", kind: "file", sizeBytes: 3, inferredType: "image", extension: ".png" },
				],
			},
		});
		expect(results[1]?.outcome).toEqual({
			status: "ok",
			data: { success: true, path: join(root, "docs"), created: true },
			simulated: true,
		});
		expect(results[2]?.outcome).toEqual({
			status: "ok",
			data: { success: true, source: join(root, "a.txt"), destination: join(root, "docs", "a.txt") },
			simulated: true,
		});

		expect(await exists(join(root, "docs"))).toBe(false);
		expect(await readFile(join(root, "a.txt"), "utf8")).toBe("hello");
	});

	test("sends the mode's system prompt, the tools and the organize request", async () => {
		const client = new ScriptedClient([finalTurn("Nothing to do.")]);
		await createController({ mode: "dry_run", client }).run();

		const [request] = client.requests;
		expect(request?.system).toBe(systemPrompt("dry_run"));
		expect(request?.tools.map(tool => tool.name)).toEqual(["list_directory", "create_folder", "move_file"]);
		expect(request?.turns).toEqual([{ role: "user", text: organizeRequest(root) }]);
	});

	test("every tool call is answered before the model is asked again", async () => {
		const client = new ScriptedClient([
			toolTurn(call("c1", "list_directory", { path: "." }), call("c2", "list_directory", { path: "missing" })),
			finalTurn("Done."),
		]);
		await createController({ mode: "live", client }).run();

		const second = client.requests[1];
		expect(second?.turns.map(turn => turn.role)).toEqual(["user", "model", "tool_result", "tool_result"]);
		expect(toolResults(second?.turns ?? []).map(result => result.id)).toEqual(["c1", "c2"]);
		expect(toolResults(second?.turns ?? [])[1]?.outcome).toEqual({
			status: "error",
			error: { code: "NOT_FOUND", message: "No such file or directory: missing" },
		});
	});

	test("live mode with approval moves the files", async () => {
		const confirm = vi.fn(async () => true);
		const client = new ScriptedClient([
			toolTurn(call("c1", "list_directory", { path: "." })),
			toolTurn(
				call("c2", "create_folder", { path: "docs" }),
				call("c3", "move_file", { source: "a.txt", destination: "docs/a.txt" }),
				call("c4", "move_file", { source: "b.png", destination: "images/b.png" }),
			),
			finalTurn("Organized."),
		]);

		const outcome = await createController({ mode: "live", client, confirmer: { confirm } }).run();

		expect(outcome.status).toBe("done");
		expect(confirm).toHaveBeenCalledTimes(3);
		expect(await readFile(join(root, "docs", "a.txt"), "utf8")).toBe("hello");
		expect(await readFile(join(root, "images", "b.png"), "utf8")).toBe("png");
		expect(await exists(join(root, "a.txt"))).toBe(false);
	});

	test("a declined action is reported to the model and nothing changes", async () => {
		const client = new ScriptedClient([
			toolTurn(call("c1", "move_file", { source: "a.txt", destination: "docs/a.txt" })),
			finalTurn("Leaving a.txt where it is."),
		]);

		const outcome = await createController({
			mode: "live",
			client,
			confirmer: { confirm: async () => false },
		}).run();

		expect(outcome.status).toBe("done");
		expect(toolResults(outcome.transcript)[0]?.outcome).toEqual({
			status: "error",
			error: {
				code: "USER_DECLINED",
				message: "The user declined move_file. Do not retry the same action; adjust the plan instead.",
			},
		});
		expect(await readFile(join(root, "a.txt"), "utf8")).toBe("hello");
		expect(await exists(join(root, "docs"))).toBe(false);
	});

	test("a conflicting move is reported as PATH_CONFLICT and both files survive", async () => {
		await mkdir(join(root, "docs"));
		await writeFile(join(root, "docs", "a.txt"), "older");
		const client = new ScriptedClient([
			toolTurn(call("c1", "move_file", { source: "a.txt", destination: "docs/a.txt" })),
			finalTurn("docs/a.txt already exists, skipped."),
		]);

		const outcome = await createController({ mode: "live", client }).run();

		expect(outcome.status).toBe("done");
		expect(toolResults(outcome.transcript)[0]?.outcome).toEqual({
			status: "error",
			error: { code: "PATH_CONFLICT", message: "Destination already exists: docs/a.txt" },
		});
		expect(await readFile(join(root, "a.txt"), "utf8")).toBe("hello");
		expect(await readFile(join(root, "docs", "a.txt"), "utf8")).toBe("older");
	});

	test("invalid arguments become a validation error without asking the user", async () => {
		const confirm = vi.fn(async () => true);
		const client = new ScriptedClient([
			toolTurn(call("c1", "move_file", { source: "a.txt" })),
			finalTurn("Sorry."),
		]);

		const outcome = await createController({ mode: "live", client, confirmer: { confirm } }).run();

		expect(outcome.status).toBe("done");
		expect(toolResults(outcome.transcript)[0]?.outcome).toEqual({
			status: "error",
			error: { code: "VALIDATION_ERROR", message: "Invalid arguments for move_file: destination: Required" },
		});
		expect(confirm).not.toHaveBeenCalled();
	});

	test("an unknown tool is reported once, then the run continues", async () => {
		const client = new ScriptedClient([
			toolTurn(call("c1", "delete_file", { path: "a.txt" })),
			finalTurn("I cannot delete files."),
		]);

		const outcome = await createController({ mode: "live", client }).run();

		expect(outcome.status).toBe("done");
		expect(toolResults(outcome.transcript)[0]?.outcome).toEqual({
			status: "error",
			error: {
				code: "PROTOCOL_ERROR",
				message: "Unknown tool: delete_file. Available tools: list_directory, create_folder, move_file",
			},
		});
	});

	test("the same unknown tool twice in one response is answered twice before the model sees it", async () => {
		const onProtocolFault = vi.fn();
		const client = new ScriptedClient([
			toolTurn(call("c1", "delete_file", { path: "a.txt" }), call("c2", "delete_file", { path: "b.png" })),
			finalTurn("I cannot delete files."),
		]);

		const outcome = await createController({ mode: "live", client, observer: { onProtocolFault } }).run();

		expect(outcome.status).toBe("done");
		expect(outcome.iterations).toBe(2);
		const unknownTool = {
			status: "error",
			error: {
				code: "PROTOCOL_ERROR",
				message: "Unknown tool: delete_file. Available tools: list_directory, create_folder, move_file",
			},
		};
		expect(toolResults(outcome.transcript)).toEqual([
			{ id: "c1", outcome: unknownTool },
			{ id: "c2", outcome: unknownTool },
		]);
		expect(onProtocolFault).toHaveBeenCalledTimes(1);
	});

	test("the same unknown tool a second time fails the run", async () => {
		const client = new ScriptedClient([
			toolTurn(call("c1", "delete_file", { path: "a.txt" })),
			toolTurn(call("c2", "delete_file", { path: "b.png" })),
		]);

		const outcome = await createController({ mode: "live", client }).run();

		expect(outcome.status).toBe("failed");
		if (outcome.status === "failed") {
			expect(outcome.error.code).toBe("PROTOCOL_ERROR");
			expect(outcome.error.message).toBe(
				"Repeated protocol fault: Unknown tool: delete_file. Available tools: list_directory, create_folder, move_file",
			);
			expect(outcome.iterations).toBe(2);
		}
		expect(await exists(join(root, "a.txt"))).toBe(true);
	});

	test("an empty response is nudged once", async () => {
		const client = new ScriptedClient([{ toolCalls: [], stopReason: "end_turn" }, finalTurn("All set.")]);

		const outcome = await createController({ mode: "live", client }).run();

		expect(outcome.status).toBe("done");
		expect(client.requests[1]?.turns.at(-1)).toEqual({
			role: "user",
			text: "Your last response had neither text nor tool calls. Continue organizing, or reply with a summary if you are finished.",
		});
	});

	test("a second empty response fails the run", async () => {
		const client = new ScriptedClient([
			{ toolCalls: [], stopReason: "end_turn" },
			{ toolCalls: [], stopReason: "end_turn" },
		]);

		const outcome = await createController({ mode: "live", client }).run();

		expect(outcome.status).toBe("failed");
		if (outcome.status === "failed") {
			expect(outcome.error.code).toBe("PROTOCOL_ERROR");
		}
	});

	test("a response cut off by the token limit is asked to continue", async () => {
		const client = new ScriptedClient([
			{ text: "I will start by", toolCalls: [], stopReason: "other", providerStopReason: "max_tokens" },
			finalTurn("Done."),
		]);

		const outcome = await createController({ mode: "live", client }).run();

		expect(outcome.status).toBe("done");
		expect(client.requests[1]?.turns.at(-1)).toEqual({
			role: "user",
			text: "Your last response stopped before you finished (stop reason: max_tokens). Continue where you left off.",
		});
	});

	test("the iteration ceiling stops a model that never finishes", async () => {
		const client = new ScriptedClient([
			toolTurn(call("c1", "list_directory", { path: "." })),
			toolTurn(call("c2", "list_directory", { path: "." })),
			toolTurn(call("c3", "list_directory", { path: "." })),
			finalTurn("Too late."),
		]);

		const controller = createController({ mode: "live", client, maxIterations: 3 });
		const outcome = await controller.run();

		expect(outcome.status).toBe("failed");
		if (outcome.status === "failed") {
			expect(outcome.error.code).toBe("RUNAWAY_LOOP");
			expect(outcome.error.message).toBe("Stopped after 3 model turns without the model finishing.");
			expect(outcome.iterations).toBe(3);
		}
		expect(client.requests).toHaveLength(3);
		expect(controller.currentState).toBe("failed");
	});

	test("a transport failure fails the run", async () => {
		const client = new ScriptedClient([
			toolTurn(call("c1", "list_directory", { path: "." })),
			new TransportError("Anthropic messages.create failed after 4 attempt(s): overloaded", {
				status: 529,
				attempts: 4,
			}),
		]);

		const outcome = await createController({ mode: "live", client }).run();

		expect(outcome.status).toBe("failed");
		if (outcome.status === "failed") {
			expect(outcome.error.code).toBe("TRANSPORT_ERROR");
			expect(outcome.iterations).toBe(2);
		}
	});

	test("unexpected client errors fail the run as INTERNAL_ERROR", async () => {
		const client = new ScriptedClient([new Error("mapping bug")]);

		const outcome = await createController({ mode: "live", client }).run();

		expect(outcome.status).toBe("failed");
		if (outcome.status === "failed") {
			expect(outcome.error.code).toBe("INTERNAL_ERROR");
			expect(outcome.error.message).toBe("mapping bug");
		}
	});

	test("the observer sees text, calls, results and state changes", async () => {
		const observer = {
			onStateChange: vi.fn(),
			onModelText: vi.fn(),
			onToolCall: vi.fn(),
			onToolResult: vi.fn(),
		};
		const client = new ScriptedClient([
			{ text: "Let me look.", toolCalls: [call("c1", "list_directory", { path: "." })], stopReason: "tool_use" },
			finalTurn("Done."),
		]);

		await createController({ mode: "live", client, observer }).run();

		expect(observer.onModelText.mock.calls).toEqual([["Let me look."], ["Done."]]);
		expect(observer.onToolCall).toHaveBeenCalledTimes(1);
		expect(observer.onToolResult).toHaveBeenCalledTimes(1);
		expect(observer.onStateChange.mock.calls).toEqual([
			["awaiting_tool_results", "awaiting_model"],
			["awaiting_model", "awaiting_tool_results"],
			["done", "awaiting_model"],
		]);
	});

	test("run may only be called once", async () => {
		const controller = createController({ mode: "live", client: new ScriptedClient([finalTurn("Done.")]) });
		await controller.run();
		await expect(controller.run()).rejects.toThrow("LoopController.run() may only be called once");
	});
});
