import { ProtocolError } from "../Errors";
import type { ToolDef } from "../Types";
import type { ActionContext } from "./FileActions";
import type { PrepareResult, ToolDefinition } from "./Tools";

/**
 * Closed lookup over the tools of one run. Built once at startup; nothing registers later.
 */
export interface ToolRegistry {
	resolve(name: string): ToolDefinition | undefined;
	/** Validates arguments against the tool's schema. Failures are returned, never thrown. */
	validate(name: string, args: unknown, context: ActionContext): PrepareResult;
	/** Schemas advertised to the model, in registration order */
	definitions(): ReadonlyArray<ToolDef>;
}

export function createToolRegistry(tools: ReadonlyArray<ToolDefinition>): ToolRegistry {
	const byName = new Map<string, ToolDefinition>();
	for (const tool of tools) {
		if (byName.has(tool.name)) {
			throw new Error(`Duplicate tool name: ${tool.name}`);
		}
		byName.set(tool.name, tool);
	}

	const schemas: ReadonlyArray<ToolDef> = Object.freeze(
		tools.map(tool => Object.freeze({ name: tool.name, description: tool.description, parameters: tool.parameters })),
	);

	return Object.freeze({
		resolve: (name: string) => byName.get(name),
		validate: (name: string, args: unknown, context: ActionContext): PrepareResult => {
			const tool = byName.get(name);
			if (!tool) {
				return { ok: false, error: new ProtocolError(`Unknown tool: ${name}`, { tool: name }) };
			}
			return tool.prepare(args, context);
		},
		definitions: () => schemas,
	});
}
