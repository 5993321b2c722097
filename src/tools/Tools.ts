import { type OrganizerError, ValidationError } from "../Errors";
import type { JSONSchema, ToolDef, ToolOutcome } from "../Types";
import { type ActionContext, createFolder, listDirectory, moveFile } from "./FileActions";
import { resolveWithinRoot } from "./PathPolicy";
import { simulatedSuccess, toolFailure, toolSuccess } from "./ToolResults";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

// =============================================================================
// SECTION: Types
// =============================================================================

export type ToolName = "list_directory" | "create_folder" | "move_file";

type ToolArgs = Readonly<Record<string, string>>;

/**
 * A tool call whose arguments passed validation, bound to the run's context.
 * Mutating actions also know how to answer without touching the filesystem.
 */
export type PreparedAction =
	| {
			readonly toolName: ToolName;
			readonly mutating: false;
			/** Arguments with every path resolved to an absolute path inside the root */
			readonly resolvedArgs: ToolArgs;
			execute(): Promise<ToolOutcome>;
	  }
	| {
			readonly toolName: ToolName;
			readonly mutating: true;
			readonly resolvedArgs: ToolArgs;
			execute(): Promise<ToolOutcome>;
			simulate(): ToolOutcome;
	  };

export type PrepareResult = { ok: true; value: PreparedAction } | { ok: false; error: OrganizerError };

export interface ToolDefinition extends ToolDef {
	readonly name: ToolName;
	readonly mutating: boolean;
	prepare(args: unknown, context: ActionContext): PrepareResult;
}

type ToolBlueprint<TArgs extends ToolArgs, TResult> = {
	name: ToolName;
	description: string;
	argsSchema: z.ZodType<TArgs>;
	/** Maps every path argument through the path policy */
	resolve(args: TArgs, root: string): TArgs;
	execute(args: TArgs, context: ActionContext): Promise<TResult>;
} & ({ mutating: false } | { mutating: true; simulate(resolved: TArgs): TResult });

// =============================================================================
// SECTION: Definition
// =============================================================================

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

/**
 * JSON schema advertised to the model, generated from the argument schema
 */
function toParameters(argsSchema: z.ZodTypeAny): JSONSchema {
	const { $schema: _draft, ...parameters } = zodToJsonSchema(argsSchema, { $refStrategy: "none" });
	return parameters;
}

export function defineTool<TArgs extends ToolArgs, TResult>(
	blueprint: ToolBlueprint<TArgs, TResult>,
): ToolDefinition {
	const prepare = (rawArgs: unknown, context: ActionContext): PrepareResult => {
		const parsed = blueprint.argsSchema.safeParse(rawArgs);
		if (!parsed.success) {
			return {
				ok: false,
				error: new ValidationError(`Invalid arguments for ${blueprint.name}: ${describeIssues(parsed.error)}`, {
					tool: blueprint.name,
				}),
			};
		}

		const args = parsed.data;
		let resolved: TArgs;
		try {
			resolved = blueprint.resolve(args, context.root);
		} catch (err) {
			if (err instanceof ValidationError) {
				return { ok: false, error: err };
			}
			throw err;
		}

		const execute = async (): Promise<ToolOutcome> => {
			try {
				return toolSuccess(await blueprint.execute(args, context));
			} catch (err) {
				return toolFailure(err);
			}
		};

		let action: PreparedAction;
		if (blueprint.mutating) {
			const simulate = blueprint.simulate;
			action = {
				toolName: blueprint.name,
				mutating: true,
				resolvedArgs: resolved,
				execute,
				simulate: () => simulatedSuccess(simulate(resolved)),
			};
		} else {
			action = { toolName: blueprint.name, mutating: false, resolvedArgs: resolved, execute };
		}
		return { ok: true, value: Object.freeze(action) };
	};

	return Object.freeze({
		name: blueprint.name,
		description: blueprint.description,
		parameters: toParameters(blueprint.argsSchema),
		mutating: blueprint.mutating,
		prepare,
	});
}

// =============================================================================
// SECTION: Tools
// =============================================================================

const nonEmptyPath = (field: string, description: string) =>
	z.string().min(1, `${field} must not be empty`).describe(description);

export const listDirectoryTool = defineTool({
	name: "list_directory",
	description:
		"List the direct children of a directory. Returns each entry's name, kind (file or dir), size in bytes and a type inferred from its extension.",
	argsSchema: z
		.object({ path: nonEmptyPath("path", "Directory path relative to the directory being organized ('.' for itself)") })
		.strict(),
	mutating: false,
	resolve: (args, root) => ({ path: resolveWithinRoot(args.path, root) }),
	execute: listDirectory,
});

export const createFolderTool = defineTool({
	name: "create_folder",
	description:
		"Create a folder, including missing parent folders. Succeeds without changes if the folder already exists.",
	argsSchema: z
		.object({ path: nonEmptyPath("path", "Folder path relative to the directory being organized") })
		.strict(),
	mutating: true,
	resolve: (args, root) => ({ path: resolveWithinRoot(args.path, root) }),
	execute: createFolder,
	simulate: resolved => ({ success: true, path: resolved.path, created: true }),
});

export const moveFileTool = defineTool({
	name: "move_file",
	description:
		"Move a file to a new location. Missing destination folders are created. Fails if the destination already exists; nothing is ever overwritten.",
	argsSchema: z
		.object({
			source: nonEmptyPath("source", "Path of the file to move, relative to the directory being organized"),
			destination: nonEmptyPath(
				"destination",
				"New path of the file including its name, relative to the directory being organized",
			),
		})
		.strict(),
	mutating: true,
	resolve: (args, root) => ({
		source: resolveWithinRoot(args.source, root),
		destination: resolveWithinRoot(args.destination, root),
	}),
	execute: moveFile,
	simulate: resolved => ({ success: true, source: resolved.source, destination: resolved.destination }),
});

/** Every tool the organizer offers, in the order they are advertised to the model */
export const ORGANIZER_TOOLS: ReadonlyArray<ToolDefinition> = [listDirectoryTool, createFolderTool, moveFileTool];
