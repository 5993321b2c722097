// File Actions
// The three filesystem operations the agent may request. Each call re-reads the filesystem;
// nothing is cached between calls because other processes may change the directory meanwhile.

import { errnoCode, NotADirectoryError, NotFoundError, PathConflictError, ValidationError } from "../Errors";
import { getLog, logError } from "../shared/logger";
import { extensionOf, type InferredType, inferFileType } from "./FileKinds";
import { assertRealPathWithinRoot, resolveWithinRoot } from "./PathPolicy";
import { constants, type Stats } from "node:fs";
import * as fsPromises from "node:fs/promises";
import path from "node:path";

const logger = getLog(import.meta);

// =============================================================================
// SECTION: Types
// =============================================================================

export type ActionFileSystem = Pick<
	typeof fsPromises,
	"stat" | "readdir" | "mkdir" | "link" | "unlink" | "copyFile" | "rm" | "realpath"
>;

/**
 * Context passed to every action
 */
export interface ActionContext {
	/** Absolute path of the directory being organized; every path resolves inside it */
	readonly root: string;
	readonly fs?: ActionFileSystem;
}

export interface DirectoryEntry {
	readonly name: string;
	readonly kind: "file" | "dir";
	readonly sizeBytes: number;
	readonly inferredType: InferredType;
	readonly extension: string;
}

export interface ListDirectoryResult {
	readonly path: string;
	readonly entries: ReadonlyArray<DirectoryEntry>;
}

export interface CreateFolderResult {
	readonly success: true;
	readonly path: string;
	readonly created: boolean;
}

export interface MoveFileResult {
	readonly success: true;
	readonly source: string;
	readonly destination: string;
}

// =============================================================================
// SECTION: Helpers
// =============================================================================

/**
 * stat that maps "does not exist" to undefined and rethrows anything else
 */
async function statIfExists(fs: ActionFileSystem, absolutePath: string): Promise<Stats | undefined> {
	try {
		return await fs.stat(absolutePath);
	} catch (err) {
		const code = errnoCode(err);
		if (code === "ENOENT" || code === "ENOTDIR") {
			return;
		}
		throw err;
	}
}

function fileSystemOf(context: ActionContext): ActionFileSystem {
	return context.fs ?? fsPromises;
}

// =============================================================================
// SECTION: list_directory
// =============================================================================

export async function listDirectory(args: { path: string }, context: ActionContext): Promise<ListDirectoryResult> {
	const fs = fileSystemOf(context);
	const absolutePath = resolveWithinRoot(args.path, context.root);
	await assertRealPathWithinRoot(absolutePath, context.root, args.path, target => fs.realpath(target));
	const stats = await statIfExists(fs, absolutePath);

	if (!stats) {
		throw new NotFoundError(args.path);
	}
	if (!stats.isDirectory()) {
		throw new NotADirectoryError(args.path);
	}

	const dirents = await fs.readdir(absolutePath, { withFileTypes: true });
	const entries: Array<DirectoryEntry> = [];

	for (const dirent of dirents) {
		// Symlinks and other special entries are classified by what they point at
		const entryStats = dirent.isDirectory() ? undefined : await statIfExists(fs, path.join(absolutePath, dirent.name));
		if (!dirent.isDirectory() && !entryStats) {
			logger.debug("Skipping %s: vanished or dangling while listing", dirent.name);
			continue;
		}

		const isDirectory = dirent.isDirectory() || entryStats?.isDirectory() === true;
		entries.push(
			isDirectory
				? { name: dirent.name, kind: "dir", sizeBytes: 0, inferredType: "folder", extension: "" }
				: {
						name: dirent.name,
						kind: "file",
						sizeBytes: entryStats?.size ?? 0,
						inferredType: inferFileType(dirent.name),
						extension: extensionOf(dirent.name),
					},
		);
	}

	entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
	return { path: absolutePath, entries };
}

// =============================================================================
// SECTION: create_folder
// =============================================================================

export async function createFolder(args: { path: string }, context: ActionContext): Promise<CreateFolderResult> {
	const fs = fileSystemOf(context);
	const absolutePath = resolveWithinRoot(args.path, context.root);
	await assertRealPathWithinRoot(absolutePath, context.root, args.path, target => fs.realpath(target));
	const existing = await statIfExists(fs, absolutePath);

	if (existing) {
		if (existing.isDirectory()) {
			return { success: true, path: absolutePath, created: false };
		}
		throw new PathConflictError(`Path exists and is not a directory: ${args.path}`, args.path);
	}

	await makeDirectory(fs, absolutePath, args.path);
	return { success: true, path: absolutePath, created: true };
}

async function makeDirectory(fs: ActionFileSystem, absolutePath: string, requestedPath: string): Promise<void> {
	try {
		await fs.mkdir(absolutePath, { recursive: true });
	} catch (err) {
		const code = errnoCode(err);
		if (code === "ENOTDIR" || code === "EEXIST") {
			throw new PathConflictError(`A file is in the way of directory ${requestedPath}`, requestedPath);
		}
		throw err;
	}
}

// =============================================================================
// SECTION: move_file
// =============================================================================

export async function moveFile(
	args: { source: string; destination: string },
	context: ActionContext,
): Promise<MoveFileResult> {
	const fs = fileSystemOf(context);
	const absoluteSource = resolveWithinRoot(args.source, context.root);
	const absoluteDestination = resolveWithinRoot(args.destination, context.root);
	const realpath = (target: string) => fs.realpath(target);
	await assertRealPathWithinRoot(absoluteSource, context.root, args.source, realpath);
	await assertRealPathWithinRoot(absoluteDestination, context.root, args.destination, realpath);

	const sourceStats = await statIfExists(fs, absoluteSource);
	if (!sourceStats) {
		throw new NotFoundError(args.source);
	}
	if (sourceStats.isDirectory()) {
		throw new ValidationError(`move_file moves files only; ${args.source} is a directory`, { path: args.source });
	}

	if (await statIfExists(fs, absoluteDestination)) {
		throw new PathConflictError(`Destination already exists: ${args.destination}`, args.destination);
	}

	const parent = path.dirname(absoluteDestination);
	const parentStats = await statIfExists(fs, parent);
	if (parentStats && !parentStats.isDirectory()) {
		throw new PathConflictError(`Destination folder is a file: ${path.dirname(args.destination)}`, args.destination);
	}
	if (!parentStats) {
		await makeDirectory(fs, parent, path.dirname(args.destination));
	}

	await relocate(fs, absoluteSource, absoluteDestination, args.destination);
	return { success: true, source: absoluteSource, destination: absoluteDestination };
}

/**
 * Moves a file without ever overwriting the destination.
 * A hard link claims the destination atomically; the source is unlinked only once the destination exists.
 */
async function relocate(fs: ActionFileSystem, source: string, destination: string, requested: string): Promise<void> {
	try {
		await fs.link(source, destination);
	} catch (err) {
		const code = errnoCode(err);
		if (code === "EEXIST") {
			throw new PathConflictError(`Destination already exists: ${requested}`, requested);
		}
		if (code === "EXDEV" || code === "EPERM" || code === "ENOTSUP" || code === "EOPNOTSUPP") {
			await copyThenUnlink(fs, source, destination, requested);
			return;
		}
		throw err;
	}

	try {
		await fs.unlink(source);
	} catch (err) {
		// Undo the link so the move is all-or-nothing; the source is still intact
		await fs.unlink(destination).catch((cleanupErr: unknown) => {
			logError(logger, cleanupErr, `Failed to remove link ${destination} after unlink failure`);
		});
		throw err;
	}
}

async function copyThenUnlink(fs: ActionFileSystem, source: string, destination: string, requested: string) {
	logger.debug("Hard link unavailable for %s, copying instead", source);
	try {
		await fs.copyFile(source, destination, constants.COPYFILE_EXCL);
	} catch (err) {
		if (errnoCode(err) === "EEXIST") {
			throw new PathConflictError(`Destination already exists: ${requested}`, requested);
		}
		await removePartialCopy(fs, destination);
		throw err;
	}

	const [sourceStats, destinationStats] = await Promise.all([fs.stat(source), fs.stat(destination)]);
	if (sourceStats.size !== destinationStats.size) {
		await removePartialCopy(fs, destination);
		throw new Error(
			`Copy of ${source} is incomplete (${destinationStats.size} of ${sourceStats.size} bytes); source left in place`,
		);
	}

	await fs.unlink(source);
}

async function removePartialCopy(fs: ActionFileSystem, destination: string): Promise<void> {
	await fs.rm(destination, { force: true }).catch((cleanupErr: unknown) => {
		logError(logger, cleanupErr, `Failed to remove partial copy ${destination}`);
	});
}
