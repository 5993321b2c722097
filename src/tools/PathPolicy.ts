import { errnoCode, ValidationError } from "../Errors";
import path from "node:path";

export type RealPath = (target: string) => Promise<string>;

function isWithin(candidate: string, root: string): boolean {
	const prefix = root.endsWith(path.sep) ? root : root + path.sep;
	return candidate === root || candidate.startsWith(prefix);
}

function escapeError(requestedPath: string): ValidationError {
	return new ValidationError(`Path escapes the directory being organized: ${requestedPath}`, {
		path: requestedPath,
	});
}

/**
 * Resolves a tool-supplied path against the directory being organized.
 * Returns the absolute path, throws ValidationError if the path escapes the root.
 */
export function resolveWithinRoot(requestedPath: string, root: string): string {
	if (requestedPath.includes("\u0000")) {
		throw new ValidationError("Invalid path: contains null byte", { path: requestedPath });
	}

	const normalizedRoot = path.resolve(root);
	const absolutePath = path.resolve(normalizedRoot, requestedPath);
	if (isWithin(absolutePath, normalizedRoot)) {
		return absolutePath;
	}
	throw escapeError(requestedPath);
}

/**
 * Follows symlinks on the part of the path that exists and checks it still lands inside the root.
 * Segments that do not exist yet (a folder or destination about to be created) are judged by
 * their nearest existing ancestor.
 */
export async function assertRealPathWithinRoot(
	absolutePath: string,
	root: string,
	requestedPath: string,
	realpath: RealPath,
): Promise<void> {
	const realRoot = await realpath(path.resolve(root));

	let existing = absolutePath;
	let realExisting: string | undefined;
	while (realExisting === undefined) {
		try {
			realExisting = await realpath(existing);
		} catch (err) {
			const code = errnoCode(err);
			const parent = path.dirname(existing);
			if ((code !== "ENOENT" && code !== "ENOTDIR") || parent === existing) {
				throw err;
			}
			existing = parent;
		}
	}

	if (!isWithin(realExisting, realRoot)) {
		throw escapeError(requestedPath);
	}
}
