import fileTypes from "./file-types.json";
import path from "node:path";

export const FILE_CATEGORIES = [
	"document",
	"spreadsheet",
	"presentation",
	"image",
	"audio",
	"video",
	"archive",
	"code",
	"data",
] as const;

export type FileCategory = (typeof FILE_CATEGORIES)[number];

/** Classification reported by list_directory: a file bucket, "other", or "folder" for directories */
export type InferredType = FileCategory | "other" | "folder";

const fileCategories: ReadonlySet<string> = new Set(FILE_CATEGORIES);

function isFileCategory(value: string): value is FileCategory {
	return fileCategories.has(value);
}

const categoryByExtension: ReadonlyMap<string, FileCategory> = new Map(
	Object.entries(fileTypes).flatMap(([category, extensions]) =>
		isFileCategory(category) ? extensions.map(extension => [extension, category] as const) : [],
	),
);

/**
 * Lower-cased extension including the dot, or "" for names without one.
 * Dotfiles such as ".env" count as their own extension.
 */
export function extensionOf(fileName: string): string {
	const ext = path.extname(fileName).toLowerCase();
	if (ext) {
		return ext;
	}
	return fileName.startsWith(".") && fileName.indexOf(".", 1) === -1 ? fileName.toLowerCase() : "";
}

export function inferFileType(fileName: string): InferredType {
	return categoryByExtension.get(extensionOf(fileName)) ?? "other";
}
