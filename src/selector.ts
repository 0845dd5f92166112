// src/selector.ts
import fs from "node:fs";
import path from "node:path";
import { DirectoryNotReadable, NoCandidatesFound } from "./errors";
import type { CandidateFile, SelectionRule } from "./types";
import { extractDateToken } from "./utils";

/**
 * Whether a basename is a screenshot the pipeline should process.
 * Both prefix and extension compare case-insensitively.
 */
export function matchesRule(basename: string, rule: SelectionRule): boolean {
	const lower = basename.toLowerCase();
	return (
		lower.startsWith(rule.prefix.toLowerCase()) &&
		path.extname(lower) === rule.extension.toLowerCase()
	);
}

export function toCandidate(directory: string, basename: string): CandidateFile {
	return {
		path: path.join(directory, basename),
		basename,
		normalizedName: basename.toLowerCase(),
		dateToken: extractDateToken(basename),
	};
}

// symlinks count when they resolve to a regular file
async function isRegularFile(
	directory: string,
	entry: fs.Dirent,
): Promise<boolean> {
	if (entry.isFile()) return true;
	if (!entry.isSymbolicLink()) return false;
	try {
		return (await fs.promises.stat(path.join(directory, entry.name))).isFile();
	} catch {
		// dangling link
		return false;
	}
}

/**
 * List the screenshots in `directory`, in the order the filesystem returns them.
 * @throws DirectoryNotReadable when the directory is missing or unreadable
 * @throws NoCandidatesFound when nothing matches
 */
export async function selectCandidates(
	directory: string,
	rule: SelectionRule,
): Promise<CandidateFile[]> {
	let entries: fs.Dirent[];
	try {
		entries = await fs.promises.readdir(directory, { withFileTypes: true });
	} catch (error) {
		throw new DirectoryNotReadable(directory, error);
	}

	const candidates: CandidateFile[] = [];
	for (const entry of entries) {
		if (matchesRule(entry.name, rule) && (await isRegularFile(directory, entry))) {
			candidates.push(toCandidate(directory, entry.name));
		}
	}

	if (candidates.length === 0) {
		throw new NoCandidatesFound(directory);
	}
	return candidates;
}
