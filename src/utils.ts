import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// Helper function: Resolve tilde (~) in paths
export function resolvePath(p: string | null | undefined): string | null {
	if (!p) return null;
	return p.replace(/^~/, os.homedir());
}

// Helper function: Deep merge two objects
export function deepMerge<
	T extends Record<string, unknown>,
	U extends Record<string, unknown>,
>(target: T, source: U): T & U {
	const output = { ...target } as T & U;
	if (isObject(target) && isObject(source)) {
		for (const key of Object.keys(source)) {
			const sourceValue = source[key];
			const targetValue = target[key];
			if (isObject(sourceValue) && isObject(targetValue)) {
				(output as Record<string, unknown>)[key] = deepMerge(
					targetValue,
					sourceValue,
				);
			} else {
				Object.assign(output, { [key]: sourceValue });
			}
		}
	}
	return output;
}

// Helper function: Check if an item is an object
export function isObject(item: unknown): item is Record<string, unknown> {
	return Boolean(item && typeof item === "object" && !Array.isArray(item));
}

const DATE_TOKEN = /(\d{4}-\d{2}-\d{2})/;

/**
 * Finds the first YYYY-MM-DD token in a filename.
 * @param fileName - basename of the screenshot
 * @returns the date token, or null when the name carries none
 */
export function extractDateToken(fileName: string): string | null {
	const match = fileName.match(DATE_TOKEN);
	return match?.[1] ?? null;
}

/**
 * Finds a free path for `desiredPath`. When another file already holds the
 * name, numbers up with a `-N` suffix before the extension. `sourcePath` is
 * the file being renamed and never counts as a collision. Paths in
 * `reserved` count as taken even when nothing is on disk yet.
 */
export function resolveAvailablePath(
	desiredPath: string,
	sourcePath?: string,
	reserved: ReadonlySet<string> = new Set(),
): string {
	const folder = path.dirname(desiredPath);
	const ext = path.extname(desiredPath);
	const baseWithoutExt = path.basename(desiredPath, ext);
	const source = sourcePath ? path.resolve(sourcePath) : null;

	let count = 0;
	let finalPath = desiredPath;
	while (
		reserved.has(finalPath) ||
		(fs.existsSync(finalPath) && path.resolve(finalPath) !== source)
	) {
		count++;
		finalPath = path.join(folder, `${baseWithoutExt}-${count}${ext}`);
	}
	return finalPath;
}

/**
 * Wraps text into at most `maxLines` lines of `lineLength` characters.
 * Words that would start a line past the limit are dropped.
 */
export function formatPreview(
	text: string,
	maxLines = 2,
	lineLength = 80,
): string {
	const words = text.split(/\s+/).filter(Boolean);
	const lines: string[] = [];
	let current = "";

	for (const word of words) {
		if (current && current.length + word.length + 1 > lineLength) {
			lines.push(current);
			current = word;
			if (lines.length === maxLines) break;
		} else {
			current = current ? `${current} ${word}` : word;
		}
	}

	if (current && lines.length < maxLines) {
		lines.push(current);
	}

	return lines.join("\n");
}

export function formatSeconds(ms: number): string {
	return `${(ms / 1000).toFixed(2)} seconds`;
}

/** Runs `fn` and reports how long it took in milliseconds. */
export async function timed<T>(
	fn: () => Promise<T>,
): Promise<{ value: T; ms: number }> {
	const start = performance.now();
	const value = await fn();
	return { value, ms: performance.now() - start };
}
