// src/synthesizer.ts
import type { NamingRules, SynthesizedName } from "./types";

/** Anything that turns a prompt into free text. */
export type TextGenerator = (prompt: string) => Promise<string>;

export type SanitizeStep = (value: string) => string;

export const DEFAULT_MAX_STEM_LENGTH = 64;

/** Used when sanitizing leaves nothing of the model's reply. */
export const EMPTY_STEM = "untitled";

export function buildNamePrompt(
	rawText: string,
	description: string,
	maxLength = DEFAULT_MAX_STEM_LENGTH,
): string {
	return [
		`Generate a concise, descriptive filename (max ${maxLength} characters) for a screenshot stored as a PNG image, based on the OCR text and the AI generated caption below.`,
		"The filename should tell the user what the image is for or what it shows.",
		"Prioritize clarity and distinctiveness while avoiding redundancy.",
		"",
		"Format requirements:",
		"- Output only the filename",
		"- Words must be separated by underscores (_)",
		"- No filename extension (e.g., .png)",
		"- No full sentences",
		"- No explanations",
		"- No special characters (except underscores)",
		`- Maximum length: ${maxLength} characters`,
		"",
		`OCR Text: ${rawText}`,
		"",
		`Caption: ${description}`,
		"",
		"Filename:",
	].join("\n");
}

export const firstLine: SanitizeStep = (value) =>
	value.trim().split(/\r?\n/)[0] ?? "";

// the target filesystem is assumed case-insensitive
export const lowercase: SanitizeStep = (value) => value.toLowerCase();

export const spacesToUnderscores: SanitizeStep = (value) =>
	value.replace(/ /g, "_");

export const collapseUnderscores: SanitizeStep = (value) =>
	value.replace(/_{2,}/g, "_");

// letters and digits of any script, plus _ . -
export const filterCharset: SanitizeStep = (value) =>
	value.replace(/[^\p{L}\p{N}_.-]/gu, "");

// counts code points so a surrogate pair is never split
export const truncate =
	(maxLength: number): SanitizeStep =>
	(value) =>
		Array.from(value).slice(0, maxLength).join("");

export function sanitizeSteps(
	maxLength = DEFAULT_MAX_STEM_LENGTH,
): SanitizeStep[] {
	return [
		firstLine,
		lowercase,
		spacesToUnderscores,
		collapseUnderscores,
		filterCharset,
		truncate(maxLength),
	];
}

/** Turn a raw generator reply into a filename stem. Pure. */
export function sanitizeStem(
	response: string,
	maxLength = DEFAULT_MAX_STEM_LENGTH,
): string {
	return sanitizeSteps(maxLength).reduce((value, step) => step(value), response);
}

/**
 * Assemble `<prefix><date>-<stem><ext>`, substituting the placeholder when the
 * original filename carried no date.
 */
export function composeFilename(
	stem: string,
	dateToken: string | null,
	rules: NamingRules,
): string {
	const date = dateToken ?? rules.missingDatePlaceholder;
	return `${rules.namePrefix}${date}-${stem}${rules.extension}`;
}

/**
 * Ask the generator for a name and shape it into the final filename.
 */
export async function synthesize(
	rawText: string,
	description: string,
	dateToken: string | null,
	generate: TextGenerator,
	rules: NamingRules,
): Promise<SynthesizedName> {
	const response = await generate(
		buildNamePrompt(rawText, description, rules.maxNameLength),
	);
	let stem = sanitizeStem(response, rules.maxNameLength);
	if (stem.endsWith(rules.extension)) {
		stem = stem.slice(0, -rules.extension.length);
	}
	if (!stem) stem = EMPTY_STEM;
	return { stem, filename: composeFilename(stem, dateToken, rules) };
}
