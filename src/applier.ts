// src/applier.ts
import fs from "node:fs";
import path from "node:path";
import { yellow } from "kleur/colors";
import { MetadataWriteFailed, RenameFailed } from "./errors";
import type { MetadataWriter } from "./metadata";
import type {
	CandidateFile,
	ExtractionResult,
	RunMode,
	TransactionOutcome,
} from "./types";
import { resolveAvailablePath } from "./utils";

/**
 * Rename the screenshot, then write its description and text into the
 * renamed file. A dry run only reports the mapping.
 *
 * The metadata write targets the new path, so the order is fixed. A failed
 * metadata write leaves the rename in place and yields a `partial` outcome.
 * `planned` holds the targets earlier dry-run items were given, so a preview
 * numbers up the same way a real run would.
 */
export async function applyTransaction(
	candidate: CandidateFile,
	targetName: string,
	extraction: Pick<ExtractionResult, "rawText" | "description">,
	mode: RunMode,
	writer: MetadataWriter,
	planned: ReadonlySet<string> = new Set(),
): Promise<TransactionOutcome> {
	const newPath = resolveAvailablePath(
		path.join(path.dirname(candidate.path), targetName),
		candidate.path,
		planned,
	);
	const newName = path.basename(newPath);

	if (mode === "dry-run") {
		console.log(
			`Dry Run: Would rename '${candidate.basename}' -> '${yellow(newName)}'`,
		);
		return {
			oldPath: candidate.path,
			newPath,
			metadataWritten: false,
			mode,
			status: "planned",
		};
	}

	try {
		await fs.promises.rename(candidate.path, newPath);
	} catch (error) {
		return {
			oldPath: candidate.path,
			newPath: null,
			metadataWritten: false,
			mode,
			status: "failed",
			stage: "applying",
			error: new RenameFailed(candidate.basename, newName, error),
		};
	}

	try {
		await writer.write(newPath, {
			description: extraction.description,
			comment: extraction.rawText,
		});
	} catch (error) {
		return {
			oldPath: candidate.path,
			newPath,
			metadataWritten: false,
			mode,
			status: "partial",
			stage: "applying",
			error: new MetadataWriteFailed(newPath, error),
		};
	}

	console.log(
		`Renamed and updated metadata: '${candidate.basename}' -> '${yellow(newName)}'`,
	);
	return {
		oldPath: candidate.path,
		newPath,
		metadataWritten: true,
		mode,
		status: "applied",
	};
}
