// src/orchestrator.ts
import async from "async";
import { dim, red, yellow } from "kleur/colors";
import { applyTransaction } from "./applier";
import { toError } from "./errors";
import { extract } from "./extractor";
import type { MetadataWriter } from "./metadata";
import { selectCandidates } from "./selector";
import { synthesize } from "./synthesizer";
import type {
	BatchReport,
	BatchState,
	CandidateFile,
	NamingRules,
	OutcomeStatus,
	PipelineSession,
	PipelineStage,
	RunMode,
	SelectionRule,
	TransactionOutcome,
} from "./types";
import { formatPreview, formatSeconds, timed } from "./utils";

export type BatchOptions = {
	directory: string;
	mode: RunMode;
	rule: SelectionRule;
	naming: NamingRules;
	previewLimit: number;
};

export type BatchDependencies = {
	/** builds the shared session; called once, after selection */
	createSession: () => PipelineSession;
	writer: MetadataWriter;
	/** source of randomness for the dry-run shuffle */
	random?: () => number;
	onStateChange?: (state: BatchState, file?: CandidateFile) => void;
};

type QueuedItem = {
	file: CandidateFile;
	position: number;
};

function compareNames(a: CandidateFile, b: CandidateFile): number {
	if (a.normalizedName < b.normalizedName) return -1;
	if (a.normalizedName > b.normalizedName) return 1;
	return 0;
}

// Fisher-Yates, in place
function shuffle<T>(items: T[], random: () => number): T[] {
	for (let i = items.length - 1; i > 0; i--) {
		const j = Math.floor(random() * (i + 1));
		[items[i], items[j]] = [items[j], items[i]];
	}
	return items;
}

/**
 * Order the batch for processing. Dry runs shuffle so repeated previews
 * sample different files; real runs go shortest filename first.
 */
export function orderCandidates(
	files: readonly CandidateFile[],
	mode: RunMode,
	random: () => number = Math.random,
): CandidateFile[] {
	const sorted = [...files].sort(compareNames);
	if (mode === "dry-run") {
		return shuffle(sorted, random);
	}
	// Array.prototype.sort is stable, so equal lengths stay alphabetical
	return sorted.sort((a, b) => a.basename.length - b.basename.length);
}

export function formatBatchPreview(
	files: readonly CandidateFile[],
	limit = 9,
): string {
	const lines = files
		.slice(0, limit)
		.map((file, index) => `${index + 1}: ${file.basename}`);
	if (files.length > limit) {
		lines.push(`... plus ${files.length - limit} more files`);
	}
	return lines.join("\n");
}

export function countOutcomes(
	outcomes: readonly TransactionOutcome[],
): Record<OutcomeStatus, number> {
	const counts: Record<OutcomeStatus, number> = {
		planned: 0,
		applied: 0,
		partial: 0,
		failed: 0,
	};
	for (const outcome of outcomes) {
		counts[outcome.status]++;
	}
	return counts;
}

function failedOutcome(
	file: CandidateFile,
	mode: RunMode,
	stage: PipelineStage,
	error: unknown,
): TransactionOutcome {
	return {
		oldPath: file.path,
		newPath: null,
		metadataWritten: false,
		mode,
		status: "failed",
		stage,
		error: toError(error),
	};
}

function reportItemError(file: CandidateFile, outcome: TransactionOutcome) {
	if (!outcome.error) return;
	const label =
		outcome.status === "partial" ? "Partially processed" : "Failed to process";
	console.error(
		red(`${label} ${file.basename} during ${outcome.stage ?? "processing"}:`),
		outcome.error.message,
	);
	if (outcome.error.cause) {
		console.error(dim(`  caused by: ${String(outcome.error.cause)}`));
	}
}

/**
 * Run one screenshot through extract, synthesize and apply. Never rejects:
 * any failure becomes a `failed` outcome. Reclamation runs whatever happens.
 * A dry run records its target in `planned` so later items avoid it.
 */
export async function processItem(
	file: CandidateFile,
	session: PipelineSession,
	options: BatchOptions,
	deps: BatchDependencies,
	planned: Set<string> = new Set(),
): Promise<TransactionOutcome> {
	const emit = (state: PipelineStage) => deps.onStateChange?.(state, file);

	console.log("\n");
	console.log("=".repeat(60));
	console.log(`Processing image: ${yellow(file.basename)}`);

	let stage: PipelineStage = "extracting";
	let outcome: TransactionOutcome;
	try {
		emit(stage);
		const extraction = await extract(file, session);
		console.log(`\nOCR Results:\n${formatPreview(extraction.rawText)}`);
		console.log(
			dim(`Time taken for OCR: ${formatSeconds(extraction.extractionMs)}`),
		);
		console.log(`\nCaption Results:\n${formatPreview(extraction.description)}`);
		console.log(
			dim(
				`Time taken for caption generation: ${formatSeconds(extraction.descriptionMs)}`,
			),
		);

		stage = "synthesizing";
		emit(stage);
		const named = await timed(() =>
			synthesize(
				extraction.rawText,
				extraction.description,
				file.dateToken,
				(prompt) => session.provider.complete(prompt),
				options.naming,
			),
		);
		console.log(`\nAI Filename Result: ${yellow(named.value.filename)}`);
		console.log(
			dim(`Time taken for filename generation: ${formatSeconds(named.ms)}`),
		);

		stage = "applying";
		emit(stage);
		const applied = await timed(() =>
			applyTransaction(
				file,
				named.value.filename,
				extraction,
				options.mode,
				deps.writer,
				planned,
			),
		);
		outcome = applied.value;
		if (outcome.status === "planned" && outcome.newPath) {
			planned.add(outcome.newPath);
		}
		if (options.mode === "applied") {
			console.log(
				dim(
					`Time taken for renaming and metadata update: ${formatSeconds(applied.ms)}`,
				),
			);
		}
	} catch (error) {
		outcome = failedOutcome(file, options.mode, stage, error);
	}
	reportItemError(file, outcome);

	emit("reclaiming");
	try {
		await session.reclaim();
	} catch (error) {
		console.warn(
			`Could not release memory after ${file.basename}: ${toError(error).message}`,
		);
	}
	return outcome;
}

async function prepareBatch(
	options: BatchOptions,
	deps: BatchDependencies,
): Promise<{ ordered: CandidateFile[]; session: PipelineSession }> {
	console.log(`Checking for screenshots in ${yellow(options.directory)}...`);
	const files = await selectCandidates(options.directory, options.rule);
	const ordered = orderCandidates(files, options.mode, deps.random);
	console.log(formatBatchPreview(ordered, options.previewLimit));

	return { ordered, session: deps.createSession() };
}

/**
 * Select, order and process a directory of screenshots one at a time.
 * Selection and session errors propagate; per-item errors are logged and
 * the batch moves on.
 */
export async function runBatch(
	options: BatchOptions,
	deps: BatchDependencies,
): Promise<BatchReport> {
	const emit = (state: BatchState) => deps.onStateChange?.(state);

	emit("selecting");
	let prepared: Awaited<ReturnType<typeof prepareBatch>>;
	try {
		prepared = await prepareBatch(options, deps);
	} catch (error) {
		emit("aborted");
		throw error;
	}
	const { ordered, session } = prepared;

	const outcomes: TransactionOutcome[] = [];
	const planned = new Set<string>();
	const total = ordered.length;

	// one file at a time: the model session is not shared between calls
	const queue = async.queue<QueuedItem>(async (item) => {
		console.log(`\nProcessing image ${item.position} of ${total}`);
		try {
			outcomes.push(
				await processItem(item.file, session, options, deps, planned),
			);
		} catch (error) {
			outcomes.push(
				failedOutcome(item.file, options.mode, "extracting", error),
			);
		}
	}, 1);

	await new Promise<void>((resolve) => {
		queue.drain(() => resolve());
		queue.push(ordered.map((file, index) => ({ file, position: index + 1 })));
	});

	emit("done");
	const counts = countOutcomes(outcomes);
	console.log(
		`\nAll ${total} screenshots processed: ${counts.applied} renamed, ${counts.planned} planned, ${counts.partial} partial, ${counts.failed} failed.`,
	);
	return { outcomes, counts };
}
