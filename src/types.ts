import type { VisionProvider } from "./providers/VisionProvider";

export type ProviderName = "openai" | "ollama";

export type Detail = "high" | "low" | "auto";

export type RunMode = "dry-run" | "applied";

export type Options = {
	/** directory scanned for screenshots */
	directory: string;
	/** report the planned renames without touching any file */
	dryRun: boolean;
	/** only check that the text generator answers */
	unitTest: boolean;
	/** API provider */
	provider: ProviderName;
	/** question answered instead of free captioning */
	instruction?: string;
	/** longest side of the image sent to the vision model */
	maxDimension: number;
	/** image resolution used for inference (openai only) */
	detail: Detail;
};

/** API Provider options */
export type ProviderOptions = {
	baseURL: string;
	/** model used for text extraction and description */
	visionModel: string;
	/** model used for filename generation */
	textModel: string;
	/** token cap for the filename completion */
	maxTokens: number;
	/** token cap for transcription and description */
	visionMaxTokens: number;
};

export type OllamaOptions = ProviderOptions & {
	/** unload the models after every file */
	releaseBetweenItems: boolean;
};

export type Config = {
	provider: ProviderName;
	directory: string;
	detail: Detail;

	/** lowercase prefix a screenshot's filename starts with */
	filePrefix: string;
	/** the one image extension processed, lowercase with its dot */
	extension: string;
	/** prefix of every generated filename */
	namePrefix: string;
	missingDatePlaceholder: string;
	maxNameLength: number;
	maxDimension: number;
	previewLimit: number;
	instruction: string | null;

	ollama: OllamaOptions;
	openai: ProviderOptions;
};

export type SelectionRule = {
	prefix: string;
	extension: string;
};

export type CandidateFile = {
	/** path of the file as found; stale once the file is renamed */
	path: string;
	basename: string;
	/** lowercase basename */
	normalizedName: string;
	/** YYYY-MM-DD found in the basename */
	dateToken: string | null;
};

export type ExtractionResult = {
	rawText: string;
	description: string;
	extractionMs: number;
	descriptionMs: number;
};

export type NamingRules = {
	namePrefix: string;
	extension: string;
	missingDatePlaceholder: string;
	maxNameLength: number;
};

export type SynthesizedName = {
	/** sanitized identifier produced by the text generator */
	stem: string;
	/** full filename including prefix, date and extension */
	filename: string;
};

export type OutcomeStatus = "planned" | "applied" | "partial" | "failed";

export type PipelineStage =
	| "extracting"
	| "synthesizing"
	| "applying"
	| "reclaiming";

export type TransactionOutcome = {
	oldPath: string;
	newPath: string | null;
	metadataWritten: boolean;
	mode: RunMode;
	status: OutcomeStatus;
	/** stage the item reached when it failed */
	stage?: PipelineStage;
	error?: Error;
};

export type MetadataFields = {
	/** written to EXIF:ImageDescription */
	description: string;
	/** written to EXIF:UserComment */
	comment: string;
};

/**
 * Long-lived handle shared by every item of a batch. Built once before the
 * loop and passed explicitly into each stage.
 */
export type PipelineSession = {
	provider: VisionProvider;
	instruction: string | null;
	maxDimension: number;
	/** drop transient caches and ask the model host to free memory */
	reclaim: () => Promise<void>;
};

export type BatchState =
	| "idle"
	| "selecting"
	| "extracting"
	| "synthesizing"
	| "applying"
	| "reclaiming"
	| "done"
	| "aborted";

export type BatchReport = {
	outcomes: TransactionOutcome[];
	counts: Record<OutcomeStatus, number>;
};
