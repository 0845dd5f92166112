import type { PipelineStage } from "./types";

export class SnapscribeError extends Error {
	public readonly code: string;
	public readonly stage?: PipelineStage;

	constructor(
		message: string,
		options: { code: string; stage?: PipelineStage; cause?: unknown },
	) {
		super(message, { cause: options.cause });
		this.name = new.target.name;
		this.code = options.code;
		this.stage = options.stage;
	}
}

export class ConfigError extends SnapscribeError {
	constructor(message: string, cause?: unknown) {
		super(message, { code: "CONFIG_ERROR", cause });
	}
}

export class DirectoryNotReadable extends SnapscribeError {
	constructor(directory: string, cause?: unknown) {
		super(`Directory ${directory} does not exist or is not readable`, {
			code: "DIRECTORY_NOT_READABLE",
			cause,
		});
	}
}

export class NoCandidatesFound extends SnapscribeError {
	constructor(directory: string) {
		super(`No images found in ${directory}`, { code: "NO_CANDIDATES" });
	}
}

export class SessionSetupFailed extends SnapscribeError {
	constructor(message: string, cause?: unknown) {
		super(message, { code: "SESSION_SETUP_FAILED", cause });
	}
}

export class EmptyDescription extends SnapscribeError {
	constructor(filename: string) {
		super(
			`Caption generation failed for ${filename}: the model returned an empty response`,
			{ code: "EMPTY_DESCRIPTION", stage: "extracting" },
		);
	}
}

export class RenameFailed extends SnapscribeError {
	constructor(from: string, to: string, cause?: unknown) {
		super(`Could not rename ${from} to ${to}`, {
			code: "RENAME_FAILED",
			stage: "applying",
			cause,
		});
	}
}

export class MetadataWriteFailed extends SnapscribeError {
	constructor(filePath: string, cause?: unknown) {
		super(`Could not write metadata to ${filePath}`, {
			code: "METADATA_WRITE_FAILED",
			stage: "applying",
			cause,
		});
	}
}

/** Normalizes anything thrown into an Error. */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
