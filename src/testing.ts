// In-process stand-ins for the model provider and the metadata writer.
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import type { MetadataWriter } from "./metadata";
import { type EncodedImage, VisionProvider } from "./providers/VisionProvider";
import type {
	MetadataFields,
	NamingRules,
	PipelineSession,
	ProviderOptions,
} from "./types";

type FakeHandlers = {
	extractText?: (image: EncodedImage) => Promise<string>;
	describe?: (image: EncodedImage, instruction: string | null) => Promise<string>;
	complete?: (prompt: string) => Promise<string>;
};

export class FakeProvider extends VisionProvider {
	readonly name = "fake";
	protected opts: ProviderOptions = {
		baseURL: "http://localhost:0",
		visionModel: "fake-vision",
		textModel: "fake-text",
		maxTokens: 40,
		visionMaxTokens: 400,
	};
	/** every call in order, e.g. "describe" or "release" */
	readonly calls: string[] = [];
	readonly prompts: string[] = [];
	readonly instructions: (string | null)[] = [];

	constructor(private handlers: FakeHandlers = {}) {
		super();
	}

	async extractText(image: EncodedImage): Promise<string> {
		this.calls.push("extractText");
		return this.handlers.extractText
			? this.handlers.extractText(image)
			: "Sign in\nPassword";
	}

	async describe(
		image: EncodedImage,
		instruction: string | null,
	): Promise<string> {
		this.calls.push("describe");
		this.instructions.push(instruction);
		return this.handlers.describe
			? this.handlers.describe(image, instruction)
			: "A login form with a password field";
	}

	async complete(prompt: string): Promise<string> {
		this.calls.push("complete");
		this.prompts.push(prompt);
		return this.handlers.complete ? this.handlers.complete(prompt) : "Login Form";
	}

	async release(): Promise<void> {
		this.calls.push("release");
	}

	// expose the protected helpers
	clean(text: string | null | undefined): string {
		return this.cleanResponse(text);
	}

	transcript(text: string | null | undefined): string {
		return this.normalizeTranscript(text);
	}
}

export class FakeMetadataWriter implements MetadataWriter {
	readonly writes: { filePath: string; fields: MetadataFields }[] = [];
	closed = false;

	constructor(private failure?: Error) {}

	async write(filePath: string, fields: MetadataFields): Promise<void> {
		if (this.failure) throw this.failure;
		this.writes.push({ filePath, fields });
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}

export function fakeSession(
	provider: VisionProvider,
	overrides: Partial<PipelineSession> = {},
): PipelineSession {
	return {
		provider,
		instruction: null,
		maxDimension: 720,
		reclaim: () => provider.release(),
		...overrides,
	};
}

export const namingRules: NamingRules = {
	namePrefix: "screenshot_",
	extension: ".png",
	missingDatePlaceholder: "unknown-date",
	maxNameLength: 64,
};

export async function makeTempDir(): Promise<string> {
	return fs.promises.mkdtemp(path.join(os.tmpdir(), "snapscribe-"));
}

/** Write a solid-colour PNG of the given size. */
export async function writePng(
	filePath: string,
	width = 64,
	height = 48,
): Promise<void> {
	await sharp({
		create: {
			width,
			height,
			channels: 3,
			background: { r: 240, g: 240, b: 240 },
		},
	})
		.png()
		.toFile(filePath);
}

/** Filename to file contents, for before/after comparisons. */
export async function snapshotDir(
	directory: string,
): Promise<Map<string, Buffer>> {
	const entries = await fs.promises.readdir(directory);
	const contents = new Map<string, Buffer>();
	for (const entry of entries.sort()) {
		contents.set(entry, await fs.promises.readFile(path.join(directory, entry)));
	}
	return contents;
}
