// src/extractor.ts
import sharp from "sharp";
import { EmptyDescription } from "./errors";
import type { EncodedImage } from "./providers/VisionProvider";
import type { CandidateFile, ExtractionResult, PipelineSession } from "./types";
import { timed } from "./utils";

/**
 * Read an image and bound its longest side to `maxDimension`, keeping the
 * aspect ratio. Smaller images pass through at their own size.
 */
export async function loadImage(
	filePath: string,
	maxDimension: number,
): Promise<EncodedImage> {
	const buffer = await sharp(filePath)
		.resize({
			width: maxDimension,
			height: maxDimension,
			fit: "inside",
			withoutEnlargement: true,
			kernel: "lanczos3",
		})
		.png()
		.toBuffer();
	return { base64: buffer.toString("base64"), mimeType: "image/png" };
}

/** Read an image at its own size, re-encoded as PNG. */
export async function loadFullImage(filePath: string): Promise<EncodedImage> {
	const buffer = await sharp(filePath).png().toBuffer();
	return { base64: buffer.toString("base64"), mimeType: "image/png" };
}

/**
 * Describe the screenshot with the session's vision model.
 * @throws EmptyDescription when the model answers with nothing
 */
export async function describe(
	file: CandidateFile,
	session: PipelineSession,
): Promise<string> {
	const image = await loadImage(file.path, session.maxDimension);
	const description = (
		await session.provider.describe(image, session.instruction)
	).trim();
	if (!description) {
		throw new EmptyDescription(file.basename);
	}
	return description;
}

/**
 * Gather the text and the description of one screenshot, timing each call.
 * Text is read from the full-size image; only the description gets the
 * bounded one.
 */
export async function extract(
	file: CandidateFile,
	session: PipelineSession,
): Promise<ExtractionResult> {
	const text = await timed(async () =>
		session.provider.extractText(await loadFullImage(file.path)),
	);
	const caption = await timed(() => describe(file, session));

	return {
		rawText: text.value.trim(),
		description: caption.value,
		extractionMs: text.ms,
		descriptionMs: caption.ms,
	};
}
