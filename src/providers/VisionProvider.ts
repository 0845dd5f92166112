import type { ProviderOptions } from "../types";

/** Image handed to the vision engines. */
export type EncodedImage = {
	base64: string;
	mimeType: "image/png";
};

/**
 * Abstract class for the model services the pipeline talks to: text
 * extraction, image description and free-text completion.
 */
export abstract class VisionProvider {
	protected abstract opts: ProviderOptions;

	static readonly NO_TEXT = "NO_TEXT";

	static readonly TRANSCRIBE_PROMPT = `Transcribe all readable text in this image exactly as it appears, line by line.
Do not describe the image. Do not add commentary.
If the image contains no text, reply with ${VisionProvider.NO_TEXT}.`;

	static readonly CAPTION_PROMPT =
		"Describe this image in two or three sentences. Mention the application or website if you can identify it.";

	/** Provider name used in log lines */
	abstract readonly name: string;

	/**
	 * Return all machine-readable text in the image.
	 * @returns the text, or an empty string when there is none
	 */
	abstract extractText(image: EncodedImage): Promise<string>;

	/**
	 * Describe the image, or answer `instruction` about it when given.
	 * @returns the raw model output, possibly empty
	 */
	abstract describe(
		image: EncodedImage,
		instruction: string | null,
	): Promise<string>;

	/** Send a text-only prompt and return the raw reply. */
	abstract complete(prompt: string): Promise<string>;

	/** Ask the model host to free memory held for this session. */
	async release(): Promise<void> {}

	/**
	 * Trim a model reply and unwrap a surrounding markdown code block.
	 */
	protected cleanResponse(text: string | null | undefined): string {
		if (!text) return "";
		const trimmed = text.trim();
		const codeBlock = trimmed.match(/^```[a-z]*\n([\s\S]*?)\n?```$/);
		return (codeBlock?.[1] ?? trimmed).trim();
	}

	/** Map the no-text sentinel to an empty transcript. */
	protected normalizeTranscript(text: string | null | undefined): string {
		const cleaned = this.cleanResponse(text);
		return cleaned.toUpperCase().replace(/[^A-Z_]/g, "") ===
			VisionProvider.NO_TEXT
			? ""
			: cleaned;
	}
}
