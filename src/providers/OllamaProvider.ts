import { yellow } from "kleur/colors";
import {
	type ChatRequest,
	type ChatResponse,
	type GenerateRequest,
	Ollama,
} from "ollama";
import type { OllamaOptions } from "../types";
import { type EncodedImage, VisionProvider } from "./VisionProvider";

/** The non-streaming calls of the `Ollama` client this provider makes. */
export type OllamaClient = {
	chat(
		request: ChatRequest & { stream?: false },
	): Promise<Pick<ChatResponse, "message">>;
	generate(request: GenerateRequest & { stream?: false }): Promise<unknown>;
};

/**
 * Provider implementation for local Ollama models using the ollama npm package
 */
export class OllamaProvider extends VisionProvider {
	readonly name = "ollama";
	private client: OllamaClient;
	protected opts: OllamaOptions;

	/**
	 * Create a new OllamaProvider
	 * @param opts - Provider options (models, baseURL, token caps)
	 * @param client - Client to use instead of one built from `opts.baseURL`
	 */
	constructor(opts: OllamaOptions, client?: OllamaClient) {
		super();
		if (!opts.baseURL) {
			throw new Error("Missing baseURL in Ollama provider options");
		}
		if (!opts.visionModel || !opts.textModel) {
			throw new Error("Missing model in Ollama provider options");
		}

		this.opts = opts;
		this.client = client ?? new Ollama({ host: opts.baseURL });
		console.log(
			`Initialized ${this.name} provider with models ${yellow(opts.visionModel)} and ${yellow(opts.textModel)}`,
		);
	}

	async extractText(image: EncodedImage): Promise<string> {
		const content = await this.chatWithImage(
			VisionProvider.TRANSCRIBE_PROMPT,
			image,
		);
		return this.normalizeTranscript(content);
	}

	async describe(
		image: EncodedImage,
		instruction: string | null,
	): Promise<string> {
		const content = await this.chatWithImage(
			instruction ?? VisionProvider.CAPTION_PROMPT,
			image,
		);
		return this.cleanResponse(content);
	}

	async complete(prompt: string): Promise<string> {
		const response = await this.client.chat({
			model: this.opts.textModel,
			messages: [{ role: "user", content: prompt }],
			options: { num_predict: this.opts.maxTokens },
		});
		return this.cleanResponse(response.message?.content);
	}

	/**
	 * Unload both models when configured to; Ollama frees a model's memory
	 * once its keep-alive reaches zero.
	 */
	async release(): Promise<void> {
		if (!this.opts.releaseBetweenItems) return;

		const models = new Set([this.opts.visionModel, this.opts.textModel]);
		for (const model of models) {
			await this.client.generate({ model, prompt: "", keep_alive: 0 });
		}
	}

	private async chatWithImage(
		prompt: string,
		image: EncodedImage,
	): Promise<string> {
		const response = await this.client.chat({
			model: this.opts.visionModel,
			messages: [{ role: "user", content: prompt, images: [image.base64] }],
			options: { num_predict: this.opts.visionMaxTokens },
		});
		return response.message?.content ?? "";
	}
}
