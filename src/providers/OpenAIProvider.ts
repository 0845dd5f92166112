import { yellow } from "kleur/colors";
import OpenAI from "openai";
import type {
	ChatCompletion,
	ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import type { Detail, ProviderOptions } from "../types";
import { resolveApiKey } from "../utils/resolveApiKey";
import { type EncodedImage, VisionProvider } from "./VisionProvider";

/** The non-streaming chat completion call of the `OpenAI` client. */
export type ChatCompletionsClient = {
	chat: {
		completions: {
			create(
				body: ChatCompletionCreateParamsNonStreaming,
			): Promise<Pick<ChatCompletion, "choices">>;
		};
	};
};

/**
 * Provider implementation using OpenAI chat completions with image input
 */
export class OpenAIProvider extends VisionProvider {
	readonly name = "openai";
	private client: ChatCompletionsClient;
	protected opts: ProviderOptions;
	private detail: Detail;

	/**
	 * Create a new OpenAIProvider
	 * @param opts - Provider options (models, baseURL, token caps)
	 * @param detail - Image detail level for AI analysis
	 * @param client - Client to use instead of one built from `opts`
	 */
	constructor(
		opts: ProviderOptions,
		detail: Detail,
		client?: ChatCompletionsClient,
	) {
		super();
		this.opts = opts;
		this.detail = detail;
		this.client =
			client ?? new OpenAI({ baseURL: opts.baseURL, apiKey: resolveApiKey() });
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
		const response = await this.client.chat.completions.create({
			model: this.opts.textModel,
			messages: [{ role: "user", content: prompt }],
			max_tokens: this.opts.maxTokens,
		});
		return this.cleanResponse(response.choices[0]?.message?.content);
	}

	private async chatWithImage(
		prompt: string,
		image: EncodedImage,
	): Promise<string | null> {
		const response = await this.client.chat.completions.create({
			model: this.opts.visionModel,
			messages: [
				{
					role: "user",
					content: [
						{ type: "text", text: prompt },
						{
							type: "image_url",
							image_url: {
								url: `data:${image.mimeType};base64,${image.base64}`,
								detail: this.detail,
							},
						},
					],
				},
			],
			max_tokens: this.opts.visionMaxTokens,
		});

		const choice = response.choices[0];
		if (choice && choice.finish_reason !== "stop") {
			console.warn(
				`Model ${yellow(this.opts.visionModel)} stopped generating: ${choice.finish_reason}`,
			);
		}
		return choice?.message?.content ?? null;
	}
}
