// src/session.ts
import sharp from "sharp";
import { SessionSetupFailed } from "./errors";
import { OllamaProvider } from "./providers/OllamaProvider";
import { OpenAIProvider } from "./providers/OpenAIProvider";
import type { VisionProvider } from "./providers/VisionProvider";
import type { Config, Options, PipelineSession } from "./types";

export type ProviderFactory = (
	config: Config,
	options: Options,
) => VisionProvider;

export const createProvider: ProviderFactory = (config, options) => {
	switch (options.provider) {
		case "openai":
			return new OpenAIProvider(config.openai, options.detail);
		case "ollama":
			return new OllamaProvider(config.ollama);
	}
};

/** Drop libvips' operation cache; turning it back on restores the defaults. */
export function clearImageCache(): void {
	sharp.cache(false);
	sharp.cache(true);
}

/**
 * Build the session every item of the batch shares. Called once, before the
 * loop starts.
 * @throws SessionSetupFailed when the provider cannot be initialized
 */
export function createSession(
	config: Config,
	options: Options,
	makeProvider: ProviderFactory = createProvider,
): PipelineSession {
	let provider: VisionProvider;
	try {
		provider = makeProvider(config, options);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new SessionSetupFailed(
			`Error initializing ${options.provider} provider: ${reason}`,
			error,
		);
	}

	return {
		provider,
		instruction: options.instruction ?? config.instruction,
		maxDimension: options.maxDimension,
		reclaim: async () => {
			clearImageCache();
			await provider.release();
		},
	};
}
