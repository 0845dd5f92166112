// src/index.ts
import { red } from "kleur/colors";
import { parseCliOptions } from "./cli";
import { loadConfig } from "./config";
import { ExifToolMetadataWriter } from "./metadata";
import { runBatch } from "./orchestrator";
import { runSelfTest } from "./selfTest";
import { createProvider, createSession } from "./session";
import type { Config, Options } from "./types";

// Main application function
async function main() {
	// 1. Load configuration
	const config: Config = await loadConfig();

	// 2. Parse Command Line Options (passing config for defaults)
	const options: Options = parseCliOptions(config);

	// 3. Connectivity check only
	if (options.unitTest) {
		const provider = createProvider(config, options);
		const passed = await runSelfTest((prompt) => provider.complete(prompt));
		process.exit(passed ? 0 : 1);
	}

	// 4. Select, order and process the screenshots
	const writer = new ExifToolMetadataWriter();
	try {
		await runBatch(
			{
				directory: options.directory,
				mode: options.dryRun ? "dry-run" : "applied",
				rule: { prefix: config.filePrefix, extension: config.extension },
				naming: {
					namePrefix: config.namePrefix,
					extension: config.extension,
					missingDatePlaceholder: config.missingDatePlaceholder,
					maxNameLength: config.maxNameLength,
				},
				previewLimit: config.previewLimit,
			},
			{
				createSession: () => createSession(config, options),
				writer,
			},
		);
	} finally {
		await writer.close();
	}
}

// Execute the main function and catch any top-level errors
main().catch((error) => {
	const message = error instanceof Error ? error.message : String(error);
	console.error(red(message));
	const cause = error instanceof Error ? error.cause : undefined;
	// session setup already folds the cause's message into its own
	if (cause && !(cause instanceof Error && message.includes(cause.message))) {
		console.error(cause);
	}
	process.exit(1);
});
