// src/cli.ts
import { Command, InvalidArgumentError } from "commander";
import packageJson from "../package.json";
import { isDetail, isProviderName } from "./config";
import { ConfigError } from "./errors";
import type { Config, Options } from "./types";
import { resolvePath } from "./utils";

type RawOptions = {
	dryRun: boolean;
	unitTest: boolean;
	provider: string;
	instruction?: string;
	maxDimension: number;
	detail: string;
};

function parsePositiveInt(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value) {
		throw new InvalidArgumentError("Expected a positive whole number.");
	}
	return parsed;
}

export function createProgram(config: Config): Command {
	return new Command()
		.name(packageJson.name)
		.version(packageJson.version)
		.description(
			"Rename screenshots by their contents and store the description in their metadata.",
		)
		.argument("[directory]", "Directory containing screenshots", config.directory)
		.option("-n, --dry-run", "Perform a dry run without modifying files", false)
		.option(
			"-t, --unit-test",
			"Ask the text model to add two numbers and exit",
			false,
		)
		.option(
			"--provider <value>",
			"Choose supported API provider - openai or ollama",
			config.provider,
		)
		.option(
			"--instruction <text>",
			"Question the vision model answers instead of captioning",
		)
		.option(
			"--max-dimension <px>",
			"Longest image side sent to the vision model",
			parsePositiveInt,
			config.maxDimension,
		)
		.option(
			"--detail <value>",
			"What image resolution to use for inference (openai)",
			config.detail,
		);
}

/**
 * Parse the command line on top of the loaded configuration.
 * @throws ConfigError for an unsupported provider or detail level
 */
export function parseCliOptions(
	config: Config,
	argv: readonly string[] = process.argv,
): Options {
	const program = createProgram(config);
	program.parse([...argv]);

	const opts = program.opts<RawOptions>();

	// Validation for provider (convert to lowercase for case-insensitive check)
	const provider = opts.provider.toLowerCase();
	if (!isProviderName(provider)) {
		throw new ConfigError(`Selected provider ${provider} is not supported`);
	}
	if (!isDetail(opts.detail)) {
		throw new ConfigError(`Unsupported detail level ${opts.detail}`);
	}

	return {
		directory: resolvePath(program.args[0]) ?? config.directory,
		dryRun: opts.dryRun,
		unitTest: opts.unitTest,
		provider,
		instruction: opts.instruction?.trim() || undefined,
		maxDimension: opts.maxDimension,
		detail: opts.detail,
	};
}
