// src/config.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors";
import type { Config, Detail, ProviderName } from "./types";
import { deepMerge, isObject, resolvePath } from "./utils";

// Application default configuration
export const appDefaults = {
	provider: "ollama",
	directory: path.join(os.homedir(), "Desktop"),
	detail: "low",
	filePrefix: "screen",
	extension: ".png",
	namePrefix: "screenshot_",
	missingDatePlaceholder: "unknown-date",
	maxNameLength: 64,
	maxDimension: 720,
	previewLimit: 9,
	instruction: null,
	ollama: {
		baseURL: "http://localhost:11434",
		visionModel: "llava",
		textModel: "llama3.2",
		maxTokens: 40,
		visionMaxTokens: 400,
		releaseBetweenItems: false,
	},
	openai: {
		baseURL: "https://api.openai.com/v1",
		visionModel: "gpt-4o-mini",
		textModel: "gpt-4o-mini",
		maxTokens: 40,
		visionMaxTokens: 400,
	},
};

const PROVIDERS: readonly ProviderName[] = ["ollama", "openai"];
const DETAILS: readonly Detail[] = ["low", "high", "auto"];

function projectRoot(): string {
	return path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
}

export function defaultConfigPath(): string {
	return path.join(projectRoot(), "user.config.json");
}

// Load the user configuration, creating it from the example or defaults first
async function loadAndCreateUserConfig(
	configPath: string,
): Promise<Record<string, unknown>> {
	const exampleConfigPath = `${configPath}.example`;

	try {
		await fs.promises.access(configPath);
	} catch {
		try {
			let configContent: string;
			try {
				configContent = await fs.promises.readFile(exampleConfigPath, "utf-8");
				console.log(`Creating ${path.basename(configPath)} from example file...`);
			} catch {
				configContent = JSON.stringify(appDefaults, null, 2);
				console.log(
					`Creating ${path.basename(configPath)} from default values...`,
				);
			}
			await fs.promises.writeFile(configPath, configContent, "utf-8");
		} catch (createError) {
			console.warn(`Failed to create ${configPath}:`, createError);
			return {};
		}
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(await fs.promises.readFile(configPath, "utf-8"));
	} catch (error) {
		throw new ConfigError(`Could not read configuration ${configPath}`, error);
	}
	if (!isObject(parsed)) {
		throw new ConfigError(`Configuration ${configPath} must be a JSON object`);
	}
	return parsed;
}

function positiveInteger(value: unknown, key: string): number {
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${key} must be a positive integer`);
	}
	return value;
}

function nonEmptyString(value: unknown, key: string): string {
	if (typeof value !== "string" || value.trim() === "") {
		throw new ConfigError(`${key} must be a non-empty string`);
	}
	return value;
}

export function isProviderName(value: unknown): value is ProviderName {
	return PROVIDERS.some((name) => name === value);
}

export function isDetail(value: unknown): value is Detail {
	return DETAILS.some((detail) => detail === value);
}

function providerBlock(value: unknown, key: string) {
	if (!isObject(value)) {
		throw new ConfigError(`${key} must be an object`);
	}
	return {
		baseURL: nonEmptyString(value.baseURL, `${key}.baseURL`),
		visionModel: nonEmptyString(value.visionModel, `${key}.visionModel`),
		textModel: nonEmptyString(value.textModel, `${key}.textModel`),
		maxTokens: positiveInteger(value.maxTokens, `${key}.maxTokens`),
		visionMaxTokens: positiveInteger(
			value.visionMaxTokens,
			`${key}.visionMaxTokens`,
		),
	};
}

/**
 * Check a merged configuration object and turn it into a `Config`.
 * @throws ConfigError naming the first offending key
 */
export function validateConfig(merged: Record<string, unknown>): Config {
	const rawProvider = merged.provider;
	const provider =
		typeof rawProvider === "string" ? rawProvider.toLowerCase() : rawProvider;
	if (!isProviderName(provider)) {
		throw new ConfigError(
			`provider must be one of ${PROVIDERS.join(", ")}, got ${String(rawProvider)}`,
		);
	}
	const detail = merged.detail;
	if (!isDetail(detail)) {
		throw new ConfigError(`detail must be one of ${DETAILS.join(", ")}`);
	}

	const extension = nonEmptyString(merged.extension, "extension").toLowerCase();
	if (!extension.startsWith(".")) {
		throw new ConfigError("extension must start with a dot");
	}

	const rawInstruction = merged.instruction ?? null;
	if (rawInstruction !== null && typeof rawInstruction !== "string") {
		throw new ConfigError("instruction must be a string or null");
	}
	const instruction =
		typeof rawInstruction === "string" && rawInstruction.trim()
			? rawInstruction
			: null;

	const rawOllama = merged.ollama;
	const releaseBetweenItems =
		isObject(rawOllama) && rawOllama.releaseBetweenItems === true;

	return {
		provider,
		directory:
			resolvePath(nonEmptyString(merged.directory, "directory")) ??
			appDefaults.directory,
		detail,
		filePrefix: nonEmptyString(merged.filePrefix, "filePrefix").toLowerCase(),
		extension,
		namePrefix: nonEmptyString(merged.namePrefix, "namePrefix"),
		missingDatePlaceholder: nonEmptyString(
			merged.missingDatePlaceholder,
			"missingDatePlaceholder",
		),
		maxNameLength: positiveInteger(merged.maxNameLength, "maxNameLength"),
		maxDimension: positiveInteger(merged.maxDimension, "maxDimension"),
		previewLimit: positiveInteger(merged.previewLimit, "previewLimit"),
		instruction,
		ollama: {
			...providerBlock(rawOllama, "ollama"),
			releaseBetweenItems,
		},
		openai: providerBlock(merged.openai, "openai"),
	};
}

// Function to load and process configuration
export async function loadConfig(
	configPath: string = defaultConfigPath(),
): Promise<Config> {
	const userConfig = await loadAndCreateUserConfig(configPath);
	return validateConfig(deepMerge(appDefaults, userConfig));
}
