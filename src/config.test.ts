import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { appDefaults, loadConfig, validateConfig } from "./config";
import { ConfigError } from "./errors";
import { makeTempDir } from "./testing";

describe("loadConfig", () => {
	let dir: string;
	let configPath: string;

	beforeEach(async () => {
		dir = await makeTempDir();
		configPath = path.join(dir, "user.config.json");
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await fs.promises.rm(dir, { recursive: true, force: true });
	});

	it("creates the user config from defaults on first run", async () => {
		const config = await loadConfig(configPath);

		expect(config.provider).toBe("ollama");
		expect(config.maxDimension).toBe(720);
		expect(config.maxNameLength).toBe(64);
		expect(config.instruction).toBeNull();
		expect(fs.existsSync(configPath)).toBe(true);
	});

	it("creates the user config from the example file when present", async () => {
		await fs.promises.writeFile(
			`${configPath}.example`,
			JSON.stringify({ previewLimit: 3 }),
		);

		const config = await loadConfig(configPath);

		expect(config.previewLimit).toBe(3);
	});

	it("merges user values over the defaults", async () => {
		await fs.promises.writeFile(
			configPath,
			JSON.stringify({
				provider: "OpenAI",
				directory: "~/Shots",
				maxDimension: 1024,
				ollama: { textModel: "qwen2.5" },
			}),
		);

		const config = await loadConfig(configPath);

		expect(config.provider).toBe("openai");
		expect(config.directory).toBe(path.join(os.homedir(), "Shots"));
		expect(config.maxDimension).toBe(1024);
		expect(config.ollama.textModel).toBe("qwen2.5");
		expect(config.ollama.visionModel).toBe("llava");
		expect(config.ollama.releaseBetweenItems).toBe(false);
	});

	it("rejects malformed JSON", async () => {
		await fs.promises.writeFile(configPath, "{ not json");
		await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
	});
});

describe("validateConfig", () => {
	it("rejects an unknown provider", () => {
		expect(() => validateConfig({ ...appDefaults, provider: "bard" })).toThrow(
			"provider must be one of ollama, openai, got bard",
		);
	});

	it("rejects a non-positive name length", () => {
		expect(() => validateConfig({ ...appDefaults, maxNameLength: 0 })).toThrow(
			ConfigError,
		);
	});

	it("rejects an extension without a dot", () => {
		expect(() => validateConfig({ ...appDefaults, extension: "png" })).toThrow(
			"extension must start with a dot",
		);
	});

	it("treats a blank instruction as none", () => {
		expect(validateConfig({ ...appDefaults, instruction: "  " }).instruction).toBeNull();
	});
});
