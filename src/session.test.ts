import { describe, expect, it, vi } from "vitest";
import { appDefaults, validateConfig } from "./config";
import { SessionSetupFailed } from "./errors";
import { createSession } from "./session";
import { FakeProvider } from "./testing";
import type { Options } from "./types";

const config = validateConfig({ ...appDefaults, instruction: "Which app is this?" });

const options: Options = {
	directory: "/home/test/Desktop",
	dryRun: false,
	unitTest: false,
	provider: "ollama",
	maxDimension: 512,
	detail: "low",
};

describe("createSession", () => {
	it("builds the provider once and carries the image settings", () => {
		const provider = new FakeProvider();
		const factory = vi.fn(() => provider);

		const session = createSession(config, options, factory);

		expect(factory).toHaveBeenCalledTimes(1);
		expect(session.provider).toBe(provider);
		expect(session.maxDimension).toBe(512);
		expect(session.instruction).toBe("Which app is this?");
	});

	it("prefers the command line instruction", () => {
		const session = createSession(
			config,
			{ ...options, instruction: "What error is shown?" },
			() => new FakeProvider(),
		);
		expect(session.instruction).toBe("What error is shown?");
	});

	it("asks the provider to release memory on reclaim", async () => {
		const provider = new FakeProvider();
		const session = createSession(config, options, () => provider);

		await session.reclaim();

		expect(provider.calls).toEqual(["release"]);
	});

	it("wraps provider construction errors", () => {
		const build = () =>
			createSession(config, options, () => {
				throw new Error("Missing model in Ollama provider options");
			});

		expect(build).toThrow(SessionSetupFailed);
		expect(build).toThrow(
			"Error initializing ollama provider: Missing model in Ollama provider options",
		);
	});
});
