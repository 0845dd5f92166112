import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { applyTransaction } from "./applier";
import { MetadataWriteFailed, RenameFailed } from "./errors";
import { toCandidate } from "./selector";
import { FakeMetadataWriter, makeTempDir, snapshotDir } from "./testing";

const extraction = { rawText: "Sign in", description: "A login form" };

describe("applyTransaction", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await makeTempDir();
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await fs.promises.rm(dir, { recursive: true, force: true });
	});

	it("only reports the mapping in a dry run", async () => {
		const candidate = toCandidate(dir, "screen_a.png");
		await fs.promises.writeFile(candidate.path, "image");
		const before = await snapshotDir(dir);
		const writer = new FakeMetadataWriter();

		const outcome = await applyTransaction(
			candidate,
			"screenshot_unknown-date-login.png",
			extraction,
			"dry-run",
			writer,
		);

		expect(outcome).toEqual({
			oldPath: candidate.path,
			newPath: path.join(dir, "screenshot_unknown-date-login.png"),
			metadataWritten: false,
			mode: "dry-run",
			status: "planned",
		});
		expect(writer.writes).toEqual([]);
		expect(await snapshotDir(dir)).toEqual(before);
	});

	it("renames, then writes metadata to the new path", async () => {
		const candidate = toCandidate(dir, "screen_a.png");
		await fs.promises.writeFile(candidate.path, "image");
		const writer = new FakeMetadataWriter();

		const outcome = await applyTransaction(
			candidate,
			"screenshot_unknown-date-login.png",
			extraction,
			"applied",
			writer,
		);

		const newPath = path.join(dir, "screenshot_unknown-date-login.png");
		expect(outcome.status).toBe("applied");
		expect(outcome.metadataWritten).toBe(true);
		expect(outcome.newPath).toBe(newPath);
		expect(await fs.promises.readdir(dir)).toEqual([
			"screenshot_unknown-date-login.png",
		]);
		expect(writer.writes).toEqual([
			{
				filePath: newPath,
				fields: { description: "A login form", comment: "Sign in" },
			},
		]);
	});

	it("adds a numeric suffix when the name is taken", async () => {
		const candidate = toCandidate(dir, "screen_a.png");
		await fs.promises.writeFile(candidate.path, "image");
		await fs.promises.writeFile(
			path.join(dir, "screenshot_unknown-date-login.png"),
			"other",
		);

		const outcome = await applyTransaction(
			candidate,
			"screenshot_unknown-date-login.png",
			extraction,
			"applied",
			new FakeMetadataWriter(),
		);

		expect(outcome.newPath).toBe(
			path.join(dir, "screenshot_unknown-date-login-1.png"),
		);
		expect(
			await fs.promises.readFile(
				path.join(dir, "screenshot_unknown-date-login.png"),
				"utf-8",
			),
		).toBe("other");
	});

	it("skips the metadata write when the rename fails", async () => {
		const candidate = toCandidate(dir, "screen_missing.png");
		const writer = new FakeMetadataWriter();

		const outcome = await applyTransaction(
			candidate,
			"screenshot_unknown-date-login.png",
			extraction,
			"applied",
			writer,
		);

		expect(outcome.status).toBe("failed");
		expect(outcome.newPath).toBeNull();
		expect(outcome.error).toBeInstanceOf(RenameFailed);
		expect(writer.writes).toEqual([]);
	});

	it("keeps the rename when the metadata write fails", async () => {
		const candidate = toCandidate(dir, "screen_a.png");
		await fs.promises.writeFile(candidate.path, "image");
		const writer = new FakeMetadataWriter(new Error("exiftool exited"));

		const outcome = await applyTransaction(
			candidate,
			"screenshot_unknown-date-login.png",
			extraction,
			"applied",
			writer,
		);

		expect(outcome.status).toBe("partial");
		expect(outcome.metadataWritten).toBe(false);
		expect(outcome.error).toBeInstanceOf(MetadataWriteFailed);
		expect(await fs.promises.readdir(dir)).toEqual([
			"screenshot_unknown-date-login.png",
		]);
	});
});
