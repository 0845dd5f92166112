// src/metadata.ts
import fs from "node:fs";
import { ExifTool, type WriteTags } from "exiftool-vendored";
import type { MetadataFields } from "./types";

/** The part of exiftool-vendored's `ExifTool` the writer uses. */
export type ExifToolClient = {
	write(file: string, tags: WriteTags): Promise<unknown>;
	end(): Promise<unknown>;
};

export interface MetadataWriter {
	/** Overwrite `filePath` in place with the given fields. */
	write(filePath: string, fields: MetadataFields): Promise<void>;
	close(): Promise<void>;
}

/**
 * Writes EXIF:ImageDescription and EXIF:UserComment through exiftool.
 * One exiftool process serves the whole batch.
 */
export class ExifToolMetadataWriter implements MetadataWriter {
	private exiftool: ExifToolClient;

	constructor(exiftool: ExifToolClient = new ExifTool()) {
		this.exiftool = exiftool;
	}

	async write(filePath: string, fields: MetadataFields): Promise<void> {
		await this.exiftool.write(filePath, {
			ImageDescription: fields.description,
			UserComment: fields.comment,
		});
		// exiftool keeps the untouched file as <name>_original
		await fs.promises.rm(`${filePath}_original`, { force: true });
	}

	async close(): Promise<void> {
		await this.exiftool.end();
	}
}
