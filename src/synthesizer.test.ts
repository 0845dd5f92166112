import { describe, expect, it } from "vitest";
import {
	buildNamePrompt,
	collapseUnderscores,
	composeFilename,
	filterCharset,
	firstLine,
	lowercase,
	sanitizeStem,
	spacesToUnderscores,
	synthesize,
	truncate,
} from "./synthesizer";
import { namingRules } from "./testing";

describe("sanitize steps", () => {
	it("keeps only the first line of a reply", () => {
		expect(firstLine("  invoice_q3  \nThis name describes the invoice")).toBe(
			"invoice_q3",
		);
	});

	it("lowercases", () => {
		expect(lowercase("Login Screen")).toBe("login screen");
	});

	it("turns spaces into underscores", () => {
		expect(spacesToUnderscores("a b  c")).toBe("a_b__c");
	});

	it("collapses runs of underscores", () => {
		expect(collapseUnderscores("a__b___c_d")).toBe("a_b_c_d");
	});

	it("drops characters outside the filename charset", () => {
		expect(filterCharset("résumé-final.v2!?/")).toBe("résumé-final.v2");
		expect(filterCharset("日本語のテキスト（下書き）")).toBe("日本語のテキスト下書き");
	});

	it("truncates to the given length", () => {
		expect(truncate(5)("abcdefgh")).toBe("abcde");
	});

	it("truncates by code point", () => {
		expect(truncate(2)("𝒜𝒜𝒜")).toBe("𝒜𝒜");
	});
});

describe("sanitizeStem", () => {
	it("cleans a typical model reply", () => {
		expect(sanitizeStem("My Login Screen!!")).toBe("my_login_screen");
	});

	it("keeps accented and non-Latin letters", () => {
		expect(sanitizeStem("Résumé Final")).toBe("résumé_final");
		expect(sanitizeStem("日本語 メモ")).toBe("日本語_メモ");
	});

	it("returns the same output for the same input", () => {
		const reply = "Quarterly Revenue  Chart (Draft)";
		expect(sanitizeStem(reply)).toBe(sanitizeStem(reply));
		expect(sanitizeStem(reply)).toBe("quarterly_revenue_chart_draft");
	});

	it("caps the stem at 64 characters", () => {
		expect(sanitizeStem("word ".repeat(40))).toHaveLength(64);
	});

	it("keeps every stem inside the charset and length bounds", () => {
		const replies = [
			"Terminal — npm install output",
			"`slack_thread`",
			"Filename: YouTube Video Player\nExplanation follows",
			"\t\tTABS\tand spaces ",
			"日本語のテキスト",
			"x".repeat(200),
		];
		for (const reply of replies) {
			const stem = sanitizeStem(reply);
			expect(stem).toMatch(/^[\p{Ll}\p{Lo}\p{N}_.-]*$/u);
			expect(Array.from(stem).length).toBeLessThanOrEqual(64);
		}
	});
});

describe("composeFilename", () => {
	it("prefixes the date from the original filename", () => {
		expect(composeFilename("my_login_screen", "2024-03-01", namingRules)).toBe(
			"screenshot_2024-03-01-my_login_screen.png",
		);
	});

	it("uses the placeholder when there is no date", () => {
		expect(composeFilename("my_login_screen", null, namingRules)).toBe(
			"screenshot_unknown-date-my_login_screen.png",
		);
	});
});

describe("buildNamePrompt", () => {
	it("includes the text, the caption and the length limit", () => {
		const prompt = buildNamePrompt("Sign in", "A login form", 64);
		expect(prompt).toContain("OCR Text: Sign in");
		expect(prompt).toContain("Caption: A login form");
		expect(prompt).toContain("- Maximum length: 64 characters");
		expect(prompt.endsWith("Filename:")).toBe(true);
	});
});

describe("synthesize", () => {
	it("prompts the generator and builds the final filename", async () => {
		const prompts: string[] = [];
		const name = await synthesize(
			"Sign in",
			"A login form",
			"2024-03-01",
			async (prompt) => {
				prompts.push(prompt);
				return "My Login Screen!!\nI chose this because it shows a login.";
			},
			namingRules,
		);

		expect(prompts).toHaveLength(1);
		expect(prompts[0]).toContain("OCR Text: Sign in");
		expect(name).toEqual({
			stem: "my_login_screen",
			filename: "screenshot_2024-03-01-my_login_screen.png",
		});
	});

	it("does not double the extension when the model adds one", async () => {
		const name = await synthesize(
			"",
			"A chart",
			null,
			async () => "Sales Chart.png",
			namingRules,
		);
		expect(name.filename).toBe("screenshot_unknown-date-sales_chart.png");
	});

	it("falls back to a fixed stem when nothing survives sanitizing", async () => {
		const name = await synthesize(
			"",
			"An image",
			"2024-03-01",
			async () => "!!!",
			namingRules,
		);
		expect(name.filename).toBe("screenshot_2024-03-01-untitled.png");
	});
});
