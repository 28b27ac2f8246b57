import { gfm } from "@truto/turndown-plugin-gfm";
import TurndownService from "turndown";

import { ParseError } from "../errors.js";
import type { ConvertOptions } from "../types.js";

export type MarkdownOptions = Pick<ConvertOptions, "includeImages" | "includeTables" | "includeLinks">;

export function createTurndown(options: MarkdownOptions): TurndownService {
	const turndown = new TurndownService({
		headingStyle: "atx",
		codeBlockStyle: "fenced",
		bulletListMarker: "-",
	});
	turndown.use(gfm);
	turndown.remove(["script", "style", "noscript", "title", "meta", "link"]);

	// Added rules run before the built-in ones, so these override image, table and link output.
	if (!options.includeImages) {
		turndown.addRule("dropImages", { filter: ["img", "picture"], replacement: () => "" });
	}
	if (!options.includeTables) {
		turndown.addRule("dropTables", { filter: ["table"], replacement: () => "" });
	}
	if (!options.includeLinks) {
		turndown.addRule("plainLinks", { filter: ["a"], replacement: (content) => content });
	}

	return turndown;
}

export function convertToMarkdown(html: string, options: MarkdownOptions): string {
	let markdown: string;
	try {
		markdown = createTurndown(options).turndown(html);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ParseError(`Error converting HTML to Markdown: ${message}`, { cause: error });
	}

	if (markdown.trim().length === 0) {
		throw new ParseError("Failed to extract content from HTML - result is empty");
	}
	return markdown;
}
