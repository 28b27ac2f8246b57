import { JSDOM } from "jsdom";

import { ParseError } from "../errors.js";

export const NON_CONTENT_TAGS = ["script", "style", "nav", "footer", "header", "aside", "noscript", "iframe"] as const;

export function parseHtml(html: string): JSDOM {
	try {
		return new JSDOM(html);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ParseError(`Error parsing HTML: ${message}`, { cause: error });
	}
}

/** Removes scripts, styles and page chrome, keeping the main content, tables and images. */
export function cleanHtml(html: string): string {
	const dom = parseHtml(html);
	const { document } = dom.window;

	for (const element of Array.from(document.querySelectorAll(NON_CONTENT_TAGS.join(",")))) {
		element.remove();
	}

	return dom.serialize();
}
