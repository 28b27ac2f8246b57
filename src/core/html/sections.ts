import { SectionNotFoundError } from "../errors.js";
import { parseHtml } from "./clean.js";

export type SectionSelector = { sectionId: string } | { sectionHeading: string };

const HEADING_TAG = /^h([1-6])$/i;
const MARKDOWN_HEADING = /^(#+)\s+(.+)$/;

export function describeSection(selector: SectionSelector): string {
	return "sectionId" in selector ? selector.sectionId : selector.sectionHeading;
}

/**
 * Extract one section of a page.
 *
 * An id (or `name` attribute) match is widened to its nearest enclosing
 * `section`, `article` or `div`. A heading match spans the heading and every
 * following sibling element up to the next heading of the same or a higher level.
 */
export function extractSectionFromHtml(html: string, selector: SectionSelector): string {
	const dom = parseHtml(html);
	const { document } = dom.window;

	const target = "sectionId" in selector
		? findById(document, selector.sectionId)
		: findByHeading(document, selector.sectionHeading);
	if (!target) {
		throw new SectionNotFoundError(describeSection(selector));
	}

	const level = headingLevel(target);
	if (level === null) {
		const container = target.parentElement?.closest("section, article, div");
		return (container ?? target).outerHTML;
	}

	const parts = [target.outerHTML];
	for (let current = target.nextElementSibling; current; current = current.nextElementSibling) {
		const siblingLevel = headingLevel(current);
		if (siblingLevel !== null && siblingLevel <= level) {
			break;
		}
		parts.push(current.outerHTML);
	}
	return parts.join("");
}

export function extractSectionFromMarkdown(markdown: string, heading: string): string {
	const search = heading.trim().toLowerCase();
	const lines: string[] = [];
	let sectionLevel: number | null = null;

	for (const line of markdown.split("\n")) {
		const match = MARKDOWN_HEADING.exec(line.trim());
		if (match) {
			const level = match[1].length;
			if (sectionLevel === null) {
				if (match[2].trim().toLowerCase().includes(search)) {
					sectionLevel = level;
					lines.push(line);
				}
				continue;
			}
			if (level <= sectionLevel) {
				break;
			}
		}
		if (sectionLevel !== null) {
			lines.push(line);
		}
	}

	if (lines.length === 0) {
		throw new SectionNotFoundError(heading);
	}
	return lines.join("\n");
}

export function extractToc(markdown: string, maxHeadings = 50): string[] {
	const headings: string[] = [];
	for (const line of markdown.split("\n")) {
		const trimmed = line.trim();
		if (trimmed.startsWith("#")) {
			headings.push(trimmed);
			if (headings.length >= maxHeadings) {
				break;
			}
		}
	}
	return headings;
}

function findById(document: Document, sectionId: string): Element | null {
	const id = sectionId.replace(/^#+/, "");
	return document.getElementById(id) ?? document.getElementsByName(id).item(0);
}

function findByHeading(document: Document, sectionHeading: string): Element | null {
	const search = sectionHeading.trim().toLowerCase();
	for (let level = 1; level <= 6; level++) {
		for (const heading of Array.from(document.getElementsByTagName(`h${level}`))) {
			if ((heading.textContent ?? "").trim().toLowerCase().includes(search)) {
				return heading;
			}
		}
	}
	return null;
}

function headingLevel(element: Element): number | null {
	const match = HEADING_TAG.exec(element.tagName);
	return match ? Number(match[1]) : null;
}
