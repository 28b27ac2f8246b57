import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { formatBytes } from "../utils/helpers.js";
import { extractToc } from "./html/sections.js";
import type { ConversionResult } from "./types.js";

const PREVIEW_WORDS = 500;
const MAX_TOC_HEADINGS = 50;

export const SUMMARY_HELP = [
	"This document is too large to return directly. The full content has been saved to a file. You can:",
	"1. Read the file using standard tools",
	"2. Use 'section_id' or 'section_heading' parameter to extract specific sections",
	"3. Review the table of contents to find sections of interest",
].join("\n");

export interface SummaryStatistics {
	originalSizeBytes: number;
	originalSizeHuman: string;
	cleanedSizeBytes: number;
	cleanedSizeHuman: string;
	markdownSizeBytes: number;
	markdownSizeHuman: string;
	estimatedTokens: number;
	compressionRatio: string;
	compressionPercent: string;
}

export interface ConversionSummary {
	url: string;
	savedTo: string;
	statistics: SummaryStatistics;
	preview: string;
	tableOfContents: string[];
	help: string;
}

export function shouldSummarize(result: ConversionResult, options: { returnSummary: boolean; maxTokens: number }): boolean {
	return options.returnSummary || result.estimatedTokens > options.maxTokens;
}

export function compressionPercent(originalSize: number, markdownSize: number): number {
	if (originalSize <= 0) {
		return 0;
	}
	return 100 - (markdownSize / originalSize) * 100;
}

export function buildPreview(markdown: string, maxWords = PREVIEW_WORDS): string {
	const words = markdown.split(/\s+/).filter((word) => word.length > 0);
	const preview = words.slice(0, maxWords).join(" ");
	return words.length > maxWords ? `${preview}\n\n[... preview truncated ...]` : preview;
}

export function saveMarkdown(markdown: string, directory = tmpdir()): string {
	const dir = mkdtempSync(join(directory, "html2md-"));
	const path = join(dir, "document.md");
	writeFileSync(path, markdown, "utf8");
	return path;
}

/** Writes the full Markdown to a temp file and describes it. */
export function generateSummary(result: ConversionResult, options: { directory?: string } = {}): ConversionSummary {
	const savedTo = saveMarkdown(result.markdown, options.directory);
	const ratio = result.markdownSize > 0 ? result.originalSize / result.markdownSize : 0;

	return {
		url: result.url,
		savedTo,
		statistics: {
			originalSizeBytes: result.originalSize,
			originalSizeHuman: formatBytes(result.originalSize, 2),
			cleanedSizeBytes: result.cleanedSize,
			cleanedSizeHuman: formatBytes(result.cleanedSize, 2),
			markdownSizeBytes: result.markdownSize,
			markdownSizeHuman: formatBytes(result.markdownSize, 2),
			estimatedTokens: result.estimatedTokens,
			compressionRatio: `${ratio.toFixed(2)}x`,
			compressionPercent: `${compressionPercent(result.originalSize, result.markdownSize).toFixed(1)}%`,
		},
		preview: buildPreview(result.markdown),
		tableOfContents: extractToc(result.markdown, MAX_TOC_HEADINGS),
		help: SUMMARY_HELP,
	};
}
