import { StringEnum, type Tool } from "@mariozechner/pi-ai";
import { type Static, Type } from "@sinclair/typebox";

import { DEFAULT_CONVERT_OPTIONS, OPTION_BOUNDS } from "../core/options.js";

export const HTML_TO_MARKDOWN_TOOL_NAME = "html_to_markdown";

const defaults = DEFAULT_CONVERT_OPTIONS;

export const htmlToMarkdownParameters = Type.Object({
	url: Type.String({ description: "URL of the webpage to convert to Markdown" }),
	include_images: Type.Optional(
		Type.Boolean({ description: "Whether to include images in the Markdown output", default: defaults.includeImages }),
	),
	include_tables: Type.Optional(
		Type.Boolean({ description: "Whether to include tables in the Markdown output", default: defaults.includeTables }),
	),
	include_links: Type.Optional(
		Type.Boolean({ description: "Whether to include links in the Markdown output", default: defaults.includeLinks }),
	),
	timeout: Type.Optional(
		Type.Integer({
			description: "Request timeout in seconds",
			default: defaults.timeoutSeconds,
			minimum: OPTION_BOUNDS.timeoutSeconds.min,
			maximum: OPTION_BOUNDS.timeoutSeconds.max,
		}),
	),
	max_size: Type.Optional(
		Type.Integer({
			description: "Maximum size to download in bytes (default: 10MB)",
			default: defaults.maxSizeBytes,
			minimum: OPTION_BOUNDS.maxSizeBytes.min,
			maximum: OPTION_BOUNDS.maxSizeBytes.max,
		}),
	),
	use_cache: Type.Optional(
		Type.Boolean({
			description: "Use cache for this request (reduces repeated conversions)",
			default: defaults.useCache,
		}),
	),
	cache_ttl: Type.Optional(
		Type.Integer({
			description: "Cache time-to-live in seconds (default: the server's cache TTL, 3600 unless configured)",
			minimum: OPTION_BOUNDS.cacheTtlSeconds.min,
			maximum: OPTION_BOUNDS.cacheTtlSeconds.max,
		}),
	),
	fetch_method: Type.Optional(
		StringEnum(["fetch", "playwright"] as const, {
			description: "Fetch method: fetch (fast) or playwright (JS, auth)",
			default: defaults.fetchMethod,
		}),
	),
	browser_type: Type.Optional(
		StringEnum(["chromium", "firefox", "webkit"] as const, {
			description: "Browser to use with playwright (default: chromium)",
			default: defaults.browserType,
		}),
	),
	headless: Type.Optional(
		Type.Boolean({ description: "Run browser in headless mode (default: true)", default: defaults.headless }),
	),
	wait_for: Type.Optional(
		StringEnum(["load", "domcontentloaded", "networkidle"] as const, {
			description: "Page load wait strategy (default: networkidle)",
			default: defaults.waitFor,
		}),
	),
	use_user_profile: Type.Optional(
		Type.Boolean({
			description: "Use browser profile with cookies (requires playwright)",
			default: defaults.useUserProfile,
		}),
	),
	return_summary: Type.Optional(
		Type.Boolean({
			description: "Return summary with metadata instead of full content (useful for large documents)",
			default: defaults.returnSummary,
		}),
	),
	max_tokens: Type.Optional(
		Type.Integer({
			description: "Maximum tokens before auto-returning summary (default: 25000)",
			default: defaults.maxTokens,
			minimum: OPTION_BOUNDS.maxTokens.min,
			maximum: OPTION_BOUNDS.maxTokens.max,
		}),
	),
	section_id: Type.Optional(
		Type.Union([Type.String(), Type.Null()], {
			description:
				"Extract only section with this HTML anchor ID (e.g., 'PRD1480'). Mutually exclusive with section_heading.",
		}),
	),
	section_heading: Type.Optional(
		Type.Union([Type.String(), Type.Null()], {
			description:
				"Extract only section with this heading text (e.g., '7.2 Frontend'). Mutually exclusive with section_id.",
		}),
	),
});

export type HtmlToMarkdownParams = Static<typeof htmlToMarkdownParameters>;

export const htmlToMarkdownTool: Tool<typeof htmlToMarkdownParameters> = {
	name: HTML_TO_MARKDOWN_TOOL_NAME,
	description:
		"Convert HTML from a URL to clean Markdown format. " +
		"Preserves tables, images, and links while removing unnecessary elements " +
		"like scripts, styles, navigation, headers, and footers. " +
		"Perfect for reducing HTML size for AI context.",
	parameters: htmlToMarkdownParameters,
};
