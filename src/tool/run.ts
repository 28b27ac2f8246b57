import { type ToolCall, validateToolArguments } from "@mariozechner/pi-ai";

import { convert } from "../convert.js";
import { FetchError, Html2MdError, InvalidArgumentsError, ParseError } from "../core/errors.js";
import type { ConvertEvent } from "../core/events.js";
import { resolveConvertOptions } from "../core/options.js";
import { generateSummary, shouldSummarize } from "../core/summary.js";
import type { ConversionResult, ConvertDeps, ConvertOptions } from "../core/types.js";
import { toError } from "../utils/helpers.js";
import { renderConversion, renderSummary } from "./render.js";
import { HTML_TO_MARKDOWN_TOOL_NAME, type HtmlToMarkdownParams, htmlToMarkdownTool } from "./schema.js";

export type ToolResponse = {
	content: Array<{ type: "text"; text: string }>;
	isError: boolean;
};

export interface ToolDeps extends ConvertDeps {
	/** Receives every conversion event, e.g. for logging. */
	onEvent?: (event: ConvertEvent) => void;

	/** Where summaries write the full Markdown. Defaults to the OS temp directory. */
	summaryDirectory?: string;
}

export async function runHtmlToMarkdownTool(args: unknown, deps: ToolDeps = {}): Promise<ToolResponse> {
	try {
		const params = validateParams(args);
		const options = resolveConvertOptions(toConvertOptions(params));
		const result = await runConversion(params.url, options, deps);

		if (shouldSummarize(result, options)) {
			return textResponse(renderSummary(generateSummary(result, { directory: deps.summaryDirectory })), false);
		}
		return textResponse(renderConversion(result), false);
	} catch (error) {
		return textResponse(describeError(toError(error)), true);
	}
}

export function validateParams(args: unknown): HtmlToMarkdownParams {
	if (!isRecord(args)) {
		throw new InvalidArgumentsError("Tool arguments must be an object");
	}
	if (typeof args.url !== "string" || args.url.trim().length === 0) {
		throw new InvalidArgumentsError("'url' parameter is required", [{ path: "url", message: "is required" }]);
	}
	if (isNonEmptyString(args.section_id) && isNonEmptyString(args.section_heading)) {
		throw new InvalidArgumentsError(
			"'section_id' and 'section_heading' are mutually exclusive. Provide only one.",
			[{ path: "section_id", message: "cannot be combined with section_heading" }],
		);
	}

	const toolCall: ToolCall = {
		type: "toolCall",
		id: HTML_TO_MARKDOWN_TOOL_NAME,
		name: HTML_TO_MARKDOWN_TOOL_NAME,
		arguments: args,
	};
	try {
		const validated: HtmlToMarkdownParams = validateToolArguments(htmlToMarkdownTool, toolCall);
		return validated;
	} catch (error) {
		const err = toError(error);
		throw new InvalidArgumentsError(err.message, [], { cause: err });
	}
}

export function toConvertOptions(params: HtmlToMarkdownParams): Partial<ConvertOptions> {
	return {
		includeImages: params.include_images,
		includeTables: params.include_tables,
		includeLinks: params.include_links,
		timeoutSeconds: params.timeout,
		maxSizeBytes: params.max_size,
		useCache: params.use_cache,
		cacheTtlSeconds: params.cache_ttl,
		fetchMethod: params.fetch_method,
		browserType: params.browser_type,
		headless: params.headless,
		waitFor: params.wait_for,
		useUserProfile: params.use_user_profile,
		returnSummary: params.return_summary,
		maxTokens: params.max_tokens,
		sectionId: params.section_id,
		sectionHeading: params.section_heading,
	};
}

async function runConversion(url: string, options: Partial<ConvertOptions>, deps: ToolDeps): Promise<ConversionResult> {
	const stream = convert(url, options, deps);

	let conversionError: Error | undefined;
	for await (const event of stream) {
		deps.onEvent?.(event);
		if (event.type === "error") {
			conversionError = event.error;
		}
	}

	const result = await stream.result();
	if (conversionError || !result) {
		throw conversionError ?? new Html2MdError("Conversion failed.");
	}
	return result;
}

function describeError(error: Error): string {
	if (error instanceof InvalidArgumentsError) {
		return `Error: ${error.message}`;
	}
	if (error instanceof FetchError) {
		return `Error fetching URL: ${error.message}`;
	}
	if (error instanceof ParseError) {
		return `Error parsing/converting content: ${error.message}`;
	}
	if (error instanceof Html2MdError) {
		return `Conversion error: ${error.message}`;
	}
	return `Unexpected error: ${error.message}`;
}

function textResponse(text: string, isError: boolean): ToolResponse {
	return { content: [{ type: "text", text }], isError };
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
	return typeof value === "string" && value.trim().length > 0;
}
