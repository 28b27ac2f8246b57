export { createMemoryCache, DEFAULT_CACHE_TTL_MS } from "./core/cache/memory.js";
export { type CacheKeyOptions, computeCacheKey } from "./core/cache/key.js";
export type { CacheEntry, CacheLookup, MemoryCacheOptions, ResultCache } from "./core/cache/types.js";
export { resolveServiceConfig, type ServiceConfig } from "./core/config.js";
export {
	AbortError,
	type ArgumentErrorDetail,
	ConfigurationError,
	FetchError,
	Html2MdError,
	InvalidArgumentsError,
	ParseError,
	SectionNotFoundError,
} from "./core/errors.js";
export type { ConvertEvent } from "./core/events.js";
export { fetchHtmlWithBrowser, getChromeUserDataDir } from "./core/fetch/browser.js";
export { fetchHtml, isHttpUrl } from "./core/fetch/http.js";
export { cleanHtml } from "./core/html/clean.js";
export { convertToMarkdown } from "./core/html/markdown.js";
export { extractSectionFromHtml, extractSectionFromMarkdown, extractToc, type SectionSelector } from "./core/html/sections.js";
export { DEFAULT_CONVERT_OPTIONS, OPTION_BOUNDS, resolveConvertOptions } from "./core/options.js";
export { type ConversionSummary, generateSummary, shouldSummarize } from "./core/summary.js";
export type {
	BrowserName,
	ConversionResult,
	ConvertDeps,
	ConvertOptions,
	ConvertStream,
	FetchMethod,
	FetchRequest,
	HtmlFetcher,
	WaitStrategy,
} from "./core/types.js";
export { convert, convertSync, defaultFetchers } from "./convert.js";
export { createToolServer, type ServerDeps, serve, serveStdio } from "./server.js";
export {
	HTML_TO_MARKDOWN_TOOL_NAME,
	htmlToMarkdownTool,
	runHtmlToMarkdownTool,
	type ToolDeps,
	type ToolResponse,
} from "./tool/index.js";
export { estimateTokens, formatBytes } from "./utils/helpers.js";
