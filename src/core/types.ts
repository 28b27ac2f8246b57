import type { ResultCache } from "./cache/types.js";
import type { ConvertEvent } from "./events.js";

export type FetchMethod = "fetch" | "playwright";
export type BrowserName = "chromium" | "firefox" | "webkit";
export type WaitStrategy = "load" | "domcontentloaded" | "networkidle";

/**
 * Fully resolved conversion options. Build one with `resolveConvertOptions()`;
 * every field is present so cache keys never depend on what a caller left out.
 */
export interface ConvertOptions {
	/** Keep `<img>` elements as Markdown images. */
	includeImages: boolean;

	/** Keep `<table>` elements as GFM tables. */
	includeTables: boolean;

	/** Keep hyperlinks. When false, link text is kept without the target. */
	includeLinks: boolean;

	/** Request or navigation timeout, 5-120 seconds. */
	timeoutSeconds: number;

	/** Download limit for plain fetches, 1-50 MiB. */
	maxSizeBytes: number;

	/** Read from and write to the result cache. */
	useCache: boolean;

	/**
	 * Lifetime of a cached result in seconds, clamped to 60-86400. `null` keeps
	 * the cache's configured default.
	 */
	cacheTtlSeconds: number | null;

	fetchMethod: FetchMethod;
	browserType: BrowserName;
	headless: boolean;
	waitFor: WaitStrategy;

	/**
	 * Launch chromium on the local Chrome profile so cookies and logins apply.
	 * Ignored for other browsers.
	 */
	useUserProfile: boolean;

	/** Always answer with a summary instead of the full Markdown. */
	returnSummary: boolean;

	/** Estimated token count above which a summary is returned, 1000-100000. */
	maxTokens: number;

	/** Convert only the element with this id or name attribute. */
	sectionId: string | null;

	/** Convert only the section under the first heading containing this text. */
	sectionHeading: string | null;
}

export interface ConversionResult {
	url: string;
	markdown: string;

	/** Sizes in UTF-8 bytes. */
	originalSize: number;
	cleanedSize: number;
	markdownSize: number;

	estimatedTokens: number;
	fetchMethod: FetchMethod;
	section: string | null;
}

export interface FetchRequest {
	url: string;
	options: ConvertOptions;
	signal?: AbortSignal;
	emit: (event: ConvertEvent) => void;
}

/** Produces raw HTML for a URL, or rejects with a FetchError. */
export type HtmlFetcher = (request: FetchRequest) => Promise<string>;

export interface ConvertDeps {
	/** Shared result cache. Required for `useCache` to take effect. */
	cache?: ResultCache<ConversionResult>;

	fetchers?: Partial<Record<FetchMethod, HtmlFetcher>>;

	signal?: AbortSignal;
}

export interface ConvertStream extends AsyncIterable<ConvertEvent> {
	/**
	 * Resolves when conversion completes.
	 * Returns undefined if conversion failed.
	 */
	result(): Promise<ConversionResult | undefined>;

	abort(): void;
}
