import { convert as convertInternal, convertSync as convertSyncInternal } from "./core/convert.js";
import { fetchHtmlWithBrowser } from "./core/fetch/browser.js";
import { fetchHtml } from "./core/fetch/http.js";
import type { ConversionResult, ConvertDeps, ConvertOptions, ConvertStream, FetchMethod, HtmlFetcher } from "./core/types.js";

export const defaultFetchers: Record<FetchMethod, HtmlFetcher> = {
	fetch: ({ url, options, signal }) =>
		fetchHtml(url, {
			timeoutMs: options.timeoutSeconds * 1000,
			maxBytes: options.maxSizeBytes,
			signal,
		}),
	playwright: ({ url, options, emit }) =>
		fetchHtmlWithBrowser(url, {
			browserType: options.browserType,
			headless: options.headless,
			waitFor: options.waitFor,
			useUserProfile: options.useUserProfile,
			timeoutSeconds: options.timeoutSeconds,
			emit,
		}),
};

function withDefaultFetchers(deps: ConvertDeps): ConvertDeps {
	return { ...deps, fetchers: { ...defaultFetchers, ...deps.fetchers } };
}

export function convert(url: string, options: Partial<ConvertOptions> = {}, deps: ConvertDeps = {}): ConvertStream {
	return convertInternal(url, options, withDefaultFetchers(deps));
}

export async function convertSync(
	url: string,
	options: Partial<ConvertOptions> = {},
	deps: ConvertDeps = {},
): Promise<ConversionResult> {
	return await convertSyncInternal(url, options, withDefaultFetchers(deps));
}
