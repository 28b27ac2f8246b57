import { EventStream } from "@mariozechner/pi-ai";

import { byteLength, estimateTokens, toError } from "../utils/helpers.js";
import { computeCacheKey } from "./cache/key.js";
import { AbortError, Html2MdError, SectionNotFoundError } from "./errors.js";
import type { ConvertEvent } from "./events.js";
import { cleanHtml } from "./html/clean.js";
import { convertToMarkdown } from "./html/markdown.js";
import { extractSectionFromHtml, extractSectionFromMarkdown } from "./html/sections.js";
import { resolveConvertOptions } from "./options.js";
import type { ConversionResult, ConvertDeps, ConvertOptions, ConvertStream } from "./types.js";

type Emit = (event: ConvertEvent) => void;

export function convert(url: string, options: Partial<ConvertOptions>, deps: ConvertDeps = {}): ConvertStream {
	const stream = new EventStream<ConvertEvent, ConversionResult | undefined>(
		(event) => event.type === "complete" || event.type === "error",
		(event) => (event.type === "complete" ? event.result : undefined),
	);

	const abortController = createAbortController(deps.signal);

	void runConversion(url, options, deps, (event) => stream.push(event), abortController.signal).catch(() => {
		// Error event already emitted in runConversion.
	});

	return Object.assign(stream, {
		abort: () => abortController.abort(new AbortError()),
	});
}

export async function convertSync(
	url: string,
	options: Partial<ConvertOptions>,
	deps: ConvertDeps = {},
): Promise<ConversionResult> {
	return await runConversion(url, options, deps, () => undefined, deps.signal);
}

async function runConversion(
	url: string,
	overrides: Partial<ConvertOptions>,
	deps: ConvertDeps,
	emit: Emit,
	signal?: AbortSignal,
): Promise<ConversionResult> {
	emit({ type: "start", url });

	try {
		const options = resolveConvertOptions(overrides);
		throwIfAborted(signal);

		const cache = options.useCache ? deps.cache : undefined;
		const cacheKey = cache ? computeCacheKey(url, options) : null;
		if (cache && cacheKey) {
			const lookup = cache.get(cacheKey);
			if (lookup.found) {
				emit({ type: "cache_hit", key: cacheKey, age: lookup.age });
				emit({ type: "complete", result: lookup.value, cached: true });
				return lookup.value;
			}
			emit({ type: "cache_miss", key: cacheKey });
		}

		const fetcher = deps.fetchers?.[options.fetchMethod];
		if (!fetcher) {
			throw new Html2MdError(`No fetcher registered for method "${options.fetchMethod}"`);
		}

		emit({
			type: "fetch_start",
			method: options.fetchMethod,
			...(options.fetchMethod === "playwright" ? { browser: options.browserType } : {}),
		});
		const html = await fetcher({ url, options, signal, emit });
		emit({ type: "fetch_end", method: options.fetchMethod, bytes: byteLength(html) });
		throwIfAborted(signal);

		const { sectionHtml, markdownHeading } = selectSection(html, options, emit);

		const cleaned = cleanHtml(sectionHtml);
		emit({ type: "clean_end", bytes: byteLength(cleaned) });

		let markdown = convertToMarkdown(cleaned, options);
		if (markdownHeading !== null) {
			markdown = extractSectionFromMarkdown(markdown, markdownHeading);
		}
		emit({ type: "convert_end", bytes: byteLength(markdown) });

		const result: ConversionResult = {
			url,
			markdown,
			originalSize: byteLength(html),
			cleanedSize: byteLength(cleaned),
			markdownSize: byteLength(markdown),
			estimatedTokens: estimateTokens(markdown),
			fetchMethod: options.fetchMethod,
			section: options.sectionId ?? options.sectionHeading,
		};

		if (cache && cacheKey) {
			if (options.cacheTtlSeconds === null) {
				cache.set(cacheKey, result);
				emit({ type: "cache_set", key: cacheKey, ttlMs: cache.defaultTtlMs });
			} else {
				const ttlMs = options.cacheTtlSeconds * 1000;
				cache.set(cacheKey, result, ttlMs);
				emit({ type: "cache_set", key: cacheKey, ttlMs });
			}
		}

		emit({ type: "complete", result, cached: false });
		return result;
	} catch (error) {
		const err = toError(error);
		emit({ type: "error", error: err });
		throw err;
	}
}

/**
 * Narrow the page to the requested section. A heading that is not found in
 * the HTML is looked up again in the converted Markdown.
 */
function selectSection(
	html: string,
	options: ConvertOptions,
	emit: Emit,
): { sectionHtml: string; markdownHeading: string | null } {
	if (options.sectionId !== null) {
		const sectionHtml = extractSectionFromHtml(html, { sectionId: options.sectionId });
		emit({ type: "section_extracted", section: options.sectionId, bytes: byteLength(sectionHtml) });
		return { sectionHtml, markdownHeading: null };
	}

	if (options.sectionHeading !== null) {
		try {
			const sectionHtml = extractSectionFromHtml(html, { sectionHeading: options.sectionHeading });
			emit({ type: "section_extracted", section: options.sectionHeading, bytes: byteLength(sectionHtml) });
			return { sectionHtml, markdownHeading: null };
		} catch (error) {
			if (!(error instanceof SectionNotFoundError)) {
				throw error;
			}
			return { sectionHtml: html, markdownHeading: options.sectionHeading };
		}
	}

	return { sectionHtml: html, markdownHeading: null };
}

function throwIfAborted(signal?: AbortSignal): void {
	if (!signal?.aborted) {
		return;
	}
	const reason: unknown = signal.reason;
	if (reason instanceof AbortError) {
		throw reason;
	}
	throw new AbortError(reason instanceof Error ? reason.message : undefined);
}

function createAbortController(signal?: AbortSignal): AbortController {
	const controller = new AbortController();

	if (!signal) {
		return controller;
	}

	if (signal.aborted) {
		controller.abort(signal.reason);
		return controller;
	}

	signal.addEventListener(
		"abort",
		() => {
			controller.abort(signal.reason);
		},
		{ once: true },
	);

	return controller;
}
