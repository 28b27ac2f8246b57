import { describe, expect, it, vi } from "vitest";

import { computeCacheKey } from "../src/core/cache/key.js";
import { createMemoryCache } from "../src/core/cache/memory.js";
import { resolveServiceConfig } from "../src/core/config.js";
import { convert, convertSync } from "../src/core/convert.js";
import { AbortError, FetchError, Html2MdError, InvalidArgumentsError, SectionNotFoundError } from "../src/core/errors.js";
import type { ConvertEvent } from "../src/core/events.js";
import { resolveConvertOptions } from "../src/core/options.js";
import type { ConversionResult, ConvertStream, HtmlFetcher } from "../src/core/types.js";

const PAGE_URL = "https://example.com/hello";
const PAGE =
	"<html><head><title>T</title></head><body><nav>Menu</nav><h1>Hello</h1><p>World</p>" +
	'<h2 id="more">More</h2><p>Details</p></body></html>';
const CLEANED =
	"<html><head><title>T</title></head><body><h1>Hello</h1><p>World</p>" +
	'<h2 id="more">More</h2><p>Details</p></body></html>';

function bytes(text: string): number {
	return Buffer.byteLength(text, "utf8");
}

function fakeFetcher(html = PAGE) {
	return vi.fn<HtmlFetcher>(async () => html);
}

async function collect(stream: ConvertStream): Promise<ConvertEvent[]> {
	const events: ConvertEvent[] = [];
	for await (const event of stream) {
		events.push(event);
	}
	return events;
}

describe("convert", () => {
	it("fetches, cleans and converts a page", async () => {
		const fetcher = fakeFetcher();

		const result = await convertSync(PAGE_URL, {}, { fetchers: { fetch: fetcher } });

		const markdown = "# Hello\n\nWorld\n\n## More\n\nDetails";
		expect(result).toEqual({
			url: PAGE_URL,
			markdown,
			originalSize: bytes(PAGE),
			cleanedSize: bytes(CLEANED),
			markdownSize: bytes(markdown),
			estimatedTokens: Math.floor(markdown.length / 4),
			fetchMethod: "fetch",
			section: null,
		} satisfies ConversionResult);
		expect(fetcher).toHaveBeenCalledTimes(1);
		expect(fetcher.mock.calls[0][0]).toMatchObject({ url: PAGE_URL, options: resolveConvertOptions() });
	});

	it("emits lifecycle events and serves repeats from the cache", async () => {
		const fetcher = fakeFetcher();
		const cache = createMemoryCache<ConversionResult>();
		const deps = { cache, fetchers: { fetch: fetcher } };
		const key = computeCacheKey(PAGE_URL, resolveConvertOptions({ useCache: true }));

		const first = convert(PAGE_URL, { useCache: true, cacheTtlSeconds: 600 }, deps);
		const firstEvents = await collect(first);

		expect(firstEvents.map((event) => event.type)).toEqual([
			"start",
			"cache_miss",
			"fetch_start",
			"fetch_end",
			"clean_end",
			"convert_end",
			"cache_set",
			"complete",
		]);
		expect(firstEvents[1]).toEqual({ type: "cache_miss", key });
		expect(firstEvents[3]).toEqual({ type: "fetch_end", method: "fetch", bytes: bytes(PAGE) });
		expect(firstEvents[6]).toEqual({ type: "cache_set", key, ttlMs: 600_000 });
		expect(firstEvents[7]).toMatchObject({ type: "complete", cached: false });

		const second = convert(PAGE_URL, { useCache: true }, deps);
		const secondEvents = await collect(second);

		expect(secondEvents.map((event) => event.type)).toEqual(["start", "cache_hit", "complete"]);
		expect(secondEvents[2]).toMatchObject({ type: "complete", cached: true });
		expect(await second.result()).toEqual(await first.result());
		expect(fetcher).toHaveBeenCalledTimes(1);
		expect(cache.size()).toBe(1);
	});

	it("stores with the cache's configured lifetime when the request sets none", async () => {
		let now = 0;
		const fetcher = fakeFetcher();
		const cache = createMemoryCache<ConversionResult>({
			...resolveServiceConfig({ HTML2MD_CACHE_TTL: "120" }).cache,
			now: () => now,
		});
		const deps = { cache, fetchers: { fetch: fetcher } };

		const events = await collect(convert(PAGE_URL, { useCache: true }, deps));
		expect(events).toContainEqual({
			type: "cache_set",
			key: computeCacheKey(PAGE_URL, resolveConvertOptions({ useCache: true })),
			ttlMs: 120_000,
		});

		now = 119_000;
		await convertSync(PAGE_URL, { useCache: true }, deps);
		expect(fetcher).toHaveBeenCalledTimes(1);

		now = 121_000;
		await convertSync(PAGE_URL, { useCache: true }, deps);
		expect(fetcher).toHaveBeenCalledTimes(2);
	});

	it("lets a request lifetime override the configured one", async () => {
		let now = 0;
		const fetcher = fakeFetcher();
		const cache = createMemoryCache<ConversionResult>({ defaultTtlMs: 120_000, now: () => now });
		const deps = { cache, fetchers: { fetch: fetcher } };

		await convertSync(PAGE_URL, { useCache: true, cacheTtlSeconds: 600 }, deps);
		now = 300_000;
		await convertSync(PAGE_URL, { useCache: true }, deps);

		expect(fetcher).toHaveBeenCalledTimes(1);
	});

	it("keeps the later of two concurrent misses for the same key", async () => {
		const cache = createMemoryCache<ConversionResult>();
		const pending: Array<(html: string) => void> = [];
		const fetcher = vi.fn<HtmlFetcher>(
			() =>
				new Promise<string>((resolve) => {
					pending.push(resolve);
				}),
		);
		const deps = { cache, fetchers: { fetch: fetcher } };

		const first = convertSync(PAGE_URL, { useCache: true }, deps);
		const second = convertSync(PAGE_URL, { useCache: true }, deps);
		expect(fetcher).toHaveBeenCalledTimes(2);

		pending[1]("<body><h1>Second</h1></body>");
		expect((await second).markdown).toBe("# Second");
		pending[0]("<body><h1>First</h1></body>");
		const firstResult = await first;

		const key = computeCacheKey(PAGE_URL, resolveConvertOptions({ useCache: true }));
		expect(cache.size()).toBe(1);
		expect(cache.get(key)).toEqual({ found: true, value: firstResult, age: expect.any(Number) });
		expect(firstResult.markdown).toBe("# First");
	});

	it("bypasses the cache unless useCache is set", async () => {
		const fetcher = fakeFetcher();
		const cache = createMemoryCache<ConversionResult>();

		await convertSync(PAGE_URL, {}, { cache, fetchers: { fetch: fetcher } });
		await convertSync(PAGE_URL, {}, { cache, fetchers: { fetch: fetcher } });

		expect(fetcher).toHaveBeenCalledTimes(2);
		expect(cache.size()).toBe(0);
	});

	it("caches different option sets separately", async () => {
		const fetcher = fakeFetcher();
		const cache = createMemoryCache<ConversionResult>();
		const deps = { cache, fetchers: { fetch: fetcher } };

		await convertSync(PAGE_URL, { useCache: true }, deps);
		await convertSync(PAGE_URL, { useCache: true, includeLinks: false }, deps);

		expect(fetcher).toHaveBeenCalledTimes(2);
		expect(cache.size()).toBe(2);
	});

	it("converts only the selected section", async () => {
		const stream = convert(PAGE_URL, { sectionId: "more" }, { fetchers: { fetch: fakeFetcher() } });
		const events = await collect(stream);
		const result = await stream.result();

		expect(result?.markdown).toBe("## More\n\nDetails");
		expect(result?.section).toBe("more");
		expect(events).toContainEqual({
			type: "section_extracted",
			section: "more",
			bytes: bytes('<h2 id="more">More</h2><p>Details</p>'),
		});
	});

	it("reports a missing section as an error event", async () => {
		const stream = convert(PAGE_URL, { sectionHeading: "Pricing" }, { fetchers: { fetch: fakeFetcher() } });
		const events = await collect(stream);

		const last = events[events.length - 1];
		expect(last.type).toBe("error");
		expect(last.type === "error" && last.error).toBeInstanceOf(SectionNotFoundError);
		expect(await stream.result()).toBeUndefined();
	});

	it("rejects invalid options before fetching", async () => {
		const fetcher = fakeFetcher();

		await expect(convertSync(PAGE_URL, { timeoutSeconds: 1 }, { fetchers: { fetch: fetcher } })).rejects.toBeInstanceOf(
			InvalidArgumentsError,
		);
		expect(fetcher).not.toHaveBeenCalled();
	});

	it("propagates fetch errors", async () => {
		const fetcher = vi.fn<HtmlFetcher>(async ({ url }) => {
			throw new FetchError(`HTTP error 500 while fetching URL: ${url}`, url, 500);
		});

		await expect(convertSync(PAGE_URL, {}, { fetchers: { fetch: fetcher } })).rejects.toThrow(
			"HTTP error 500 while fetching URL: https://example.com/hello",
		);
	});

	it("requires a fetcher for the chosen method", async () => {
		const promise = convertSync(PAGE_URL, { fetchMethod: "playwright" }, { fetchers: { fetch: fakeFetcher() } });

		await expect(promise).rejects.toBeInstanceOf(Html2MdError);
		await expect(promise).rejects.toThrow('No fetcher registered for method "playwright"');
	});

	it("names the browser when fetching with playwright", async () => {
		const events = await collect(
			convert(PAGE_URL, { fetchMethod: "playwright", browserType: "webkit" }, { fetchers: { playwright: fakeFetcher() } }),
		);

		expect(events[1]).toEqual({ type: "fetch_start", method: "playwright", browser: "webkit" });
	});

	it("stops when aborted", async () => {
		let stream: ConvertStream | undefined;
		const fetcher = vi.fn<HtmlFetcher>(async () => {
			await Promise.resolve();
			stream?.abort();
			return PAGE;
		});

		stream = convert(PAGE_URL, {}, { fetchers: { fetch: fetcher } });
		const events = await collect(stream);

		const last = events[events.length - 1];
		expect(last.type === "error" && last.error).toBeInstanceOf(AbortError);
		expect(await stream.result()).toBeUndefined();
	});

	it("honors a signal that is already aborted", async () => {
		const controller = new AbortController();
		controller.abort();
		const fetcher = fakeFetcher();

		await expect(
			convertSync(PAGE_URL, {}, { fetchers: { fetch: fetcher }, signal: controller.signal }),
		).rejects.toBeInstanceOf(AbortError);
		expect(fetcher).not.toHaveBeenCalled();
	});
});
