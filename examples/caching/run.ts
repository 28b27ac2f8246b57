// Example: converting the same page twice through a shared result cache
//
// Run (from repo root):
//   npx tsx examples/caching/run.ts https://example.com

import { performance } from "node:perf_hooks";

import { type ConversionResult, type ConvertEvent, convert, createMemoryCache } from "../../src/index.js";

const url = process.argv[2] ?? "https://example.com";
const cache = createMemoryCache<ConversionResult>({ defaultTtlMs: 5 * 60 * 1000 });

async function runOnce(label: string): Promise<void> {
	const start = performance.now();
	const stream = convert(url, { useCache: true, cacheTtlSeconds: 300 }, { cache });

	let cached = false;
	for await (const event of stream) {
		logEvent(event);
		if (event.type === "complete") {
			cached = event.cached;
		}
	}

	const result = await stream.result();
	const durationMs = performance.now() - start;
	if (!result) {
		console.log(`${label}: failed after ${durationMs.toFixed(0)}ms`);
		return;
	}
	console.log(
		`${label}: ${result.markdownSize} bytes of Markdown in ${durationMs.toFixed(0)}ms${cached ? " (from cache)" : ""}`,
	);
}

function logEvent(event: ConvertEvent): void {
	switch (event.type) {
		case "cache_hit":
			console.log(`  cache hit, entry is ${event.age}ms old`);
			break;
		case "cache_miss":
			console.log("  cache miss");
			break;
		case "error":
			console.log(`  error: ${event.error.message}`);
			break;
		default:
			break;
	}
}

await runOnce("First run");
await runOnce("Second run");
console.log(`Entries cached: ${cache.size()}`);
cache.dispose();
