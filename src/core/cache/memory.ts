import { ConfigurationError } from "../errors.js";
import type { CacheEntry, CacheLookup, MemoryCacheOptions, ResultCache } from "./types.js";

export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;
const DEFAULT_SWEEP_EVERY = 100;

export function createMemoryCache<T>(options: MemoryCacheOptions = {}): ResultCache<T> {
	const enabled = options.enabled ?? true;
	const defaultTtlMs = options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;
	const sweepEvery = options.sweepEvery ?? DEFAULT_SWEEP_EVERY;
	const now = options.now ?? Date.now;

	assertPositive("defaultTtlMs", defaultTtlMs);
	assertPositive("sweepEvery", sweepEvery);
	if (options.sweepIntervalMs !== undefined) assertPositive("sweepIntervalMs", options.sweepIntervalMs);
	if (options.maxEntries !== undefined) assertPositive("maxEntries", options.maxEntries);

	const map = new Map<string, CacheEntry<T>>();
	let writesSinceSweep = 0;

	const isStale = (entry: CacheEntry<T>, at: number): boolean => at >= entry.createdAt + entry.ttlMs;

	const sweep = (): number => {
		const at = now();
		let removed = 0;
		for (const [key, entry] of map) {
			if (isStale(entry, at)) {
				map.delete(key);
				removed++;
			}
		}
		writesSinceSweep = 0;
		return removed;
	};

	let timer: ReturnType<typeof setInterval> | undefined;
	if (enabled && options.sweepIntervalMs !== undefined) {
		timer = setInterval(sweep, options.sweepIntervalMs);
		timer.unref();
	}

	return {
		enabled,
		defaultTtlMs,
		get: (key): CacheLookup<T> => {
			if (!enabled) {
				return { found: false };
			}

			const entry = map.get(key);
			if (!entry) {
				return { found: false };
			}

			const at = now();
			if (isStale(entry, at)) {
				map.delete(key);
				return { found: false };
			}

			// Refresh LRU
			map.delete(key);
			map.set(key, entry);
			return { found: true, value: structuredClone(entry.value), age: at - entry.createdAt };
		},
		set: (key, value, ttlMs = defaultTtlMs) => {
			if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
				throw new RangeError(`Cache TTL must be a positive number of milliseconds, got ${ttlMs}`);
			}
			if (!enabled) {
				return;
			}

			if (++writesSinceSweep >= sweepEvery) {
				sweep();
			}

			map.delete(key);
			map.set(key, { value: structuredClone(value), createdAt: now(), ttlMs });

			if (options.maxEntries !== undefined) {
				while (map.size > options.maxEntries) {
					const oldest = map.keys().next();
					if (oldest.done) {
						break;
					}
					map.delete(oldest.value);
				}
			}
		},
		delete: (key) => {
			map.delete(key);
		},
		clear: () => {
			map.clear();
			writesSinceSweep = 0;
		},
		size: () => map.size,
		sweep,
		dispose: () => {
			if (timer) {
				clearInterval(timer);
				timer = undefined;
			}
		},
	};
}

function assertPositive(name: string, value: number): void {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(`Invalid cache option "${name}": expected a positive number, got ${value}`);
	}
}
