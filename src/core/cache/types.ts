export interface CacheEntry<T> {
	value: T;
	createdAt: number;
	ttlMs: number;
}

export type CacheLookup<T> = { found: true; value: T; age: number } | { found: false };

/**
 * Synchronous result cache. Every call runs to completion without yielding,
 * so concurrent requests interleaved at `await` points never observe a
 * partially written entry.
 */
export interface ResultCache<T> {
	readonly enabled: boolean;
	readonly defaultTtlMs: number;

	/** Stale entries read as absent. */
	get(key: string): CacheLookup<T>;

	/** Stores or replaces `key`. `ttlMs` must be positive; it is not clamped here. */
	set(key: string, value: T, ttlMs?: number): void;

	delete(key: string): void;
	clear(): void;

	/** Entries held, live or stale. */
	size(): number;

	/** Removes stale entries and returns how many were removed. */
	sweep(): number;

	/** Stops the sweep timer, if one was started. */
	dispose(): void;
}

export interface MemoryCacheOptions {
	/** @default true */
	enabled?: boolean;

	/** @default 3_600_000 (one hour) */
	defaultTtlMs?: number;

	/**
	 * Sweep stale entries after this many writes.
	 * @default 100
	 */
	sweepEvery?: number;

	/** Also sweep on a timer. The timer never keeps the process alive. */
	sweepIntervalMs?: number;

	/**
	 * Upper bound on entries; the least recently used entry is evicted first.
	 * Unbounded when omitted.
	 */
	maxEntries?: number;

	/** Clock in milliseconds. @default Date.now */
	now?: () => number;
}
