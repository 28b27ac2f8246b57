import { toBoolean, toInteger } from "../utils/helpers.js";
import { DEFAULT_CACHE_TTL_MS } from "./cache/memory.js";
import type { MemoryCacheOptions } from "./cache/types.js";
import { ConfigurationError } from "./errors.js";

export interface ServiceConfig {
	cache: MemoryCacheOptions;
}

type Env = Record<string, string | undefined>;

/**
 * Service settings from the environment:
 *
 * - `HTML2MD_CACHE_ENABLED`: true/false, 1/0 or yes/no (default true)
 * - `HTML2MD_CACHE_TTL`: default entry lifetime in seconds (default 3600)
 * - `HTML2MD_CACHE_MAX_ENTRIES`: evict least recently used entries above this count
 * - `HTML2MD_CACHE_SWEEP_INTERVAL`: seconds between background sweeps of expired entries
 */
export function resolveServiceConfig(env: Env = process.env): ServiceConfig {
	const cache: MemoryCacheOptions = {
		enabled: readBoolean(env, "HTML2MD_CACHE_ENABLED") ?? true,
		defaultTtlMs: (readPositiveInteger(env, "HTML2MD_CACHE_TTL") ?? DEFAULT_CACHE_TTL_MS / 1000) * 1000,
	};

	const maxEntries = readPositiveInteger(env, "HTML2MD_CACHE_MAX_ENTRIES");
	if (maxEntries !== undefined) {
		cache.maxEntries = maxEntries;
	}

	const sweepInterval = readPositiveInteger(env, "HTML2MD_CACHE_SWEEP_INTERVAL");
	if (sweepInterval !== undefined) {
		cache.sweepIntervalMs = sweepInterval * 1000;
	}

	return { cache };
}

function readRaw(env: Env, name: string): string | undefined {
	const value = env[name]?.trim();
	return value ? value : undefined;
}

function readBoolean(env: Env, name: string): boolean | undefined {
	const raw = readRaw(env, name);
	if (raw === undefined) {
		return undefined;
	}
	const value = toBoolean(raw);
	if (value === undefined) {
		throw new ConfigurationError(`Invalid ${name}: expected true or false, got "${raw}"`);
	}
	return value;
}

function readPositiveInteger(env: Env, name: string): number | undefined {
	const raw = readRaw(env, name);
	if (raw === undefined) {
		return undefined;
	}
	const value = toInteger(raw);
	if (value === undefined || value <= 0) {
		throw new ConfigurationError(`Invalid ${name}: expected a positive integer, got "${raw}"`);
	}
	return value;
}
