import { createHash } from "node:crypto";

import { InvalidArgumentsError } from "../errors.js";
import type { ConvertOptions } from "../types.js";

/** Options that change the converted Markdown. Everything else stays out of the key. */
export type CacheKeyOptions = Pick<
	ConvertOptions,
	| "includeImages"
	| "includeTables"
	| "includeLinks"
	| "fetchMethod"
	| "browserType"
	| "waitFor"
	| "useUserProfile"
	| "sectionId"
	| "sectionHeading"
>;

export function computeCacheKey(url: string, options: CacheKeyOptions): string {
	if (typeof url !== "string" || url.length === 0) {
		throw new InvalidArgumentsError("Cache key requires a non-empty URL", [{ path: "url", message: "must not be empty" }]);
	}

	const keyData: Record<string, string | boolean | null> = {
		url,
		includeImages: options.includeImages,
		includeTables: options.includeTables,
		includeLinks: options.includeLinks,
		fetchMethod: options.fetchMethod,
		browserType: options.browserType,
		waitFor: options.waitFor,
		useUserProfile: options.useUserProfile,
		sectionId: options.sectionId,
		sectionHeading: options.sectionHeading,
	};

	return createHash("sha256").update(canonicalize(keyData)).digest("hex");
}

function canonicalize(data: Record<string, string | boolean | null>): string {
	const entries = Object.entries(data).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
	return `{${entries.map(([key, value]) => `${JSON.stringify(key)}:${JSON.stringify(value)}`).join(",")}}`;
}
