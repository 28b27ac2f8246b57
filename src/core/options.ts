import type { ArgumentErrorDetail } from "./errors.js";
import { InvalidArgumentsError } from "./errors.js";
import type { BrowserName, ConvertOptions, FetchMethod, WaitStrategy } from "./types.js";

export const FETCH_METHODS: readonly FetchMethod[] = ["fetch", "playwright"];
export const BROWSER_NAMES: readonly BrowserName[] = ["chromium", "firefox", "webkit"];
export const WAIT_STRATEGIES: readonly WaitStrategy[] = ["load", "domcontentloaded", "networkidle"];

const MIB = 1024 * 1024;

export const OPTION_BOUNDS = {
	timeoutSeconds: { min: 5, max: 120 },
	maxSizeBytes: { min: 1 * MIB, max: 50 * MIB },
	cacheTtlSeconds: { min: 60, max: 86400 },
	maxTokens: { min: 1000, max: 100000 },
} as const;

export const DEFAULT_CONVERT_OPTIONS: ConvertOptions = {
	includeImages: true,
	includeTables: true,
	includeLinks: true,
	timeoutSeconds: 30,
	maxSizeBytes: 10 * MIB,
	useCache: false,
	cacheTtlSeconds: null,
	fetchMethod: "fetch",
	browserType: "chromium",
	headless: true,
	waitFor: "networkidle",
	useUserProfile: false,
	returnSummary: false,
	maxTokens: 25000,
	sectionId: null,
	sectionHeading: null,
};

/**
 * Fill defaults and check every field against its domain.
 * Empty section selectors count as unset.
 */
export function resolveConvertOptions(overrides: Partial<ConvertOptions> = {}): ConvertOptions {
	const pick = <K extends keyof ConvertOptions>(key: K): ConvertOptions[K] =>
		overrides[key] ?? DEFAULT_CONVERT_OPTIONS[key];

	const options: ConvertOptions = {
		includeImages: pick("includeImages"),
		includeTables: pick("includeTables"),
		includeLinks: pick("includeLinks"),
		timeoutSeconds: pick("timeoutSeconds"),
		maxSizeBytes: pick("maxSizeBytes"),
		useCache: pick("useCache"),
		cacheTtlSeconds: clampCacheTtl(pick("cacheTtlSeconds")),
		fetchMethod: pick("fetchMethod"),
		browserType: pick("browserType"),
		headless: pick("headless"),
		waitFor: pick("waitFor"),
		useUserProfile: pick("useUserProfile"),
		returnSummary: pick("returnSummary"),
		maxTokens: pick("maxTokens"),
		sectionId: normalizeSelector(pick("sectionId")),
		sectionHeading: normalizeSelector(pick("sectionHeading")),
	};

	const errors: ArgumentErrorDetail[] = [];
	const checkRange = (field: keyof typeof OPTION_BOUNDS, value: number): void => {
		const { min, max } = OPTION_BOUNDS[field];
		if (!Number.isInteger(value) || value < min || value > max) {
			errors.push({ path: field, message: `must be an integer between ${min} and ${max}` });
		}
	};

	checkRange("timeoutSeconds", options.timeoutSeconds);
	checkRange("maxSizeBytes", options.maxSizeBytes);
	if (options.cacheTtlSeconds !== null && !Number.isInteger(options.cacheTtlSeconds)) {
		errors.push({ path: "cacheTtlSeconds", message: "must be an integer" });
	}
	checkRange("maxTokens", options.maxTokens);

	if (!FETCH_METHODS.includes(options.fetchMethod)) {
		errors.push({ path: "fetchMethod", message: `must be one of ${FETCH_METHODS.join(", ")}` });
	}
	if (!BROWSER_NAMES.includes(options.browserType)) {
		errors.push({ path: "browserType", message: `must be one of ${BROWSER_NAMES.join(", ")}` });
	}
	if (!WAIT_STRATEGIES.includes(options.waitFor)) {
		errors.push({ path: "waitFor", message: `must be one of ${WAIT_STRATEGIES.join(", ")}` });
	}
	if (options.sectionId !== null && options.sectionHeading !== null) {
		errors.push({ path: "sectionId", message: "cannot be combined with sectionHeading" });
	}

	if (errors.length > 0) {
		const details = errors.map((error) => `${error.path} ${error.message}`).join("; ");
		throw new InvalidArgumentsError(`Invalid conversion options: ${details}`, errors);
	}

	return options;
}

function clampCacheTtl(value: number | null): number | null {
	if (value === null || !Number.isInteger(value)) {
		return value;
	}
	const { min, max } = OPTION_BOUNDS.cacheTtlSeconds;
	return Math.min(Math.max(value, min), max);
}

function normalizeSelector(value: string | null): string | null {
	if (value === null) {
		return null;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : null;
}
