const SIZE_UNITS = ["B", "KB", "MB", "GB"] as const;

export function byteLength(text: string): number {
	return Buffer.byteLength(text, "utf8");
}

/** Rough token estimate: one token per four characters. */
export function estimateTokens(text: string): number {
	return Math.floor(text.length / 4);
}

export function formatBytes(size: number, fractionDigits = 1): string {
	let value = size;
	for (const unit of SIZE_UNITS) {
		if (value < 1024) {
			return `${value.toFixed(fractionDigits)} ${unit}`;
		}
		value /= 1024;
	}
	return `${value.toFixed(fractionDigits)} TB`;
}

export function formatCount(value: number): string {
	return value.toLocaleString("en-US");
}

export function toBoolean(value: unknown): boolean | undefined {
	if (typeof value === "boolean") return value;
	if (typeof value === "string") {
		const lower = value.trim().toLowerCase();
		if (lower === "true" || lower === "1" || lower === "yes") return true;
		if (lower === "false" || lower === "0" || lower === "no") return false;
	}
	return undefined;
}

export function toInteger(value: unknown): number | undefined {
	if (typeof value === "number" && Number.isInteger(value)) {
		return value;
	}

	if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
		return Number(value.trim());
	}

	return undefined;
}

export function toError(error: unknown): Error {
	if (error instanceof Error) {
		return error;
	}

	return new Error(typeof error === "string" ? error : "Unknown error");
}
