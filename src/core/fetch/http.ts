import { AbortError, FetchError } from "../errors.js";

export const USER_AGENT = "Mozilla/5.0 (compatible; html2md/0.3; +https://www.npmjs.com/package/html2md)";

export interface HttpFetchOptions {
	timeoutMs: number;
	maxBytes: number;
	signal?: AbortSignal;
	fetchFn?: typeof fetch;
}

export function isHttpUrl(value: string): boolean {
	try {
		const url = new URL(value);
		return (url.protocol === "http:" || url.protocol === "https:") && url.hostname.length > 0;
	} catch {
		return false;
	}
}

export async function fetchHtml(url: string, options: HttpFetchOptions): Promise<string> {
	if (!isHttpUrl(url)) {
		throw new FetchError(`Invalid URL format: ${url}`, url);
	}

	const fetchFn = options.fetchFn ?? fetch;
	const controller = new AbortController();
	let timedOut = false;
	const timer = setTimeout(() => {
		timedOut = true;
		controller.abort();
	}, options.timeoutMs);
	const onAbort = () => controller.abort(options.signal?.reason);
	options.signal?.addEventListener("abort", onAbort, { once: true });

	try {
		if (options.signal?.aborted) {
			throw new AbortError();
		}

		const response = await fetchFn(url, {
			headers: { "User-Agent": USER_AGENT, Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8" },
			redirect: "follow",
			signal: controller.signal,
		});

		if (!response.ok) {
			throw new FetchError(`HTTP error ${response.status} while fetching URL: ${url}`, url, response.status);
		}

		const declaredLength = Number.parseInt(response.headers.get("content-length") ?? "", 10);
		if (Number.isFinite(declaredLength) && declaredLength > options.maxBytes) {
			throw new FetchError(
				`Content too large: ${declaredLength} bytes exceeds maximum of ${options.maxBytes} bytes`,
				url,
				response.status,
			);
		}

		return await readBody(response, url, options.maxBytes);
	} catch (error) {
		if (error instanceof FetchError || error instanceof AbortError) {
			throw error;
		}
		if (timedOut) {
			throw new FetchError(`Timeout while fetching URL: ${url}`, url, undefined, { cause: error });
		}
		if (options.signal?.aborted) {
			throw new AbortError();
		}
		if (error instanceof TypeError) {
			throw new FetchError(`Connection error while fetching URL: ${url}`, url, undefined, { cause: error });
		}
		const message = error instanceof Error ? error.message : String(error);
		throw new FetchError(`Unexpected error while fetching URL: ${url} - ${message}`, url, undefined, {
			cause: error,
		});
	} finally {
		clearTimeout(timer);
		options.signal?.removeEventListener("abort", onAbort);
	}
}

async function readBody(response: Response, url: string, maxBytes: number): Promise<string> {
	const decoder = createDecoder(response.headers.get("content-type"));
	if (!response.body) {
		return "";
	}

	const reader = response.body.getReader();
	let total = 0;
	let text = "";

	for (;;) {
		const { done, value } = await reader.read();
		if (done) {
			break;
		}
		total += value.byteLength;
		if (total > maxBytes) {
			await reader.cancel();
			throw new FetchError(`Content too large: exceeds maximum of ${maxBytes} bytes`, url, response.status);
		}
		text += decoder.decode(value, { stream: true });
	}

	return text + decoder.decode();
}

function createDecoder(contentType: string | null): TextDecoder {
	const charset = /charset=["']?([\w-]+)/i.exec(contentType ?? "")?.[1] ?? "utf-8";
	try {
		return new TextDecoder(charset);
	} catch {
		return new TextDecoder("utf-8");
	}
}
