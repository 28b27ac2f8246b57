import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { Writable } from "node:stream";

import { afterEach, describe, expect, it, vi } from "vitest";

import { runCli } from "../src/cli.js";
import { computeCacheKey } from "../src/core/cache/key.js";
import { FetchError } from "../src/core/errors.js";
import { resolveConvertOptions } from "../src/core/options.js";
import type { HtmlFetcher } from "../src/core/types.js";
import { createToolServer, type serveStdio } from "../src/server.js";
import { getVersion } from "../src/utils/version.js";

const PAGE_URL = "https://example.com/hello";
const PAGE = "<html><body><h1>Hello</h1><p>World</p></body></html>";

const tempDirs: string[] = [];

afterEach(() => {
	for (const dir of tempDirs.splice(0)) {
		rmSync(dir, { recursive: true, force: true });
	}
});

function createWritable(): { writable: Writable; read: () => string } {
	let data = "";
	const writable = new Writable({
		write(chunk, _encoding, callback) {
			data += chunk.toString();
			callback();
		},
	});
	return { writable, read: () => data };
}

async function run(argv: string[], fetcher: HtmlFetcher = async () => PAGE, env: Record<string, string> = {}) {
	const stdout = createWritable();
	const stderr = createWritable();
	const exitCode = await runCli(argv, {
		fetchers: { fetch: fetcher, playwright: fetcher },
		env,
		stdout: stdout.writable,
		stderr: stderr.writable,
	});
	return { exitCode, stdout: stdout.read(), stderr: stderr.read() };
}

describe("cli", () => {
	it("prints the Markdown", async () => {
		const result = await run([PAGE_URL]);

		expect(result).toEqual({ exitCode: 0, stdout: "# Hello\n\nWorld\n", stderr: "" });
	});

	it("writes the Markdown to a file", async () => {
		const directory = mkdtempSync(join(tmpdir(), "html2md-cli-test-"));
		tempDirs.push(directory);
		const output = join(directory, "hello.md");

		const result = await run([PAGE_URL, "-o", output]);

		expect(result.exitCode).toBe(0);
		expect(result.stdout).toBe("");
		expect(readFileSync(output, "utf8")).toBe("# Hello\n\nWorld\n");
	});

	it("logs each step with --verbose", async () => {
		const result = await run([PAGE_URL, "--verbose"]);

		expect(result.exitCode).toBe(0);
		expect(result.stderr).toBe(
			[
				"[start] https://example.com/hello",
				"[fetch] Using fetch",
				"[fetch] Received 52.0 B",
				"[clean] 65.0 B after cleaning",
				"[convert] 14.0 B of Markdown",
				"[complete] ~3 tokens",
				"",
			].join("\n"),
		);
	});

	it("logs cache activity", async () => {
		const key = computeCacheKey(PAGE_URL, resolveConvertOptions({ useCache: true })).slice(0, 12);

		const result = await run([PAGE_URL, "--cache", "--verbose"]);

		expect(result.exitCode).toBe(0);
		expect(result.stderr).toContain(`[cache] Miss ${key}\n`);
		expect(result.stderr).toContain(`[cache] Stored ${key} for 3600s\n`);
	});

	it("prints fetcher warnings unless quiet", async () => {
		const fetcher: HtmlFetcher = async ({ emit }) => {
			emit({ type: "warning", code: "profile_unsupported", message: "Profiles need chromium" });
			return PAGE;
		};

		expect((await run([PAGE_URL], fetcher)).stderr).toBe("Warning: Profiles need chromium\n");
		expect((await run([PAGE_URL, "--quiet"], fetcher)).stderr).toBe("");
	});

	it("prints a summary with --summary", async () => {
		const result = await run([PAGE_URL, "--summary"]);

		expect(result.exitCode).toBe(0);
		expect(result.stdout.startsWith("# Document Too Large - Summary Returned\n")).toBe(true);

		const savedTo = /\*\*Full content saved to:\*\* `([^`]+)`/.exec(result.stdout)?.[1] ?? "";
		tempDirs.push(dirname(savedTo));
		expect(readFileSync(savedTo, "utf8")).toBe("# Hello\n\nWorld");
	});

	it("prints help and version", async () => {
		const help = await run(["--help"]);
		const version = await run(["--version"]);

		expect(help.exitCode).toBe(0);
		expect(help.stdout.startsWith("html2md - Convert web pages to clean Markdown\n")).toBe(true);
		expect(version).toEqual({ exitCode: 0, stdout: `${getVersion()}\n`, stderr: "" });
	});

	it("starts the server with the cache settings from the environment", async () => {
		const serveFn = vi.fn<typeof serveStdio>(async () => createToolServer());
		const stderr = createWritable();

		const exitCode = await runCli(["serve"], {
			serveFn,
			env: { HTML2MD_CACHE_TTL: "120" },
			stdout: createWritable().writable,
			stderr: stderr.writable,
		});

		expect(exitCode).toBe(0);
		expect(serveFn).toHaveBeenCalledTimes(1);
		expect(serveFn.mock.calls[0][0]).toMatchObject({ env: { HTML2MD_CACHE_TTL: "120" }, stderr: stderr.writable });
		expect(serveFn.mock.calls[0][0]?.cache).toBeUndefined();
	});
});

describe("cli exit codes", () => {
	it("returns 2 without a url", async () => {
		const result = await run([]);

		expect(result.exitCode).toBe(2);
		expect(result.stderr).toBe("Error: Missing required argument: <url>\n");
	});

	it("returns 2 on unknown options", async () => {
		const result = await run([PAGE_URL, "--fast"]);

		expect(result.exitCode).toBe(2);
		expect(result.stderr).toBe("Error: Unknown option: --fast\n");
	});

	it("returns 2 on out-of-range options", async () => {
		const fetcher = vi.fn<HtmlFetcher>(async () => PAGE);

		const result = await run([PAGE_URL, "--timeout", "1"], fetcher);

		expect(result.exitCode).toBe(2);
		expect(result.stderr).toBe(
			"Error: Invalid conversion options: timeoutSeconds must be an integer between 5 and 120\n",
		);
		expect(fetcher).not.toHaveBeenCalled();
	});

	it("returns 2 on invalid cache settings", async () => {
		const result = await run([PAGE_URL, "--cache"], undefined, { HTML2MD_CACHE_TTL: "soon" });

		expect(result.exitCode).toBe(2);
		expect(result.stderr).toBe('Error: Invalid HTML2MD_CACHE_TTL: expected a positive integer, got "soon"\n');
	});

	it("returns 2 when the server's cache settings are invalid", async () => {
		const result = await run(["serve"], undefined, { HTML2MD_CACHE_MAX_ENTRIES: "none" });

		expect(result.exitCode).toBe(2);
		expect(result.stderr).toBe('Error: Invalid HTML2MD_CACHE_MAX_ENTRIES: expected a positive integer, got "none"\n');
	});

	it("returns 3 when the page cannot be fetched", async () => {
		const result = await run([PAGE_URL], async ({ url }) => {
			throw new FetchError(`HTTP error 404 while fetching URL: ${url}`, url, 404);
		});

		expect(result.exitCode).toBe(3);
		expect(result.stderr).toBe("Error: HTTP error 404 while fetching URL: https://example.com/hello\n");
	});

	it("returns 4 when the page has no content", async () => {
		const result = await run([PAGE_URL], async () => "<body><div> </div></body>");

		expect(result.exitCode).toBe(4);
		expect(result.stderr).toBe("Error: Failed to extract content from HTML - result is empty\n");
	});

	it("returns 4 when the output file cannot be written", async () => {
		const directory = mkdtempSync(join(tmpdir(), "html2md-cli-test-"));
		tempDirs.push(directory);
		const output = join(directory, "missing", "hello.md");

		const result = await run([PAGE_URL, "-o", output]);

		expect(result.exitCode).toBe(4);
		expect(result.stderr.startsWith("Error: Failed to write output file: ")).toBe(true);
		expect(existsSync(output)).toBe(false);
	});
});
