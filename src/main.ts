import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import type { Writable } from "node:stream";

import { parseArgs, renderHelp } from "./cli/args.js";
import { convert } from "./convert.js";
import { createMemoryCache } from "./core/cache/memory.js";
import type { ResultCache } from "./core/cache/types.js";
import { resolveServiceConfig } from "./core/config.js";
import { ConfigurationError, FetchError, InvalidArgumentsError } from "./core/errors.js";
import type { ConvertEvent } from "./core/events.js";
import { resolveConvertOptions } from "./core/options.js";
import { generateSummary } from "./core/summary.js";
import type { ConversionResult, ConvertOptions, FetchMethod, HtmlFetcher } from "./core/types.js";
import { serveStdio } from "./server.js";
import { renderSummary } from "./tool/render.js";
import { formatBytes, formatCount } from "./utils/helpers.js";
import { getVersion } from "./utils/version.js";

export interface CliDeps {
	convertFn?: typeof convert;
	serveFn?: typeof serveStdio;
	fetchers?: Partial<Record<FetchMethod, HtmlFetcher>>;
	env?: Record<string, string | undefined>;
	stdout?: Writable;
	stderr?: Writable;
}

class CliExitError extends Error {
	constructor(
		message: string,
		public readonly exitCode: number,
	) {
		super(message);
		this.name = "CliExitError";
	}
}

export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
	const stdout = deps.stdout ?? process.stdout;
	const stderr = deps.stderr ?? process.stderr;

	try {
		return await runCliInternal(argv, deps, stdout, stderr);
	} catch (error) {
		const err = error instanceof Error ? error : new Error(String(error));
		if (err instanceof CliExitError) {
			writeLine(stderr, `Error: ${err.message}`);
			return err.exitCode;
		}
		writeLine(stderr, `Error: ${err.message}`);
		return mapConversionExitCode(err);
	}
}

async function runCliInternal(argv: string[], deps: CliDeps, stdout: Writable, stderr: Writable): Promise<number> {
	const { args, errors } = parseArgs(argv);

	if (args.help) {
		stdout.write(renderHelp());
		return 0;
	}
	if (args.version) {
		stdout.write(`${getVersion()}\n`);
		return 0;
	}

	if (errors.length > 0) {
		throw new CliExitError(errors.join("\n"), 2);
	}

	if (args.command === "serve") {
		const serveFn = deps.serveFn ?? serveStdio;
		await serveFn({ env: deps.env, fetchers: deps.fetchers, stderr });
		return 0;
	}

	if (!args.url) {
		throw new CliExitError("Missing required argument: <url>", 2);
	}

	let options: ConvertOptions;
	try {
		options = resolveConvertOptions(args.options);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new CliExitError(message, 2);
	}

	const cache = options.useCache ? createCache(deps.env) : undefined;
	const convertFn = deps.convertFn ?? convert;
	const stream = convertFn(args.url, options, { cache, fetchers: deps.fetchers });

	const effectiveVerbose = Boolean(args.verbose) && !args.quiet;

	let finalResult: ConversionResult | undefined;
	let conversionError: Error | undefined;

	try {
		for await (const event of stream) {
			if (effectiveVerbose) {
				logVerbose(event, stderr);
			}
			if (event.type === "warning" && !args.quiet && !effectiveVerbose) {
				writeLine(stderr, `Warning: ${event.message}`);
			}
			if (event.type === "complete") {
				finalResult = event.result;
			}
			if (event.type === "error") {
				conversionError = event.error;
			}
		}
	} finally {
		cache?.dispose();
	}

	const result = finalResult ?? (await stream.result());
	if (conversionError || !result) {
		const err = conversionError ?? new Error("Conversion failed.");
		writeLine(stderr, `Error: ${err.message}`);
		return mapConversionExitCode(err);
	}

	const summarize =
		options.returnSummary || (args.options.maxTokens !== undefined && result.estimatedTokens > options.maxTokens);
	const text = summarize ? renderSummary(generateSummary(result)) : withTrailingNewline(result.markdown);

	if (args.output) {
		try {
			writeFileSync(resolve(args.output), text, "utf8");
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			throw new CliExitError(`Failed to write output file: ${message}`, 4);
		}
		return 0;
	}

	stdout.write(text);
	return 0;
}

function createCache(env: Record<string, string | undefined> | undefined): ResultCache<ConversionResult> {
	try {
		const { cache } = resolveServiceConfig(env ?? process.env);
		// No sweep timer for one-shot runs.
		return createMemoryCache<ConversionResult>({ ...cache, sweepIntervalMs: undefined });
	} catch (error) {
		if (error instanceof ConfigurationError) {
			throw new CliExitError(error.message, 2);
		}
		throw error;
	}
}

function logVerbose(event: ConvertEvent, stderr: Writable): void {
	switch (event.type) {
		case "start":
			writeLine(stderr, `[start] ${event.url}`);
			break;
		case "cache_hit":
			writeLine(stderr, `[cache] Hit ${event.key.slice(0, 12)} (age ${Math.round(event.age / 1000)}s)`);
			break;
		case "cache_miss":
			writeLine(stderr, `[cache] Miss ${event.key.slice(0, 12)}`);
			break;
		case "cache_set":
			writeLine(stderr, `[cache] Stored ${event.key.slice(0, 12)} for ${event.ttlMs / 1000}s`);
			break;
		case "fetch_start":
			writeLine(stderr, `[fetch] Using ${event.browser ? `${event.method} (${event.browser})` : event.method}`);
			break;
		case "fetch_end":
			writeLine(stderr, `[fetch] Received ${formatBytes(event.bytes)}`);
			break;
		case "section_extracted":
			writeLine(stderr, `[section] ${event.section}: ${formatBytes(event.bytes)}`);
			break;
		case "clean_end":
			writeLine(stderr, `[clean] ${formatBytes(event.bytes)} after cleaning`);
			break;
		case "convert_end":
			writeLine(stderr, `[convert] ${formatBytes(event.bytes)} of Markdown`);
			break;
		case "warning":
			writeLine(stderr, `[warning] ${event.message}`);
			break;
		case "complete":
			writeLine(
				stderr,
				`[complete] ~${formatCount(event.result.estimatedTokens)} tokens${event.cached ? " (cached)" : ""}`,
			);
			break;
		case "error":
			writeLine(stderr, `[error] ${event.error.message}`);
			break;
		default:
			break;
	}
}

function mapConversionExitCode(error: Error): number {
	if (error instanceof InvalidArgumentsError || error instanceof ConfigurationError) {
		return 2;
	}
	if (error instanceof FetchError) {
		return 3;
	}

	return 4;
}

function withTrailingNewline(text: string): string {
	return text.endsWith("\n") ? text : `${text}\n`;
}

function writeLine(stream: Writable, message: string): void {
	stream.write(`${message}\n`);
}
