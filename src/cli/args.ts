import { BROWSER_NAMES, FETCH_METHODS, WAIT_STRATEGIES } from "../core/options.js";
import type { BrowserName, ConvertOptions, WaitStrategy } from "../core/types.js";

export interface CliArgs {
	command: "convert" | "serve";
	url?: string;
	output?: string;
	options: Partial<ConvertOptions>;
	verbose?: boolean;
	quiet?: boolean;
	help?: boolean;
	version?: boolean;
}

export interface ParsedArgs {
	args: CliArgs;
	errors: string[];
}

export function parseArgs(argv: string[]): ParsedArgs {
	const args: CliArgs = {
		command: "convert",
		options: {},
	};
	const errors: string[] = [];
	const positionals: string[] = [];

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];

		const nextValue = (flag: string): string | undefined => {
			if (i + 1 >= argv.length) {
				errors.push(`Missing value for ${flag}.`);
				return undefined;
			}
			return argv[++i];
		};

		const nextInteger = (flag: string): number | undefined => {
			const value = nextValue(flag);
			if (!value) return undefined;
			const parsed = Number(value);
			if (!Number.isInteger(parsed) || parsed <= 0) {
				errors.push(`Invalid value for ${flag}: ${value}`);
				return undefined;
			}
			return parsed;
		};

		switch (arg) {
			case "-o":
			case "--output": {
				const value = nextValue(arg);
				if (value) args.output = value;
				break;
			}
			case "--no-images":
				args.options.includeImages = false;
				break;
			case "--no-tables":
				args.options.includeTables = false;
				break;
			case "--no-links":
				args.options.includeLinks = false;
				break;
			case "-t":
			case "--timeout": {
				const value = nextInteger(arg);
				if (value !== undefined) args.options.timeoutSeconds = value;
				break;
			}
			case "--max-size": {
				const value = nextInteger(arg);
				if (value !== undefined) args.options.maxSizeBytes = value;
				break;
			}
			case "--cache":
				args.options.useCache = true;
				break;
			case "--cache-ttl": {
				const value = nextInteger(arg);
				if (value !== undefined) args.options.cacheTtlSeconds = value;
				break;
			}
			case "-m":
			case "--method": {
				const value = nextValue(arg);
				if (!value) break;
				const method = matchChoice(value, FETCH_METHODS);
				if (method) {
					args.options.fetchMethod = method;
				} else {
					errors.push(`Invalid value for ${arg}: ${value} (expected ${FETCH_METHODS.join(", ")})`);
				}
				break;
			}
			case "-b":
			case "--browser": {
				const value = nextValue(arg);
				if (!value) break;
				const browser: BrowserName | undefined = matchChoice(value, BROWSER_NAMES);
				if (browser) {
					args.options.browserType = browser;
				} else {
					errors.push(`Invalid value for ${arg}: ${value} (expected ${BROWSER_NAMES.join(", ")})`);
				}
				break;
			}
			case "--headed":
				args.options.headless = false;
				break;
			case "--wait-for": {
				const value = nextValue(arg);
				if (!value) break;
				const strategy: WaitStrategy | undefined = matchChoice(value, WAIT_STRATEGIES);
				if (strategy) {
					args.options.waitFor = strategy;
				} else {
					errors.push(`Invalid value for ${arg}: ${value} (expected ${WAIT_STRATEGIES.join(", ")})`);
				}
				break;
			}
			case "--user-profile":
				args.options.useUserProfile = true;
				break;
			case "--summary":
				args.options.returnSummary = true;
				break;
			case "--max-tokens": {
				const value = nextInteger(arg);
				if (value !== undefined) args.options.maxTokens = value;
				break;
			}
			case "--section-id": {
				const value = nextValue(arg);
				if (value) args.options.sectionId = value;
				break;
			}
			case "--section-heading": {
				const value = nextValue(arg);
				if (value) args.options.sectionHeading = value;
				break;
			}
			case "--verbose":
				args.verbose = true;
				break;
			case "--quiet":
				args.quiet = true;
				break;
			case "-h":
			case "--help":
				args.help = true;
				break;
			case "-v":
			case "--version":
				args.version = true;
				break;
			default:
				if (arg.startsWith("-")) {
					errors.push(`Unknown option: ${arg}`);
				} else {
					positionals.push(arg);
				}
		}
	}

	if (positionals[0] === "serve") {
		args.command = "serve";
		positionals.shift();
	} else if (positionals.length > 0) {
		args.url = positionals.shift();
	}
	for (const extra of positionals) {
		errors.push(`Unexpected argument: ${extra}`);
	}

	return { args, errors };
}

function matchChoice<T extends string>(value: string, choices: readonly T[]): T | undefined {
	return choices.find((choice) => choice === value.trim().toLowerCase());
}

export function renderHelp(): string {
	return `html2md - Convert web pages to clean Markdown

Usage:
  html2md [options] <url>
  html2md serve                Run the html_to_markdown tool server on stdio

Options:
  -o, --output <file>          Output file (default: stdout)
  --no-images                  Drop images
  --no-tables                  Drop tables
  --no-links                   Keep link text only
  -t, --timeout <seconds>      Request timeout, 5-120 (default: 30)
  --max-size <bytes>           Download limit, 1-50 MiB (default: 10 MiB)
  --cache                      Reuse results within this process
  --cache-ttl <seconds>        Cache lifetime, 60-86400 (default: HTML2MD_CACHE_TTL or 3600)
  -m, --method <name>          fetch or playwright (default: fetch)
  -b, --browser <name>         chromium, firefox or webkit (default: chromium)
  --headed                     Show the browser window
  --wait-for <event>           load, domcontentloaded or networkidle (default: networkidle)
  --user-profile               Use the local Chrome profile (chromium only)
  --summary                    Print a summary instead of the full Markdown
  --max-tokens <n>             Print a summary above this many tokens, 1000-100000
  --section-id <id>            Convert only the element with this id
  --section-heading <text>     Convert only the section under this heading
  --verbose                    Show detailed progress
  --quiet                      Suppress non-essential output
  -h, --help                   Show help
  -v, --version                Show version

Environment:
  HTML2MD_CACHE_ENABLED, HTML2MD_CACHE_TTL, HTML2MD_CACHE_MAX_ENTRIES, HTML2MD_CACHE_SWEEP_INTERVAL
`;
}
