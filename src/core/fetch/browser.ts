import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { FetchError } from "../errors.js";
import type { ConvertEvent } from "../events.js";
import type { BrowserName, WaitStrategy } from "../types.js";

/**
 * The slice of Playwright's `Page`, `BrowserContext`, `Browser` and
 * `BrowserType` this module drives. Playwright's own classes satisfy these
 * structurally, and tests can pass plain objects.
 */
export interface AutomationPage {
	goto(url: string, options: { timeout: number; waitUntil: WaitStrategy }): Promise<unknown>;
	content(): Promise<string>;
	close(): Promise<void>;
}

export interface AutomationContext {
	newPage(): Promise<AutomationPage>;
	close(): Promise<void>;
}

export interface AutomationBrowser {
	newContext(): Promise<AutomationContext>;
	close(): Promise<void>;
}

export interface AutomationLauncher {
	launch(options: { headless: boolean }): Promise<AutomationBrowser>;
	launchPersistentContext(
		userDataDir: string,
		options: { headless: boolean; channel?: string; args?: string[] },
	): Promise<AutomationContext>;
}

export type LoadLaunchers = () => Promise<Record<BrowserName, AutomationLauncher>>;

export interface BrowserFetchOptions {
	browserType: BrowserName;
	headless: boolean;
	waitFor: WaitStrategy;
	useUserProfile: boolean;
	timeoutSeconds: number;
	emit?: (event: ConvertEvent) => void;
	loadLaunchers?: LoadLaunchers;
	userDataDir?: () => string | null;
}

const PROFILE_ARGS = ["--disable-blink-features=AutomationControlled", "--no-first-run", "--no-default-browser-check"];

export async function loadPlaywrightLaunchers(): Promise<Record<BrowserName, AutomationLauncher>> {
	const playwright = await import("playwright-core");
	return {
		chromium: playwright.chromium,
		firefox: playwright.firefox,
		webkit: playwright.webkit,
	};
}

export function getChromeUserDataDir(platform: NodeJS.Platform = process.platform, home = homedir()): string | null {
	let path: string;
	switch (platform) {
		case "darwin":
			path = join(home, "Library", "Application Support", "Google", "Chrome");
			break;
		case "win32":
			path = join(home, "AppData", "Local", "Google", "Chrome", "User Data");
			break;
		case "linux":
			path = join(home, ".config", "google-chrome");
			break;
		default:
			return null;
	}

	return existsSync(path) ? path : null;
}

export async function fetchHtmlWithBrowser(url: string, options: BrowserFetchOptions): Promise<string> {
	const loadLaunchers = options.loadLaunchers ?? loadPlaywrightLaunchers;

	try {
		const launchers = await loadLaunchers();
		const session = await openSession(url, launchers[options.browserType], options);
		try {
			const page = await session.newPage();
			try {
				await page.goto(url, { timeout: options.timeoutSeconds * 1000, waitUntil: options.waitFor });
				return await page.content();
			} finally {
				await page.close();
			}
		} finally {
			await session.close();
		}
	} catch (error) {
		if (error instanceof FetchError) {
			throw error;
		}
		const message = error instanceof Error ? error.message : String(error);
		throw new FetchError(`Playwright error while fetching ${url}: ${message}`, url, undefined, { cause: error });
	}
}

async function openSession(
	url: string,
	launcher: AutomationLauncher,
	options: BrowserFetchOptions,
): Promise<{ newPage(): Promise<AutomationPage>; close(): Promise<void> }> {
	if (options.useUserProfile && options.browserType === "chromium") {
		const userDataDir = (options.userDataDir ?? getChromeUserDataDir)();
		if (userDataDir === null) {
			throw new FetchError(
				"Chrome user data directory not found. Cannot use user profile. Try with use_user_profile=false",
				url,
			);
		}
		// The profile belongs to the installed Chrome, not a bundled build.
		return await launcher.launchPersistentContext(userDataDir, {
			headless: options.headless,
			channel: "chrome",
			args: PROFILE_ARGS,
		});
	}

	if (options.useUserProfile) {
		options.emit?.({
			type: "warning",
			code: "profile_unsupported",
			message: `User profile is only supported for chromium. Ignoring use_user_profile for ${options.browserType}.`,
		});
	}

	const browser = await launcher.launch({ headless: options.headless });
	return {
		newPage: async () => {
			const context = await browser.newContext();
			return await context.newPage();
		},
		close: () => browser.close(),
	};
}
