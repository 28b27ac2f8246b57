import { describe, expect, it, vi } from "vitest";

import { FetchError } from "../src/core/errors.js";
import type { ConvertEvent } from "../src/core/events.js";
import {
	type AutomationLauncher,
	type BrowserFetchOptions,
	fetchHtmlWithBrowser,
	getChromeUserDataDir,
} from "../src/core/fetch/browser.js";
import type { BrowserName } from "../src/core/types.js";

const PAGE_URL = "https://example.com/app";

function createFakeLauncher(html = "<html><body>Rendered</body></html>") {
	const page = {
		goto: vi.fn(async () => null),
		content: vi.fn(async () => html),
		close: vi.fn(async () => undefined),
	};
	const context = {
		newPage: vi.fn(async () => page),
		close: vi.fn(async () => undefined),
	};
	const browser = {
		newContext: vi.fn(async () => context),
		close: vi.fn(async () => undefined),
	};
	const launcher = {
		launch: vi.fn(async () => browser),
		launchPersistentContext: vi.fn(async () => context),
	} satisfies AutomationLauncher;

	return { page, context, browser, launcher };
}

function launchersFor(launcher: AutomationLauncher): BrowserFetchOptions["loadLaunchers"] {
	return async () => ({ chromium: launcher, firefox: launcher, webkit: launcher });
}

function baseOptions(launcher: AutomationLauncher, browserType: BrowserName = "chromium"): BrowserFetchOptions {
	return {
		browserType,
		headless: true,
		waitFor: "networkidle",
		useUserProfile: false,
		timeoutSeconds: 30,
		loadLaunchers: launchersFor(launcher),
	};
}

describe("fetchHtmlWithBrowser", () => {
	it("navigates and returns the rendered page", async () => {
		const fake = createFakeLauncher();

		const html = await fetchHtmlWithBrowser(PAGE_URL, baseOptions(fake.launcher));

		expect(html).toBe("<html><body>Rendered</body></html>");
		expect(fake.launcher.launch).toHaveBeenCalledWith({ headless: true });
		expect(fake.page.goto).toHaveBeenCalledWith(PAGE_URL, { timeout: 30_000, waitUntil: "networkidle" });
		expect(fake.page.close).toHaveBeenCalledTimes(1);
		expect(fake.browser.close).toHaveBeenCalledTimes(1);
	});

	it("closes the browser when navigation fails", async () => {
		const fake = createFakeLauncher();
		fake.page.goto.mockRejectedValueOnce(new Error("net::ERR_NAME_NOT_RESOLVED"));

		const promise = fetchHtmlWithBrowser(PAGE_URL, baseOptions(fake.launcher));

		await expect(promise).rejects.toBeInstanceOf(FetchError);
		await expect(promise).rejects.toThrow(
			"Playwright error while fetching https://example.com/app: net::ERR_NAME_NOT_RESOLVED",
		);
		expect(fake.page.close).toHaveBeenCalledTimes(1);
		expect(fake.browser.close).toHaveBeenCalledTimes(1);
	});

	it("wraps launcher loading failures", async () => {
		await expect(
			fetchHtmlWithBrowser(PAGE_URL, {
				...baseOptions(createFakeLauncher().launcher),
				loadLaunchers: async () => {
					throw new Error("Cannot find package 'playwright-core'");
				},
			}),
		).rejects.toThrow("Playwright error while fetching https://example.com/app: Cannot find package 'playwright-core'");
	});

	it("opens the Chrome profile for chromium", async () => {
		const fake = createFakeLauncher();

		await fetchHtmlWithBrowser(PAGE_URL, {
			...baseOptions(fake.launcher),
			headless: false,
			useUserProfile: true,
			userDataDir: () => "/home/tester/.config/google-chrome",
		});

		expect(fake.launcher.launch).not.toHaveBeenCalled();
		expect(fake.launcher.launchPersistentContext).toHaveBeenCalledWith(
			"/home/tester/.config/google-chrome",
			expect.objectContaining({ headless: false, channel: "chrome" }),
		);
		expect(fake.context.close).toHaveBeenCalledTimes(1);
	});

	it("fails when the Chrome profile is missing", async () => {
		const fake = createFakeLauncher();

		await expect(
			fetchHtmlWithBrowser(PAGE_URL, { ...baseOptions(fake.launcher), useUserProfile: true, userDataDir: () => null }),
		).rejects.toThrow(
			"Chrome user data directory not found. Cannot use user profile. Try with use_user_profile=false",
		);
	});

	it("warns and ignores the profile for other browsers", async () => {
		const fake = createFakeLauncher();
		const events: ConvertEvent[] = [];

		await fetchHtmlWithBrowser(PAGE_URL, {
			...baseOptions(fake.launcher, "firefox"),
			useUserProfile: true,
			emit: (event) => events.push(event),
		});

		expect(fake.launcher.launch).toHaveBeenCalledTimes(1);
		expect(fake.launcher.launchPersistentContext).not.toHaveBeenCalled();
		expect(events).toEqual([
			{
				type: "warning",
				code: "profile_unsupported",
				message: "User profile is only supported for chromium. Ignoring use_user_profile for firefox.",
			},
		]);
	});
});

describe("getChromeUserDataDir", () => {
	it("returns null on unsupported platforms", () => {
		expect(getChromeUserDataDir("aix", "/home/tester")).toBeNull();
	});

	it("returns null when the profile directory does not exist", () => {
		expect(getChromeUserDataDir("linux", "/nonexistent-home-for-tests")).toBeNull();
	});
});
