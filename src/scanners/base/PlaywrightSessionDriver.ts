/**
 * Playwright session driver
 *
 * SOLID:
 * - SRP: every call into Playwright made on behalf of the pool
 * - DIP: implements SessionDriver so the pool stays library agnostic
 *
 * Contexts get the stealth plugin (via playwright-extra), a desktop
 * viewport and user agent, and the resource blocking route.
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, BrowserContext, Page } from "playwright";
import { execFile } from "child_process";
import { promisify } from "util";
import { BROWSER_ARGS } from "@/config/BrowserArgs";
import { POOL_CONFIG, SCRAPER_CONFIG } from "@/config/constants";
import { shouldBlockRequest } from "@/config/ResourceBlocking";
import type { SessionDriver } from "@/core/interfaces/ISessionDriver";
import type { Logger } from "@/config/logger";

chromium.use(StealthPlugin());

const execFileAsync = promisify(execFile);

export interface PlaywrightDriverOptions {
  headless?: boolean;
  args?: string[];
  userAgent?: string;
  navigationTimeoutMs?: number;
}

const MISSING_BINARY_MARKERS = [
  "Executable doesn't exist",
  "npx playwright install",
];

export class PlaywrightSessionDriver
  implements SessionDriver<Browser, BrowserContext, Page>
{
  constructor(
    private readonly logger: Logger,
    private readonly options: PlaywrightDriverOptions = {},
  ) {}

  async launchEngine(): Promise<Browser> {
    return chromium.launch({
      headless: this.options.headless ?? POOL_CONFIG.HEADLESS,
      args: this.options.args ?? BROWSER_ARGS.DEFAULT,
    });
  }

  async createContext(engine: Browser): Promise<BrowserContext> {
    const context = await engine.newContext({
      viewport: { ...POOL_CONFIG.VIEWPORT },
      userAgent: this.options.userAgent ?? SCRAPER_CONFIG.DEFAULT_USER_AGENT,
      locale: POOL_CONFIG.LOCALE,
      javaScriptEnabled: true,
    });

    await context.route("**/*", async (route) => {
      const request = route.request();
      if (shouldBlockRequest(request.url(), request.resourceType())) {
        await route.abort();
      } else {
        await route.continue();
      }
    });

    return context;
  }

  async openPage(context: BrowserContext): Promise<Page> {
    const page = await context.newPage();
    page.setDefaultNavigationTimeout(
      this.options.navigationTimeoutMs ?? SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS,
    );
    return page;
  }

  async closePage(page: Page): Promise<void> {
    if (!page.isClosed()) {
      await page.close();
    }
  }

  async closeContext(context: BrowserContext): Promise<void> {
    await context.close();
  }

  async closeEngine(engine: Browser): Promise<void> {
    if (engine.isConnected()) {
      await engine.close();
    }
  }

  isEngineAlive(engine: Browser): boolean {
    return engine.isConnected();
  }

  isMissingBinaryError(error: unknown): boolean {
    const message = error instanceof Error ? error.message : String(error);
    return MISSING_BINARY_MARKERS.some((marker) => message.includes(marker));
  }

  async installBinary(): Promise<void> {
    this.logger.warn("Running `playwright install chromium`");
    const { stdout } = await execFileAsync(
      "npx",
      ["playwright", "install", "chromium"],
      { timeout: 5 * 60 * 1000 },
    );
    this.logger.info({ output: stdout.trim().slice(-500) }, "Chromium installed");
  }
}
