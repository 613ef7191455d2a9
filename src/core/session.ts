import { chromium } from 'playwright';
import type { Browser, BrowserContext, Locator, Page } from 'playwright';
import { captureArtifacts } from '../utils/artifacts.js';
import { getLogger } from '../utils/logger.js';
import { DEFAULT_USER_AGENT } from '../utils/config.js';
import type { BrowserSession, SessionOptions } from './types.js';

export interface PlaywrightBrowserSession extends BrowserSession<Locator> {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

export async function createBrowserSession(
  options: SessionOptions = {}
): Promise<PlaywrightBrowserSession> {
  const headless = options.headless ?? true;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const navigationTimeoutMs = options.navigationTimeoutMs ?? 60000;
  const actionTimeoutMs = options.actionTimeoutMs ?? 10000;
  const logger = getLogger();

  let browser: Browser | null = null;
  let context: BrowserContext | null = null;
  let page: Page | null = null;
  let closed = false;

  const closeQuietly = async (label: string, fn: () => Promise<void>) => {
    try {
      await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Ignoring ${label} close failure: ${message}`);
    }
  };

  const close = async () => {
    if (closed) return;
    closed = true;

    const openPage = page;
    const openContext = context;
    const openBrowser = browser;

    if (openPage) {
      await closeQuietly('page', () => openPage.close());
    }
    if (openContext) {
      await closeQuietly('context', () => openContext.close());
    }
    if (openBrowser) {
      await closeQuietly('browser', () => openBrowser.close());
    }
  };

  try {
    browser = await chromium.launch({ headless });
    context = await browser.newContext({
      userAgent,
      viewport: { width: 1920, height: 1080 },
    });
    page = await context.newPage();
    page.setDefaultNavigationTimeout(navigationTimeoutMs);
    page.setDefaultTimeout(actionTimeoutMs);
  } catch (error) {
    await close();
    throw error;
  }

  if (!browser || !context || !page) {
    throw new Error('Failed to initialize Playwright page');
  }

  const activePage = page;

  return {
    browser,
    context,
    page: activePage,
    close,

    async navigate(url: string): Promise<void> {
      await activePage.goto(url, { waitUntil: 'domcontentloaded' });
    },

    async uploadFile(input: Locator, filePath: string): Promise<void> {
      await input.setInputFiles(filePath);
    },

    findElements(locator: string): Promise<Locator[]> {
      return activePage.locator(locator).all();
    },

    isVisible(handle: Locator): Promise<boolean> {
      return handle.isVisible();
    },

    readAttribute(handle: Locator, name: string): Promise<string | null> {
      return handle.getAttribute(name);
    },

    async click(handle: Locator): Promise<void> {
      await handle.click();
    },

    async scrollToBottom(): Promise<void> {
      await activePage.evaluate(() => {
        window.scrollTo(0, document.body.scrollHeight);
      });
    },

    currentScrollPosition(): Promise<number> {
      return activePage.evaluate(() => Math.round(window.scrollY));
    },

    currentUrl(): Promise<string> {
      return Promise.resolve(activePage.url());
    },

    captureArtifacts(outputDir: string, phase: string, runId: string) {
      return captureArtifacts(activePage, outputDir, phase, runId);
    },
  };
}
