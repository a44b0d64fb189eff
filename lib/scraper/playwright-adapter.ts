import { chromium, errors, type BrowserContext, type Locator, type Page } from 'playwright';
import { ExtractionTimeout, StaleElementError } from '../errors';
import { log } from '../logger';
import type { ListingItem, PageAdapter } from './page-navigator';
import type { ItemFieldSpec } from './selectors';
import type { BrowserHandle, LaunchOptions } from './session-manager';

const STEALTH_ARGS = [
  '--disable-features=IsolateOrigins,site-per-process',
  '--disable-blink-features=AutomationControlled',
  '--disable-infobars',
  '--disable-extensions',
  '--disable-session-crashed-bubble',
  '--disable-restore-session-state',
];

const STEALTH_INIT_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
window.chrome = window.chrome || { runtime: {} };
`;

const STALE_PATTERNS = [
  'not attached to the dom',
  'execution context was destroyed',
  'element is not attached',
  'frame was detached',
];

function isStale(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return STALE_PATTERNS.some(pattern => message.includes(pattern));
}

/** Playwright timeouts and detached elements as the scraper's error types */
export function translatePlaywrightError(error: unknown, what: string, timeoutMs = 0): unknown {
  if (error instanceof errors.TimeoutError) {
    return new ExtractionTimeout(what, timeoutMs);
  }
  if (isStale(error)) {
    return new StaleElementError(`${what}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }
  return error;
}

async function readLocator(locator: Locator, attribute?: string): Promise<string | null> {
  if (attribute) {
    return locator.getAttribute(attribute);
  }
  return (await locator.innerText()).trim();
}

/** PageAdapter over a live Playwright page */
export class PlaywrightPageAdapter implements PageAdapter {
  private readonly page: Page;

  constructor(page: Page) {
    this.page = page;
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
    } catch (error) {
      throw translatePlaywrightError(error, `navigation to ${url}`, timeoutMs);
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async exists(selector: string): Promise<boolean> {
    try {
      return (await this.page.locator(selector).count()) > 0;
    } catch (error) {
      throw translatePlaywrightError(error, selector);
    }
  }

  async readAll(selector: string, attribute?: string): Promise<string[]> {
    try {
      const values: string[] = [];
      for (const locator of await this.page.locator(selector).all()) {
        if (!(await locator.isVisible())) continue;
        const value = await readLocator(locator, attribute);
        if (value !== null) values.push(value);
      }
      return values;
    } catch (error) {
      throw translatePlaywrightError(error, selector);
    }
  }

  async readItems(
    itemSelector: string,
    keyAttribute: string,
    fields: Record<string, ItemFieldSpec>
  ): Promise<ListingItem[]> {
    try {
      return await this.page.$$eval(
        itemSelector,
        (elements, args) => {
          const read = (el: Element | null, attribute?: string): string | null => {
            if (!el) return null;
            if (attribute) return el.getAttribute(attribute);
            const text = el instanceof HTMLElement ? el.innerText : el.textContent;
            return text === null ? null : text.trim();
          };
          return elements.map(el => {
            const values: Record<string, string | null> = {};
            for (const [name, field] of Object.entries(args.fields)) {
              const target = field.selector ? el.querySelector(field.selector) : el;
              values[name] = read(target, field.attribute);
            }
            return { key: el.getAttribute(args.keyAttribute), fields: values };
          });
        },
        { keyAttribute, fields }
      );
    } catch (error) {
      throw translatePlaywrightError(error, itemSelector);
    }
  }

  async scrollListing(itemSelector: string): Promise<void> {
    try {
      await this.page.evaluate((selector) => {
        const items = document.querySelectorAll(selector);
        const last = items.item(items.length - 1);
        if (last) {
          last.scrollIntoView({ block: 'end' });
        }
        window.scrollBy(0, window.innerHeight);
      }, itemSelector);
    } catch (error) {
      throw translatePlaywrightError(error, `scroll ${itemSelector}`);
    }
  }

  async press(key: string): Promise<void> {
    try {
      await this.page.keyboard.press(key);
    } catch (error) {
      throw translatePlaywrightError(error, `press ${key}`);
    }
  }

  async click(selector: string): Promise<void> {
    try {
      await this.page.locator(selector).first().click({ timeout: 5000 });
    } catch (error) {
      throw translatePlaywrightError(error, `click ${selector}`, 5000);
    }
  }

  async documentLanguage(): Promise<string | null> {
    try {
      const lang = await this.page.evaluate(() => document.documentElement.lang);
      return lang.length > 0 ? lang : null;
    } catch (error) {
      throw translatePlaywrightError(error, 'document language');
    }
  }

  async clearStorage(): Promise<void> {
    try {
      await this.page.evaluate(async () => {
        window.localStorage.clear();
        window.sessionStorage.clear();
        const databases = await window.indexedDB.databases();
        for (const database of databases) {
          if (database.name) window.indexedDB.deleteDatabase(database.name);
        }
        for (const name of await window.caches.keys()) {
          await window.caches.delete(name);
        }
      });
    } catch (error) {
      throw translatePlaywrightError(error, 'clear storage');
    }
  }
}

/**
 * Launch Chromium on a persistent profile directory, so a login done once
 * with `gphoto login` is reused by later runs.
 */
export async function launchPersistentBrowser(options: LaunchOptions): Promise<BrowserHandle> {
  log.debug('session', 'Launching browser', { profileDir: options.profileDir, headless: options.headless });

  const context: BrowserContext = await chromium.launchPersistentContext(options.profileDir, {
    headless: options.headless,
    args: STEALTH_ARGS,
    ignoreDefaultArgs: ['--enable-automation'],
    viewport: { width: 1280, height: 720 },
    locale: 'en-US',
  });

  const page = context.pages()[0] ?? await context.newPage();
  await page.addInitScript(STEALTH_INIT_SCRIPT);

  return {
    page: new PlaywrightPageAdapter(page),
    close: () => context.close(),
  };
}
