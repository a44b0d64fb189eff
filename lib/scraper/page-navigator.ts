import { ExtractionSchemaError, ExtractionTimeout, LocaleUnsupportedError } from '../errors';
import { log } from '../logger';
import { sleep as defaultSleep } from '../retry';
import { SUPPORTED_LANGUAGE } from './selectors';
import type { ExtractSpec, FieldSpec, ItemFieldSpec, ListingSpec } from './selectors';

/**
 * DOM operations the navigator needs. Implemented over Playwright in
 * playwright-adapter.ts and by an in-memory page in tests.
 */
export interface PageAdapter {
  goto(url: string, timeoutMs: number): Promise<void>;
  currentUrl(): string;
  exists(selector: string): Promise<boolean>;
  /** Text (or attribute) of every visible match, in document order */
  readAll(selector: string, attribute?: string): Promise<string[]>;
  /** Items currently rendered for a listing, in document order */
  readItems(itemSelector: string, keyAttribute: string, fields: Record<string, ItemFieldSpec>): Promise<ListingItem[]>;
  /** Scroll so that the listing renders more items */
  scrollListing(itemSelector: string): Promise<void>;
  press(key: string): Promise<void>;
  click(selector: string): Promise<void>;
  documentLanguage(): Promise<string | null>;
  /** Empty local and session storage, IndexedDB and caches; cookies stay */
  clearStorage(): Promise<void>;
}

export interface ListingItem {
  key: string | null;
  fields: Record<string, string | null>;
}

export type FieldValue = string | string[] | null;
export type RawFields = Record<string, FieldValue>;

export type View = 'albums' | 'album' | 'sharing' | 'asset';

export interface ViewParams {
  /** Album page URL, for the album, sharing and asset views */
  albumUrl?: string;
  assetSourceId?: string;
  /** Navigate to this exact URL instead of building one */
  url?: string;
}

export interface NavigatorOptions {
  baseUrl: string;
  /** Timeout for a single navigation (default: 30s) */
  navigationTimeoutMs?: number;
  /** Longest time extract() polls before giving up (default: 15s) */
  waitCeilingMs?: number;
  /** Consecutive polls without new items that end a listing (default: 3) */
  stablePolls?: number;
  /** First poll interval, doubled after each miss (default: 100ms) */
  pollIntervalMs?: number;
  /** Poll interval cap (default: 2s) */
  maxPollIntervalMs?: number;
  /** Checked after every navigation and before a poll gives up; throws when the session is gone */
  guard?: (page: PageAdapter) => Promise<void>;
  /** Second view action, such as opening the sharing panel */
  sharingTrigger?: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const DEFAULT_NAVIGATION_TIMEOUT = 30000;
const DEFAULT_WAIT_CEILING = 15000;
const DEFAULT_STABLE_POLLS = 3;
const DEFAULT_POLL_INTERVAL = 100;
const DEFAULT_MAX_POLL_INTERVAL = 2000;

function isPresent(value: FieldValue): boolean {
  return value !== null && value.length > 0;
}

/** Fails when the UI is not in a language the selectors are written for */
export async function assertSupportedLocale(page: PageAdapter): Promise<void> {
  const language = await page.documentLanguage();
  if (language && !SUPPORTED_LANGUAGE.test(language)) {
    throw new LocaleUnsupportedError(language);
  }
}

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\.?\/+/, '')}`;
}

/**
 * Resolves views to URLs and turns rendered pages into raw field values.
 * Navigation is serialized: one page, one view at a time.
 */
export class PageNavigator {
  private readonly page: PageAdapter;
  private readonly baseUrl: string;
  private readonly navigationTimeoutMs: number;
  readonly waitCeilingMs: number;
  readonly stablePolls: number;
  private readonly pollIntervalMs: number;
  private readonly maxPollIntervalMs: number;
  private readonly guard?: (page: PageAdapter) => Promise<void>;
  private readonly sharingTrigger?: string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(page: PageAdapter, options: NavigatorOptions) {
    this.page = page;
    this.baseUrl = options.baseUrl;
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT;
    this.waitCeilingMs = options.waitCeilingMs ?? DEFAULT_WAIT_CEILING;
    this.stablePolls = Math.max(1, options.stablePolls ?? DEFAULT_STABLE_POLLS);
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL;
    this.maxPollIntervalMs = options.maxPollIntervalMs ?? DEFAULT_MAX_POLL_INTERVAL;
    this.guard = options.guard;
    this.sharingTrigger = options.sharingTrigger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  resolveUrl(view: View, params: ViewParams = {}): string {
    if (params.url) {
      return params.url.startsWith('http') ? params.url : joinUrl(this.baseUrl, params.url);
    }

    const albumUrl = params.albumUrl
      ? (params.albumUrl.startsWith('http') ? params.albumUrl : joinUrl(this.baseUrl, params.albumUrl))
      : null;

    switch (view) {
      case 'albums':
        return joinUrl(this.baseUrl, 'albums');
      case 'album':
      case 'sharing':
        if (!albumUrl) throw new Error(`View "${view}" needs an album URL`);
        return albumUrl;
      case 'asset':
        if (!params.assetSourceId) throw new Error('View "asset" needs an asset id');
        return albumUrl
          ? joinUrl(albumUrl.split('?')[0] ?? albumUrl, `photo/${params.assetSourceId}`)
          : joinUrl(this.baseUrl, `photo/${params.assetSourceId}`);
    }
  }

  async goto(view: View, params: ViewParams = {}): Promise<PageHandle> {
    const url = this.resolveUrl(view, params);
    log.debug('navigator', `Opening ${view}`, { url });

    await this.page.goto(url, this.navigationTimeoutMs);
    await this.checkSession();

    if (view === 'sharing' && this.sharingTrigger) {
      await this.page.click(this.sharingTrigger);
    }

    return new PageHandle(this, this.page, view, url);
  }

  private async checkSession(): Promise<void> {
    if (this.guard) {
      await this.guard(this.page);
    }
  }

  checkLocale(): Promise<void> {
    return assertSupportedLocale(this.page);
  }

  /** @internal polling shared by PageHandle */
  async pollFields(spec: ExtractSpec): Promise<RawFields> {
    const started = this.now();
    let interval = this.pollIntervalMs;
    let revealed = false;

    while (true) {
      const values = await this.readFields(spec.fields);
      const missing = Object.entries(spec.fields)
        .filter(([name, field]) => field.required && !isPresent(values[name] ?? null))
        .map(([name]) => name);

      if (missing.length === 0) {
        const optionalMisses = Object.keys(spec.fields).filter(name => !isPresent(values[name] ?? null));
        if (optionalMisses.length > 0) {
          log.debug('navigator', `Optional fields absent on ${spec.name}`, { fields: optionalMisses });
        }
        return values;
      }

      if (spec.revealKey && !revealed) {
        await this.page.press(spec.revealKey);
        revealed = true;
      }

      const elapsed = this.now() - started;
      if (elapsed >= this.waitCeilingMs) {
        // A view that never fills in may be a lost session
        await this.checkSession();
        if (await this.page.exists(spec.root)) {
          throw new ExtractionSchemaError(spec.name, missing);
        }
        throw new ExtractionTimeout(spec.name, elapsed, missing);
      }

      await this.sleep(Math.min(interval, this.waitCeilingMs - elapsed));
      interval = Math.min(interval * 2, this.maxPollIntervalMs);
    }
  }

  private async readFields(fields: Record<string, FieldSpec>): Promise<RawFields> {
    const values: RawFields = {};
    for (const [name, field] of Object.entries(fields)) {
      const matches = await this.page.readAll(field.selector, field.attribute);
      if (field.all) {
        values[name] = matches;
      } else {
        if (matches.length > 1) {
          log.debug('navigator', `Several visible matches for ${name}, using the first`, { count: matches.length });
        }
        values[name] = matches[0] ?? null;
      }
    }
    return values;
  }

  /** @internal */
  async pollListing(spec: ListingSpec): Promise<ListingItem[]> {
    const started = this.now();
    const seen = new Map<string, ListingItem>();
    let stable = 0;

    while (true) {
      const items = await this.page.readItems(spec.item, spec.keyAttribute, spec.fields);
      let added = 0;
      for (const item of items) {
        const key = item.key ?? JSON.stringify(item.fields);
        if (!seen.has(key)) {
          seen.set(key, item);
          added++;
        }
      }

      if (seen.size === 0) {
        const elapsed = this.now() - started;
        if (elapsed >= this.waitCeilingMs) {
          await this.checkSession();
          // A rendered view without items is an empty listing
          if (await this.page.exists(spec.root)) return [];
          throw new ExtractionTimeout(spec.name, elapsed, [spec.item]);
        }
        await this.sleep(this.pollIntervalMs);
        continue;
      }

      stable = added === 0 ? stable + 1 : 0;
      if (stable >= this.stablePolls) {
        log.debug('navigator', `Listing ${spec.name} settled`, { items: seen.size });
        return [...seen.values()];
      }

      await this.page.scrollListing(spec.item);
      await this.sleep(this.pollIntervalMs);
    }
  }
}

export class PageHandle {
  readonly view: View;
  readonly url: string;
  private readonly navigator: PageNavigator;
  private readonly page: PageAdapter;

  constructor(navigator: PageNavigator, page: PageAdapter, view: View, url: string) {
    this.navigator = navigator;
    this.page = page;
    this.view = view;
    this.url = url;
  }

  /**
   * Poll until every required field of `spec` is present.
   *
   * Throws ExtractionTimeout when the view never renders within the wait
   * ceiling, and ExtractionSchemaError when it renders without a required
   * field. Missing optional fields come back as null.
   */
  extract(spec: ExtractSpec): Promise<RawFields> {
    return this.navigator.pollFields(spec);
  }

  /** Scroll a listing until it stops growing, keeping first-seen order */
  extractListing(spec: ListingSpec): Promise<ListingItem[]> {
    return this.navigator.pollListing(spec);
  }

  currentUrl(): string {
    return this.page.currentUrl();
  }
}
