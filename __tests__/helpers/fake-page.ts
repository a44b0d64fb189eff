import type { ListingItem, PageAdapter } from '../../lib/scraper/page-navigator';
import type { ItemFieldSpec } from '../../lib/scraper/selectors';
import { SESSION_SIGNALS } from '../../lib/scraper/selectors';

/** Time that only moves when something sleeps */
export class FakeClock {
  t = 0;
  readonly sleeps: number[] = [];

  now = (): number => this.t;

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.t += ms;
  };
}

export interface FakeView {
  /** Selectors that match something, values aside */
  present?: string[];
  /** What readAll returns, keyed by selector */
  values?: Record<string, string[]>;
  /** Values that only render after a key press */
  revealed?: Record<string, string[]>;
  /** Listing batches keyed by item selector; each scroll renders one more batch */
  listings?: Record<string, ListingItem[][]>;
  /** Navigating here lands on this URL instead */
  redirectTo?: string;
}

/** In-memory PageAdapter: a map of URL to rendered view */
export class FakePage implements PageAdapter {
  readonly views = new Map<string, FakeView>();
  readonly visits: string[] = [];
  readonly pressed: string[] = [];
  readonly clicked: string[] = [];
  signedIn = true;
  accountLabel: string | null = null;
  language: string | null = 'en';
  /** Throws this from the next goto, then clears it */
  failNextGoto: Error | null = null;
  storageClears = 0;

  private url = 'about:blank';
  private scrolls = new Map<string, number>();
  private isRevealed = false;

  setView(url: string, view: FakeView): this {
    this.views.set(url, view);
    return this;
  }

  private get view(): FakeView {
    return this.views.get(this.url) ?? {};
  }

  async goto(url: string): Promise<void> {
    if (this.failNextGoto) {
      const error = this.failNextGoto;
      this.failNextGoto = null;
      throw error;
    }
    this.visits.push(url);
    this.url = this.views.get(url)?.redirectTo ?? url;
    this.scrolls = new Map();
    this.isRevealed = false;
  }

  currentUrl(): string {
    return this.url;
  }

  async exists(selector: string): Promise<boolean> {
    if (selector === SESSION_SIGNALS.mainNavigation) return this.signedIn;
    const view = this.view;
    return (
      (view.present ?? []).includes(selector) ||
      (view.values?.[selector]?.length ?? 0) > 0 ||
      (view.listings?.[selector]?.length ?? 0) > 0
    );
  }

  async readAll(selector: string): Promise<string[]> {
    if (selector === SESSION_SIGNALS.accountButton) {
      return this.accountLabel ? [this.accountLabel] : [];
    }
    const view = this.view;
    const shown = view.values?.[selector];
    if (shown) return shown;
    return (this.isRevealed ? view.revealed?.[selector] : undefined) ?? [];
  }

  async readItems(
    itemSelector: string,
    _keyAttribute: string,
    _fields: Record<string, ItemFieldSpec>
  ): Promise<ListingItem[]> {
    const batches = this.view.listings?.[itemSelector] ?? [];
    const rendered = Math.min(batches.length, (this.scrolls.get(itemSelector) ?? 0) + 1);
    return batches.slice(0, rendered).flat();
  }

  async scrollListing(itemSelector: string): Promise<void> {
    this.scrolls.set(itemSelector, (this.scrolls.get(itemSelector) ?? 0) + 1);
  }

  async press(key: string): Promise<void> {
    this.pressed.push(key);
    this.isRevealed = true;
  }

  async click(selector: string): Promise<void> {
    this.clicked.push(selector);
  }

  async documentLanguage(): Promise<string | null> {
    return this.language;
  }

  async clearStorage(): Promise<void> {
    this.storageClears++;
  }
}
