import { promises as fs } from 'fs';
import { AuthenticationError, PorterError, SessionExpiredError, errorCategory } from '../errors';
import { log } from '../logger';
import { RetryPolicy, sleep as defaultSleep } from '../retry';
import { userSourceId } from '../identity';
import { assertSupportedLocale, type PageAdapter } from './page-navigator';
import { SESSION_SIGNALS } from './selectors';

export interface LaunchOptions {
  profileDir: string;
  headless: boolean;
}

export interface BrowserHandle {
  page: PageAdapter;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<BrowserHandle>;

export interface AccountIdentity {
  sourceId: string;
  displayName: string;
  email: string | null;
}

/** An acquired, signed-in browser session. Passed explicitly, never global */
export interface Session {
  readonly id: number;
  readonly browser: BrowserHandle;
  readonly page: PageAdapter;
  readonly account: AccountIdentity | null;
  readonly acquiredAt: Date;
}

export interface SessionManagerOptions {
  baseUrl: string;
  profileDir: string;
  headless: boolean;
  navigationTimeoutMs?: number;
  launcher: BrowserLauncher;
  /** Policy for reacquire(); attempts are bounded by its maxAttempts */
  retry?: RetryPolicy;
  /** Empty the site's browser storage once, before the first page is used */
  clearStorage?: boolean;
  /** How long `login()` waits for the user to sign in (default: 5 min) */
  loginTimeoutMs?: number;
  /** How long `ensureActive()` waits for the main navigation (default: 15s) */
  waitCeilingMs?: number;
  profileExists?: (dir: string) => Promise<boolean>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const DEFAULT_LOGIN_TIMEOUT = 5 * 60 * 1000;
const LOGIN_POLL_INTERVAL = 2000;
const DEFAULT_WAIT_CEILING = 15000;
const SIGNAL_POLL_INTERVAL = 250;
const MAX_SIGNAL_POLL_INTERVAL = 2000;

async function directoryExists(dir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

export function isSignInUrl(url: string): boolean {
  return SESSION_SIGNALS.signInUrl.test(url);
}

/**
 * Parse the account button label: "Google Account: Jane Doe (jane@example.com)"
 */
export function parseAccountLabel(label: string): AccountIdentity | null {
  const match = label.match(/^Google Account:\s*(.+?)\s*(?:\(([^)]+)\))?\s*$/);
  const name = match?.[1]?.trim();
  if (!name) return null;
  return {
    sourceId: userSourceId(name),
    displayName: name,
    email: match?.[2]?.trim() ?? null,
  };
}

export class SessionManager {
  private readonly options: SessionManagerOptions;
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private current: Session | null = null;
  private nextId = 1;
  private storageCleared = false;

  constructor(options: SessionManagerOptions) {
    this.options = options;
    this.retry = (options.retry ?? new RetryPolicy({ maxAttempts: 3, baseDelayMs: 2000, maxDelayMs: 30000 })).with({
      retryOn: error => {
        const category = errorCategory(error);
        return category === 'session' || category === 'transient';
      },
      scope: 'session',
    });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get session(): Session | null {
    return this.current;
  }

  /**
   * Launch the browser on the saved profile and verify the account is signed
   * in and the UI is in English.
   */
  async acquire(): Promise<Session> {
    if (this.current) return this.current;

    const exists = this.options.profileExists ?? directoryExists;
    if (!(await exists(this.options.profileDir))) {
      throw new AuthenticationError(
        `No browser profile at ${this.options.profileDir}: run "albumporter gphoto login" first`
      );
    }

    const browser = await this.options.launcher({
      profileDir: this.options.profileDir,
      headless: this.options.headless,
    });

    try {
      await this.open(browser.page, this.options.baseUrl);

      const url = browser.page.currentUrl();
      if (isSignInUrl(url)) {
        throw new AuthenticationError(`Not signed in (landed on ${url}): run "albumporter gphoto login"`);
      }
      await assertSupportedLocale(browser.page);

      const account = await this.readAccount(browser.page);
      const session: Session = {
        id: this.nextId++,
        browser,
        page: browser.page,
        account,
        acquiredAt: new Date(),
      };
      this.current = session;
      log.info('session', 'Session acquired', { session: session.id, account: account?.displayName ?? 'unknown' });
      return session;
    } catch (error) {
      await this.closeQuietly(browser);
      throw error;
    }
  }

  /**
   * Throws SessionExpiredError when the page shows the session is gone: at
   * once on a sign-in URL, or when the main navigation has not rendered
   * within the wait ceiling.
   */
  async ensureActive(session: Session): Promise<void> {
    const ceiling = this.options.waitCeilingMs ?? DEFAULT_WAIT_CEILING;
    const started = this.now();
    let interval = SIGNAL_POLL_INTERVAL;

    while (true) {
      const url = session.page.currentUrl();
      if (isSignInUrl(url)) {
        throw new SessionExpiredError(url, 'redirected to sign-in');
      }
      if (await session.page.exists(SESSION_SIGNALS.mainNavigation)) return;

      const elapsed = this.now() - started;
      if (elapsed >= ceiling) {
        throw new SessionExpiredError(url, 'main navigation missing');
      }
      await this.sleep(Math.min(interval, ceiling - elapsed));
      interval = Math.min(interval * 2, MAX_SIGNAL_POLL_INTERVAL);
    }
  }

  /**
   * Release the current session and acquire a new one, retrying session and
   * transient failures. Escalates to a fatal error once attempts run out.
   */
  async reacquire(): Promise<Session> {
    await this.release();
    try {
      return await this.retry.run(() => this.acquire(), 'session re-acquisition');
    } catch (error) {
      if (errorCategory(error) === 'fatal') throw error;
      throw new PorterError(
        `Could not re-acquire the browser session after ${this.retry.maxAttempts} attempt(s)`,
        'fatal',
        { cause: error }
      );
    }
  }

  async release(): Promise<void> {
    const session = this.current;
    if (!session) return;
    this.current = null;
    await this.closeQuietly(session.browser);
    log.debug('session', 'Session released', { session: session.id });
  }

  /** Acquire, run `fn`, and release on every exit path */
  async withSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    const session = await this.acquire();
    try {
      return await fn(session);
    } finally {
      await this.release();
    }
  }

  /**
   * Open a visible browser on the sign-in page and wait until the user has
   * signed in. The profile directory keeps the login for later runs.
   */
  async login(): Promise<AccountIdentity | null> {
    await fs.mkdir(this.options.profileDir, { recursive: true });
    const browser = await this.options.launcher({ profileDir: this.options.profileDir, headless: false });

    try {
      await this.open(browser.page, `${this.options.baseUrl}/login`);
      const timeout = this.options.loginTimeoutMs ?? DEFAULT_LOGIN_TIMEOUT;
      let waited = 0;

      log.info('session', 'Sign in to the account in the browser window', { timeoutSeconds: Math.round(timeout / 1000) });

      while (waited < timeout) {
        const url = browser.page.currentUrl();
        if (!isSignInUrl(url) && (await browser.page.exists(SESSION_SIGNALS.mainNavigation))) {
          await assertSupportedLocale(browser.page);
          const account = await this.readAccount(browser.page);
          log.info('session', 'Signed in', { account: account?.displayName ?? 'unknown' });
          return account;
        }
        await this.sleep(LOGIN_POLL_INTERVAL);
        waited += LOGIN_POLL_INTERVAL;
      }

      throw new AuthenticationError(`Sign-in not completed within ${Math.round(timeout / 1000)}s`);
    } finally {
      await this.closeQuietly(browser);
    }
  }

  private async open(page: PageAdapter, url: string): Promise<void> {
    const timeout = this.options.navigationTimeoutMs ?? 30000;
    await page.goto(url, timeout);
    if (this.options.clearStorage && !this.storageCleared) {
      await page.clearStorage();
      this.storageCleared = true;
      log.info('session', 'Cleared browser storage');
      await page.goto(url, timeout);
    }
  }

  private async readAccount(page: PageAdapter): Promise<AccountIdentity | null> {
    const labels = await page.readAll(SESSION_SIGNALS.accountButton, 'aria-label');
    for (const label of labels) {
      const account = parseAccountLabel(label);
      if (account) return account;
    }
    log.warn('session', 'Could not read the signed-in account; owned items will have no owner');
    return null;
  }

  private async closeQuietly(browser: BrowserHandle): Promise<void> {
    try {
      await browser.close();
    } catch (error) {
      log.warn('session', 'Failed to close browser', undefined, error);
    }
  }
}
