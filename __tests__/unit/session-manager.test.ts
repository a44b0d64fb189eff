import { AuthenticationError, LocaleUnsupportedError, PorterError, SessionExpiredError } from '../../lib/errors';
import { RetryPolicy } from '../../lib/retry';
import {
  SessionManager,
  parseAccountLabel,
  type BrowserHandle,
  type LaunchOptions,
  type SessionManagerOptions,
} from '../../lib/scraper/session-manager';
import { FakeClock, FakePage } from '../helpers/fake-page';

const BASE = 'https://photos.example.test';

function setup(
  configure: (page: FakePage, launch: number) => void = () => undefined,
  options: Partial<SessionManagerOptions> = {}
) {
  const clock = new FakeClock();
  const launches: LaunchOptions[] = [];
  const pages: FakePage[] = [];
  let closed = 0;

  const launcher = async (options: LaunchOptions): Promise<BrowserHandle> => {
    launches.push(options);
    const page = new FakePage();
    page.accountLabel = 'Google Account: Alice Owner (alice@example.com)';
    configure(page, launches.length);
    pages.push(page);
    return {
      page,
      close: async () => {
        closed++;
      },
    };
  };

  const sessions = new SessionManager({
    baseUrl: BASE,
    profileDir: '/tmp/profile-test',
    headless: true,
    launcher,
    profileExists: async () => true,
    retry: new RetryPolicy({ maxAttempts: 2, sleep: async () => undefined }),
    waitCeilingMs: 1000,
    sleep: clock.sleep,
    now: clock.now,
    ...options,
  });

  return { sessions, clock, launches, pages, closedCount: () => closed };
}

describe('parseAccountLabel', () => {
  it('reads name and email from the account button', () => {
    expect(parseAccountLabel('Google Account: Alice Owner (alice@example.com)')).toEqual({
      sourceId: 'name:alice owner',
      displayName: 'Alice Owner',
      email: 'alice@example.com',
    });
    expect(parseAccountLabel('Google Account: Jane Doe')?.email).toBeNull();
    expect(parseAccountLabel('Settings')).toBeNull();
  });
});

describe('SessionManager', () => {
  it('acquires a signed-in session once', async () => {
    const { sessions, launches, pages } = setup();

    const session = await sessions.acquire();
    expect(await sessions.acquire()).toBe(session);

    expect(launches).toEqual([{ profileDir: '/tmp/profile-test', headless: true }]);
    expect(pages[0]?.visits).toEqual([BASE]);
    expect(session.account?.sourceId).toBe('name:alice owner');
    expect(session.id).toBe(1);
  });

  it('needs a browser profile', async () => {
    const launcher = vi.fn();
    const sessions = new SessionManager({
      baseUrl: BASE,
      profileDir: '/tmp/missing',
      headless: true,
      launcher,
      profileExists: async () => false,
    });

    await expect(sessions.acquire()).rejects.toBeInstanceOf(AuthenticationError);
    expect(launcher).not.toHaveBeenCalled();
  });

  it('closes the browser when the account is signed out', async () => {
    const { sessions, closedCount } = setup(page => {
      page.setView(BASE, { redirectTo: 'https://accounts.example.test/ServiceLogin' });
    });

    await expect(sessions.acquire()).rejects.toBeInstanceOf(AuthenticationError);
    expect(closedCount()).toBe(1);
    expect(sessions.session).toBeNull();
  });

  it('rejects a UI in another language', async () => {
    const { sessions } = setup(page => {
      page.language = 'fr-FR';
    });

    await expect(sessions.acquire()).rejects.toBeInstanceOf(LocaleUnsupportedError);
  });

  it('detects an expired session once the wait ceiling passes', async () => {
    const { sessions, clock, pages } = setup();
    const session = await sessions.acquire();

    await expect(sessions.ensureActive(session)).resolves.toBeUndefined();
    expect(clock.sleeps).toEqual([]);

    const page = pages[0];
    if (page) page.signedIn = false;
    await expect(sessions.ensureActive(session)).rejects.toBeInstanceOf(SessionExpiredError);
    expect(clock.sleeps).toEqual([250, 500, 250]);
  });

  it('waits for the navigation to render before deciding', async () => {
    const { sessions, clock, pages } = setup();
    const session = await sessions.acquire();
    const page = pages[0];
    if (page) page.signedIn = false;

    const check = sessions.ensureActive(session);
    clock.sleeps.length = 0;
    if (page) page.signedIn = true;

    await expect(check).resolves.toBeUndefined();
    expect(clock.sleeps).toEqual([250]);
  });

  it('fails at once on a sign-in redirect', async () => {
    const { sessions, clock, pages } = setup();
    const session = await sessions.acquire();
    await pages[0]?.goto('https://accounts.example.test/ServiceLogin');

    await expect(sessions.ensureActive(session)).rejects.toThrow(/redirected to sign-in/);
    expect(clock.sleeps).toEqual([]);
  });

  it('clears browser storage before the first session only', async () => {
    const { sessions, pages } = setup(undefined, { clearStorage: true });

    await sessions.acquire();
    await sessions.reacquire();

    expect(pages.map(page => page.storageClears)).toEqual([1, 0]);
    expect(pages[0]?.visits).toEqual([BASE, BASE]);
    expect(pages[1]?.visits).toEqual([BASE]);
  });

  it('re-acquires a fresh session', async () => {
    const { sessions, closedCount } = setup();
    await sessions.acquire();

    const next = await sessions.reacquire();
    expect(next.id).toBe(2);
    expect(closedCount()).toBe(1);
  });

  it('escalates to fatal when re-acquisition keeps failing', async () => {
    const { sessions, launches } = setup((page, launch) => {
      if (launch > 1) page.setView(BASE, { redirectTo: 'https://accounts.example.test/signin' });
    });
    await sessions.acquire();

    const error = await sessions.reacquire().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PorterError);
    expect(error instanceof PorterError ? error.category : null).toBe('fatal');
    expect(launches).toHaveLength(3);
  });

  it('releases the session after withSession', async () => {
    const { sessions, closedCount } = setup();

    await expect(sessions.withSession(async session => session.id)).resolves.toBe(1);
    expect(sessions.session).toBeNull();
    expect(closedCount()).toBe(1);
  });
});
