import type { LocalStore } from '../../lib/db/store';
import { RetryPolicy } from '../../lib/retry';
import { GPhotosScraper } from '../../lib/scraper/gphotos-scraper';
import { SessionManager } from '../../lib/scraper/session-manager';
import { FakeClock } from './fake-page';
import { BASE, buildSite, type SiteAlbum } from './site';

export const ACCOUNT_LABEL = 'Google Account: Alice Owner (alice@example.com)';

/** A scraper over a fake site, signed in as Alice Owner */
export function createTestScraper(store: LocalStore, albums: SiteAlbum[]) {
  const clock = new FakeClock();
  const page = buildSite(albums);
  page.accountLabel = ACCOUNT_LABEL;
  let launches = 0;

  const sessions = new SessionManager({
    baseUrl: BASE,
    profileDir: '/tmp/profile-test',
    headless: true,
    launcher: async () => {
      launches++;
      return { page, close: async () => undefined };
    },
    profileExists: async () => true,
    waitCeilingMs: 1000,
    sleep: clock.sleep,
    now: clock.now,
    retry: new RetryPolicy({ maxAttempts: 1, sleep: clock.sleep }),
  });

  const scraper = new GPhotosScraper({
    store,
    sessions,
    baseUrl: BASE,
    stablePolls: 1,
    waitCeilingMs: 1000,
    retry: new RetryPolicy({ maxAttempts: 1, sleep: clock.sleep }),
    sleep: clock.sleep,
    now: clock.now,
  });

  return { scraper, page, clock, launchCount: () => launches };
}
