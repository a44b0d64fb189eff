import { ExtractionSchemaError, ExtractionTimeout, LocaleUnsupportedError, SessionExpiredError } from '../../lib/errors';
import { PageNavigator, type PageAdapter } from '../../lib/scraper/page-navigator';
import { ALBUM_ASSETS, ASSET_INFO, SHARING_TRIGGER } from '../../lib/scraper/selectors';
import { FakeClock, FakePage } from '../helpers/fake-page';

const BASE = 'https://photos.example.test';
const ASSET_URL = `${BASE}/album/a1/photo/x1`;
const FILENAME = ASSET_INFO.fields.filename?.selector ?? '';

function setup(options: { stablePolls?: number; guard?: (page: PageAdapter) => Promise<void> } = {}) {
  const page = new FakePage();
  const clock = new FakeClock();
  const navigator = new PageNavigator(page, {
    baseUrl: BASE,
    guard: options.guard,
    waitCeilingMs: 1000,
    pollIntervalMs: 100,
    maxPollIntervalMs: 400,
    stablePolls: options.stablePolls ?? 2,
    sharingTrigger: SHARING_TRIGGER,
    sleep: clock.sleep,
    now: clock.now,
  });
  return { page, clock, navigator };
}

function photo(id: string) {
  return { key: `./album/a1/photo/${id}`, fields: { label: `Photo - ${id}` } };
}

describe('PageNavigator', () => {
  describe('resolveUrl', () => {
    const { navigator } = setup();

    it('builds view URLs', () => {
      expect(navigator.resolveUrl('albums')).toBe(`${BASE}/albums`);
      expect(navigator.resolveUrl('album', { albumUrl: './album/a1' })).toBe(`${BASE}/album/a1`);
      expect(navigator.resolveUrl('asset', { albumUrl: `${BASE}/album/a1?key=k`, assetSourceId: 'x1' }))
        .toBe(`${BASE}/album/a1/photo/x1`);
      expect(navigator.resolveUrl('asset', { url: `${BASE}/album/a1/photo/x2` })).toBe(`${BASE}/album/a1/photo/x2`);
    });

    it('needs an album URL for album views', () => {
      expect(() => navigator.resolveUrl('sharing')).toThrow('needs an album URL');
    });
  });

  describe('extract', () => {
    it('returns fields once required ones render', async () => {
      const { page, navigator, clock } = setup();
      page.setView(ASSET_URL, { values: { [FILENAME]: ['IMG_0001.jpg'] } });

      const handle = await navigator.goto('asset', { url: ASSET_URL });
      const fields = await handle.extract(ASSET_INFO);

      expect(fields.filename).toBe('IMG_0001.jpg');
      expect(fields.date).toBeNull();
      expect(fields.tags).toEqual([]);
      expect(clock.sleeps).toEqual([]);
    });

    it('presses the reveal key when fields are hidden', async () => {
      const { page, navigator, clock } = setup();
      page.setView(ASSET_URL, { revealed: { [FILENAME]: ['IMG_0001.jpg'] } });

      const handle = await navigator.goto('asset', { url: ASSET_URL });
      const fields = await handle.extract(ASSET_INFO);

      expect(fields.filename).toBe('IMG_0001.jpg');
      expect(page.pressed).toEqual(['i']);
      expect(clock.sleeps).toEqual([100]);
    });

    it('times out with backoff when the view never renders', async () => {
      const { page, navigator, clock } = setup();

      const handle = await navigator.goto('asset', { url: ASSET_URL });
      const error = await handle.extract(ASSET_INFO).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExtractionTimeout);
      expect(clock.sleeps).toEqual([100, 200, 400, 300]);
      expect(page.pressed).toEqual(['i']);
    });

    it('reports a schema error when the view renders without a required field', async () => {
      const { page, navigator } = setup();
      page.setView(ASSET_URL, { present: [ASSET_INFO.root] });

      const handle = await navigator.goto('asset', { url: ASSET_URL });
      const error = await handle.extract(ASSET_INFO).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExtractionSchemaError);
      expect(error instanceof ExtractionSchemaError ? error.fields : []).toEqual(['filename']);
    });

    it('reports a session lost while polling as expired', async () => {
      const guard = vi.fn(async (current: PageAdapter) => {
        const url = current.currentUrl();
        if (url.includes('ServiceLogin')) throw new SessionExpiredError(url, 'redirected to sign-in');
      });
      const { page, navigator } = setup({ guard });

      const handle = await navigator.goto('asset', { url: ASSET_URL });
      await page.goto('https://accounts.example.test/ServiceLogin');
      const error = await handle.extract(ASSET_INFO).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SessionExpiredError);
      expect(guard).toHaveBeenCalledTimes(2);
    });
  });

  describe('extractListing', () => {
    it('scrolls until the listing stops growing', async () => {
      const { page, navigator } = setup({ stablePolls: 2 });
      page.setView(`${BASE}/album/a1`, {
        listings: { [ALBUM_ASSETS.item]: [[photo('x1'), photo('x2')], [photo('x2'), photo('x3')]] },
      });

      const handle = await navigator.goto('album', { albumUrl: `${BASE}/album/a1` });
      const items = await handle.extractListing(ALBUM_ASSETS);

      expect(items.map(item => item.key)).toEqual([
        './album/a1/photo/x1',
        './album/a1/photo/x2',
        './album/a1/photo/x3',
      ]);
    });

    it('treats a rendered view without items as empty', async () => {
      const { page, navigator, clock } = setup();
      page.setView(`${BASE}/album/a1`, { present: [ALBUM_ASSETS.root] });

      const handle = await navigator.goto('album', { albumUrl: `${BASE}/album/a1` });
      await expect(handle.extractListing(ALBUM_ASSETS)).resolves.toEqual([]);
      expect(clock.t).toBe(1000);
    });

    it('times out when nothing renders', async () => {
      const guard = vi.fn(async () => undefined);
      const { navigator } = setup({ guard });

      const handle = await navigator.goto('album', { albumUrl: `${BASE}/album/a1` });
      await expect(handle.extractListing(ALBUM_ASSETS)).rejects.toBeInstanceOf(ExtractionTimeout);
      expect(guard).toHaveBeenCalledTimes(2);
    });
  });

  describe('goto', () => {
    it('opens the sharing panel for the sharing view', async () => {
      const { page, navigator } = setup();

      await navigator.goto('sharing', { albumUrl: `${BASE}/album/a1` });
      expect(page.visits).toEqual([`${BASE}/album/a1`]);
      expect(page.clicked).toEqual([SHARING_TRIGGER]);
    });

    it('runs the guard after every navigation', async () => {
      const page = new FakePage();
      const guard = vi.fn(async () => undefined);
      const navigator = new PageNavigator(page, { baseUrl: BASE, guard });

      await navigator.goto('albums');
      await navigator.goto('album', { albumUrl: './album/a1' });
      expect(guard).toHaveBeenCalledTimes(2);
    });

    it('rejects a UI in another language', async () => {
      const { page, navigator } = setup();
      page.language = 'de-DE';

      await expect(navigator.checkLocale()).rejects.toBeInstanceOf(LocaleUnsupportedError);
    });
  });
});
