import { albumUnit, type LocalStore } from '../../lib/db/store';
import { SessionExpiredError } from '../../lib/errors';
import { ASSET_INFO } from '../../lib/scraper/selectors';
import type { FakePage } from '../helpers/fake-page';
import { createTestScraper } from '../helpers/scraper';
import { albumUrl, assetUrl, type SiteAlbum } from '../helpers/site';
import { openMemoryStore } from '../helpers/store';

const BIG: SiteAlbum = {
  id: 'big',
  title: 'Big',
  assets: [
    { id: 'a1', filename: 'IMG_0001.jpg' },
    { id: 'a2', filename: 'IMG_0002.jpg' },
    { id: 'a3', filename: 'IMG_0003.jpg' },
    { id: 'a4', filename: 'IMG_0004.jpg' },
  ],
};

const TRIP: SiteAlbum = {
  id: 'trip',
  title: 'Trip 2023',
  shared: true,
  gridLimit: 1,
  members: [
    { name: 'Alice Owner', profileId: 'p-alice', owner: true },
    { name: 'Bob Member', profileId: 'p-bob' },
  ],
  assets: [
    { id: 'x1', filename: 'IMG_0101.jpg', date: 'Jun 3, 2023', time: '10:15 AM', sharedBy: 'Bob Member', tags: ['beach'] },
    { id: 'v2', filename: 'VID_0102.mp4', date: 'Jun 4, 2023', video: true, tags: ['beach'] },
  ],
};

const HOME: SiteAlbum = { id: 'home', title: 'Home', assets: [{ id: 'h1', filename: 'IMG_0100.jpg' }] };

/** Takes a view off the site; the returned function puts it back */
function hideView(page: FakePage, url: string): () => void {
  const view = page.views.get(url);
  page.views.delete(url);
  return () => {
    if (view) page.setView(url, view);
  };
}

async function links(store: LocalStore, albumSourceId: string): Promise<string[]> {
  return (await store.query('album-asset', { albumSourceId })).map(link => link.assetSourceId);
}

async function snapshot(store: LocalStore) {
  return {
    users: await store.query('user'),
    albums: await store.query('album'),
    assets: await store.query('asset'),
    links: await store.query('album-asset'),
    tags: await store.query('tag', { includeDeleted: true }),
  };
}

describe('album export recovery', () => {
  let store: LocalStore;

  beforeEach(async () => {
    store = await openMemoryStore();
  });

  afterEach(async () => {
    await store.close();
  });

  it('follows next links past the grid and picks up where a failed asset stopped it', async () => {
    const { scraper, page } = createTestScraper(store, [{ ...BIG, gridLimit: 2 }]);
    await scraper.exportAlbums();
    const restore = hideView(page, assetUrl('big', 'a3'));

    const first = await scraper.exportPhotos();
    expect(first).toMatchObject({ completed: 0, incomplete: 1, failed: 0, assets: 2 });
    expect(await store.isCheckpointed(albumUnit('big'))).toBe(false);
    expect(await links(store, 'big')).toEqual(['a1', 'a2', 'a3']);

    restore();
    const second = await scraper.exportPhotos();
    expect(second).toMatchObject({ completed: 1, incomplete: 0, failed: 0, assets: 2 });
    expect(await store.isCheckpointed(albumUnit('big'))).toBe(true);
    expect(await links(store, 'big')).toEqual(['a1', 'a2', 'a3', 'a4']);
    expect((await store.query('asset')).map(asset => asset.sourceId)).toEqual(['a1', 'a2', 'a3', 'a4']);
  });

  it('skips an asset that never renders and finishes the rest of the album', async () => {
    const { scraper, page } = createTestScraper(store, [BIG]);
    await scraper.exportAlbums();
    const restore = hideView(page, assetUrl('big', 'a3'));

    const first = await scraper.exportPhotos();
    expect(first).toMatchObject({ completed: 0, incomplete: 1, failed: 0, assets: 3 });
    expect(page.visits).toContain(assetUrl('big', 'a4'));
    expect(await links(store, 'big')).toEqual(['a1', 'a2', 'a3', 'a4']);
    expect((await store.query('asset')).map(asset => asset.sourceId)).toEqual(['a1', 'a2', 'a4']);

    const errors = await store.listErrors({ runId: first.runId });
    expect(errors.map(e => `${e.operation} ${e.entityKind}:${e.entityId} ${e.category}`)).toEqual([
      'extract-asset asset:a3 transient',
    ]);

    restore();
    const second = await scraper.exportPhotos();
    expect(second).toMatchObject({ completed: 1, incomplete: 0, assets: 1 });
  });

  it('keeps an album whose next links end early, with a warning', async () => {
    const { scraper, page } = createTestScraper(store, [{ ...BIG, gridLimit: 1 }]);
    await scraper.exportAlbums();
    const view = page.views.get(assetUrl('big', 'a2'));
    if (view?.values) delete view.values[ASSET_INFO.fields.next?.selector ?? ''];

    const report = await scraper.exportPhotos();
    expect(report).toMatchObject({ completed: 1, incomplete: 0, assets: 2 });
    expect(report.warnings).toEqual([{
      category: 'structural',
      type: 'PorterError',
      count: 1,
      sample: 'Album "Big" lists 4 item(s) but only 2 were reachable',
    }]);
    expect(await store.isCheckpointed(albumUnit('big'))).toBe(true);
    expect(await links(store, 'big')).toEqual(['a1', 'a2']);
  });

  it('reads the media type of assets reached through next links', async () => {
    const { scraper } = createTestScraper(store, [TRIP]);
    await scraper.exportAlbums();
    await scraper.exportPhotos();

    expect(await links(store, 'trip')).toEqual(['x1', 'v2']);
    const assets = await store.query('asset');
    expect(assets.map(asset => [asset.sourceId, asset.mediaType])).toEqual([
      ['v2', 'video'],
      ['x1', 'photo'],
    ]);
  });

  it('re-acquires a session lost mid-run and redoes the album', async () => {
    const { scraper, page, launchCount } = createTestScraper(store, [HOME, BIG]);
    await scraper.exportAlbums();
    const launches = launchCount();

    scraper.on('album-started', (event: { albumSourceId: string }) => {
      if (event.albumSourceId === 'big') {
        page.failNextGoto = new SessionExpiredError(albumUrl('big'), 'signed out');
      }
    });
    const report = await scraper.exportPhotos();

    expect(report).toMatchObject({ status: 'completed', completed: 2, failed: 0, assets: 5 });
    expect(launchCount() - launches).toBe(2);
    expect(await store.isCheckpointed(albumUnit('big'))).toBe(true);
  });

  it('stops after the album in progress and resumes with the next one', async () => {
    const { scraper } = createTestScraper(store, [HOME, BIG]);
    await scraper.exportAlbums();

    scraper.once('album-completed', () => scraper.requestStop());
    const stopped = await scraper.exportPhotos();
    expect(stopped).toMatchObject({ status: 'stopped', completed: 1, assets: 1 });
    expect(await store.getRun(stopped.runId)).toMatchObject({ status: 'stopped', unitsCompleted: 1 });
    expect(await store.isCheckpointed(albumUnit('big'))).toBe(false);

    const resumed = await scraper.exportPhotos();
    expect(resumed).toMatchObject({ status: 'completed', completed: 1, skipped: 1, assets: 4 });
  });

  it('stores the same thing when everything is extracted again', async () => {
    const { scraper } = createTestScraper(store, [TRIP, { ...BIG, gridLimit: 2 }, HOME]);
    await scraper.exportAlbums();
    await scraper.exportPhotos();
    const first = await snapshot(store);

    await scraper.exportAlbums({ fresh: true });
    const again = await scraper.exportPhotos({ fresh: true, refreshAssets: true });

    expect(again).toMatchObject({ completed: 3, assets: 7 });
    expect(await snapshot(store)).toEqual(first);
  });
});
