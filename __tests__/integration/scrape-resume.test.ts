import { albumUnit, type LocalStore } from '../../lib/db/store';
import { ConfigError } from '../../lib/errors';
import { createTestScraper } from '../helpers/scraper';
import type { SiteAlbum } from '../helpers/site';
import { openMemoryStore } from '../helpers/store';

const TRIP: SiteAlbum = {
  id: 'trip',
  title: 'Trip 2023',
  shared: true,
  members: [
    { name: 'Alice Owner', profileId: 'p-alice', owner: true },
    { name: 'Bob Member', profileId: 'p-bob' },
  ],
  assets: [
    { id: 'x1', filename: 'IMG_0001.jpg', date: 'Jun 3, 2023', time: '10:15 AM', sharedBy: 'Bob Member' },
    { id: 'v1', filename: 'VID_0002.mp4', date: 'Jun 4, 2023', video: true },
  ],
};

const HOME: SiteAlbum = { id: 'home', title: 'Home', assets: [{ id: 'h1', filename: 'IMG_0100.jpg' }] };

describe('album export with checkpoints', () => {
  let store: LocalStore;

  beforeEach(async () => {
    store = await openMemoryStore();
  });

  afterEach(async () => {
    await store.close();
  });

  it('exports the album list once', async () => {
    const { scraper, page } = createTestScraper(store, [TRIP, HOME]);

    const first = await scraper.exportAlbums();
    const again = await scraper.exportAlbums();

    expect(first).toMatchObject({ kind: 'albums', status: 'completed', completed: 1, skipped: 0 });
    expect(again).toMatchObject({ completed: 0, skipped: 1 });
    expect((await store.query('album')).map(album => album.title)).toEqual(['Trip 2023', 'Home']);
    expect(page.visits.filter(url => url.endsWith('/albums'))).toHaveLength(1);
  });

  it('resumes at the first album without a checkpoint', async () => {
    const { scraper } = createTestScraper(store, [TRIP, HOME]);
    await scraper.exportAlbums();

    const completed: string[] = [];
    const skipped: string[] = [];
    scraper.on('album-completed', (event: { albumSourceId: string }) => completed.push(event.albumSourceId));
    scraper.on('album-skipped', (event: { albumSourceId: string }) => skipped.push(event.albumSourceId));

    const first = await scraper.exportPhotos({ maxAlbums: 1 });
    expect(first).toMatchObject({ kind: 'photos', status: 'completed', completed: 1, skipped: 0, failed: 0, assets: 2 });
    expect(await store.isCheckpointed(albumUnit('trip'))).toBe(true);
    expect(await store.isCheckpointed(albumUnit('home'))).toBe(false);

    const second = await scraper.exportPhotos();
    expect(second).toMatchObject({ completed: 1, skipped: 1, failed: 0, assets: 1 });
    expect(completed).toEqual(['trip', 'home']);
    expect(skipped).toEqual(['trip']);

    const run = await store.getRun(second.runId);
    expect(run).toMatchObject({ kind: 'photos', status: 'completed', unitsCompleted: 1, unitsFailed: 0 });
  });

  it('stores what the album pages show', async () => {
    const { scraper } = createTestScraper(store, [TRIP]);
    await scraper.exportAlbums();
    await scraper.exportPhotos();

    const [trip] = await store.query('album');
    expect(trip).toMatchObject({ ownerSourceId: 'name:alice owner', storedItems: 2 });
    expect((await store.query('album-asset', { albumSourceId: 'trip' })).map(link => link.assetSourceId)).toEqual(['x1', 'v1']);

    const assets = await store.query('asset');
    expect(assets.map(asset => [asset.sourceId, asset.mediaType, asset.takenAt, asset.ownerSourceId])).toEqual([
      ['v1', 'video', '2023-06-04', 'name:alice owner'],
      ['x1', 'photo', '2023-06-03T10:15:00', 'p-bob'],
    ]);
  });

  it('extracts every album again when fresh', async () => {
    const { scraper } = createTestScraper(store, [HOME]);
    await scraper.exportAlbums();
    await scraper.exportPhotos();

    const fresh = await scraper.exportPhotos({ fresh: true });
    expect(fresh).toMatchObject({ completed: 1, skipped: 0, assets: 0 });

    const refreshed = await scraper.exportPhotos({ fresh: true, refreshAssets: true });
    expect(refreshed).toMatchObject({ completed: 1, assets: 1 });
  });

  it('starts at the album named by id or title', async () => {
    const { scraper } = createTestScraper(store, [TRIP, HOME]);
    await scraper.exportAlbums();

    const report = await scraper.exportPhotos({ startAlbum: 'home' });
    expect(report).toMatchObject({ completed: 1, skipped: 0, assets: 1 });
    expect(await store.isCheckpointed(albumUnit('trip'))).toBe(false);

    await expect(scraper.exportPhotos({ startAlbum: 'trip 2023' })).resolves.toMatchObject({ completed: 1, skipped: 1 });
    await expect(scraper.exportPhotos({ startAlbum: 'Elsewhere' })).rejects.toBeInstanceOf(ConfigError);
  });
});
