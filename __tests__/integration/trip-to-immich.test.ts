import type { LocalStore } from '../../lib/db/store';
import { Reconciler } from '../../lib/sync/reconciler';
import { FakeDestination } from '../helpers/fake-destination';
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
    {
      id: 'x1',
      filename: 'IMG_0001.jpg',
      date: 'Jun 3, 2023',
      time: '10:15 AM',
      sharedBy: 'Bob Member',
      tags: ['vacation'],
    },
  ],
};

describe('shared album from the source library to the destination', () => {
  let store: LocalStore;
  let destination: FakeDestination;
  let reconciler: Reconciler;

  beforeEach(async () => {
    store = await openMemoryStore();
    destination = new FakeDestination();
    destination.seedAsset({ originalFileName: 'IMG_0001.jpg', takenAt: '2023-06-03T10:15:00.000Z' });
    reconciler = new Reconciler({
      store,
      destination,
      emailDomain: 'example.invalid',
      defaultPassword: 'test-secret',
    });

    const { scraper } = createTestScraper(store, [TRIP]);
    await scraper.exportAlbums();
    await scraper.exportPhotos();
  });

  afterEach(async () => {
    await store.close();
  });

  it('recreates owner, members, contents and tags', async () => {
    const plan = await reconciler.plan();
    expect(plan.mutations.map(m => m.id)).toEqual([
      'create-user:name:alice owner',
      'create-user:p-bob',
      'create-album:trip',
      'add-album-members:trip',
      'reassign-asset-owner:x1',
      'add-album-assets:trip',
      'create-tag:vacation',
      'set-tag-assets:vacation',
    ]);

    const result = await reconciler.apply(plan);
    expect(result).toMatchObject({ applied: 8, failed: [], blocked: [], stopped: false });

    const users = [...destination.users.values()].map(user => `${user.name} <${user.email}>`);
    expect(users).toEqual([
      'Admin <admin@example.test>',
      'Alice Owner <alice@example.com>',
      'Bob Member <bob.member@example.invalid>',
    ]);

    const alice = await store.getMapping('user', 'name:alice owner');
    const bob = await store.getMapping('user', 'p-bob');
    const asset = await store.getMapping('asset', 'x1');
    const album = await destination.getAlbum((await store.getMapping('album', 'trip')) ?? '');
    expect(album).toMatchObject({ albumName: 'Trip 2023', ownerId: alice, memberIds: [bob], assetIds: [asset] });

    const tag = await store.getMapping('tag', 'vacation');
    expect(await destination.getTagAssets(tag ?? '')).toEqual([asset]);
  });

  it('has nothing left to do after an apply', async () => {
    await reconciler.apply(await reconciler.plan());
    const calls = destination.calls.length;

    const again = await reconciler.plan();
    expect(again.mutations).toEqual([]);
    expect((await reconciler.apply(again)).applied).toBe(0);
    expect(destination.calls).toHaveLength(calls);
  });
});
