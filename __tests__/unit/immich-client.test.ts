import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { DestinationApiError } from '../../lib/errors';
import { ImmichClient, classifyStatus, parseRetryAfter } from '../../lib/immich/client';
import { RetryPolicy } from '../../lib/retry';

interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  body: unknown;
  apiKey: unknown;
}

interface Reply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
  /** Fail without a response, like a dropped connection */
  network?: boolean;
}

/** axios adapter answering from a queue of replies */
function stubServer(replies: Array<Reply | ((request: RecordedRequest) => Reply)>) {
  const requests: RecordedRequest[] = [];
  const sleeps: number[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      body,
      apiKey: config.headers['x-api-key'],
    };
    requests.push(request);

    const next = replies.shift();
    if (!next) throw new Error(`unexpected request ${request.method} ${request.url}`);
    const reply = typeof next === 'function' ? next(request) : next;

    if (reply.network) {
      throw new AxiosError('socket hang up', 'ECONNRESET', config);
    }
    const response: AxiosResponse = {
      data: reply.data ?? null,
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(`Request failed with status code ${reply.status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
    }
    return response;
  };

  const client = new ImmichClient({
    endpoint: 'http://immich.test/',
    apiKey: 'test-secret',
    adapter,
    retry: new RetryPolicy({
      maxAttempts: 3,
      baseDelayMs: 10,
      random: () => 0,
      sleep: async ms => {
        sleeps.push(ms);
      },
    }),
  });

  return { client, requests, sleeps };
}

function immichAsset(id: string, originalFileName: string, localDateTime?: string) {
  return { id, ownerId: 'user-1', originalFileName, ...(localDateTime ? { localDateTime } : {}) };
}

describe('classifyStatus', () => {
  it('maps HTTP statuses to error kinds', () => {
    expect([429, 503, 409, 400, 422, 404, 401, 403, 418].map(classifyStatus)).toEqual([
      'rate_limited',
      'transient_network',
      'conflict',
      'validation',
      'validation',
      'not_found',
      'auth',
      'auth',
      'unknown',
    ]);
  });
});

describe('parseRetryAfter', () => {
  it('accepts seconds and HTTP dates', () => {
    const now = Date.UTC(2024, 0, 1, 0, 0, 0);
    expect(parseRetryAfter('120', now)).toBe(120);
    expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:30 GMT', now)).toBe(30);
    expect(parseRetryAfter('soon', now)).toBeNull();
    expect(parseRetryAfter(undefined, now)).toBeNull();
  });
});

describe('ImmichClient', () => {
  it('sends the API key to the api base path', async () => {
    const { client, requests } = stubServer([{ status: 200, data: [{ id: 'u1', email: 'a@example.com', name: 'A' }] }]);

    await expect(client.listUsers()).resolves.toEqual([{ id: 'u1', email: 'a@example.com', name: 'A' }]);
    expect(requests).toEqual([{ method: 'GET', url: '/users', params: undefined, body: undefined, apiKey: 'test-secret' }]);
  });

  it('waits for Retry-After on rate limits', async () => {
    const { client, sleeps } = stubServer([
      { status: 429, headers: { 'retry-after': '2' } },
      { status: 200, data: [] },
    ]);

    await expect(client.listTags()).resolves.toEqual([]);
    expect(sleeps).toEqual([2000]);
  });

  it('retries server and network failures with backoff', async () => {
    const { client, sleeps, requests } = stubServer([
      { status: 502 },
      { status: 0, network: true },
      { status: 200, data: { id: 't1', name: 'vacation' } },
    ]);

    await expect(client.createTag('vacation')).resolves.toEqual({ id: 't1', name: 'vacation' });
    expect(sleeps).toEqual([10, 20]);
    expect(requests.map(r => r.body)).toEqual([{ name: 'vacation' }, { name: 'vacation' }, { name: 'vacation' }]);
  });

  it('does not retry authentication failures', async () => {
    const { client, requests } = stubServer([{ status: 401, data: { message: 'Invalid API key' } }]);

    const error = await client.listUsers().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DestinationApiError);
    expect(error instanceof DestinationApiError ? [error.kind, error.category, error.message] : []).toEqual([
      'auth',
      'fatal',
      'list-users failed (auth 401): Invalid API key',
    ]);
    expect(requests).toHaveLength(1);
  });

  it('joins validation messages', async () => {
    const { client } = stubServer([
      { status: 400, data: { message: ['name should not be empty', 'email must be an email'] } },
    ]);

    await expect(client.createUser({ email: 'x', name: '', password: 'test-secret' })).rejects.toThrow(
      'create-user failed (validation 400): name should not be empty; email must be an email'
    );
  });

  it('rejects responses of an unexpected shape', async () => {
    const { client } = stubServer([{ status: 200, data: [{ id: 1 }] }]);

    await expect(client.listUsers()).rejects.toThrow('Unexpected response shape at 0.id');
  });

  it('returns null for missing albums and assets', async () => {
    const { client } = stubServer([{ status: 404 }, { status: 404 }]);

    await expect(client.getAlbum('gone')).resolves.toBeNull();
    await expect(client.getAsset('gone')).resolves.toBeNull();
  });

  it('merges owned and shared albums', async () => {
    const album = (id: string) => ({
      id,
      albumName: `Album ${id}`,
      ownerId: 'owner',
      albumUsers: [{ user: { id: 'owner' } }, { user: { id: 'member' } }],
      assetCount: 5,
    });
    const { client, requests } = stubServer([
      { status: 200, data: [album('a1')] },
      { status: 200, data: [album('a1'), album('a2')] },
    ]);

    const albums = await client.listAlbums();
    expect(albums.map(a => [a.id, a.memberIds, a.assetCount])).toEqual([
      ['a1', ['member'], 5],
      ['a2', ['member'], 5],
    ]);
    expect(requests.map(r => r.params)).toEqual([undefined, { shared: true }]);
  });

  it('asks for one side only when filtered by sharing', async () => {
    const { client, requests } = stubServer([
      { status: 200, data: [{ id: 'a3', albumName: 'Solo', ownerId: 'owner', albumUsers: [], assetCount: 2 }] },
    ]);

    const albums = await client.listAlbums({ shared: false });
    expect(albums.map(a => [a.id, a.memberIds])).toEqual([['a3', []]]);
    expect(requests.map(r => r.params)).toEqual([{ shared: false }]);
  });

  describe('findAsset', () => {
    it('searches two hours either side and picks the closest match', async () => {
      const { client, requests } = stubServer([{
        status: 200,
        data: {
          assets: {
            items: [
              immichAsset('far', 'img_0001.JPG', '2023-06-03T12:00:00.000Z'),
              immichAsset('near', 'IMG_0001.jpg', '2023-06-03T10:20:00.000Z'),
              immichAsset('other', 'IMG_0001 (1).jpg', '2023-06-03T10:15:00.000Z'),
            ],
          },
        },
      }]);

      const found = await client.findAsset({ filename: 'IMG_0001.jpg', takenAt: '2023-06-03T10:15:00' });

      expect(found?.id).toBe('near');
      expect(requests[0]).toMatchObject({
        method: 'POST',
        url: '/search/metadata',
        body: {
          originalFileName: 'IMG_0001.jpg',
          size: 250,
          takenAfter: '2023-06-03T08:15:00.000Z',
          takenBefore: '2023-06-03T12:15:00.000Z',
        },
      });
    });

    it('searches the whole day when only the date is known', async () => {
      const { client, requests } = stubServer([{ status: 200, data: { assets: { items: [] } } }]);

      await expect(client.findAsset({ filename: 'IMG_0001.jpg', takenAt: '2023-06-03' })).resolves.toBeNull();
      expect(requests[0]?.body).toEqual({
        originalFileName: 'IMG_0001.jpg',
        size: 250,
        takenAfter: '2023-06-03T00:00:00.000Z',
        takenBefore: '2023-06-04T00:00:00.000Z',
      });
    });
  });

  it('pages through the assets of a tag', async () => {
    const { client, requests } = stubServer([
      { status: 200, data: { assets: { items: [immichAsset('a1', 'a.jpg')], nextPage: '2' } } },
      { status: 200, data: { assets: { items: [immichAsset('a2', 'b.jpg')], nextPage: null } } },
    ]);

    await expect(client.getTagAssets('t1')).resolves.toEqual(['a1', 'a2']);
    expect(requests.map(r => r.body)).toEqual([
      { tagIds: ['t1'], size: 250, page: 1 },
      { tagIds: ['t1'], size: 250, page: 2 },
    ]);
  });

  it('skips empty bulk requests', async () => {
    const { client, requests } = stubServer([]);

    await client.addAlbumMembers('a1', []);
    await expect(client.addAlbumAssets('a1', [])).resolves.toEqual([]);
    expect(requests).toEqual([]);
  });
});
