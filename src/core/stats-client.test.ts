import { HistoricStatsClient, nextPageUrl, StatsQuery, toSamples } from './stats-client';
import { DataUnavailableError } from '../utils/errors';

const QUERY: StatsQuery = {
  project: 'my-project',
  taskName: 'jsCore',
  buildVariant: 'linux-64',
  window: {
    start: new Date('2026-01-01T00:00:00Z'),
    end: new Date('2026-01-15T08:30:00Z'),
  },
};

const FIRST_URL =
  'https://ci.example.com/rest/v2/projects/my-project/test_stats' +
  '?after_date=2026-01-01&before_date=2026-01-15&group_num_days=1&variants=linux-64&tasks=jsCore';

type ResponseOptions = ConstructorParameters<typeof Response>[1];

function jsonResponse(body: unknown, init: ResponseOptions = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init });
}

function entry(test_file: string, avg_duration_pass: number, num_pass = 1, date = '2026-01-05') {
  return { test_file, date, num_pass, avg_duration_pass };
}

describe('HistoricStatsClient', () => {
  let client: HistoricStatsClient;

  beforeEach(() => {
    client = new HistoricStatsClient({
      apiUrl: 'https://ci.example.com/',
      apiUser: 'test-user',
      apiKey: 'test-secret',
      retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 5 },
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should build the test stats URL for the lookback window', () => {
    expect(client.buildUrl(QUERY)).toBe(FIRST_URL);
  });

  it('should send credentials as headers', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValueOnce(jsonResponse([]));

    await client.fetchEntries(QUERY);

    expect(fetchSpy).toHaveBeenCalledWith(FIRST_URL, {
      headers: { Accept: 'application/json', 'Api-User': 'test-user', 'Api-Key': 'test-secret' },
    });
  });

  it('should follow pagination links and build a catalog', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(
        jsonResponse([entry('jstests/core/a.js', 12), entry('jstests/core/b.js', 30, 0)], {
          headers: { link: '<https://ci.example.com/page/2>; rel="next"' },
        }),
      )
      .mockResolvedValueOnce(jsonResponse([entry('jstests\\core\\a.js', 18, 2, '2026-01-06'), { bogus: true }]));

    const catalog = await client.fetchCatalog(QUERY);

    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(fetchSpy.mock.calls[1][0]).toBe('https://ci.example.com/page/2');
    expect(catalog.size).toBe(1);
    expect(catalog.lookup('jstests/core/a.js').map(s => s.durationSecs)).toEqual([12, 18]);
  });

  it('should stop when a page links back to itself', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () =>
        jsonResponse([entry('a.js', 5)], { headers: { link: `<${FIRST_URL}>; rel="next"` } }),
      );

    const entries = await client.fetchEntries(QUERY);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(entries).toEqual([entry('a.js', 5)]);
  });

  it('should retry server errors', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(new Response('', { status: 503 }))
      .mockResolvedValueOnce(jsonResponse([entry('a.js', 3)]));

    const entries = await client.fetchEntries(QUERY);

    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(entries).toHaveLength(1);
  });

  it('should not retry client errors', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(new Response('', { status: 404 }));

    const error = await client.fetchEntries(QUERY).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DataUnavailableError);
    expect(error).toHaveProperty('status', 404);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('should give up after the last attempt', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response('', { status: 500 }));

    await expect(client.fetchEntries(QUERY)).rejects.toThrow(
      `Could not fetch test stats for jsCore: GET ${FIRST_URL} failed with HTTP 500`,
    );
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('should report network failures without a status', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    const error = await client.fetchEntries(QUERY).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DataUnavailableError);
    expect(error).toHaveProperty('status', undefined);
  });

  it('should reject a response that is not a list', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValueOnce(jsonResponse({ error: 'nope' }));

    await expect(client.fetchEntries(QUERY)).rejects.toThrow(
      `Unexpected test stats response from ${FIRST_URL}`,
    );
  });
});

describe('nextPageUrl', () => {
  it('should find the next link among others', () => {
    expect(nextPageUrl('<https://x/prev>; rel="prev", <https://x/next>; rel="next"')).toBe('https://x/next');
  });

  it('should return undefined without a next link', () => {
    expect(nextPageUrl(null)).toBeUndefined();
    expect(nextPageUrl('<https://x/prev>; rel="prev"')).toBeUndefined();
  });
});

describe('toSamples', () => {
  it('should keep passing entries dated at midnight UTC', () => {
    expect(toSamples([entry('./a.js', 4.5, 3, '2026-01-02'), entry('b.js', 9, 0)])).toEqual([
      { test: 'a.js', durationSecs: 4.5, observedAt: new Date('2026-01-02T00:00:00Z') },
    ]);
  });
});
