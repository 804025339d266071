import { afterEach, describe, expect, it, vi } from 'vitest';
import { AcquisitionError, ConfigurationError } from '../../playlist/errors';
import { InMemorySnapshotCache } from '../../playlist/snapshotCache';
import { collect, testTaxonomy } from '../../playlist/__tests__/helpers';
import { ChannelClassifier, type ExternalClassifier } from '../../playlist/classifier';
import { createPassStats } from '../../playlist/types';
import { generatePlaylist, processRecords } from '../generatePlaylist';
import { createTestDeps, EXPECTED_PLAYLIST, UPSTREAM_PLAYLIST } from './helpers';

const encoder = new TextEncoder();

const playlistResponse = (text: string) => new Response(text, { status: 200 });
const unavailable = () => new Response('down', { status: 503, statusText: 'Service Unavailable' });

const stubFetch = (impl: typeof fetch) => {
  const fetchMock = vi.fn<typeof fetch>(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
};

const readOutput = async (lines: AsyncIterable<string>) => (await collect(lines)).join('');

describe('generatePlaylist', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('filters, deduplicates, categorizes and rewrites the upstream playlist', async () => {
    stubFetch(async () => playlistResponse(UPSTREAM_PLAYLIST));
    const run = await generatePlaylist(createTestDeps());

    expect(run.origin).toBe('primary');
    expect(run.fromCache).toBe(false);
    expect(await readOutput(run.lines)).toBe(EXPECTED_PLAYLIST);
    expect(run.stats).toMatchObject({
      records: 8,
      malformed: 1,
      outOfRegion: 1,
      duplicates: 1,
      dropped: 1,
      emitted: 4,
      orphanedMetadata: 1,
      strayLocators: 1,
      provenance: { keyword: 2, external: 0, fallback: 2 },
    });
  });

  it('emits only the header for a playlist with no admitted channels', async () => {
    stubFetch(async () => playlistResponse('#EXTM3U\n#EXTINF:-1,UK|BBC One\nhttp://a.test/2\n'));
    const run = await generatePlaylist(createTestDeps());
    expect(await readOutput(run.lines)).toBe('#EXTM3U\n');
  });

  it('uses an external classifier for names no keyword matches', async () => {
    stubFetch(async () => playlistResponse(UPSTREAM_PLAYLIST));
    const classify = vi.fn<ExternalClassifier['classify']>(async (text) => (text === 'Zeta Channel' ? 'Soccer' : null));
    const run = await generatePlaylist(createTestDeps({ external: { classify } }));
    const output = await readOutput(run.lines);

    expect(output).toContain('#EXTINF:-1 group-title="Soccer",Zeta Channel\nhttp://a.test/4\n');
    expect(output).toContain('#EXTINF:-1 group-title="Mexico General",Canal Zeta\nhttp://b.test/5\n');
    expect(classify).toHaveBeenCalledTimes(2);
    expect(run.stats.provenance).toEqual({ keyword: 2, external: 1, fallback: 1 });
  });

  it('fetches with per-request credentials when given', async () => {
    const fetchMock = stubFetch(async () => playlistResponse('#EXTM3U\n'));
    const run = await generatePlaylist(createTestDeps(), {
      credentials: { username: 'other-user', password: 'other-secret' },
    });
    await readOutput(run.lines);
    expect(fetchMock.mock.calls[0][0]).toBe(
      'http://primary.test/get.php?username=other-user&password=other-secret&type=m3u_plus',
    );
  });

  it('fails with a configuration error before any request without credentials', async () => {
    const fetchMock = stubFetch(async () => playlistResponse('#EXTM3U\n'));
    await expect(generatePlaylist(createTestDeps({ env: { PLAYLIST_USERNAME: '' } }))).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails with an acquisition error when every origin is down', async () => {
    const fetchMock = stubFetch(async () => unavailable());
    await expect(generatePlaylist(createTestDeps())).rejects.toBeInstanceOf(AcquisitionError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  describe('with a snapshot cache', () => {
    it('serves the last complete upstream document while origins are down', async () => {
      let upstreamUp = true;
      stubFetch(async () => (upstreamUp ? playlistResponse(UPSTREAM_PLAYLIST) : unavailable()));
      const cache = new InMemorySnapshotCache();
      const deps = createTestDeps({ cache, env: { CACHE_ENABLED: 'true' } });

      const first = await generatePlaylist(deps);
      expect(await readOutput(first.lines)).toBe(EXPECTED_PLAYLIST);
      expect(new TextDecoder().decode(cache.read()?.body)).toBe(UPSTREAM_PLAYLIST);

      upstreamUp = false;
      const second = await generatePlaylist(deps);
      expect(second.fromCache).toBe(true);
      expect(second.origin).toBe('cache:primary');
      expect(await readOutput(second.lines)).toBe(EXPECTED_PLAYLIST);
    });

    it('does not keep a document the client stopped reading', async () => {
      stubFetch(async () => playlistResponse(UPSTREAM_PLAYLIST));
      const cache = new InMemorySnapshotCache();
      const run = await generatePlaylist(createTestDeps({ cache }));

      await run.lines.next();
      await run.lines.next();
      await run.lines.return(undefined);
      expect(cache.read()).toBeNull();
    });

    it('leaves the cache out of requests with their own credentials', async () => {
      stubFetch(async () => playlistResponse(UPSTREAM_PLAYLIST));
      const cache = new InMemorySnapshotCache();
      const run = await generatePlaylist(createTestDeps({ cache }), {
        credentials: { username: 'other-user', password: 'other-secret' },
      });
      await readOutput(run.lines);
      expect(cache.read()).toBeNull();
    });

    it('does not serve a snapshot older than the staleness limit', async () => {
      stubFetch(async () => unavailable());
      const cache = new InMemorySnapshotCache();
      const now = Date.now();
      cache.publish({
        origin: 'primary',
        headerLine: '#EXTM3U',
        body: encoder.encode(UPSTREAM_PLAYLIST),
        startedAt: now - 10_000,
        fetchedAt: now - 10_000,
      });
      const deps = createTestDeps({ cache, env: { CACHE_MAX_STALE_MS: '1000' } });
      await expect(generatePlaylist(deps)).rejects.toBeInstanceOf(AcquisitionError);
    });
  });
});

describe('processRecords', () => {
  it('does not classify duplicates or channels outside every region', async () => {
    const stats = createPassStats();
    const classifier = new ChannelClassifier({ timeoutMs: 50, maxCallsPerPass: 0 });
    const pass = classifier.startPass({ stats });
    const classify = vi.fn(pass);
    const outputs = await collect(
      processRecords(
        (async function* () {
          yield { metadata: '#EXTINF:-1,US|CNN', locator: 'http://a.test/1' };
          yield { metadata: '#EXTINF:-1,US|CNN Again', locator: 'http://a.test/1' };
          yield { metadata: '#EXTINF:-1,FR|TF1', locator: 'http://a.test/2' };
        })(),
        { taxonomy: testTaxonomy, classify, categoryAttribute: 'group-title', stats },
      ),
    );

    expect(outputs).toEqual([
      {
        metadata: '#EXTINF:-1 group-title="USA News",CNN',
        locator: 'http://a.test/1',
        category: 'USA News',
        provenance: 'keyword',
      },
    ]);
    expect(classify).toHaveBeenCalledTimes(1);
    expect(stats).toMatchObject({ duplicates: 1, outOfRegion: 1, emitted: 1 });
  });

  it('does not let a dropped record block a later one with the same locator', async () => {
    const stats = createPassStats();
    const classify = new ChannelClassifier({ timeoutMs: 50, maxCallsPerPass: 0 }).startPass({ stats });
    const outputs = await collect(
      processRecords(
        (async function* () {
          yield { metadata: '#EXTINF:-1,US|XXX Late', locator: 'http://a.test/1' };
          yield { metadata: '#EXTINF:-1,US|CNN', locator: 'http://a.test/1' };
          yield { metadata: '#EXTINF:-1,US|CNN HD', locator: 'http://a.test/1' };
        })(),
        { taxonomy: testTaxonomy, classify, categoryAttribute: 'group-title', stats },
      ),
    );

    expect(outputs.map((output) => output.metadata)).toEqual(['#EXTINF:-1 group-title="USA News",CNN']);
    expect(stats).toMatchObject({ dropped: 1, duplicates: 1, emitted: 1 });
  });

  it('keeps the first of two records that share a locator', async () => {
    const stats = createPassStats();
    const classify = new ChannelClassifier({ timeoutMs: 50, maxCallsPerPass: 0 }).startPass({ stats });
    const outputs = await collect(
      processRecords(
        (async function* () {
          yield { metadata: '#EXTINF:-1,MX|Canal 5', locator: 'http://b.test/1' };
          yield { metadata: '#EXTINF:-1,US|CNN', locator: 'http://b.test/1' };
        })(),
        { taxonomy: testTaxonomy, classify, categoryAttribute: 'group-title', stats },
      ),
    );
    expect(outputs.map((output) => output.category)).toEqual(['Mexico Movies']);
  });
});
