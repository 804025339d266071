import { buildConfig } from '../../config/config';
import { createSilentLogger } from '../../obs/logger';
import { ChannelClassifier, type ExternalClassifier } from '../../playlist/classifier';
import type { SnapshotCache } from '../../playlist/snapshotCache';
import { testTaxonomy } from '../../playlist/__tests__/helpers';
import type { PlaylistPipelineDeps } from '../generatePlaylist';

export const TEST_ORIGINS =
  'primary=http://primary.test/get.php?username={username}&password={password}&type=m3u_plus,' +
  'backup=http://backup.test/list.m3u?u={username}&p={password}';

export interface TestDepsOptions {
  env?: NodeJS.ProcessEnv;
  external?: ExternalClassifier | null;
  cache?: SnapshotCache | null;
}

export const createTestDeps = (options: TestDepsOptions = {}): PlaylistPipelineDeps => {
  const config = buildConfig({
    NODE_ENV: 'test',
    PLAYLIST_ORIGINS: TEST_ORIGINS,
    PLAYLIST_USERNAME: 'test-user',
    PLAYLIST_PASSWORD: 'test-secret',
    FETCH_MAX_ATTEMPTS: '2',
    FETCH_BACKOFF_MS: '0',
    FETCH_CONNECT_TIMEOUT_MS: '1000',
    FETCH_READ_TIMEOUT_MS: '1000',
    CLASSIFIER_TIMEOUT_MS: '50',
    LOG_LEVEL: 'error',
    ...options.env,
  });
  return {
    config,
    taxonomy: testTaxonomy,
    classifier: new ChannelClassifier({
      external: options.external,
      timeoutMs: config.classifier.timeoutMs,
      maxCallsPerPass: config.classifier.maxCallsPerPass,
    }),
    cache: options.cache,
    logger: createSilentLogger(),
  };
};

export const UPSTREAM_PLAYLIST = [
  '#EXTM3U url-tvg="http://guide.test/epg.xml"',
  '#EXTINF:-1 tvg-id="cnn" group-title="News",US|CNN HD',
  'http://a.test/1',
  '#EXTINF:-1,UK|BBC One',
  'http://a.test/2',
  '#EXTINF:-1,US| CNN HD',
  'http://a.test/1',
  '',
  '#EXTINF:-1 group-title="Cine",MX|Canal 5',
  'http://b.test/2',
  '#EXTINF:-1,US|XXX Night',
  'http://a.test/3',
  '#EXTINF:-1,US|Zeta Channel',
  'http://a.test/4',
  '#EXTINF:-1,MX|Canal Zeta',
  'http://b.test/5',
  '#EXTINF:-1 tvg-id="broken',
  'http://a.test/6',
  '#EXTINF:-1,US|Orphan',
  '#EXTVLCOPT:http-user-agent=test-agent',
  'http://a.test/7',
  '',
].join('\r\n');

export const EXPECTED_PLAYLIST = [
  '#EXTM3U url-tvg="http://guide.test/epg.xml"',
  '#EXTINF:-1 tvg-id="cnn" group-title="USA News",CNN HD',
  'http://a.test/1',
  '#EXTINF:-1 group-title="Mexico Movies",Canal 5',
  'http://b.test/2',
  '#EXTINF:-1 group-title="USA General",Zeta Channel',
  'http://a.test/4',
  '#EXTINF:-1 group-title="Mexico General",Canal Zeta',
  'http://b.test/5',
  '',
].join('\n');
