import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import type { ChannelClassifier, ClassifyFn } from '../playlist/classifier';
import { LocatorDeduplicator } from '../playlist/dedup';
import { buildHeader, emitPlaylist } from '../playlist/emitter';
import { AcquisitionError } from '../playlist/errors';
import { fetchPlaylist } from '../playlist/fetcher';
import { readLines } from '../playlist/lineReader';
import { parseRecords, splitMetadata } from '../playlist/parser';
import { rewriteMetadata } from '../playlist/rewrite';
import { resolveRoute } from '../playlist/routing';
import { captureBody, playlistFromSnapshot, type SnapshotCache } from '../playlist/snapshotCache';
import type { CompiledTaxonomy } from '../playlist/taxonomy';
import { createPassStats, type Credentials, type FetchedPlaylist, type OutputRecord, type PassStats, type RawRecord } from '../playlist/types';

export interface PlaylistPipelineDeps {
  config: AppConfig;
  taxonomy: CompiledTaxonomy;
  classifier: ChannelClassifier;
  /** Shared last-document cache; only consulted for requests on the configured credentials. */
  cache?: SnapshotCache | null;
  logger: Logger;
}

export interface GeneratePlaylistOptions {
  /** Per-request credentials. Falls back to the configured ones. */
  credentials?: Credentials;
  signal?: AbortSignal;
}

export interface PlaylistRun {
  origin: string;
  fromCache: boolean;
  /** Output lines. Single pass; iterate once. */
  lines: AsyncGenerator<string>;
  stats: PassStats;
  /** Releases the upstream connection if `lines` is abandoned before it is read to the end. */
  cancel: () => Promise<void>;
}

interface RecordStageOptions {
  taxonomy: CompiledTaxonomy;
  classify: ClassifyFn;
  categoryAttribute: string;
  stats: PassStats;
}

/** Admission, dedup, classification, filtering and rewrite, one record at a time. */
export async function* processRecords(
  records: AsyncIterable<RawRecord>,
  options: RecordStageOptions,
): AsyncGenerator<OutputRecord> {
  const { taxonomy, classify, stats } = options;
  const seen = new LocatorDeduplicator();

  for await (const record of records) {
    const parsed = splitMetadata(record.metadata);
    if (!parsed) {
      stats.malformed += 1;
      continue;
    }
    const route = resolveRoute(parsed.displayName, taxonomy);
    if (!route) {
      stats.outOfRegion += 1;
      continue;
    }
    if (seen.has(record.locator)) {
      stats.duplicates += 1;
      continue;
    }
    const result = await classify(route.strippedName, route.region);
    if (taxonomy.droppedCategories.has(result.category)) {
      stats.dropped += 1;
      continue;
    }
    // Only emitted locators count as seen; a dropped record leaves its locator free.
    seen.admit(record.locator);
    stats.provenance[result.provenance] += 1;
    stats.emitted += 1;
    yield {
      metadata: rewriteMetadata(parsed, {
        categoryAttribute: options.categoryAttribute,
        category: result.category,
        displayName: route.strippedName,
      }),
      locator: record.locator,
      category: result.category,
      provenance: result.provenance,
    };
  }
}

const acquire = async (
  deps: PlaylistPipelineDeps,
  credentials: Credentials,
  useCache: boolean,
  signal?: AbortSignal,
): Promise<{ fetched: FetchedPlaylist; fromCache: boolean }> => {
  const { config, logger } = deps;
  try {
    const fetched = await fetchPlaylist({
      origins: config.acquisition.origins,
      credentials,
      rotation: config.acquisition.rotation,
      maxAttempts: config.acquisition.maxAttempts,
      backoffMs: config.acquisition.backoffMs,
      connectTimeoutMs: config.acquisition.connectTimeoutMs,
      readTimeoutMs: config.acquisition.readTimeoutMs,
      maxHeaderBytes: config.acquisition.maxHeaderBytes,
      userAgent: config.acquisition.userAgent,
      signal,
      logger,
    });
    return { fetched, fromCache: false };
  } catch (error) {
    const snapshot = useCache && error instanceof AcquisitionError ? deps.cache?.read() : null;
    if (snapshot && Date.now() - snapshot.fetchedAt <= config.cache.maxStaleMs) {
      logger.warn('All origins failed, serving cached playlist', {
        error: error instanceof Error ? error.message : String(error),
        cachedOrigin: snapshot.origin,
        ageMs: Date.now() - snapshot.fetchedAt,
      });
      return { fetched: playlistFromSnapshot(snapshot), fromCache: true };
    }
    throw error;
  }
};

/**
 * Produces the categorized playlist. Acquisition finishes before this resolves, so
 * ConfigurationError and AcquisitionError are thrown here and never after output has begun.
 */
export const generatePlaylist = async (
  deps: PlaylistPipelineDeps,
  options: GeneratePlaylistOptions = {},
): Promise<PlaylistRun> => {
  const { config, taxonomy, classifier, logger } = deps;
  const credentials = options.credentials ?? config.credentials;
  const useCache = Boolean(deps.cache) && !options.credentials;
  const startedAt = Date.now();

  const { fetched, fromCache } = await acquire(deps, credentials, useCache, options.signal);
  const stats = createPassStats();

  let body: AsyncIterable<Uint8Array> = fetched.body;
  const cache = deps.cache;
  if (useCache && !fromCache && cache) {
    body = captureBody(body, {
      maxBytes: config.cache.maxBytes,
      onComplete: (bytes) => {
        const stored = cache.publish({
          origin: fetched.origin,
          headerLine: fetched.headerLine,
          body: bytes,
          startedAt,
          fetchedAt: Date.now(),
        });
        logger.debug('Playlist snapshot captured', { origin: fetched.origin, bytes: bytes.length, stored });
      },
    });
  }

  const lines = readLines(body, { maxLineBytes: config.playlist.maxLineBytes, stats });
  const records = parseRecords(lines, { locatorSchemes: config.playlist.locatorSchemes, stats });
  const outputs = processRecords(records, {
    taxonomy,
    classify: classifier.startPass({ signal: options.signal, stats }),
    categoryAttribute: config.playlist.categoryAttribute,
    stats,
  });
  const header = buildHeader(fetched.headerLine, config.playlist.forwardHeaderAttributes);

  async function* run(): AsyncGenerator<string> {
    let completed = false;
    try {
      yield* emitPlaylist(header, outputs);
      completed = true;
    } finally {
      await fetched.cancel('pass finished');
      logger.info(completed ? 'Playlist pass complete' : 'Playlist pass stopped early', {
        origin: fetched.origin,
        fromCache,
        elapsedMs: Date.now() - startedAt,
        ...stats,
      });
    }
  }

  return {
    origin: fetched.origin,
    fromCache,
    lines: run(),
    stats,
    cancel: () => fetched.cancel('client went away'),
  };
};
