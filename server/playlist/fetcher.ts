import type { Logger } from '../obs/logger';
import { forwardAbort, sleep } from '../utils/async';
import { AcquisitionError, ConfigurationError, errorMessage, type OriginFailure } from './errors';
import type { Credentials, FetchedPlaylist, Origin } from './types';

export const PLAYLIST_HEADER = '#EXTM3U';

export type OriginRotation = 'cycle' | 'fixed';

export interface FetchPlaylistOptions {
  origins: Origin[];
  credentials: Credentials;
  rotation: OriginRotation;
  maxAttempts: number;
  backoffMs: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  maxHeaderBytes: number;
  userAgent: string;
  signal?: AbortSignal;
  logger?: Logger;
}

const NEWLINE = 0x0a;
const BOM = '\uFEFF';

class AttemptFailure extends Error {}

export const expandOriginUrl = (template: string, credentials: Credentials): string =>
  template
    .replace(/\{username\}/g, encodeURIComponent(credentials.username))
    .replace(/\{password\}/g, encodeURIComponent(credentials.password));

export const selectOrigin = (origins: Origin[], rotation: OriginRotation, attempt: number): Origin => {
  const index = rotation === 'cycle' ? attempt % origins.length : Math.min(attempt, origins.length - 1);
  return origins[index];
};

export const assertAcquisitionConfig = (origins: Origin[], credentials: Credentials) => {
  if (!credentials.username || !credentials.password) {
    throw new ConfigurationError('Playlist credentials are missing (PLAYLIST_USERNAME / PLAYLIST_PASSWORD)');
  }
  if (!origins.length) {
    throw new ConfigurationError('No playlist origins configured (PLAYLIST_ORIGINS)');
  }
};

const concatBytes = (chunks: Uint8Array[], total: number): Uint8Array => {
  if (chunks.length === 1) return chunks[0];
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
};

const describeFetchError = (error: unknown): string => {
  const message = errorMessage(error);
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : null;
  return cause && cause !== message ? `${message} (${cause})` : message;
};

interface HeaderRead {
  headerLine: string;
  buffered: Uint8Array;
}

const readHeader = async (
  reader: ReadableStreamDefaultReader<Uint8Array>,
  maxHeaderBytes: number,
): Promise<HeaderRead> => {
  const chunks: Uint8Array[] = [];
  let total = 0;
  let newlineAt = -1;
  while (newlineAt < 0 && total < maxHeaderBytes) {
    const { done, value } = await reader.read();
    if (done) break;
    const idx = value.indexOf(NEWLINE);
    if (idx >= 0) newlineAt = total + idx;
    chunks.push(value);
    total += value.length;
  }
  if (!total) {
    throw new AttemptFailure('empty body');
  }
  const buffered = concatBytes(chunks, total);
  const firstLine = buffered.subarray(0, newlineAt >= 0 ? newlineAt : Math.min(total, maxHeaderBytes));
  let headerLine = new TextDecoder('utf-8', { ignoreBOM: true }).decode(firstLine).replace(/\r$/, '');
  if (headerLine.startsWith(BOM)) headerLine = headerLine.slice(1);
  headerLine = headerLine.trim();
  if (!headerLine.startsWith(PLAYLIST_HEADER)) {
    throw new AttemptFailure('invalid header');
  }
  return { headerLine, buffered };
};

interface Connection {
  reader: ReadableStreamDefaultReader<Uint8Array>;
  header: HeaderRead;
}

const openConnection = async (
  origin: Origin,
  url: string,
  options: FetchPlaylistOptions,
  signal: AbortSignal,
): Promise<Connection> => {
  const response = await fetch(url, {
    method: 'GET',
    headers: {
      'User-Agent': options.userAgent,
      Accept: 'audio/x-mpegurl, application/x-mpegurl, text/plain;q=0.9, */*;q=0.1',
    },
    redirect: 'follow',
    signal,
  });
  if (!response.ok) {
    await response.body?.cancel().catch((error: unknown) => {
      options.logger?.debug('Discarding error body failed', { origin: origin.name, error: errorMessage(error) });
    });
    throw new AttemptFailure(`HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`);
  }
  if (!response.body) {
    throw new AttemptFailure('empty body');
  }
  const reader: ReadableStreamDefaultReader<Uint8Array> = response.body.getReader();
  try {
    return { reader, header: await readHeader(reader, options.maxHeaderBytes) };
  } catch (error) {
    await reader.cancel().catch((cancelError: unknown) => {
      options.logger?.debug('Upstream cancel failed', { origin: origin.name, error: errorMessage(cancelError) });
    });
    throw error;
  }
};

/**
 * One GET against one origin. Resolves once the header line is validated; the body keeps
 * streaming from the same connection.
 */
const attemptOrigin = async (
  origin: Origin,
  url: string,
  options: FetchPlaylistOptions,
): Promise<FetchedPlaylist> => {
  const controller = new AbortController();
  const detach = forwardAbort(options.signal, controller);
  let timedOut = false;
  const connectTimer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error('connect timeout'));
  }, options.connectTimeoutMs);

  let connection: Connection;
  try {
    connection = await openConnection(origin, url, options, controller.signal);
  } catch (error) {
    detach();
    if (options.signal?.aborted) throw error;
    if (timedOut) throw new AttemptFailure(`connect timeout after ${options.connectTimeoutMs}ms`);
    if (error instanceof AttemptFailure) throw error;
    throw new AttemptFailure(describeFetchError(error));
  } finally {
    clearTimeout(connectTimer);
  }

  const { reader: activeReader, header } = connection;
  let finished = false;

  const release = async (reason: string) => {
    if (finished) return;
    finished = true;
    detach();
    await activeReader.cancel(reason).catch((error: unknown) => {
      options.logger?.debug('Upstream cancel failed', { origin: origin.name, error: errorMessage(error) });
    });
  };

  async function* body(): AsyncGenerator<Uint8Array> {
    let idle: ReturnType<typeof setTimeout> | undefined;
    try {
      yield header.buffered;
      while (true) {
        // The idle window only runs while waiting on the network, not while downstream is busy.
        idle = setTimeout(() => {
          controller.abort(new Error(`read timeout after ${options.readTimeoutMs}ms`));
        }, options.readTimeoutMs);
        const { done, value } = await activeReader.read();
        clearTimeout(idle);
        if (done) {
          finished = true;
          detach();
          return;
        }
        yield value;
      }
    } finally {
      clearTimeout(idle);
      await release('consumer stopped');
    }
  }

  return {
    origin: origin.name,
    headerLine: header.headerLine,
    body: body(),
    cancel: async (reason = 'cancelled') => {
      controller.abort(new Error(reason));
      await release(reason);
    },
  };
};

/**
 * Walks the origin list until one answers with a document that starts with `#EXTM3U`.
 * Throws ConfigurationError before any request when credentials or origins are missing,
 * AcquisitionError once every attempt has failed.
 */
export const fetchPlaylist = async (options: FetchPlaylistOptions): Promise<FetchedPlaylist> => {
  const { origins, credentials, logger } = options;
  assertAcquisitionConfig(origins, credentials);

  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const lastFailureByOrigin = new Map<string, string>();

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    if (options.signal?.aborted) {
      throw new Error('Aborted');
    }
    const origin = selectOrigin(origins, options.rotation, attempt);
    const url = expandOriginUrl(origin.urlTemplate, credentials);
    try {
      const fetched = await attemptOrigin(origin, url, options);
      logger?.info('Playlist origin accepted', { origin: origin.name, attempt: attempt + 1 });
      return fetched;
    } catch (error) {
      if (!(error instanceof AttemptFailure)) throw error;
      lastFailureByOrigin.set(origin.name, error.message);
      logger?.warn('Playlist origin attempt failed', {
        origin: origin.name,
        attempt: attempt + 1,
        maxAttempts,
        reason: error.message,
      });
    }
    if (attempt + 1 < maxAttempts) {
      await sleep(options.backoffMs, options.signal);
    }
  }

  const failures: OriginFailure[] = Array.from(lastFailureByOrigin, ([origin, reason]) => ({ origin, reason }));
  throw new AcquisitionError(maxAttempts, failures);
};
