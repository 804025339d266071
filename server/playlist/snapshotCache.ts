import type { FetchedPlaylist } from './types';

export interface PlaylistSnapshot {
  readonly origin: string;
  readonly headerLine: string;
  readonly body: Uint8Array;
  /** When the upstream transfer began; decides which of two racing writers wins. */
  readonly startedAt: number;
  readonly fetchedAt: number;
}

/**
 * Last complete upstream document, kept to serve requests while every origin is down.
 * Readers get an immutable snapshot; writers replace it whole.
 */
export interface SnapshotCache {
  read(): PlaylistSnapshot | null;
  /** Returns false when a snapshot from a later transfer is already stored. */
  publish(snapshot: PlaylistSnapshot): boolean;
}

export class InMemorySnapshotCache implements SnapshotCache {
  private current: PlaylistSnapshot | null = null;

  read(): PlaylistSnapshot | null {
    return this.current;
  }

  publish(snapshot: PlaylistSnapshot): boolean {
    if (this.current && this.current.startedAt > snapshot.startedAt) {
      return false;
    }
    this.current = Object.freeze({ ...snapshot });
    return true;
  }
}

export interface CaptureOptions {
  maxBytes: number;
  /** Called once, only if the body was read to the end within `maxBytes`. */
  onComplete: (body: Uint8Array) => void;
}

/**
 * Passes `body` through unchanged while keeping a copy. A consumer that stops early, an
 * upstream error or an oversized document leaves nothing behind.
 */
export async function* captureBody(
  body: AsyncIterable<Uint8Array>,
  options: CaptureOptions,
): AsyncGenerator<Uint8Array> {
  let chunks: Uint8Array[] = [];
  let size = 0;
  let overflow = false;
  for await (const chunk of body) {
    if (!overflow) {
      if (size + chunk.length > options.maxBytes) {
        overflow = true;
        chunks = [];
        size = 0;
      } else {
        chunks.push(chunk.slice());
        size += chunk.length;
      }
    }
    yield chunk;
  }
  if (overflow) return;
  const copy = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    copy.set(chunk, offset);
    offset += chunk.length;
  }
  options.onComplete(copy);
}

export const playlistFromSnapshot = (snapshot: PlaylistSnapshot): FetchedPlaylist => {
  async function* body(): AsyncGenerator<Uint8Array> {
    yield snapshot.body;
  }
  return {
    origin: `cache:${snapshot.origin}`,
    headerLine: snapshot.headerLine,
    body: body(),
    cancel: async () => {},
  };
};
