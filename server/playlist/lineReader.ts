import type { PassStats } from './types';

export interface LineReaderOptions {
  maxLineBytes: number;
  stats?: PassStats;
}

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Splits a byte stream into text lines. Lines that are not valid UTF-8 are skipped, lines
 * longer than `maxLineBytes` are discarded without being buffered.
 */
export async function* readLines(
  body: AsyncIterable<Uint8Array>,
  options: LineReaderOptions,
): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  const stats = options.stats;
  let parts: Uint8Array[] = [];
  let size = 0;
  let oversized = false;

  const takeLine = (): string | null => {
    if (oversized) {
      oversized = false;
      if (stats) stats.oversizedLines += 1;
      return null;
    }
    let bytes: Uint8Array;
    if (parts.length === 1) {
      bytes = parts[0];
    } else {
      bytes = new Uint8Array(size);
      let offset = 0;
      for (const part of parts) {
        bytes.set(part, offset);
        offset += part.length;
      }
    }
    parts = [];
    size = 0;
    if (bytes.length && bytes[bytes.length - 1] === CARRIAGE_RETURN) {
      bytes = bytes.subarray(0, bytes.length - 1);
    }
    try {
      const line = decoder.decode(bytes);
      if (stats) stats.lines += 1;
      return line;
    } catch {
      if (stats) stats.decodeSkips += 1;
      return null;
    }
  };

  for await (const chunk of body) {
    let start = 0;
    while (start <= chunk.length) {
      const newlineAt = chunk.indexOf(NEWLINE, start);
      const end = newlineAt < 0 ? chunk.length : newlineAt;
      if (!oversized && end > start) {
        if (size + (end - start) > options.maxLineBytes) {
          oversized = true;
          parts = [];
          size = 0;
        } else {
          // Copy the carried-over tail: the chunk may be reused once we yield.
          parts.push(newlineAt < 0 ? chunk.slice(start, end) : chunk.subarray(start, end));
          size += end - start;
        }
      }
      if (newlineAt < 0) break;
      const line = takeLine();
      if (line !== null) yield line;
      start = newlineAt + 1;
    }
  }

  if (size > 0 || oversized) {
    const line = takeLine();
    if (line !== null) yield line;
  }
}
