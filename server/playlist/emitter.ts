import { PLAYLIST_HEADER } from './fetcher';
import type { OutputRecord } from './types';

const HEADER_ATTRIBUTE = /(?:^|\s)([A-Za-z0-9_.:-]+)=("[^"]*"|'[^']*'|[^\s"']+)/g;

/**
 * First attribute of the source header whose key is in `forwarded` (case-insensitive), as it
 * appeared, e.g. `url-tvg="http://guide.example/epg.xml"`.
 */
export const extractForwardedAttribute = (headerLine: string, forwarded: readonly string[]): string | null => {
  if (!forwarded.length) return null;
  const wanted = new Set(forwarded.map((key) => key.toLowerCase()));
  const rest = headerLine.slice(PLAYLIST_HEADER.length);
  for (const match of rest.matchAll(HEADER_ATTRIBUTE)) {
    if (wanted.has(match[1].toLowerCase())) {
      return `${match[1]}=${match[2]}`;
    }
  }
  return null;
};

export const buildHeader = (sourceHeader: string | null, forwarded: readonly string[]): string => {
  const attribute = sourceHeader ? extractForwardedAttribute(sourceHeader, forwarded) : null;
  return attribute ? `${PLAYLIST_HEADER} ${attribute}` : PLAYLIST_HEADER;
};

/**
 * Header, then two lines per record, in input order. Nothing is buffered: each record is
 * written as soon as the upstream pass produces it.
 */
export async function* emitPlaylist(header: string, records: AsyncIterable<OutputRecord>): AsyncGenerator<string> {
  yield `${header}\n`;
  for await (const record of records) {
    yield `${record.metadata}\n${record.locator}\n`;
  }
}
