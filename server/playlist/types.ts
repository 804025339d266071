export interface Origin {
  name: string;
  urlTemplate: string;
}

export interface Credentials {
  username: string;
  password: string;
}

export interface RawRecord {
  metadata: string;
  locator: string;
}

export interface MetadataAttribute {
  key: string;
  value: string;
  /** Token text exactly as it appeared, e.g. `tvg-id="cnn.us"`. */
  raw: string;
  /** Offsets of `raw` within `ParsedMetadata.attributeBlock`. */
  start: number;
  end: number;
}

export interface ParsedMetadata {
  /** Directive plus duration, e.g. `#EXTINF:-1`. */
  head: string;
  /** Everything between the duration and the display-name delimiter, leading whitespace included. */
  attributeBlock: string;
  attributes: MetadataAttribute[];
  displayName: string;
}

export type Provenance = 'keyword' | 'external' | 'fallback';

export interface ClassificationResult {
  category: string;
  provenance: Provenance;
  /** Keyword that decided a `keyword` classification. */
  keyword?: string;
}

export interface OutputRecord {
  metadata: string;
  locator: string;
  category: string;
  provenance: Provenance;
}

export interface FetchedPlaylist {
  origin: string;
  /** First line of the document, already validated. */
  headerLine: string;
  /** The complete document, header included. Single pass. */
  body: AsyncIterable<Uint8Array>;
  cancel: (reason?: string) => Promise<void>;
}

export interface PassStats {
  lines: number;
  decodeSkips: number;
  oversizedLines: number;
  records: number;
  malformed: number;
  orphanedMetadata: number;
  strayLocators: number;
  outOfRegion: number;
  duplicates: number;
  dropped: number;
  emitted: number;
  provenance: Record<Provenance, number>;
  externalFailures: number;
}

export const createPassStats = (): PassStats => ({
  lines: 0,
  decodeSkips: 0,
  oversizedLines: 0,
  records: 0,
  malformed: 0,
  orphanedMetadata: 0,
  strayLocators: 0,
  outOfRegion: 0,
  duplicates: 0,
  dropped: 0,
  emitted: 0,
  provenance: { keyword: 0, external: 0, fallback: 0 },
  externalFailures: 0,
});
