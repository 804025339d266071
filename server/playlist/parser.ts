import type { MetadataAttribute, ParsedMetadata, PassStats, RawRecord } from './types';

const METADATA_DIRECTIVE = /^#EXTINF:/i;
const HEAD_PATTERN = /^#EXTINF:[ \t]*(?:[-+]?\d+(?:\.\d+)?)?/i;
const KEY_PATTERN = /[A-Za-z0-9_.:-]+/y;
const UNQUOTED_VALUE = /[^\s,]*/y;
const WHITESPACE = /[ \t]/;

export const buildLocatorPattern = (schemes: readonly string[]): RegExp => {
  const escaped = schemes.map((scheme) => scheme.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
  return new RegExp(`^(?:${escaped.join('|')})://\\S`, 'i');
};

/**
 * Splits an `#EXTINF` line into its head, attribute block and display name.
 *
 * The delimiter is the first comma after the attribute block, so commas inside quoted
 * attribute values or inside the display name do not move the split. Returns null when the
 * line does not follow `#EXTINF:<duration> key="value"...,<name>`.
 */
export const splitMetadata = (line: string): ParsedMetadata | null => {
  const text = line.trim();
  const headMatch = HEAD_PATTERN.exec(text);
  if (!headMatch) return null;
  const head = headMatch[0].replace(/[ \t]+$/, '');
  const blockStart = head.length;
  const attributes: MetadataAttribute[] = [];
  let pos = blockStart;

  while (pos < text.length) {
    const char = text[pos];
    if (WHITESPACE.test(char)) {
      pos += 1;
      continue;
    }
    if (char === ',') {
      return {
        head,
        attributeBlock: text.slice(blockStart, pos),
        attributes,
        displayName: text.slice(pos + 1).trim(),
      };
    }

    const tokenStart = pos;
    KEY_PATTERN.lastIndex = pos;
    const keyMatch = KEY_PATTERN.exec(text);
    if (!keyMatch) return null;
    pos += keyMatch[0].length;
    if (text[pos] !== '=') return null;
    pos += 1;

    let value: string;
    const quote = text[pos];
    if (quote === '"' || quote === "'") {
      const closing = text.indexOf(quote, pos + 1);
      if (closing < 0) return null;
      value = text.slice(pos + 1, closing);
      pos = closing + 1;
    } else {
      UNQUOTED_VALUE.lastIndex = pos;
      const valueMatch = UNQUOTED_VALUE.exec(text);
      value = valueMatch ? valueMatch[0] : '';
      pos += value.length;
    }

    attributes.push({
      key: keyMatch[0],
      value,
      raw: text.slice(tokenStart, pos),
      start: tokenStart - blockStart,
      end: pos - blockStart,
    });
  }

  return null;
};

export interface ParseRecordsOptions {
  locatorSchemes: readonly string[];
  stats?: PassStats;
}

/**
 * Pairs each `#EXTINF` line with the locator line that directly follows it. Blank lines are
 * skipped; any other line in between orphans the pending metadata.
 */
export async function* parseRecords(
  lines: AsyncIterable<string>,
  options: ParseRecordsOptions,
): AsyncGenerator<RawRecord> {
  const locatorPattern = buildLocatorPattern(options.locatorSchemes);
  const stats = options.stats;
  let pending: string | null = null;

  for await (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    if (METADATA_DIRECTIVE.test(line)) {
      if (pending !== null && stats) stats.orphanedMetadata += 1;
      pending = line;
      continue;
    }

    if (locatorPattern.test(line)) {
      if (pending === null) {
        if (stats) stats.strayLocators += 1;
        continue;
      }
      const record: RawRecord = { metadata: pending, locator: line };
      pending = null;
      if (stats) stats.records += 1;
      yield record;
      continue;
    }

    if (pending !== null) {
      if (stats) stats.orphanedMetadata += 1;
      pending = null;
    }
  }

  if (pending !== null && stats) stats.orphanedMetadata += 1;
}
