import type { ParsedMetadata } from './types';

const WHITESPACE = /\s/;

export const formatAttribute = (name: string, value: string): string => `${name}="${value.replace(/"/g, "'")}"`;

/**
 * Sets `attributeName` in the attribute block. An existing attribute keeps its position and
 * any repeats of it are removed; otherwise the attribute goes at the end of the block.
 * Every other token is kept byte for byte.
 */
export const setAttribute = (parsed: ParsedMetadata, attributeName: string, value: string): string => {
  const token = formatAttribute(attributeName, value);
  const wanted = attributeName.toLowerCase();
  const matches = parsed.attributes.filter((attr) => attr.key.toLowerCase() === wanted);
  const block = parsed.attributeBlock;

  if (!matches.length) {
    return `${block.trimEnd()} ${token}`;
  }

  let out = '';
  let cursor = 0;
  matches.forEach((attr, index) => {
    let cut = attr.start;
    if (index > 0) {
      while (cut > cursor && WHITESPACE.test(block[cut - 1])) cut -= 1;
    }
    out += block.slice(cursor, cut);
    if (index === 0) out += token;
    cursor = attr.end;
  });
  return out + block.slice(cursor);
};

export interface RewriteOptions {
  categoryAttribute: string;
  category: string;
  displayName: string;
}

export const rewriteMetadata = (parsed: ParsedMetadata, options: RewriteOptions): string =>
  `${parsed.head}${setAttribute(parsed, options.categoryAttribute, options.category)},${options.displayName}`;
