import { compileTaxonomy, parseTaxonomy, type CompiledRegion, type CompiledTaxonomy } from '../taxonomy';

const encoder = new TextEncoder();

export async function* bytesOf(...chunks: Array<string | Uint8Array>): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
  }
}

export async function* linesOf(...lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

export const collect = async <T>(items: AsyncIterable<T>): Promise<T[]> => {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
};

export const readableOf = (...parts: string[]): ReadableStream<Uint8Array> =>
  new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) controller.enqueue(encoder.encode(part));
      controller.close();
    },
  });

export const testTaxonomy: CompiledTaxonomy = compileTaxonomy(
  parseTaxonomy(
    JSON.stringify({
      regions: [
        { tag: 'usa', prefixes: ['US|', 'US:'], scopes: ['usa', 'global'], generalCategory: 'USA General' },
        { tag: 'mexico', prefixes: ['MX|'], scopes: ['mexico', 'global'], generalCategory: 'Mexico General' },
      ],
      categories: [
        { name: 'USA News', scope: 'usa', keywords: ['cnn', 'fox news'] },
        { name: 'Mexico Movies', scope: 'mexico', keywords: ['cine', 'canal 5'] },
        { name: 'Soccer', scope: 'global', keywords: ['futbol', 'fútbol', 'soccer'] },
        { name: 'Adult', scope: 'global', keywords: ['xxx'], drop: true },
        { name: 'USA General', scope: 'usa', keywords: ['fox'] },
        { name: 'Mexico General', scope: 'mexico', keywords: [] },
      ],
    }),
  ),
);

export const regionOf = (taxonomy: CompiledTaxonomy, tag: string): CompiledRegion => {
  const region = taxonomy.regions.get(tag);
  if (!region) throw new Error(`No region ${tag}`);
  return region;
};
