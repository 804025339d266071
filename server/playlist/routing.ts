import type { CompiledRegion, CompiledTaxonomy, RoutingPrefix } from './taxonomy';

const SEPARATORS = new Set(['|', ':', '-', '_', ' ', '\t']);

export interface Route {
  region: CompiledRegion;
  prefix: string;
  /** Display name with every leading routing prefix removed. */
  strippedName: string;
}

const startsWithPrefix = (value: string, prefix: string): boolean =>
  value.slice(0, prefix.length).toLowerCase() === prefix.toLowerCase();

export const matchPrefix = (value: string, prefixes: readonly RoutingPrefix[]): RoutingPrefix | null =>
  prefixes.find((entry) => startsWithPrefix(value, entry.prefix)) ?? null;

/**
 * Removes the routing prefix and one following separator, repeatedly, so the result never
 * starts with a configured prefix (`US| US|CNN` becomes `CNN`).
 */
export const stripRoutingPrefix = (displayName: string, prefixes: readonly RoutingPrefix[]): string => {
  let rest = displayName.trim();
  for (let match = matchPrefix(rest, prefixes); match; match = matchPrefix(rest, prefixes)) {
    rest = rest.slice(match.prefix.length);
    if (rest && SEPARATORS.has(rest[0])) {
      rest = rest.slice(1);
    }
    rest = rest.trimStart();
  }
  return rest.trimEnd();
};

/**
 * Admission: the display name must open with a configured routing prefix. The first prefix
 * decides the region. Returns null for names outside every region, or names that are empty
 * once the prefix is gone.
 */
export const resolveRoute = (displayName: string, taxonomy: CompiledTaxonomy): Route | null => {
  const trimmed = displayName.trim();
  const match = matchPrefix(trimmed, taxonomy.prefixes);
  if (!match) return null;
  const strippedName = stripRoutingPrefix(trimmed, taxonomy.prefixes);
  if (!strippedName) return null;
  return { region: match.region, prefix: match.prefix, strippedName };
};
