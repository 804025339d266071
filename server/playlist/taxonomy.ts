import fs from 'node:fs';
import JSON5 from 'json5';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors';

const CategorySchema = z.object({
  name: z.string().min(1),
  scope: z.string().min(1),
  keywords: z.array(z.string().min(1)),
  drop: z.boolean().optional(),
});

const RegionSchema = z.object({
  tag: z.string().min(1),
  prefixes: z.array(z.string().min(1)).min(1),
  scopes: z.array(z.string().min(1)).min(1),
  generalCategory: z.string().min(1),
});

export const TaxonomySchema = z
  .object({
    regions: z.array(RegionSchema).min(1),
    categories: z.array(CategorySchema).min(1),
  })
  .superRefine((taxonomy, ctx) => {
    const names = new Set<string>();
    for (const category of taxonomy.categories) {
      if (names.has(category.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate category name "${category.name}"` });
      }
      names.add(category.name);
    }

    const prefixOwner = new Map<string, string>();
    const tags = new Set<string>();
    for (const region of taxonomy.regions) {
      if (tags.has(region.tag)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate region tag "${region.tag}"` });
      }
      tags.add(region.tag);
      for (const prefix of region.prefixes) {
        const key = prefix.toLowerCase();
        const owner = prefixOwner.get(key);
        if (owner && owner !== region.tag) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Routing prefix "${prefix}" is claimed by both "${owner}" and "${region.tag}"`,
          });
        }
        prefixOwner.set(key, region.tag);
      }
      const general = taxonomy.categories.find((c) => c.name === region.generalCategory);
      if (!general) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Region "${region.tag}" names unknown general category "${region.generalCategory}"`,
        });
      } else if (!region.scopes.includes(general.scope)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `General category "${general.name}" is outside the scopes of region "${region.tag}"`,
        });
      }
    }
  });

export type Taxonomy = z.infer<typeof TaxonomySchema>;

export interface CompiledCategory {
  name: string;
  /** Lowercased, NFC-normalized keywords, table order. */
  keywords: string[];
  drop: boolean;
}

export interface CompiledRegion {
  tag: string;
  generalCategory: string;
  /** Eligible categories in table order; the order is the tie-break. */
  categories: CompiledCategory[];
  /** Category names offered to an external classifier, table order. */
  labels: string[];
}

export interface RoutingPrefix {
  prefix: string;
  region: CompiledRegion;
}

export interface CompiledTaxonomy {
  regions: Map<string, CompiledRegion>;
  /** Longest first, so overlapping prefixes resolve to the most specific one. */
  prefixes: RoutingPrefix[];
  droppedCategories: Set<string>;
}

export const normalizeForMatch = (value: string): string => value.normalize('NFC').toLowerCase();

export const compileTaxonomy = (taxonomy: Taxonomy): CompiledTaxonomy => {
  const compiled = taxonomy.categories.map((category) => ({
    scope: category.scope,
    category: {
      name: category.name,
      keywords: category.keywords.map(normalizeForMatch),
      drop: Boolean(category.drop),
    },
  }));

  const regions = new Map<string, CompiledRegion>();
  const prefixes: RoutingPrefix[] = [];
  for (const region of taxonomy.regions) {
    const categories = compiled.filter((entry) => region.scopes.includes(entry.scope)).map((entry) => entry.category);
    const built: CompiledRegion = {
      tag: region.tag,
      generalCategory: region.generalCategory,
      categories,
      labels: categories.map((category) => category.name),
    };
    regions.set(region.tag, built);
    for (const prefix of region.prefixes) {
      prefixes.push({ prefix, region: built });
    }
  }
  prefixes.sort((a, b) => b.prefix.length - a.prefix.length);

  return {
    regions,
    prefixes,
    droppedCategories: new Set(taxonomy.categories.filter((c) => c.drop).map((c) => c.name)),
  };
};

export const parseTaxonomy = (source: string, origin = 'taxonomy'): Taxonomy => {
  let raw: unknown;
  try {
    raw = JSON5.parse(source);
  } catch (error) {
    throw new ConfigurationError(`Taxonomy ${origin} is not valid JSON5: ${errorMessage(error)}`);
  }
  const parsed = TaxonomySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const at = issue.path.length ? `${issue.path.join('.')}: ` : '';
      return `${at}${issue.message}`;
    });
    throw new ConfigurationError(`Taxonomy ${origin} is invalid: ${issues.join('; ')}`);
  }
  return parsed.data;
};

export const loadTaxonomy = (filePath: string): Taxonomy => {
  let source: string;
  try {
    source = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read taxonomy ${filePath}: ${errorMessage(error)}`);
  }
  return parseTaxonomy(source, filePath);
};
