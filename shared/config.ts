import { z } from 'zod';

export const DEFAULT_LOCATOR_SCHEMES = ['http', 'https', 'rtmp', 'rtsp', 'rtp', 'udp', 'mms', 'mmsh'];

export const OriginSchema = z.object({
  name: z.string().min(1),
  urlTemplate: z.string().min(1),
});

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  credentials: z.object({
    username: z.string(),
    password: z.string(),
  }),
  acquisition: z.object({
    origins: z.array(OriginSchema),
    rotation: z.enum(['cycle', 'fixed']),
    maxAttempts: z.number().int().positive(),
    backoffMs: z.number().int().nonnegative(),
    connectTimeoutMs: z.number().int().positive(),
    readTimeoutMs: z.number().int().positive(),
    maxHeaderBytes: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  playlist: z.object({
    maxLineBytes: z.number().int().positive(),
    locatorSchemes: z.array(z.string().min(1)).min(1),
    categoryAttribute: z.string().min(1),
    forwardHeaderAttributes: z.array(z.string().min(1)),
    taxonomyPath: z.string().min(1),
  }),
  classifier: z.object({
    enabled: z.boolean(),
    apiKey: z.string().optional(),
    model: z.string().min(1),
    timeoutMs: z.number().int().positive(),
    maxCallsPerPass: z.number().int().nonnegative(),
  }),
  cache: z.object({
    enabled: z.boolean(),
    maxBytes: z.number().int().positive(),
    maxStaleMs: z.number().int().nonnegative(),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type OriginConfig = z.infer<typeof OriginSchema>;

export interface PublicConfig {
  origins: string[];
  rotation: AppConfig['acquisition']['rotation'];
  maxAttempts: number;
  hasCredentials: boolean;
  classifierEnabled: boolean;
  cacheEnabled: boolean;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  origins: config.acquisition.origins.map((origin) => origin.name),
  rotation: config.acquisition.rotation,
  maxAttempts: config.acquisition.maxAttempts,
  hasCredentials: Boolean(config.credentials.username && config.credentials.password),
  classifierEnabled: config.classifier.enabled && Boolean(config.classifier.apiKey),
  cacheEnabled: config.cache.enabled,
});

/**
 * Parses one `PLAYLIST_ORIGINS` entry. Accepts `name=template` or a bare template,
 * in which case the template's host names the origin.
 */
export const parseOriginEntry = (entry: string, index: number): OriginConfig | null => {
  const trimmed = entry.trim();
  if (!trimmed) return null;
  const eq = trimmed.indexOf('=');
  const schemeAt = trimmed.indexOf('://');
  if (eq > 0 && (schemeAt < 0 || eq < schemeAt)) {
    const name = trimmed.slice(0, eq).trim();
    const urlTemplate = trimmed.slice(eq + 1).trim();
    if (name && urlTemplate) {
      return { name, urlTemplate };
    }
  }
  return { name: originNameFromTemplate(trimmed, index), urlTemplate: trimmed };
};

export const originNameFromTemplate = (template: string, index: number): string => {
  try {
    const host = new URL(template.replace(/\{[a-z]+\}/gi, 'x')).host;
    return host || `origin-${index + 1}`;
  } catch {
    return `origin-${index + 1}`;
  }
};
