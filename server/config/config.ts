import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigSchema,
  DEFAULT_LOCATOR_SCHEMES,
  parseOriginEntry,
  type AppConfig,
  type OriginConfig,
} from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const csvFromEnv = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

// Failures are summarized per origin name, so two origins never share one.
const withUniqueNames = (origins: OriginConfig[]): OriginConfig[] => {
  const taken = new Set<string>();
  return origins.map((origin) => {
    let name = origin.name;
    for (let n = 2; taken.has(name); n += 1) {
      name = `${origin.name}#${n}`;
    }
    taken.add(name);
    return name === origin.name ? origin : { ...origin, name };
  });
};

const originsFromEnv = (value: string | undefined): OriginConfig[] =>
  withUniqueNames(
    csvFromEnv(value)
      .map((entry, index) => parseOriginEntry(entry, index))
      .filter((origin): origin is OriginConfig => origin !== null),
  );

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

const logLevelFromEnv = (value: string | undefined): LogLevel => {
  const normalized = (value || 'info').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
};

export const DEFAULT_TAXONOMY_PATH = fileURLToPath(new URL('./taxonomy.json5', import.meta.url));

export type { AppConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 5000),
    },
    credentials: {
      username: env.PLAYLIST_USERNAME?.trim() || '',
      password: env.PLAYLIST_PASSWORD?.trim() || '',
    },
    acquisition: {
      origins: originsFromEnv(env.PLAYLIST_ORIGINS),
      rotation: env.PLAYLIST_ROTATION?.trim().toLowerCase() === 'fixed' ? 'fixed' : 'cycle',
      maxAttempts: numberFromEnv(env.FETCH_MAX_ATTEMPTS, 5),
      backoffMs: numberFromEnv(env.FETCH_BACKOFF_MS, 2_000),
      connectTimeoutMs: numberFromEnv(env.FETCH_CONNECT_TIMEOUT_MS, 20_000),
      // Full channel lists are tens of megabytes on slow panels; the idle window must not truncate them.
      readTimeoutMs: numberFromEnv(env.FETCH_READ_TIMEOUT_MS, 60_000),
      maxHeaderBytes: numberFromEnv(env.FETCH_MAX_HEADER_BYTES, 16 * 1024),
      userAgent: env.FETCH_USER_AGENT?.trim() || 'VLC/3.0.20 LibVLC/3.0.20',
    },
    playlist: {
      maxLineBytes: numberFromEnv(env.PLAYLIST_MAX_LINE_BYTES, 64 * 1024),
      locatorSchemes: env.PLAYLIST_LOCATOR_SCHEMES
        ? csvFromEnv(env.PLAYLIST_LOCATOR_SCHEMES).map((s) => s.toLowerCase())
        : DEFAULT_LOCATOR_SCHEMES,
      categoryAttribute: env.PLAYLIST_CATEGORY_ATTRIBUTE?.trim() || 'group-title',
      forwardHeaderAttributes: env.PLAYLIST_FORWARD_HEADER_ATTRIBUTES
        ? csvFromEnv(env.PLAYLIST_FORWARD_HEADER_ATTRIBUTES)
        : ['url-tvg', 'x-tvg-url'],
      taxonomyPath: env.TAXONOMY_PATH?.trim()
        ? path.resolve(env.TAXONOMY_PATH.trim())
        : DEFAULT_TAXONOMY_PATH,
    },
    classifier: {
      enabled: booleanFromEnv(env.CLASSIFIER_ENABLED, true),
      apiKey: env.GEMINI_API_KEY?.trim() || undefined,
      model: env.CLASSIFIER_MODEL?.trim() || 'gemini-2.5-flash-lite',
      timeoutMs: numberFromEnv(env.CLASSIFIER_TIMEOUT_MS, 2_500),
      maxCallsPerPass: numberFromEnv(env.CLASSIFIER_MAX_CALLS, 200),
    },
    cache: {
      enabled: booleanFromEnv(env.CACHE_ENABLED, false),
      maxBytes: numberFromEnv(env.CACHE_MAX_BYTES, 64 * 1024 * 1024),
      maxStaleMs: numberFromEnv(env.CACHE_MAX_STALE_MS, 6 * 60 * 60 * 1000),
    },
    observability: {
      logLevel: logLevelFromEnv(env.LOG_LEVEL),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};
