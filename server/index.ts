import 'dotenv/config';
import { getPublicConfig } from '../shared/config';
import { loadConfig } from './config/config';
import { createApp } from './http/app';
import { createLogger } from './obs/logger';
import { ChannelClassifier, type ExternalClassifier } from './playlist/classifier';
import { errorMessage } from './playlist/errors';
import { InMemorySnapshotCache } from './playlist/snapshotCache';
import { compileTaxonomy, loadTaxonomy } from './playlist/taxonomy';
import { GeminiChannelClassifier } from './services/geminiClassifier';

const config = loadConfig();
const logger = createLogger(config);

const startServer = () => {
  const taxonomy = compileTaxonomy(loadTaxonomy(config.playlist.taxonomyPath));

  let external: ExternalClassifier | null = null;
  if (config.classifier.enabled && config.classifier.apiKey) {
    external = new GeminiChannelClassifier({
      apiKey: config.classifier.apiKey,
      model: config.classifier.model,
      logger,
    });
  }

  const classifier = new ChannelClassifier({
    external,
    timeoutMs: config.classifier.timeoutMs,
    maxCallsPerPass: config.classifier.maxCallsPerPass,
    logger,
  });

  logger.info('Config loaded', {
    environment: config.environment,
    ...getPublicConfig(config),
    regions: Array.from(taxonomy.regions.keys()),
    externalClassifier: classifier.hasExternal ? config.classifier.model : null,
  });

  const app = createApp({
    config,
    taxonomy,
    classifier,
    cache: config.cache.enabled ? new InMemorySnapshotCache() : null,
    logger,
  });

  const port = config.server.port;
  app.listen(port, () => {
    logger.info('Server listening', { url: `http://localhost:${port}/playlist.m3u` });
  });
};

try {
  startServer();
} catch (error) {
  logger.error('Startup failed', { error: errorMessage(error) });
  process.exitCode = 1;
}
