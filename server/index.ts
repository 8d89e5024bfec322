import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config/config';
import { createLogger, errorMessage } from './obs/logger';
import { createFsDocumentStore } from './persistence/fsStore';

const config = loadConfig();
const logger = createLogger(config);
const store = createFsDocumentStore(config, logger);

logger.info('Config loaded', {
  environment: config.environment,
  provider: config.ai.provider,
  persistenceRoot: config.persistence.rootDir,
  maxUploadBytes: config.uploads.maxBytes,
  confluence: {
    hasDefaultCredentials: Boolean(config.confluence.defaultEmail && config.confluence.defaultToken),
  },
});

const start = async () => {
  await store.ensureLayout();
  const app = createApp({ config, logger, store });
  const port = config.server.port;
  app.listen(port, () => {
    logger.info('Server listening', { url: `http://localhost:${port}` });
  });
};

start().catch((error: unknown) => {
  logger.error('Server failed to start', { error: errorMessage(error) });
  process.exitCode = 1;
});
