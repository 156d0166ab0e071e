import { createApp } from './app';
import { getConfig } from './config/config';
import logger from './logger';
import { createArtifactLoaders } from './services/artifact-loaders';
import { InferenceService } from './services/InferenceService';

const main = async () => {
  const config = getConfig();
  const service = new InferenceService(logger);

  if (config.runningMode === 'testing') {
    logger.info('Running in testing mode, skipping model loading');
  } else {
    await service.initialize(createArtifactLoaders(config, logger));
  }

  const app = createApp(service);
  app.listen(config.port, () => {
    logger.info(`Server is running on port - ${config.port}`);
    logger.debug(`Model loaded: ${service.modelLoaded}, centroids loaded: ${service.centroidsLoaded}`);
  });
};

main().catch((err) => {
  logger.error(`Failed to start server: ${err instanceof Error ? err.message : err}`);
  process.exit(1);
});
