import winston from 'winston';
import { Config } from '../config/config';
import { ensureArtifact, ensureModelArtifacts } from '../utils/files';
import { bindCentroidTable, loadCentroidTable } from './centroids';
import { SOIL_CLASSES } from './classifier/classes';
import { loadLayersModelFromDisk } from './classifier/model-loader';
import { TfjsImageClassifier } from './classifier/TfjsImageClassifier';
import { ArtifactLoaders } from './InferenceService';

/** Start-up loaders reading local artifacts, downloading any that are missing. */
export const createArtifactLoaders = (
  config: Readonly<Config>,
  logger: winston.Logger
): ArtifactLoaders => ({
  loadClassifier: async () => {
    const modelPath = await ensureModelArtifacts(
      config.modelPath,
      config.modelUrl,
      config.downloadTimeoutMs
    );

    const started = Date.now();
    const model = await loadLayersModelFromDisk(modelPath);
    logger.debug(`Model read from ${modelPath} in ${Date.now() - started}ms`);

    return TfjsImageClassifier.fromModel(model, SOIL_CLASSES.length, logger);
  },

  loadCentroids: async (classifier) => {
    const centroidsPath = await ensureArtifact(
      config.centroidsPath,
      config.centroidsUrl,
      config.downloadTimeoutMs
    );
    const table = await loadCentroidTable(centroidsPath, SOIL_CLASSES);
    return bindCentroidTable(table, classifier);
  },
});
