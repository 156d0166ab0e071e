import winston from 'winston';
import { ServiceUnavailableError } from '../helpers/errors';
import {
  CentroidPredictResponse,
  ClassesResponse,
  HealthResponse,
  ModelInfoResponse,
  Prediction,
  PredictResponse,
  StatusResponse,
} from '../types/response';
import { INPUT_SHAPE, preprocessImage, RESAMPLING_FILTER } from '../utils/image-preprocessing';
import { argmax, roundTo, toLabelMap } from '../utils/vectors';
import { CentroidTable, nearestCentroid } from './centroids';
import { MODEL_ARCHITECTURE, SOIL_CLASSES } from './classifier/classes';
import { ImageClassifier } from './classifier/ImageClassifier';

export type ServiceState = 'model_unavailable' | 'ready';

/** Handles shared by every request. Either may be absent after start-up. */
export interface InferenceContext {
  classifier: ImageClassifier | null;
  centroids: CentroidTable | null;
}

export interface ArtifactLoaders {
  loadClassifier: () => Promise<ImageClassifier>;
  loadCentroids: (classifier: ImageClassifier) => Promise<CentroidTable>;
}

const MODEL_NOT_LOADED = 'Model not loaded. Please check server logs.';
const CENTROIDS_NOT_LOADED = 'Centroids not loaded. Centroid prediction is unavailable.';

export class InferenceService {
  private state: ServiceState = 'model_unavailable';
  private context: Readonly<InferenceContext> = Object.freeze({ classifier: null, centroids: null });

  constructor(
    private readonly logger: winston.Logger,
    private readonly classes: readonly string[] = SOIL_CLASSES
  ) {}

  /** A service that is already past start-up, built around the given handles. */
  static fromContext(
    context: InferenceContext,
    logger: winston.Logger,
    classes: readonly string[] = SOIL_CLASSES
  ): InferenceService {
    const service = new InferenceService(logger, classes);
    service.context = Object.freeze({ ...context });
    service.state = 'ready';
    return service;
  }

  /**
   * Loads the model, then the centroid table. Failures are logged and leave
   * the matching handle empty for the rest of the process lifetime.
   */
  async initialize(loaders: ArtifactLoaders): Promise<void> {
    if (this.state !== 'model_unavailable') {
      throw new Error('Inference service has already been initialized');
    }

    let classifier: ImageClassifier | null = null;
    let centroids: CentroidTable | null = null;

    try {
      this.logger.info('Loading model...');
      classifier = await loaders.loadClassifier();
      this.logger.info('Model loaded successfully');
    } catch (err) {
      this.logger.error(`Error loading model: ${err instanceof Error ? err.message : err}`);
    }

    if (classifier) {
      try {
        centroids = await loaders.loadCentroids(classifier);
        this.logger.info(`Centroids loaded (${centroids.space} space, length ${centroids.dimension})`);
      } catch (err) {
        this.logger.warn(
          `Centroids not loaded, centroid prediction disabled: ${err instanceof Error ? err.message : err}`
        );
      }
    }

    this.context = Object.freeze({ classifier, centroids });
    this.state = 'ready';
  }

  getState(): ServiceState {
    return this.state;
  }

  get modelLoaded(): boolean {
    return this.context.classifier !== null;
  }

  get centroidsLoaded(): boolean {
    return this.context.centroids !== null;
  }

  getStatus(): StatusResponse {
    return {
      status: 'online',
      message: 'Soil Classification API',
      model: 'InceptionV3',
      classes: this.classes.length,
      model_loaded: this.modelLoaded,
      endpoints: {
        health: '/health',
        predict: '/predict (POST)',
        predict_with_centroids: '/predict-with-centroids (POST)',
        classes: '/classes',
        model_info: '/model-info',
      },
    };
  }

  getHealth(): HealthResponse {
    return {
      status: this.modelLoaded ? 'healthy' : 'model_not_loaded',
      model_loaded: this.modelLoaded,
      centroids_loaded: this.centroidsLoaded,
      num_classes: this.classes.length,
      message: this.modelLoaded ? 'Ready' : 'Model not loaded',
    };
  }

  listClasses(): ClassesResponse {
    return {
      classes: [...this.classes],
      count: this.classes.length,
    };
  }

  getModelInfo(): ModelInfoResponse {
    return {
      architecture: MODEL_ARCHITECTURE,
      input_shape: [...INPUT_SHAPE],
      classes: [...this.classes],
      count: this.classes.length,
      preprocessing: 'InceptionV3 (scale [0, 255] to [-1, 1])',
      resampling: RESAMPLING_FILTER,
      model_loaded: this.modelLoaded,
      centroids_loaded: this.centroidsLoaded,
    };
  }

  requireModel(): ImageClassifier {
    const { classifier } = this.context;
    if (!classifier) {
      throw new ServiceUnavailableError(MODEL_NOT_LOADED);
    }
    return classifier;
  }

  requireCentroids(): { classifier: ImageClassifier; centroids: CentroidTable } {
    const classifier = this.requireModel();
    const { centroids } = this.context;
    if (!centroids) {
      throw new ServiceUnavailableError(CENTROIDS_NOT_LOADED);
    }
    return { classifier, centroids };
  }

  async predict(image: Buffer): Promise<PredictResponse> {
    const classifier = this.requireModel();
    const started = performance.now();

    const pixels = await preprocessImage(image);
    const { probabilities } = await classifier.classify(pixels);
    const prediction = this.toPrediction(probabilities);

    const processingTime = this.elapsedSeconds(started);
    this.logger.debug(
      `Predicted ${prediction.class} (${prediction.confidence.toFixed(4)}) in ${processingTime}s`
    );

    return { success: true, prediction, processing_time: processingTime };
  }

  /**
   * Softmax prediction plus the nearest class centroid. The centroid result
   * is reported next to the softmax class and never replaces it.
   */
  async predictWithCentroids(image: Buffer): Promise<CentroidPredictResponse> {
    const { classifier, centroids } = this.requireCentroids();
    const started = performance.now();

    const pixels = await preprocessImage(image);
    const output = await classifier.classify(
      pixels,
      centroids.space === 'embedding' ? { featureLayer: centroids.layer } : {}
    );
    const prediction = this.toPrediction(output.probabilities);

    const features = centroids.space === 'embedding' ? output.features : output.probabilities;
    if (!features) {
      throw new Error('Classifier returned no features for the centroid layer');
    }
    const centroidPrediction = nearestCentroid(centroids, features, this.classes);

    const processingTime = this.elapsedSeconds(started);
    this.logger.debug(
      `Predicted ${prediction.class}, nearest centroid ${centroidPrediction.class} in ${processingTime}s`
    );

    return {
      success: true,
      prediction,
      centroid_prediction: centroidPrediction,
      processing_time: processingTime,
    };
  }

  private toPrediction(probabilities: readonly number[]): Prediction {
    if (probabilities.length !== this.classes.length) {
      throw new Error(
        `Model returned ${probabilities.length} probabilities for ${this.classes.length} classes`
      );
    }

    const index = argmax(probabilities);
    return {
      class: this.classes[index],
      class_index: index,
      confidence: probabilities[index],
      probabilities: toLabelMap(this.classes, probabilities),
    };
  }

  private elapsedSeconds(started: number): number {
    return roundTo((performance.now() - started) / 1000, 3);
  }
}
