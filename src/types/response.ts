export type ProbabilityMap = Record<string, number>;

export interface ErrorResponse {
  success: false;
  error: string;
}

export interface StatusResponse {
  status: 'online';
  message: string;
  model: string;
  classes: number;
  model_loaded: boolean;
  endpoints: Record<string, string>;
}

export interface HealthResponse {
  status: 'healthy' | 'model_not_loaded';
  model_loaded: boolean;
  centroids_loaded: boolean;
  num_classes: number;
  message: string;
}

export interface ClassesResponse {
  classes: string[];
  count: number;
}

export interface ModelInfoResponse {
  architecture: string;
  input_shape: [number, number, number];
  classes: string[];
  count: number;
  preprocessing: string;
  resampling: string;
  model_loaded: boolean;
  centroids_loaded: boolean;
}

export interface Prediction {
  class: string;
  class_index: number;
  confidence: number;
  probabilities: ProbabilityMap;
}

export interface CentroidPrediction {
  class: string;
  class_index: number;
  distance: number;
  distances: Record<string, number>;
}

export interface PredictResponse {
  success: true;
  prediction: Prediction;
  /** Seconds spent decoding, preprocessing and running the model. */
  processing_time: number;
}

export interface CentroidPredictResponse extends PredictResponse {
  centroid_prediction: CentroidPrediction;
}
