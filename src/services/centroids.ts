import fs from 'fs/promises';
import { CentroidPrediction } from '../types/response';
import { argmin, euclideanDistance, toLabelMap } from '../utils/vectors';
import { ImageClassifier } from './classifier/ImageClassifier';

export type CentroidTable =
  | { space: 'probabilities'; dimension: number; vectors: number[][] }
  | { space: 'embedding'; layer: string; dimension: number; vectors: number[][] };

export class CentroidTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CentroidTableError';
  }
}

const isVector = (value: unknown): value is number[] =>
  Array.isArray(value) &&
  value.length > 0 &&
  value.every((entry) => typeof entry === 'number' && Number.isFinite(entry));

function readVectors(raw: unknown, classes: readonly string[]): number[][] {
  if (Array.isArray(raw)) {
    if (raw.length !== classes.length) {
      throw new CentroidTableError(`Expected ${classes.length} centroids, got ${raw.length}`);
    }
    return raw.map((vector, index) => {
      if (!isVector(vector)) {
        throw new CentroidTableError(`Centroid for ${classes[index]} is not a vector of numbers`);
      }
      return vector;
    });
  }

  if (typeof raw !== 'object' || raw === null) {
    throw new CentroidTableError("'centroids' must be an array or an object keyed by class");
  }

  const entries = new Map<string, unknown>(Object.entries(raw));
  const unexpected = [...entries.keys()].filter((label) => !classes.includes(label));
  if (unexpected.length > 0) {
    throw new CentroidTableError(`Unknown classes in centroid table: ${unexpected.join(', ')}`);
  }

  return classes.map((label) => {
    const vector = entries.get(label);
    if (vector === undefined) {
      throw new CentroidTableError(`Missing centroid for class ${label}`);
    }
    if (!isVector(vector)) {
      throw new CentroidTableError(`Centroid for ${label} is not a vector of numbers`);
    }
    return vector;
  });
}

/**
 * Validates a parsed centroid file: one vector per class, all of the same
 * length, in the softmax space or in a named layer's activation space.
 */
export function parseCentroidTable(raw: unknown, classes: readonly string[]): CentroidTable {
  if (typeof raw !== 'object' || raw === null || !('centroids' in raw)) {
    throw new CentroidTableError("Centroid file must be an object with a 'centroids' field");
  }

  const space = 'space' in raw ? raw.space : 'probabilities';
  if (space !== 'probabilities' && space !== 'embedding') {
    throw new CentroidTableError(`Unknown centroid space: ${String(space)}`);
  }

  const vectors = readVectors(raw.centroids, classes);
  const dimension = vectors[0].length;
  const mismatched = vectors.findIndex((vector) => vector.length !== dimension);
  if (mismatched !== -1) {
    throw new CentroidTableError(
      `Centroid for ${classes[mismatched]} has length ${vectors[mismatched].length}, expected ${dimension}`
    );
  }

  if (space === 'probabilities') {
    if (dimension !== classes.length) {
      throw new CentroidTableError(
        `Probability-space centroids must have length ${classes.length}, got ${dimension}`
      );
    }
    return { space, dimension, vectors };
  }

  const layer = 'layer' in raw ? raw.layer : undefined;
  if (typeof layer !== 'string' || layer.length === 0) {
    throw new CentroidTableError("Embedding-space centroids need a 'layer' name");
  }
  return { space, layer, dimension, vectors };
}

export async function loadCentroidTable(
  centroidsPath: string,
  classes: readonly string[]
): Promise<CentroidTable> {
  const raw: unknown = JSON.parse(await fs.readFile(centroidsPath, 'utf8'));
  return parseCentroidTable(raw, classes);
}

/**
 * Checks the table against the loaded model and, for embedding centroids,
 * prepares the feature layer they were computed from.
 */
export function bindCentroidTable(table: CentroidTable, classifier: ImageClassifier): CentroidTable {
  if (table.space === 'probabilities') {
    return table;
  }

  const size = classifier.prepareFeatureLayer(table.layer);
  if (size !== null && size !== table.dimension) {
    throw new CentroidTableError(
      `Layer ${table.layer} produces ${size} features but centroids have length ${table.dimension}`
    );
  }
  return table;
}

export function nearestCentroid(
  table: CentroidTable,
  features: readonly number[],
  classes: readonly string[]
): CentroidPrediction {
  if (features.length !== table.dimension) {
    throw new Error(
      `Feature vector has length ${features.length}, centroids have length ${table.dimension}`
    );
  }

  const distances = table.vectors.map((centroid) => euclideanDistance(features, centroid));
  const index = argmin(distances);

  return {
    class: classes[index],
    class_index: index,
    distance: distances[index],
    distances: toLabelMap(classes, distances),
  };
}
