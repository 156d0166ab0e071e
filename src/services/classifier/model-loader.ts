import fs from 'fs/promises';
import path from 'path';
import * as tf from '@tensorflow/tfjs';

const isModelJson = (value: unknown): value is tf.io.ModelJSON =>
  typeof value === 'object' &&
  value !== null &&
  'modelTopology' in value &&
  typeof value.modelTopology === 'object' &&
  value.modelTopology !== null &&
  (!('weightsManifest' in value) || Array.isArray(value.weightsManifest));

export async function readModelJson(modelJsonPath: string): Promise<tf.io.ModelJSON> {
  const parsed: unknown = JSON.parse(await fs.readFile(modelJsonPath, 'utf8'));

  if (!isModelJson(parsed)) {
    throw new Error(`${modelJsonPath} is not a TensorFlow.js layers model`);
  }
  return parsed;
}

/** Weight shard paths named by the manifest, relative to model.json. */
export function weightShardPaths(modelJson: tf.io.ModelJSON): string[] {
  return (modelJson.weightsManifest ?? []).flatMap((group) => group.paths);
}

async function readWeights(
  directory: string,
  manifest: tf.io.WeightsManifestConfig
): Promise<[tf.io.WeightsManifestEntry[], ArrayBuffer]> {
  const specs = manifest.flatMap((group) => group.weights);
  const shards = await Promise.all(
    manifest.flatMap((group) => group.paths).map((shard) => fs.readFile(path.join(directory, shard)))
  );

  const weightData = new ArrayBuffer(shards.reduce((total, shard) => total + shard.byteLength, 0));
  const view = new Uint8Array(weightData);
  let offset = 0;
  for (const shard of shards) {
    view.set(shard, offset);
    offset += shard.byteLength;
  }

  return [specs, weightData];
}

/**
 * Loads a converted Keras model (model.json plus binary shards) from the
 * local filesystem. The pure-JS TensorFlow.js build has no file:// handler,
 * so the artifacts are read with fs and handed over through an IOHandler.
 */
export async function loadLayersModelFromDisk(modelJsonPath: string): Promise<tf.LayersModel> {
  await tf.setBackend('cpu');
  await tf.ready();

  const modelJson = await readModelJson(modelJsonPath);
  const directory = path.dirname(modelJsonPath);

  const handler: tf.io.IOHandler = {
    load: () =>
      tf.io.getModelArtifactsForJSON(modelJson, (manifest) => readWeights(directory, manifest)),
  };

  return tf.loadLayersModel(handler);
}
