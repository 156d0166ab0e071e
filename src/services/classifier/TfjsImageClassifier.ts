import * as tf from '@tensorflow/tfjs';
import winston from 'winston';
import { INPUT_SHAPE } from '../../utils/image-preprocessing';
import { ClassifierOutput, ClassifyOptions, ImageClassifier } from './ImageClassifier';

const readAndDispose = async (tensor: tf.Tensor): Promise<number[]> => {
  try {
    return Array.from(await tensor.data());
  } finally {
    tensor.dispose();
  }
};

const sameShape = (actual: readonly (number | null)[], expected: readonly number[]): boolean =>
  actual.length === expected.length + 1 &&
  expected.every((dimension, index) => actual[index + 1] === dimension);

export class TfjsImageClassifier implements ImageClassifier {
  private readonly featureModels = new Map<string, tf.LayersModel>();

  constructor(
    private readonly model: tf.LayersModel,
    private readonly logger: winston.Logger
  ) {}

  /**
   * Wraps a loaded model after checking it takes a 299x299x3 image and emits
   * one probability per class.
   */
  static fromModel(
    model: tf.LayersModel,
    classCount: number,
    logger: winston.Logger
  ): TfjsImageClassifier {
    if (model.inputs.length !== 1 || !sameShape(model.inputs[0].shape, INPUT_SHAPE)) {
      throw new Error(
        `Model input shape ${JSON.stringify(model.inputs.map((input) => input.shape))} does not match [null,${INPUT_SHAPE.join(',')}]`
      );
    }
    if (model.outputs.length !== 1 || !sameShape(model.outputs[0].shape, [classCount])) {
      throw new Error(
        `Model output shape ${JSON.stringify(model.outputs.map((output) => output.shape))} does not match [null,${classCount}]`
      );
    }

    logger.debug(`Model ${model.name} accepted: ${model.layers.length} layers`);
    return new TfjsImageClassifier(model, logger);
  }

  prepareFeatureLayer(layerName: string): number | null {
    const existing = this.featureModels.get(layerName);
    if (existing) {
      return this.flattenedSize(existing.outputs[0].shape);
    }

    const output = this.model.getLayer(layerName).output;
    if (Array.isArray(output)) {
      throw new Error(`Layer ${layerName} has more than one output`);
    }

    const featureModel = tf.model({
      inputs: this.model.inputs,
      outputs: [output, this.model.outputs[0]],
    });
    this.featureModels.set(layerName, featureModel);
    this.logger.debug(`Feature layer ${layerName} prepared with shape ${JSON.stringify(output.shape)}`);

    return this.flattenedSize(output.shape);
  }

  async classify(pixels: Float32Array, options: ClassifyOptions = {}): Promise<ClassifierOutput> {
    const input = tf.tensor4d(pixels, [1, ...INPUT_SHAPE]);

    try {
      const { featureLayer } = options;
      if (featureLayer === undefined) {
        const output = this.model.predict(input);
        if (Array.isArray(output)) {
          tf.dispose(output);
          throw new Error(`Expected a single output tensor, got ${output.length}`);
        }
        return { probabilities: await readAndDispose(output) };
      }

      const featureModel = this.featureModels.get(featureLayer);
      if (!featureModel) {
        throw new Error(`Feature layer ${featureLayer} has not been prepared`);
      }

      const outputs = featureModel.predict(input);
      if (!Array.isArray(outputs) || outputs.length !== 2) {
        tf.dispose(outputs);
        throw new Error(`Feature model for ${featureLayer} returned an unexpected output`);
      }

      const [features, probabilities] = await Promise.all(outputs.map(readAndDispose));
      return { probabilities, features };
    } finally {
      input.dispose();
    }
  }

  private flattenedSize(shape: readonly (number | null)[]): number | null {
    let size = 1;
    for (const dimension of shape.slice(1)) {
      if (dimension === null) {
        return null;
      }
      size *= dimension;
    }
    return size;
  }
}
