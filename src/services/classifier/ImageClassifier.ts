export type ClassifyOptions = {
  /** Also return the flattened activation of this layer. */
  featureLayer?: string;
};

export type ClassifierOutput = {
  probabilities: number[];
  features?: number[];
};

export interface ImageClassifier {
  /**
   * Runs one forward pass over a normalised 299x299x3 image (HWC layout).
   */
  classify: (pixels: Float32Array, options?: ClassifyOptions) => Promise<ClassifierOutput>;
  /**
   * Makes `layerName` available as a feature layer and returns its flattened
   * size, or null when the layer's shape is not fully known.
   */
  prepareFeatureLayer: (layerName: string) => number | null;
}
