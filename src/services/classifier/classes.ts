/** Soil types in the index order the network was trained with. */
export const SOIL_CLASSES = [
  'alluvial',
  'black',
  'cinder',
  'clay',
  'laterite',
  'peat',
  'red',
  'sandy',
  'yellow',
] as const;

export const MODEL_ARCHITECTURE = 'InceptionV3 (Transfer Learning)';
