export type { LoadOptions, PredictionSet } from './loader.js';
export {
  evaluatePredictionSet,
  loadPredictionSetFromFile,
  loadPredictionSetFromObject,
  loadPredictionSetFromText,
  savePredictionSetToFile,
} from './loader.js';
export {
  fileOptionsSchema,
  predictionRowSchema,
  predictionSetSchema,
  probabilitiesSchema,
} from './schema.js';
