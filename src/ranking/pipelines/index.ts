export * from './base';
export * from './registry';
export { OneShotPipeline, ChainOfThoughtPipeline } from './singleCall';
export { MultiLayerPipeline } from './multiLayer';
export { DecomposedAlgorithmicPipeline } from './decomposedAlgorithmic';
export { evaluateCriterion, evaluateAllCriteria, UNKNOWN_RATING } from './criterionEvaluator';
