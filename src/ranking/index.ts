/**
 * CV ranking core
 */

export * from './types';
export * from './extraction/responseParser';
export * from './extraction/coercion';
export * from './criteria';
export * from './aggregation';
export * from './pipelines';
export * from './collector';
export * from './config';
export * from './data';
export * from './experiment';
