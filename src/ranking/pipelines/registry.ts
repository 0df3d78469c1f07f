/**
 * Pipeline registry
 */

import type { CompletionProvider } from '../../shared/llm/provider';
import { PIPELINE_NAMES, PipelineName } from '../types';
import type { PipelineOptions, RankingPipeline } from './base';
import { DecomposedAlgorithmicPipeline } from './decomposedAlgorithmic';
import { MultiLayerPipeline } from './multiLayer';
import { ChainOfThoughtPipeline, OneShotPipeline } from './singleCall';

export function isPipelineName(value: string): value is PipelineName {
  return PIPELINE_NAMES.some(name => name === value);
}

export function createPipeline(
  name: PipelineName,
  provider: CompletionProvider,
  options: PipelineOptions = {}
): RankingPipeline {
  switch (name) {
    case 'one_shot':
      return new OneShotPipeline(provider, options);
    case 'chain_of_thought':
      return new ChainOfThoughtPipeline(provider, options);
    case 'multi_layer':
      return new MultiLayerPipeline(provider, options);
    case 'decomposed_algorithmic':
      return new DecomposedAlgorithmicPipeline(provider, options);
  }
}
