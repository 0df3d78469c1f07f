export * from './aggregator';
