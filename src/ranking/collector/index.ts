export * from './resultCollector';
export * from './differences';
