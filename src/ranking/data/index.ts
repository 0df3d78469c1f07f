export * from './loaders';
export * from './blind';
export * from './sanitizer';
