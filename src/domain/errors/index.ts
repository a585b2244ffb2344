export * from './ResolutionError';
export * from './InvalidMediaError';
