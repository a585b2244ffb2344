export * from './Stream';
export * from './Media';
