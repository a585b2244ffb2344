/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './IUnlockClient';
export * from './IFileSelector';
export * from './ICatalogClient';
export * from './IStreamSourceClient';
export * from './ILogger';
