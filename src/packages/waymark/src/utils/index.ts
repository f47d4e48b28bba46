export * from './closeable';
export * from './deepEquals';
export * from './locking';
export * from './promises';
export * from './retry';
