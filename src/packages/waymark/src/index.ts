export * from './config';
export * from './errors';
export * from './eventStore';
export * from './messageBus';
export * from './processors';
export * from './serialization';
export * from './testing';
export * from './typing';
export * from './utils';
export * from './validation';
export * from './workflows';
