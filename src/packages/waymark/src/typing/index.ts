export * from './command';
export * from './event';
export * from './message';

export type DefaultRecord = Record<string, unknown>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AnyRecord = Record<any, any>;
