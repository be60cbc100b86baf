export const name = '@packbench/shared';

export * from './errors';
export * from './logger';
export * from './types/bench';
export * from './types/events';
export * from './config/schema';
export * from './fs/path';
export * from './fs/io';
export * from './observability';
