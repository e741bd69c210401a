export const name = '@sstable-age/shared';

export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './time-utils';
