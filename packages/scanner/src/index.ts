export const name = '@sstable-age/scanner';

export * from './scanner';
export * from './config/loader';
