export * from './walker';
export * from './digest';
export * from './checksums';
