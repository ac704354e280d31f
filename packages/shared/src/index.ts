export * from './errors';
export * from './logger';
export * from './config/schema';
export * from './config/loader';
