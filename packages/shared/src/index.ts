export * from './types/snapshot';
export * from './types/adapter';
export * from './types/notification';
export * from './config/schema';
export * from './utils/logger';
export * from './utils/helpers';
