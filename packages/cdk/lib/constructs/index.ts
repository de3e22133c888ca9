export * from './storage';
export * from './monitoring';
