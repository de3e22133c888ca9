export * from './inventory';
export * from './cold-archive';
export * from './deletion';
export * from './durable-log';
export * from './notification';
export * from './secrets';
