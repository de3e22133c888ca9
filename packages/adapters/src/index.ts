export * from './interfaces';
export * from './providers';
export * from './templates/report-html';
export * from './factory/adapter-factory';
