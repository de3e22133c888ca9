/**
 * Export all provider implementations
 */
export * from './regional-client-pool';
export * from './ec2-inventory';
export * from './ec2-deletion';
export * from './glacier-archive';
export * from './dynamodb-log';
export * from './secrets-manager';
export * from './email-notification';
export * from './slack-notification';
