export * from './lifecycle';
export * from './handlers';
