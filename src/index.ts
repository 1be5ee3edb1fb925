export * from './logging';
export * from './config';
