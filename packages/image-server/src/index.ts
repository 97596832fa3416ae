export * from './types';
export * from './server';
export * from './config';
export * from './app';
export { createLogger } from './logger';
