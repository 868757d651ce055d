export * from './config';
export * from './errors';
export * from './logger';
export * from './redis';
export * from './server';
export * from './types';
