export * from './config';
export * from './logger';
export * from './errors';
export * from './db';
export * from './tracing';
export * from './http/metrics';
export * from './events';
