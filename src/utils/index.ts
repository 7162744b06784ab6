export { default as logger } from './logger';
export * from './helpers';
