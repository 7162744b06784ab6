export * from './request-logger';
export * from './error-handler';
