export * from './green-api.types';
export * from './conversation.types';
export * from './lead.types';
