export const name = '@termwise/shared';

export * from './types/events';
export * from './types/llm';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './json-utils';
export * from './config/schema';
