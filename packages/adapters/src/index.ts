export const name = '@termwise/adapters';

export * from './types';
export * from './adapter';
export * from './base-adapter';
export * from './common';
export * from './openai/adapter';
export * from './gemini/adapter';
export * from './fake/adapter';
export * from './factory';
