export const name = '@termwise/core';

export * from './config/loader';
export * from './assistant/prompts';
export * from './assistant/generator';
export * from './assistant/explainer';
export * from './assistant/classifier';
export * from './assistant/pipeline';
export * from './shell/init';
export * from './shell/tip';
