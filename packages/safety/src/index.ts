export const name = '@termwise/safety';

export * from './classify/types';
export * from './classify/parser';
export * from './classify/rules';
export * from './classify/classifier';
export * from './classify/merge';
export * from './classify/exit-code';
export * from './classify/forced';
