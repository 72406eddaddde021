export const name = '@taskplanner/adapters';

export * from './types';
export * from './adapter';
export * from './common';
export * from './ollama';
export * from './fake/adapter';
