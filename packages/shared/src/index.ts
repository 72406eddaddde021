export const name = '@taskplanner/shared';

export * from './types/events';
export * from './types/plan';
export * from './logger';
export * from './errors';
export * from './json-utils';
export * from './dates';
export * from './config/schema';
