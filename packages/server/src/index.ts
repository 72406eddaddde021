export const name = '@taskplanner/server';

export * from './app';
