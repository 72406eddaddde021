export const name = '@taskplanner/store';

export * from './sqlite';
