export const name = '@taskplanner/core';

export * from './plan';
export { ConfigLoader, type ConfigOptions } from './config/loader';
export { ProviderRegistry, createDefaultRegistry, type AdapterFactory } from './registry';
