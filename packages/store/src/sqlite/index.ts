export * from './store';
export { runMigrations, getSchemaVersion } from './migrations';
