export const name = '@repowarden/core';

export { ConfigLoader, REPO_CONFIG_FILENAME } from './config/loader';
export type { ConfigOptions } from './config/loader';
export * from './summarize';
export * from './monitor';
export { WatchdogManager } from './manager';
export type { CheckResult, ManagerDependencies } from './manager';
