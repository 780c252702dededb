export * from './config/types.js';
export * from './config/partial.js';
export * from './config/process.js';
export * from './config/plan.js';
export * from './config/options.js';
export { ConfigManager, parseConfigDocument, parseEnvironment, type ResolveConfigOptions } from './config/manager.js';
export {
  cleanupDirectoryType,
  makePermanent,
  removeDirectoryIgnoringMissing,
  runUninterruptibly,
  setupDirectoryType,
  toFilePath,
} from './instance/directory.js';
export { getFreePort, type FreePortProvider } from './instance/port.js';
export {
  ResourceManager,
  cleanupConfig,
  defaultTemporaryDirectory,
  makeResourcesDataDirPermanent,
  setupConfig,
  snapshotEnvironment,
  type ResourceManagerOptions,
  type SetupState,
} from './instance/manager.js';
export * from './utils/errors.js';
export { createLogger, defaultPlanLogger, type ComponentLogger, type LogLevel } from './utils/logger.js';
export { prettyPrintConfig, prettyPrintPlan, prettyPrintResources } from './utils/display.js';
export type { ValidationError } from './utils/validation.js';
