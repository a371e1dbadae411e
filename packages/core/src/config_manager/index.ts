export { ConfigManager } from './config_manager';
export { ListbridgeConfigSchema } from './config_schema';
export type {
  ExportPolicy,
  ListbridgeConfig,
  ProfileConfig,
  QualtricsConfig,
  RetryPolicy,
  WorkgroupConfig,
} from './config_manager.types';
