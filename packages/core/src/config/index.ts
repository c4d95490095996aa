export {
  loadConfig,
  parseConfig,
  applyEnvironment,
  createDefaultConfig,
  resolveOutputPath,
  CONFIG_FILE,
  LOG_LEVEL_ENV,
  type PerfscopeConfig,
  type OracleConfig,
  type ReportsConfig,
  type OutputConfig,
} from './perfscope-config.js';
