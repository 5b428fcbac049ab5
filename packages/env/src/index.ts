export {
  DEFAULT_SIDECAR_HTTP_PORT,
  getSidecarEnvConfig,
  getTestEnvironmentEnv,
  parseSidecarPort,
  resetEnvCache,
  validateEnv,
  type SidecarEnvConfig,
  type TestEnvironmentEnv,
  type ValidatedEnv,
} from './config.js';
