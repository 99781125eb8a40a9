export { SetupService, type SetupServiceDependencies, type SettingsLoader } from './services/setupService';
export { RemoteProbe, createProbeClient, normalizeBaseUrl, type ProbeClientFactory } from './services/remoteProbe';
export { EnvironmentDetector, type EnvironmentDetectorOptions } from './services/environmentDetector';
export {
  ReadinessEvaluator,
  type PrimaryEndpointChecker,
  type ReadinessEvaluatorOptions,
} from './services/readinessEvaluator';
export { ConfigWriter, buildPersistedConfig, serializeConfig, type ConfigWriterOptions } from './services/configWriter';
export { loadSettingsSnapshot, type SettingsSourceOptions } from './services/settings';
export { SetupError, ERROR_CODES, getErrorMessage } from './services/errors';
export { createLogger, type Logger, type LogLevel } from './services/logger';
export * from './schemas/setup.schemas';
export type * from './types';
