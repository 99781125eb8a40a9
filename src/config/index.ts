/**
 * CENTRALIZED SETUP CONFIGURATION
 *
 * Fixed paths, remote endpoints and timeouts used by the setup wizard.
 * Paths can be overridden through the environment so the wizard can run
 * against a different mount layout (and so tests can point it at a temp dir).
 */

/**
 * Configuration file written by the wizard.
 * Lives on the mounted /config volume, outside the application tree,
 * so it survives a redeploy.
 */
export const DEFAULT_CONFIG_FILE = '/config/config.yaml';

/**
 * Root of the data volume shared with the remote service
 */
export const DEFAULT_DATA_ROOT = '/data';

/**
 * Remote URL shipped in the factory settings.
 * While it is still active the readiness check has to verify it actually answers.
 */
export const DEFAULT_REMOTE_URL = 'http://docker';

export const REMOTE_ENDPOINTS = {
  catalog: '/api/toniesCustomJson',
  boxes: '/api/tonieboxes',
} as const;

export const PROBE_TIMEOUTS = {
  READINESS_MS: 5000, // status check runs before the wizard is shown
  USER_TEST_MS: 10000, // explicit "test connection" from the wizard
} as const;

/**
 * Max characters of a failing response body echoed into an error message
 */
export const ERROR_BODY_EXCERPT_LENGTH = 100;

export type Env = Record<string, string | undefined>;

// Helper to read a non-empty string environment variable
const getEnvString = (env: Env, name: string, defaultValue: string): string => {
  const value = env[name]?.trim();
  return value ? value : defaultValue;
};

export const getConfigFilePath = (env: Env = process.env): string =>
  getEnvString(env, 'SETUP_CONFIG_FILE', DEFAULT_CONFIG_FILE);

export const getDataRoot = (env: Env = process.env): string =>
  getEnvString(env, 'SETUP_DATA_ROOT', DEFAULT_DATA_ROOT);

/**
 * Remote URL forced through the environment, if any
 */
export const getRemoteUrlOverride = (env: Env = process.env): string | undefined => {
  const value = env.REMOTE_URL?.trim();
  return value || undefined;
};
