/**
 * Fixed values of the persisted configuration that the wizard does not ask for.
 * The startup loader expects every one of these keys to be present.
 */
export const REMOTE_DEFAULTS = {
  api_base: '/api',
  timeout: 30,
} as const;

export const VOLUME_DEFAULTS = {
  config_path: '/data/config',
  library_path: '/data/library',
} as const;

export const APP_DEFAULTS = {
  confirm_before_save: true,
  auto_reload_config: true,
  max_image_size_mb: 5,
  allowed_image_formats: ['jpg', 'jpeg', 'png', 'webp'],
  show_hidden_files: false,
  recursive_scan: true,
} as const;

export const ADVANCED_DEFAULTS = {
  parse_cover_from_taf: true,
  extract_track_names: true,
  log_level: 'INFO',
  cache_taf_metadata: true,
  cache_ttl_seconds: 300,
} as const;

/**
 * Layout expected on the data volume
 */
export const DATA_LAYOUT = {
  CONFIG_DIR: 'config',
  LIBRARY_DIR: 'library',
  CATALOG_FILE: 'tonies.custom.json',
  TAF_EXTENSION: '.taf',
  // Probed in this order; each existing one is reported
  IMAGE_DIRS: ['library/own/pics', 'www/custom_img'],
} as const;

/**
 * Placeholder for devices the remote service reports without a name
 */
export const UNKNOWN_BOX_NAME = 'Unknown';

export const SETUP_STATUS_REASONS = {
  CONFIG_NOT_FOUND: 'Configuration file not found',
  REMOTE_NOT_CONFIGURED: 'Remote service connection not configured',
  REMOTE_UNREACHABLE: 'Cannot connect to remote service',
} as const;

export const SAVE_SUCCESS_MESSAGE = 'Configuration saved. Please restart the application.';
