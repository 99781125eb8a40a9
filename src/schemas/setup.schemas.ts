import { z } from 'zod';
import { UNKNOWN_BOX_NAME } from '../constants';

/**
 * Zod schemas for everything that crosses a trust boundary in the setup wizard:
 * request payloads from the wizard UI, responses from the remote service and
 * files read from the data and config volumes.
 *
 * @module setup.schemas
 */

// ============================================================================
// Wizard payloads
// ============================================================================

/**
 * Body of a connection test. The URL is trimmed and must not be empty.
 */
export const ProbeRequestSchema = z.object({
  base_url: z.string().trim().min(1, 'base_url is required'),
});

export type ProbeRequest = z.infer<typeof ProbeRequestSchema>;

/**
 * Final wizard choices. Checked by type only; the values are persisted as given.
 */
export const SetupInputSchema = z.object({
  remote_url: z.string(),
  custom_img_path: z.string(),
  custom_img_json_path: z.string(),
  use_smb: z.boolean().default(false),
  ui_language: z.string().default('en'),
  default_language: z.string().default('de-de'),
  auto_parse_taf: z.boolean().default(true),
  selected_box: z.string().nullish(),
});

/** Validated input, defaults applied */
export type SetupInput = z.infer<typeof SetupInputSchema>;

/** What a caller may send before defaults are applied */
export type SetupInputPayload = z.input<typeof SetupInputSchema>;

// ============================================================================
// Remote service responses
// ============================================================================

/**
 * Device entry from the remote device list, normalized to { id, name }.
 * An entry without a usable id cannot be selected and fails validation;
 * a missing or non-string name becomes "Unknown".
 */
export const RemoteBoxSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform((id) => String(id)),
  name: z.unknown().transform((name) => (typeof name === 'string' ? name : UNKNOWN_BOX_NAME)),
});

export type RemoteBox = z.infer<typeof RemoteBoxSchema>;

// ============================================================================
// Files
// ============================================================================

/**
 * Custom catalog on the data volume. Only its length matters here.
 */
export const CatalogSchema = z.array(z.unknown());

/**
 * Document written to the config volume
 */
export const PersistedConfigSchema = z.object({
  remote: z.object({
    url: z.string(),
    api_base: z.string(),
    timeout: z.number(),
  }),
  volumes: z.object({
    enabled: z.boolean(),
    config_path: z.string(),
    custom_img_path: z.string(),
    custom_img_json_path: z.string(),
    library_path: z.string(),
  }),
  app: z.object({
    auto_parse_taf: z.boolean(),
    confirm_before_save: z.boolean(),
    auto_reload_config: z.boolean(),
    default_language: z.string(),
    max_image_size_mb: z.number(),
    allowed_image_formats: z.array(z.string()),
    show_hidden_files: z.boolean(),
    recursive_scan: z.boolean(),
    selected_box: z.string().optional(),
  }),
  advanced: z.object({
    parse_cover_from_taf: z.boolean(),
    extract_track_names: z.boolean(),
    log_level: z.string(),
    cache_taf_metadata: z.boolean(),
    cache_ttl_seconds: z.number(),
  }),
});

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

/**
 * The part of the persisted document the readiness check relies on.
 * Other sections may be missing or outdated without affecting it.
 */
export const ActiveRemoteSchema = z.object({
  remote: z.object({
    url: z.string().trim().min(1),
  }),
});
