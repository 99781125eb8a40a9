// Result shapes returned by the setup wizard operations

import type { RemoteBox } from '../schemas/setup.schemas';

export interface SetupStatus {
  setup_required: boolean;
  reason?: string;
}

export interface DetectionResult {
  volume_available: boolean;
  volume_path?: string;
  taf_file_count: number;
  catalog_entry_count: number;
  image_directory_paths: string[];
}

export interface ProbeResult {
  success: boolean;
  error?: string;
  version?: string;
  boxes: RemoteBox[];
}

export interface SaveResult {
  success: boolean;
  message: string;
}

/**
 * Read-only view of the active settings handed to the readiness check
 */
export interface SettingsSnapshot {
  readonly remoteUrl: string;
}

/**
 * Outcome of the primary remote endpoint call.
 * `unexpected_status` means the server answered, `unreachable` means it did not.
 */
export type PrimaryCheckOutcome =
  | { kind: 'reachable' }
  | { kind: 'unexpected_status'; status: number; bodyExcerpt: string }
  | { kind: 'unreachable'; message: string };

/**
 * Outcome of one filesystem sub-check during detection
 */
export type SubCheck<T> =
  | { status: 'found'; value: T }
  | { status: 'absent' }
  | { status: 'failed'; error: string };
