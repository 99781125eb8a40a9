/**
 * Configuration Writer
 * Expands the wizard input into the full configuration document and writes it
 * as YAML to the config volume. Each save replaces the whole file.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import { getConfigFilePath } from '../config';
import {
  ADVANCED_DEFAULTS,
  APP_DEFAULTS,
  REMOTE_DEFAULTS,
  VOLUME_DEFAULTS,
} from '../constants';
import type { PersistedConfig, SetupInput } from '../schemas/setup.schemas';
import { ERROR_CODES, SetupError, getErrorMessage } from './errors';
import { createLogger } from './logger';

const logger = createLogger('config-writer');

export interface ConfigWriterOptions {
  configFile?: string;
}

/**
 * Build the document the startup loader reads. Every key it expects is present;
 * `app.selected_box` only when a box was picked.
 */
export function buildPersistedConfig(input: SetupInput): PersistedConfig {
  const app: PersistedConfig['app'] = {
    auto_parse_taf: input.auto_parse_taf,
    confirm_before_save: APP_DEFAULTS.confirm_before_save,
    auto_reload_config: APP_DEFAULTS.auto_reload_config,
    default_language: input.default_language,
    max_image_size_mb: APP_DEFAULTS.max_image_size_mb,
    allowed_image_formats: [...APP_DEFAULTS.allowed_image_formats],
    show_hidden_files: APP_DEFAULTS.show_hidden_files,
    recursive_scan: APP_DEFAULTS.recursive_scan,
  };
  if (input.selected_box) {
    app.selected_box = input.selected_box;
  }

  return {
    remote: {
      url: input.remote_url,
      api_base: REMOTE_DEFAULTS.api_base,
      timeout: REMOTE_DEFAULTS.timeout,
    },
    volumes: {
      // Local volume access is off when the images come from a network share
      enabled: !input.use_smb,
      config_path: VOLUME_DEFAULTS.config_path,
      custom_img_path: input.custom_img_path,
      custom_img_json_path: input.custom_img_json_path,
      library_path: VOLUME_DEFAULTS.library_path,
    },
    app,
    advanced: { ...ADVANCED_DEFAULTS },
  };
}

export const serializeConfig = (document: PersistedConfig): string =>
  yaml.dump(document, { indent: 2, lineWidth: -1, noRefs: true, sortKeys: false });

export class ConfigWriter {
  private readonly configFile: string;

  constructor(options: ConfigWriterOptions = {}) {
    this.configFile = options.configFile ?? getConfigFilePath();
  }

  get targetPath(): string {
    return this.configFile;
  }

  /**
   * Rejects with a SetupError when the directory or file cannot be written.
   * The document goes to a sibling temp file first and is renamed into place,
   * so the target holds either the old or the new document, never a mix.
   */
  async save(input: SetupInput): Promise<{ success: boolean }> {
    const content = serializeConfig(buildPersistedConfig(input));
    const directory = path.dirname(this.configFile);
    const tempFile = path.join(directory, `.${path.basename(this.configFile)}.${randomUUID()}.tmp`);

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(tempFile, content, 'utf8');
      await rename(tempFile, this.configFile);
    } catch (error) {
      await this.removeTempFile(tempFile);
      logger.error('Failed to save configuration', getErrorMessage(error));
      throw new SetupError(
        `Failed to save configuration: ${getErrorMessage(error)}`,
        ERROR_CODES.CONFIG_WRITE_FAILED,
        500,
        { path: this.configFile }
      );
    }

    logger.info(`Setup configuration saved to ${this.configFile}`);
    return { success: true };
  }

  private async removeTempFile(tempFile: string): Promise<void> {
    try {
      await rm(tempFile, { force: true });
    } catch (cleanupError) {
      logger.warn(`Could not remove ${tempFile}`, getErrorMessage(cleanupError));
    }
  }
}
