/**
 * Resolves the settings the readiness check runs against.
 * Order: REMOTE_URL from the environment, then `remote.url` from the
 * configuration file, then the factory default.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { DEFAULT_REMOTE_URL, type Env, getConfigFilePath, getRemoteUrlOverride } from '../config';
import { ActiveRemoteSchema } from '../schemas/setup.schemas';
import type { SettingsSnapshot } from '../types';
import { safeParse } from '../utils/validation';
import { getErrorMessage, isMissingPathError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('settings');

export interface SettingsSourceOptions {
  configFile?: string;
  env?: Env;
}

async function readConfiguredRemoteUrl(configFile: string): Promise<string | undefined> {
  let raw: string;
  try {
    raw = await readFile(configFile, 'utf8');
  } catch (error) {
    if (isMissingPathError(error)) {
      return undefined;
    }
    logger.warn(`Cannot read ${configFile}, using default remote URL`, getErrorMessage(error));
    return undefined;
  }

  let document: unknown;
  try {
    document = yaml.load(raw);
  } catch (error) {
    logger.warn(`${configFile} is not valid YAML, using default remote URL`, getErrorMessage(error));
    return undefined;
  }

  return safeParse(ActiveRemoteSchema.optional(), document, undefined, configFile)?.remote.url;
}

/**
 * Take a read-only snapshot of the active settings.
 * Never rejects; anything unreadable falls back to the factory default.
 */
export async function loadSettingsSnapshot(options: SettingsSourceOptions = {}): Promise<SettingsSnapshot> {
  const env = options.env ?? process.env;
  const override = getRemoteUrlOverride(env);
  if (override) {
    return Object.freeze({ remoteUrl: override });
  }

  const configFile = options.configFile ?? getConfigFilePath(env);
  const remoteUrl = (await readConfiguredRemoteUrl(configFile)) ?? DEFAULT_REMOTE_URL;
  return Object.freeze({ remoteUrl });
}
