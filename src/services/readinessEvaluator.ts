/**
 * Readiness Evaluator
 * Decides whether the setup wizard has to run before the application is usable.
 *
 * Gates, first match wins:
 * 1. no configuration file            -> setup required
 * 2. remote URL is the factory default -> setup required unless it answers 200
 * 3. otherwise                         -> ready, without any network call
 *
 * Anything unexpected resolves to "setup required"; the returned promise never rejects.
 */

import { stat } from 'node:fs/promises';
import { DEFAULT_REMOTE_URL, PROBE_TIMEOUTS, getConfigFilePath } from '../config';
import { SETUP_STATUS_REASONS } from '../constants';
import type { PrimaryCheckOutcome, SettingsSnapshot, SetupStatus } from '../types';
import { getErrorMessage, isMissingPathError } from './errors';
import { createLogger } from './logger';
import { RemoteProbe } from './remoteProbe';

const logger = createLogger('readiness');

export interface PrimaryEndpointChecker {
  checkPrimary(baseUrl: string, timeoutMs?: number): Promise<PrimaryCheckOutcome>;
}

export interface ReadinessEvaluatorOptions {
  configFile?: string;
  probe?: PrimaryEndpointChecker;
}

export class ReadinessEvaluator {
  private readonly configFile: string;
  private readonly probe: PrimaryEndpointChecker;

  constructor(options: ReadinessEvaluatorOptions = {}) {
    this.configFile = options.configFile ?? getConfigFilePath();
    this.probe = options.probe ?? new RemoteProbe();
  }

  async isSetupRequired(settings: SettingsSnapshot): Promise<SetupStatus> {
    try {
      return await this.evaluate(settings);
    } catch (error) {
      logger.error('Error checking setup status', getErrorMessage(error));
      return { setup_required: true, reason: getErrorMessage(error) };
    }
  }

  private async evaluate(settings: SettingsSnapshot): Promise<SetupStatus> {
    if (!(await this.configFileExists())) {
      return { setup_required: true, reason: SETUP_STATUS_REASONS.CONFIG_NOT_FOUND };
    }

    if (settings.remoteUrl === DEFAULT_REMOTE_URL) {
      const outcome = await this.probe.checkPrimary(settings.remoteUrl, PROBE_TIMEOUTS.READINESS_MS);
      switch (outcome.kind) {
        case 'unexpected_status':
          logger.info(`Default remote answered HTTP ${outcome.status}`);
          return { setup_required: true, reason: SETUP_STATUS_REASONS.REMOTE_NOT_CONFIGURED };
        case 'unreachable':
          logger.info('Default remote is unreachable', outcome.message);
          return { setup_required: true, reason: SETUP_STATUS_REASONS.REMOTE_UNREACHABLE };
        case 'reachable':
          break;
      }
    }

    return { setup_required: false };
  }

  private async configFileExists(): Promise<boolean> {
    try {
      return (await stat(this.configFile)).isFile();
    } catch (error) {
      if (isMissingPathError(error)) {
        return false;
      }
      throw error;
    }
  }
}
