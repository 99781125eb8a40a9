/**
 * Setup Service
 * Transport-agnostic entry points of the first-run wizard:
 * status, detect, test-connection and save.
 *
 * The three read-only operations always resolve with a well-formed result.
 * Only save rejects, with a SetupError carrying the status to answer with.
 */

import { PROBE_TIMEOUTS } from '../config';
import { SAVE_SUCCESS_MESSAGE } from '../constants';
import { ProbeRequestSchema, SetupInputSchema } from '../schemas/setup.schemas';
import type { DetectionResult, ProbeResult, SaveResult, SettingsSnapshot, SetupStatus } from '../types';
import { ConfigWriter } from './configWriter';
import { EnvironmentDetector } from './environmentDetector';
import { ERROR_CODES, SetupError, getErrorMessage } from './errors';
import { createLogger } from './logger';
import { ReadinessEvaluator } from './readinessEvaluator';
import { RemoteProbe } from './remoteProbe';
import { loadSettingsSnapshot } from './settings';

const logger = createLogger('setup');

export type SettingsLoader = () => Promise<SettingsSnapshot>;

export interface SetupServiceDependencies {
  probe?: RemoteProbe;
  detector?: EnvironmentDetector;
  readiness?: ReadinessEvaluator;
  writer?: ConfigWriter;
  loadSettings?: SettingsLoader;
}

const formatIssues = (issues: { path: (string | number)[]; message: string }[]): string =>
  issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');

class SetupService {
  private readonly probe: RemoteProbe;
  private readonly detector: EnvironmentDetector;
  private readonly readiness: ReadinessEvaluator;
  private readonly writer: ConfigWriter;
  private readonly loadSettings: SettingsLoader;

  constructor(dependencies: SetupServiceDependencies = {}) {
    this.probe = dependencies.probe ?? new RemoteProbe();
    this.detector = dependencies.detector ?? new EnvironmentDetector();
    this.readiness = dependencies.readiness ?? new ReadinessEvaluator({ probe: this.probe });
    this.writer = dependencies.writer ?? new ConfigWriter();
    this.loadSettings = dependencies.loadSettings ?? (() => loadSettingsSnapshot());

    // Bind methods so they can be handed to a router as plain callbacks
    this.getStatus = this.getStatus.bind(this);
    this.detect = this.detect.bind(this);
    this.testConnection = this.testConnection.bind(this);
    this.save = this.save.bind(this);
  }

  /**
   * GET status
   */
  async getStatus(): Promise<SetupStatus> {
    try {
      const settings = await this.loadSettings();
      return await this.readiness.isSetupRequired(settings);
    } catch (error) {
      logger.error('Error checking setup status', getErrorMessage(error));
      return { setup_required: true, reason: getErrorMessage(error) };
    }
  }

  /**
   * GET detect
   */
  async detect(): Promise<DetectionResult> {
    return this.detector.detect();
  }

  /**
   * POST test-connection. An invalid body is reported as a failed test.
   */
  async testConnection(body: unknown): Promise<ProbeResult> {
    const parsed = ProbeRequestSchema.safeParse(body);
    if (!parsed.success) {
      return { success: false, error: formatIssues(parsed.error.issues), boxes: [] };
    }
    return this.probe.probe(parsed.data.base_url, PROBE_TIMEOUTS.USER_TEST_MS);
  }

  /**
   * POST save
   */
  async save(body: unknown): Promise<SaveResult> {
    const parsed = SetupInputSchema.safeParse(body);
    if (!parsed.success) {
      throw new SetupError(
        `Invalid setup configuration: ${formatIssues(parsed.error.issues)}`,
        ERROR_CODES.INVALID_PAYLOAD,
        422,
        parsed.error.issues
      );
    }

    const { success } = await this.writer.save(parsed.data);
    return { success, message: SAVE_SUCCESS_MESSAGE };
  }
}

export { SetupService };
export default SetupService;
