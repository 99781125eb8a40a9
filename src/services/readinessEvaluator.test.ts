import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { http, HttpResponse } from 'msw';
import { server } from '../test/mocks/server';
import { createTempDir } from '../test/tempDir';
import { DEFAULT_REMOTE_URL, PROBE_TIMEOUTS, REMOTE_ENDPOINTS } from '../config';
import type { PrimaryCheckOutcome } from '../types';
import { ReadinessEvaluator, type PrimaryEndpointChecker } from './readinessEvaluator';

const fakeProbe = (outcome: PrimaryCheckOutcome | Error) => {
  const checkPrimary = vi.fn<PrimaryEndpointChecker['checkPrimary']>(async () => {
    if (outcome instanceof Error) throw outcome;
    return outcome;
  });
  return { checkPrimary };
};

describe('ReadinessEvaluator', () => {
  let temp: Awaited<ReturnType<typeof createTempDir>>;
  let configFile: string;

  beforeEach(async () => {
    temp = await createTempDir();
    configFile = path.join(temp.root, 'config', 'config.yaml');
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('requires setup when the configuration file is missing', async () => {
    const probe = fakeProbe({ kind: 'reachable' });
    const evaluator = new ReadinessEvaluator({ configFile, probe });

    const status = await evaluator.isSetupRequired({ remoteUrl: 'http://remote.test' });

    expect(status).toEqual({ setup_required: true, reason: 'Configuration file not found' });
    expect(status.reason).toContain('not found');
    expect(probe.checkPrimary).not.toHaveBeenCalled();
  });

  it('requires setup when a directory sits where the file should be', async () => {
    await temp.mkdirs('config/config.yaml');
    const evaluator = new ReadinessEvaluator({ configFile, probe: fakeProbe({ kind: 'reachable' }) });

    const status = await evaluator.isSetupRequired({ remoteUrl: 'http://remote.test' });

    expect(status).toEqual({ setup_required: true, reason: 'Configuration file not found' });
  });

  it('is ready with a custom remote URL and never probes it', async () => {
    await temp.write('config/config.yaml', 'remote:\n  url: http://remote.test\n');
    const probe = fakeProbe({ kind: 'unreachable', message: 'should not be used' });
    const evaluator = new ReadinessEvaluator({ configFile, probe });

    const status = await evaluator.isSetupRequired({ remoteUrl: 'http://remote.test' });

    expect(status).toEqual({ setup_required: false });
    expect(probe.checkPrimary).not.toHaveBeenCalled();
  });

  describe('with the factory default remote URL', () => {
    beforeEach(async () => {
      await temp.write('config/config.yaml', 'remote:\n  url: http://docker\n');
    });

    it('probes with the short timeout and is ready when it answers', async () => {
      const probe = fakeProbe({ kind: 'reachable' });
      const evaluator = new ReadinessEvaluator({ configFile, probe });

      const status = await evaluator.isSetupRequired({ remoteUrl: DEFAULT_REMOTE_URL });

      expect(status).toEqual({ setup_required: false });
      expect(probe.checkPrimary).toHaveBeenCalledWith(DEFAULT_REMOTE_URL, PROBE_TIMEOUTS.READINESS_MS);
    });

    it('reports a not configured connection on a wrong status', async () => {
      const evaluator = new ReadinessEvaluator({
        configFile,
        probe: fakeProbe({ kind: 'unexpected_status', status: 404, bodyExcerpt: '' }),
      });

      await expect(evaluator.isSetupRequired({ remoteUrl: DEFAULT_REMOTE_URL })).resolves.toEqual({
        setup_required: true,
        reason: 'Remote service connection not configured',
      });
    });

    it('reports an unreachable remote when nothing answers', async () => {
      const evaluator = new ReadinessEvaluator({
        configFile,
        probe: fakeProbe({ kind: 'unreachable', message: 'getaddrinfo ENOTFOUND docker' }),
      });

      await expect(evaluator.isSetupRequired({ remoteUrl: DEFAULT_REMOTE_URL })).resolves.toEqual({
        setup_required: true,
        reason: 'Cannot connect to remote service',
      });
    });

    it('turns an unexpected failure into setup required', async () => {
      const evaluator = new ReadinessEvaluator({
        configFile,
        probe: fakeProbe(new Error('probe exploded')),
      });

      await expect(evaluator.isSetupRequired({ remoteUrl: DEFAULT_REMOTE_URL })).resolves.toEqual({
        setup_required: true,
        reason: 'probe exploded',
      });
    });

    it('uses the remote probe against the default host', async () => {
      server.use(
        http.get(`${DEFAULT_REMOTE_URL}${REMOTE_ENDPOINTS.catalog}`, () => new HttpResponse(null, { status: 401 }))
      );
      const evaluator = new ReadinessEvaluator({ configFile });

      await expect(evaluator.isSetupRequired({ remoteUrl: DEFAULT_REMOTE_URL })).resolves.toEqual({
        setup_required: true,
        reason: 'Remote service connection not configured',
      });
    });

    it('is ready when the default host answers', async () => {
      server.use(http.get(`${DEFAULT_REMOTE_URL}${REMOTE_ENDPOINTS.catalog}`, () => HttpResponse.json([])));
      const evaluator = new ReadinessEvaluator({ configFile });

      await expect(evaluator.isSetupRequired({ remoteUrl: DEFAULT_REMOTE_URL })).resolves.toEqual({
        setup_required: false,
      });
    });
  });
});
