/**
 * Remote Probe
 * Checks whether a remote service answers on its catalog endpoint and,
 * when it does, collects the devices it manages.
 * Every transport fault is turned into a result; nothing here rejects.
 */

import axios, { type AxiosInstance } from 'axios';
import {
  ERROR_BODY_EXCERPT_LENGTH,
  PROBE_TIMEOUTS,
  REMOTE_ENDPOINTS,
} from '../config';
import { type RemoteBox, RemoteBoxSchema } from '../schemas/setup.schemas';
import type { PrimaryCheckOutcome, ProbeResult } from '../types';
import { safeParseArray } from '../utils/validation';
import { getErrorMessage } from './errors';
import { createLogger } from './logger';

const logger = createLogger('remote-probe');

export type ProbeClientFactory = (baseURL: string, timeoutMs: number) => AxiosInstance;

/**
 * Statuses are inspected by the probe, so axios must not turn them into errors
 */
export const createProbeClient: ProbeClientFactory = (baseURL, timeoutMs) =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    validateStatus: () => true,
  });

export const normalizeBaseUrl = (baseUrl: string): string => baseUrl.trim().replace(/\/+$/, '');

const bodyToText = (data: unknown): string => {
  if (typeof data === 'string') return data;
  if (data === null || data === undefined) return '';
  return JSON.stringify(data) ?? '';
};

const describeTransportError = (error: unknown, timeoutMs: number, elapsedMs: number): string => {
  if (axios.isAxiosError(error)) {
    // A timeout that fires while the body is streaming surfaces as an aborted stream
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || elapsedMs >= timeoutMs) {
      return `Request timed out after ${timeoutMs} ms`;
    }
    // Node reports some connect failures as an AggregateError with an empty message
    return error.message || error.code || 'Network request failed';
  }
  return getErrorMessage(error);
};

export class RemoteProbe {
  private readonly createClient: ProbeClientFactory;

  constructor(createClient: ProbeClientFactory = createProbeClient) {
    this.createClient = createClient;
  }

  /**
   * Call only the catalog endpoint and report how the server answered.
   * Used by the readiness check, which needs to tell "wrong answer" from "no answer".
   */
  async checkPrimary(
    baseUrl: string,
    timeoutMs: number = PROBE_TIMEOUTS.READINESS_MS
  ): Promise<PrimaryCheckOutcome> {
    const client = this.createClient(normalizeBaseUrl(baseUrl), timeoutMs);
    return this.requestPrimary(client, timeoutMs);
  }

  /**
   * Full connection test as triggered from the wizard.
   * A failing device list never turns a successful test into a failure.
   */
  async probe(
    baseUrl: string,
    timeoutMs: number = PROBE_TIMEOUTS.USER_TEST_MS
  ): Promise<ProbeResult> {
    const target = normalizeBaseUrl(baseUrl);
    const client = this.createClient(target, timeoutMs);
    const primary = await this.requestPrimary(client, timeoutMs);

    switch (primary.kind) {
      case 'unexpected_status':
        logger.warn(`Connection test against ${target} failed with HTTP ${primary.status}`);
        return {
          success: false,
          error: `HTTP ${primary.status}: ${primary.bodyExcerpt}`,
          boxes: [],
        };
      case 'unreachable':
        logger.warn(`Connection test against ${target} failed`, primary.message);
        return { success: false, error: primary.message, boxes: [] };
      case 'reachable':
        break;
    }

    const boxes = await this.fetchBoxes(client);
    logger.info(`Connection test against ${target} succeeded (${boxes.length} boxes)`);
    return { success: true, boxes };
  }

  private async requestPrimary(client: AxiosInstance, timeoutMs: number): Promise<PrimaryCheckOutcome> {
    const startedAt = Date.now();
    try {
      const response = await client.get<unknown>(REMOTE_ENDPOINTS.catalog, { responseType: 'text' });
      if (response.status !== 200) {
        return {
          kind: 'unexpected_status',
          status: response.status,
          bodyExcerpt: bodyToText(response.data).slice(0, ERROR_BODY_EXCERPT_LENGTH),
        };
      }
      return { kind: 'reachable' };
    } catch (error) {
      return { kind: 'unreachable', message: describeTransportError(error, timeoutMs, Date.now() - startedAt) };
    }
  }

  private async fetchBoxes(client: AxiosInstance): Promise<RemoteBox[]> {
    const context = `GET ${REMOTE_ENDPOINTS.boxes}`;
    try {
      const response = await client.get<unknown>(REMOTE_ENDPOINTS.boxes);
      if (response.status !== 200) {
        logger.debug(`${context} answered HTTP ${response.status}, reporting no boxes`);
        return [];
      }
      return safeParseArray(RemoteBoxSchema, response.data, context);
    } catch (error) {
      logger.warn(`${context} failed, reporting no boxes`, getErrorMessage(error));
      return [];
    }
  }
}
