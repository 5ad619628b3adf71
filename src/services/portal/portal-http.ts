import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import * as client from 'prom-client';
import type { PortalConfig } from '../../config/app.config';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { err, ok, type Result } from '../../utils/result';
import { upstreamMessage } from './portal.schemas';

export type PortalOperation =
  | 'login'
  | 'scope'
  | 'profile'
  | 'student_status'
  | 'academic_year'
  | 'registration_schedule'
  | 'available_courses'
  | 'enrolled_courses'
  | 'schedule'
  | 'add_course'
  | 'drop_course';

export interface TransportFailure {
  message: string;
  httpStatus?: number;
}

function getCounter(name: string, help: string, labelNames: string[]) {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Counter) {
    return existing;
  }
  return new client.Counter({ name, help, labelNames });
}

function getHistogram(name: string, help: string, buckets: number[], labelNames: string[]) {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Histogram) {
    return existing;
  }
  return new client.Histogram({ name, help, buckets, labelNames });
}

const requestCounter = getCounter('krs_portal_requests_total', 'Portal requests by operation and outcome', ['operation', 'outcome']);
const latencyHistogram = getHistogram(
  'krs_portal_request_duration_ms',
  'Portal request latency in milliseconds',
  [50, 100, 250, 500, 1000, 2000, 5000, 10000, 30000],
  ['operation']
);

/**
 * One axios instance per portal session. Status codes are checked by the
 * caller so every non-2xx reply takes the same path as a transport failure.
 */
export function createPortalHttp(config: PortalConfig, adapter?: AxiosAdapter): AxiosInstance {
  return axios.create({
    timeout: config.timeoutMs,
    headers: { ...config.headers },
    validateStatus: () => true,
    ...(adapter ? { adapter } : {}),
  });
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

/** Single attempt; never throws. */
export async function sendPortalRequest(
  http: AxiosInstance,
  operation: PortalOperation,
  request: AxiosRequestConfig
): Promise<Result<unknown, TransportFailure>> {
  const stopTimer = latencyHistogram.startTimer({ operation });
  try {
    const response = await http.request<unknown>(request);
    if (response.status >= 200 && response.status < 300) {
      requestCounter.inc({ operation, outcome: 'ok' });
      return ok(response.data);
    }
    requestCounter.inc({ operation, outcome: `http_${response.status}` });
    const message = upstreamMessage(response.data) ?? `Request failed with status code ${response.status}`;
    logger.warn('portal.request.http_error', { operation, httpStatus: response.status, message });
    return err({ message, httpStatus: response.status });
  } catch (error) {
    requestCounter.inc({ operation, outcome: 'transport_error' });
    const message = errorMessage(error);
    logger.warn('portal.request.transport_error', { operation, error: message });
    return err({ message });
  } finally {
    stopTimer();
  }
}
