/**
 * Uptime Robot API Client
 *
 * Implements `ProviderApi` over the v2 REST API with:
 * - Form-encoded POST requests authenticated by the account API key
 * - Offset pagination for list methods
 * - Retry with exponential backoff and rate limit handling (429)
 * - JSON logging with secret redaction
 */

import { ApiError } from '../errors.js';
import {
  decodeContact,
  decodeMonitor,
  encodeContact,
  encodeMonitor,
  encodeMonitorUpdate,
  isRecord,
} from './codec.js';
import { ApiLogger, logger } from './logger.js';
import {
  ApiRequestError,
  parseRetryAfter,
  withRetry,
  type RetryOptions,
} from './retry.js';
import type {
  ContactRecord,
  ContactSpec,
  FormParams,
  MonitorRecord,
  MonitorSpec,
  ProviderApi,
  UptimeRobotClientConfig,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_BASE_URL = 'https://api.uptimerobot.com/v2/';

/**
 * Uptime Robot client
 */
export interface UptimeRobotClient extends ProviderApi {
  /** Get current configuration (with redacted secrets) */
  getConfig(): { baseUrl: string; hasApiKey: boolean };
}

type ApiResponseBody = Record<string, unknown>;

interface PostOptions {
  /**
   * Only retry when the request was rejected outright. Used for calls that
   * create objects, where a retried timeout could create a duplicate.
   */
  rateLimitRetryOnly?: boolean;
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create an Uptime Robot API client with retry and logging
 */
export function createClient(config: UptimeRobotClientConfig): UptimeRobotClient {
  const baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '') + '/';
  const timeout = config.timeout ?? 30000;
  const log = config.debug ? logger : new ApiLogger({ level: 'warn' });

  if (!config.apiKey) {
    throw new ApiError('An Uptime Robot API key is required', { code: 'AUTH_MISSING' });
  }

  /**
   * Issue a POST request to the API and return the decoded body
   */
  async function post(
    method: string,
    params: FormParams,
    options: PostOptions = {}
  ): Promise<ApiResponseBody> {
    const url = baseUrl + method;
    const form = new URLSearchParams({ api_key: config.apiKey, format: 'json' });
    for (const [key, value] of Object.entries(params)) {
      form.set(key, String(value));
    }

    log.request('POST', url, params);

    const makeRequest = async (): Promise<ApiResponseBody> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const startTime = Date.now();
        const response = await fetch(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            'Cache-Control': 'no-cache',
          },
          body: form.toString(),
          signal: controller.signal,
        });

        log.response(response.status, url, Date.now() - startTime);

        if (response.status !== 200) {
          throw new ApiRequestError(
            `Got HTTP error ${response.status} calling ${method}`,
            response.status,
            { retryAfter: parseRetryAfter(response.headers.get('Retry-After')) }
          );
        }

        const text = await response.text();
        let data: unknown;
        try {
          data = JSON.parse(text);
        } catch (err) {
          throw new ApiRequestError(
            `Error decoding JSON of ${method}: ${text.substring(0, 200)}`,
            response.status,
            { code: 'INVALID_JSON', cause: err }
          );
        }

        if (!isRecord(data)) {
          throw new ApiRequestError(`Unexpected response from ${method}`, response.status, {
            code: 'MALFORMED_RESPONSE',
          });
        }

        if (data.stat !== 'ok') {
          const details = isRecord(data.error) ? data.error : {};
          const code = typeof details.type === 'string' ? details.type : 'fail';
          const message =
            typeof details.message === 'string' ? details.message : JSON.stringify(data.error);
          throw new ApiRequestError(`${method} returned error: ${message}`, response.status, {
            code,
            details,
          });
        }

        return data;
      } finally {
        clearTimeout(timeoutId);
      }
    };

    const retryOptions: RetryOptions = {
      ...config.retry,
      logger: log,
      isRetryable: options.rateLimitRetryOnly
        ? (error) => error instanceof ApiRequestError && error.isRateLimited()
        : undefined,
    };

    const result = await withRetry(makeRequest, retryOptions);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  /**
   * Fetch every element of a list method, following offset pagination
   */
  async function postPaginated(
    method: string,
    params: FormParams,
    field: string
  ): Promise<unknown[]> {
    const items: unknown[] = [];
    let offset = 0;

    for (;;) {
      const data = await post(method, { ...params, offset });
      const page = data[field];
      if (Array.isArray(page)) {
        items.push(...page);
      }

      const pagination = isRecord(data.pagination) ? data.pagination : data;
      const total = Number(pagination.total ?? 0);
      const pageOffset = Number(pagination.offset ?? offset);
      const limit = Number(pagination.limit ?? 0);

      if (limit > 0 && total > pageOffset + limit) {
        offset = pageOffset + limit;
      } else {
        return items;
      }
    }
  }

  function createdId(data: ApiResponseBody, field: string, method: string): string {
    const created = data[field];
    if (isRecord(created) && (typeof created.id === 'string' || typeof created.id === 'number')) {
      return String(created.id);
    }
    throw new ApiRequestError(`${method} response carries no ${field} id`, 200, {
      code: 'MALFORMED_RESPONSE',
    });
  }

  return {
    async listContacts(): Promise<ContactRecord[]> {
      const raw = await postPaginated('getAlertContacts', {}, 'alert_contacts');
      return raw.map(decodeContact);
    },

    async listMonitors(): Promise<MonitorRecord[]> {
      const raw = await postPaginated('getMonitors', { alert_contacts: 1 }, 'monitors');
      return raw.map(decodeMonitor);
    },

    async createContact(spec: ContactSpec): Promise<string> {
      const data = await post('newAlertContact', encodeContact(spec), { rateLimitRetryOnly: true });
      return createdId(data, 'alertcontact', 'newAlertContact');
    },

    async deleteContact(id: string): Promise<void> {
      await post('deleteAlertContact', { id });
    },

    async createMonitor(spec: MonitorSpec): Promise<string> {
      const data = await post('newMonitor', encodeMonitor(spec), { rateLimitRetryOnly: true });
      return createdId(data, 'monitor', 'newMonitor');
    },

    async updateMonitor(id: string, spec: MonitorSpec): Promise<void> {
      await post('editMonitor', encodeMonitorUpdate(id, spec));
    },

    async deleteMonitor(id: string): Promise<void> {
      await post('deleteMonitor', { id });
    },

    getConfig() {
      return { baseUrl, hasApiKey: Boolean(config.apiKey) };
    },
  };
}
