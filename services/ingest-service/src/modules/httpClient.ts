import axios, { AxiosInstance, AxiosResponse, ResponseType } from 'axios';
import https from 'https';
import { HttpTimeouts, RetryPolicy } from '../config/env';
import { ProviderResponseError } from '../errors';
import { Sleep, withRetry } from './retry';

/** The slice of an axios instance the provider clients call. */
export type HttpGetter = Pick<AxiosInstance, 'get'>;

export type QueryParams = Record<string, string | number | boolean>;

export interface RequestOptions {
  retry?: RetryPolicy;
  signal?: AbortSignal;
  sleep?: Sleep;
}

export const DEFAULT_TIMEOUTS: HttpTimeouts = { connectMs: 10_000, readMs: 30_000 };

/**
 * One keep-alive agent per client, reused across every call it makes.
 * The agent bounds socket setup, axios bounds the whole exchange.
 */
export function createHttpClient(
  timeouts: HttpTimeouts = DEFAULT_TIMEOUTS,
  headers: Record<string, string> = {}
): AxiosInstance {
  const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
    timeout: timeouts.connectMs,
  });

  return axios.create({
    timeout: timeouts.readMs,
    httpsAgent,
    headers,
    // Status handling happens in `request` so non-2xx is never mistaken for a transport fault
    validateStatus: () => true,
  });
}

async function request(
  client: HttpGetter,
  url: string,
  params: QueryParams,
  responseType: ResponseType,
  options: RequestOptions
): Promise<AxiosResponse<unknown>> {
  return withRetry(
    async () => {
      const response = await client.get<unknown>(url, {
        params,
        responseType,
        signal: options.signal,
      });

      if (response.status < 200 || response.status >= 300) {
        throw new ProviderResponseError(`Unexpected HTTP ${response.status} from ${url}`, {
          status: response.status,
          payload: response.data,
        });
      }
      return response;
    },
    { policy: options.retry, signal: options.signal, sleep: options.sleep, label: url }
  );
}

export async function getJson(
  client: HttpGetter,
  url: string,
  params: QueryParams = {},
  options: RequestOptions = {}
): Promise<unknown> {
  const response = await request(client, url, params, 'json', options);
  return response.data;
}

export async function getText(
  client: HttpGetter,
  url: string,
  params: QueryParams = {},
  options: RequestOptions = {}
): Promise<string> {
  const response = await request(client, url, params, 'text', options);

  if (typeof response.data !== 'string') {
    throw new ProviderResponseError(`Expected a text body from ${url}`, {
      status: response.status,
      payload: response.data,
    });
  }
  return response.data;
}
