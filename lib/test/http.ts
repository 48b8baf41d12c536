/**
 * In-process stand-in for upstream HTTP APIs
 *
 * Plugs into axios as an adapter, so the real clients run unchanged
 * (base URL, default params, error mapping) without touching the network.
 */

import {
  AxiosAdapter,
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

export interface FakeReply {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

export type FakeHandler = (request: InternalAxiosRequestConfig) => FakeReply | Error;

export interface FakeServer {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
}

export function json(data: unknown, status: number = 200, headers?: Record<string, string>): FakeReply {
  return { status, data, headers };
}

export function timeoutError(request: InternalAxiosRequestConfig): AxiosError {
  return new AxiosError('timeout of 30000ms exceeded', AxiosError.ECONNABORTED, request, {});
}

export function networkError(request: InternalAxiosRequestConfig): AxiosError {
  return new AxiosError('connect ECONNREFUSED', AxiosError.ERR_NETWORK, request, {});
}

/**
 * Build a fake server from a request handler
 *
 * Non-2xx replies reject with an AxiosError carrying the response,
 * the same way axios' own HTTP adapter settles.
 */
export function createFakeServer(handler: FakeHandler): FakeServer {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (request) => {
    requests.push(request);
    const reply = handler(request);

    if (reply instanceof Error) {
      throw reply;
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config: request,
      request: {},
    };

    if (reply.status >= 200 && reply.status < 300) {
      return response;
    }

    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      request,
      {},
      response
    );
  };

  return { adapter, requests };
}

/**
 * Route requests by base URL host and path
 *
 * @example
 * createRoutedServer({ 'api.stockdata.org/v1/news/all': () => json({ data: [] }) })
 */
export function createRoutedServer(routes: Record<string, FakeHandler>): FakeServer {
  return createFakeServer((request) => {
    const host = (request.baseURL ?? '').replace(/^https?:\/\//, '');
    const key = `${host}${request.url ?? ''}`;
    const route = routes[key];

    return route ? route(request) : json({ message: `No route for ${key}` }, 404);
  });
}
