import axios, { AxiosError, AxiosHeaders, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
  status?: number;
  data?: unknown;
}

export type StubHandler = (request: InternalAxiosRequestConfig) => StubReply | Error | Promise<StubReply | Error>;

export interface StubHttp {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
  on(method: string, url: string, handler: StubHandler): void;
  count(method: string, url: string): number;
}

function routeKey(method: string, url: string): string {
  return `${method.toUpperCase()} ${url}`;
}

/**
 * An axios instance whose adapter answers from registered handlers instead of
 * the network. Unregistered routes answer 404; a handler returning an Error
 * stands for a transport failure.
 */
export function createStubHttp(): StubHttp {
  const routes = new Map<string, StubHandler>();
  const requests: InternalAxiosRequestConfig[] = [];

  const http = axios.create({
    adapter: async config => {
      requests.push(config);
      const handler = routes.get(routeKey(config.method ?? 'get', config.url ?? ''));
      const reply = handler ? await handler(config) : { status: 404, data: 'Not Found' };
      if (reply instanceof Error) {
        throw new AxiosError(reply.message, AxiosError.ERR_NETWORK, config);
      }

      const status = reply.status ?? 200;
      const response: AxiosResponse = {
        data: reply.data,
        status,
        statusText: String(status),
        headers: new AxiosHeaders(),
        config
      };
      if (status < 200 || status >= 300) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
          config,
          undefined,
          response
        );
      }
      return response;
    }
  });

  return {
    http,
    requests,
    on(method, url, handler) {
      routes.set(routeKey(method, url), handler);
    },
    count(method, url) {
      return requests.filter(request => routeKey(request.method ?? 'get', request.url ?? '') === routeKey(method, url))
        .length;
    }
  };
}

export function parseJsonBody(request: InternalAxiosRequestConfig): unknown {
  return typeof request.data === 'string' ? JSON.parse(request.data) : request.data;
}
