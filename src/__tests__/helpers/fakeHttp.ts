import axios, {
  AxiosError,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  headers: Record<string, string>;
  data: unknown;
}

export type FakeReply =
  | { status?: number; data: unknown; headers?: Record<string, string> }
  | { networkError: true };

export type Responder = (request: RecordedRequest) => FakeReply | undefined;

/**
 * Axios instance whose adapter answers from `responder` instead of the network.
 * Unmatched requests get a 404.
 */
export function createFakeHttp(
  responder: Responder,
  baseURL?: string
): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    baseURL,
    adapter: async (config: InternalAxiosRequestConfig) => {
      const headers: Record<string, string> = {};
      for (const [key, value] of Object.entries(config.headers.toJSON())) {
        if (typeof value === 'string') headers[key.toLowerCase()] = value;
      }

      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: { ...(config.params ?? {}) },
        headers,
        data: config.data,
      };
      requests.push(request);

      const reply = responder(request) ?? { status: 404, data: { error: 'not found' } };
      if ('networkError' in reply) {
        throw new AxiosError('Network Error', AxiosError.ERR_NETWORK, config);
      }

      const status = reply.status ?? 200;
      const response: AxiosResponse = {
        data: reply.data,
        status,
        statusText: String(status),
        headers: reply.headers ?? {},
        config,
      };
      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_REQUEST,
          config,
          null,
          response
        );
      }
      return response;
    },
  });

  return { http, requests };
}
