import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

export interface FakeReply {
  status: number;
  data: unknown;
}

export interface RecordedRequest {
  method: string;
  url: string;
  data: unknown;
}

/**
 * axios instance whose adapter answers in process
 */
export function fakeHttp(handler: (request: RecordedRequest) => FakeReply | Promise<FakeReply>): {
  client: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      if (config.signal?.aborted) {
        throw new AxiosError('canceled', AxiosError.ERR_CANCELED, config);
      }

      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        data: config.data,
      };
      requests.push(request);

      const reply = await handler(request);
      const response = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };

      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response
        );
      }
      return response;
    },
  });

  return { client, requests };
}
