import axios, { type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
  responseType?: string;
}

export interface FakeReply {
  status: number;
  data?: unknown;
}

type Responder = (request: RecordedRequest) => FakeReply;

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

/**
 * A real axios instance whose adapter answers in process. Status validation
 * happens here since custom adapters bypass axios' own settle step.
 */
export function createFakeAxios(respond: Responder): { client: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        body: parseBody(config.data),
        responseType: config.responseType,
      };
      requests.push(request);

      const reply = respond(request);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      const validateStatus = config.validateStatus ?? ((status: number) => status >= 200 && status < 300);
      if (!validateStatus(reply.status)) {
        throw new axios.AxiosError(
          `Request failed with status code ${reply.status}`,
          axios.AxiosError.ERR_BAD_RESPONSE,
          config,
          undefined,
          response
        );
      }
      return response;
    },
  });

  return { client, requests };
}
