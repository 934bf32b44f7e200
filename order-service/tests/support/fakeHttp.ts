import axios, {
  AxiosError,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from "axios";

export interface RecordedRequest {
  method?: string;
  url?: string;
  body: unknown;
}

export type FakeReply =
  | { status: number; data?: unknown }
  | { timeout: true };

/**
 * An axios instance whose requests never leave the process: every call is
 * answered by `reply` and recorded in `requests`.
 */
export function fakeHttp(
  reply: (config: InternalAxiosRequestConfig) => FakeReply
): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    baseURL: "http://collaborator.test/api/v1",
    adapter: async (config) => {
      requests.push({
        method: config.method,
        url: config.url,
        body:
          typeof config.data === "string" ? JSON.parse(config.data) : undefined,
      });

      const answer = reply(config);
      if ("timeout" in answer) {
        throw new AxiosError(
          "timeout of 5000ms exceeded",
          AxiosError.ECONNABORTED,
          config
        );
      }

      const response: AxiosResponse = {
        data: answer.data,
        status: answer.status,
        statusText: String(answer.status),
        headers: {},
        config,
      };
      if (answer.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${answer.status}`,
          AxiosError.ERR_BAD_RESPONSE,
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
