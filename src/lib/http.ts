import axios, { AxiosInstance } from 'axios';

export interface HttpResult {
  status: number;
  body: string;
}

/**
 * Minimal HTTP surface used to probe and fetch metadata. Transport failures
 * reject; any HTTP status resolves.
 */
export interface HttpProbe {
  get(url: string): Promise<HttpResult>;
  head(url: string): Promise<{ status: number }>;
}

export function createHttpProbe(timeoutMs: number, client?: AxiosInstance): HttpProbe {
  const http =
    client ??
    axios.create({
      timeout: timeoutMs,
      maxRedirects: 5,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      validateStatus: () => true
    });

  return {
    async get(url: string) {
      const res = await http.get<unknown>(url);
      return { status: res.status, body: typeof res.data === 'string' ? res.data : '' };
    },
    async head(url: string) {
      const res = await http.head(url);
      return { status: res.status };
    }
  };
}
