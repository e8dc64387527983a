import axios, { AxiosInstance } from 'axios';
import { SinkTransportError } from './errors';
import type { RequestMethod } from './reporterTypes';

export interface SinkRequest {
  method: RequestMethod;
  url: string;
  headers: Record<string, string>;
  body: string;
}

export interface SinkResponse {
  status: number;
}

/**
 * Sends one request and resolves with whatever status the sink answered.
 * Rejects only when no response arrived.
 */
export type SinkTransport = (request: SinkRequest) => Promise<SinkResponse>;

export function toTransportError(error: unknown, url: string): SinkTransportError {
  if (error instanceof SinkTransportError) return error;
  if (axios.isAxiosError(error)) {
    return new SinkTransportError(error.message, url, error.code, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SinkTransportError(message, url, undefined, error);
}

export function createAxiosTransport(client: AxiosInstance = axios.create()): SinkTransport {
  return async ({ method, url, headers, body }) => {
    try {
      const response = await client.request<string>({
        method,
        url,
        headers,
        data: body,
        responseType: 'text',
        // 3xx, 4xx and 5xx are answers, not transport failures
        validateStatus: () => true,
        // one request per report: a redirect is the sink's answer
        maxRedirects: 0
      });
      return { status: response.status };
    } catch (error) {
      throw toTransportError(error, url);
    }
  };
}
