import type { HttpClient, HttpRequest, HttpResponse } from "@brokerkit/contracts";

import { TransportFailure, failurePhaseOf } from "./transport-failure.js";
import { toHeadersRecord } from "./utils.js";

type FetchLikeResponse = {
  readonly status: number;
  readonly headers?: {
    forEach(callback: (value: string, key: string) => void): void;
  };
  text(): Promise<string>;
};

type FetchLike = (input: string, init: FetchInit) => Promise<FetchLikeResponse>;

interface FetchInit {
  readonly method: string;
  readonly headers: Record<string, string>;
  readonly body?: string;
  readonly signal?: AbortSignal;
}

const readResponseHeaders = (response: FetchLikeResponse): Record<string, string> => {
  if (!response.headers) {
    return {};
  }
  const pairs: Array<[string, string]> = [];
  response.headers.forEach((value, key) => {
    pairs.push([key, value]);
  });
  return toHeadersRecord(pairs);
};

const buildFetchInit = (request: HttpRequest): FetchInit => ({
  method: request.method,
  headers: { ...request.headers },
  body: request.body,
  signal: request.signal,
});

const globalFetch: FetchLike = (input, init) => fetch(input, init);

export class FetchHttpClient implements HttpClient {
  constructor(private readonly fetchFn: FetchLike = globalFetch) {}

  async execute(request: HttpRequest): Promise<HttpResponse> {
    let response: FetchLikeResponse;
    try {
      response = await this.fetchFn(request.url, buildFetchInit(request));
    } catch (error) {
      if (request.signal?.aborted) {
        throw error;
      }
      throw new TransportFailure(`Request to ${request.url} failed.`, failurePhaseOf(error), { cause: error });
    }

    try {
      const body = await response.text();
      return {
        status: response.status,
        headers: readResponseHeaders(response),
        body,
      } satisfies HttpResponse;
    } catch (error) {
      if (request.signal?.aborted) {
        throw error;
      }
      throw new TransportFailure(`Reading the response from ${request.url} failed.`, "in_flight", { cause: error });
    }
  }
}

export const defaultHttpClient = new FetchHttpClient();
