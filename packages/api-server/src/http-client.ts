export interface HttpRequest {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: string;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: Record<string, string>;
  readonly body?: string;
}

export interface HttpClient {
  execute(request: HttpRequest): Promise<HttpResponse>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const readResponseHeaders = (response: Response): Record<string, string> => {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });
  return headers;
};

export class FetchHttpClient implements HttpClient {
  constructor(private readonly fetchFn: FetchLike = (input, init) => fetch(input, init)) {}

  async execute(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.fetchFn(request.url, {
      method: request.method ?? "POST",
      headers: request.headers,
      body: request.body,
    });
    const body = await response.text();
    return {
      status: response.status,
      headers: readResponseHeaders(response),
      body,
    } satisfies HttpResponse;
  }
}
