/**
 * PrintHub Test HTTP Client
 *
 * Request helpers for integration testing on top of the global fetch.
 */

export type HttpResponse<T> = {
  data: T;
  status: number;
  statusText: string;
  headers: Record<string, string>;
};

async function parseResponse<T>(response: Response): Promise<HttpResponse<T>> {
  const text = await response.text();

  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  // JSON bodies are parsed; anything else is returned as text
  let data: unknown = text;
  if (headers["content-type"]?.includes("application/json") && text !== "") {
    data = JSON.parse(text);
  }

  return {
    // Test code states the shape it expects
    data: data as T,
    status: response.status,
    statusText: response.statusText,
    headers,
  };
}

export class TestHttpClient {
  private headers: Record<string, string> = {};

  constructor(public baseUrl: string) {}

  setToken(token: string): void {
    this.headers["Authorization"] = `Bearer ${token}`;
  }

  clearToken(): void {
    delete this.headers["Authorization"];
  }

  async request<T = unknown>(
    path: string,
    options: RequestInit = {},
  ): Promise<HttpResponse<T>> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      redirect: "manual",
      ...options,
      headers: {
        ...this.headers,
        ...options.headers,
      },
    });
    return parseResponse<T>(response);
  }

  private jsonRequest<T>(
    method: string,
    path: string,
    body?: unknown,
  ): Promise<HttpResponse<T>> {
    return this.request<T>(path, {
      method,
      body: body === undefined ? undefined : JSON.stringify(body),
      headers: body === undefined ? {} : { "Content-Type": "application/json" },
    });
  }

  get<T = unknown>(path: string): Promise<HttpResponse<T>> {
    return this.request<T>(path, { method: "GET" });
  }

  post<T = unknown>(path: string, body?: unknown): Promise<HttpResponse<T>> {
    return this.jsonRequest<T>("POST", path, body);
  }

  put<T = unknown>(path: string, body?: unknown): Promise<HttpResponse<T>> {
    return this.jsonRequest<T>("PUT", path, body);
  }

  patch<T = unknown>(path: string, body?: unknown): Promise<HttpResponse<T>> {
    return this.jsonRequest<T>("PATCH", path, body);
  }

  delete<T = unknown>(path: string): Promise<HttpResponse<T>> {
    return this.request<T>(path, { method: "DELETE" });
  }

  /**
   * Multipart upload; fetch sets the boundary header
   */
  postForm<T = unknown>(path: string, form: FormData): Promise<HttpResponse<T>> {
    return this.request<T>(path, { method: "POST", body: form });
  }

  postRaw<T = unknown>(
    path: string,
    body: string,
    contentType: string,
  ): Promise<HttpResponse<T>> {
    return this.request<T>(path, {
      method: "POST",
      body,
      headers: { "Content-Type": contentType },
    });
  }
}
