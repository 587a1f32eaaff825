import { HttpClient, HttpRequest, HttpResponse } from './llm.types';

/**
 * Default HttpClient on the native fetch API with an abort-based timeout
 */
export class FetchHttpClient implements HttpClient {
  async post(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: controller.signal,
      });
      return { status: response.status, body: await response.text() };
    } finally {
      // Cleared even when reading the body fails
      clearTimeout(timeoutId);
    }
  }
}

export function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}
