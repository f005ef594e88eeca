export class HttpTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "HttpTimeoutError";
  }
}

export interface HttpResult {
  status: number;
  statusText: string;
  ok: boolean;
  body: string;
}

export interface PostOptions {
  headers: Record<string, string>;
  timeoutMs: number;
}

/**
 * POST a JSON payload and read the whole response body. The timeout covers
 * the body as well as the headers.
 */
export async function postJson(
  url: string,
  payload: unknown,
  options: PostOptions
): Promise<HttpResult> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new HttpTimeoutError(options.timeoutMs));
    }, options.timeoutMs);
  });

  const exchange = async (): Promise<HttpResult> => {
    const response = await fetch(url, {
      method: "POST",
      headers: options.headers,
      body: JSON.stringify(payload),
      signal: controller.signal,
    });
    const body = await response.text();
    return {
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      body,
    };
  };

  try {
    return await Promise.race([exchange(), deadline]);
  } catch (error) {
    if (controller.signal.aborted && !(error instanceof HttpTimeoutError)) {
      throw new HttpTimeoutError(options.timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
