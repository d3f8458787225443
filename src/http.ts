export class HttpError extends Error {
  readonly status: number;
  readonly body: unknown;
  readonly headers: Headers;

  constructor(message: string, status: number, body: unknown, headers: Headers) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.body = body;
    this.headers = headers;
  }
}

export interface TextResponse {
  status: number;
  headers: Headers;
  body: string;
  url: string;
}

export async function requestText(
  input: string,
  init: RequestInit = {},
  timeoutMs = 20_000,
): Promise<TextResponse> {
  const timeout = AbortSignal.timeout(timeoutMs);
  const response = await fetch(input, {
    ...init,
    signal: init.signal ? AbortSignal.any([init.signal, timeout]) : timeout,
  });

  const text = await response.text();

  if (!response.ok) {
    throw new HttpError(
      `${init.method ?? "GET"} ${input} failed with status ${response.status}`,
      response.status,
      text || undefined,
      response.headers,
    );
  }

  return {
    status: response.status,
    headers: response.headers,
    body: text,
    url: response.url || input,
  };
}

export function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
}

export function isRetriableStatus(status: number): boolean {
  return status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

export function getRetryDelayMs(error: HttpError, attempt: number): number {
  const retryAfter = error.headers.get("retry-after");
  if (retryAfter) {
    const asNumber = Number(retryAfter);
    if (!Number.isNaN(asNumber)) {
      return Math.max(asNumber * 1_000, 1_000);
    }
  }

  const base = Math.min(1_000 * 2 ** (attempt - 1), 30_000);
  const jitter = Math.floor(Math.random() * 250);
  return base + jitter;
}

export async function wait(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();
  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
