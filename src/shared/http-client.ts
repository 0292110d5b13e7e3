// src/shared/http-client.ts
// ResilientHttpClient: HTTP client with exponential backoff retry and a per-attempt timeout.

export interface HttpRequest {
  url: string
  method: "GET" | "POST"
  headers?: Record<string, string>
  body?: string
}

export interface HttpResponse {
  status: number
  body: string
}

export interface IHttpClient {
  request(req: HttpRequest): Promise<HttpResponse>
}

export interface ResilientHttpConfig {
  /** Retries after the first attempt, on 5xx or transport failure */
  maxRetries: number
  baseDelayMs: number
  /** Abort each attempt after this many ms */
  timeoutMs: number
}

/** Raised when an attempt is aborted by the per-attempt timeout. */
export class HttpTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`)
    this.name = "HttpTimeoutError"
  }
}

export class ResilientHttpClient implements IHttpClient {
  constructor(
    private readonly config: ResilientHttpConfig,
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise(r => setTimeout(r, ms)),
  ) {}

  async request(req: HttpRequest): Promise<HttpResponse> {
    let lastError: Error | undefined

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.config.baseDelayMs * Math.pow(2, attempt - 1)
        await this.sleep(delay)
      }

      try {
        const resp = await fetch(req.url, {
          method: req.method,
          headers: req.headers,
          body: req.body,
          signal: AbortSignal.timeout(this.config.timeoutMs),
        })

        const body = await resp.text()
        const response: HttpResponse = { status: resp.status, body }

        if (resp.status >= 500 && attempt < this.config.maxRetries) {
          lastError = new Error(`HTTP ${resp.status}: ${body.slice(0, 200)}`)
          continue
        }

        return response
      } catch (err) {
        lastError = isTimeout(err)
          ? new HttpTimeoutError(redactUrl(req.url), this.config.timeoutMs)
          : err instanceof Error ? err : new Error(String(err))
        if (attempt >= this.config.maxRetries) break
      }
    }

    throw lastError ?? new Error("Request failed after retries")
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")
}

/** Strip the path so bot tokens embedded in Bot API URLs never reach logs. */
function redactUrl(url: string): string {
  try {
    return new URL(url).origin
  } catch {
    return "<invalid url>"
  }
}
