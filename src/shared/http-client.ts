// src/shared/http-client.ts
// ResilientHttpClient: HTTP client with exponential backoff retry.
// Used by the source store adapter for both buffered and streamed responses.

import { Readable } from "node:stream"
import { createInterface } from "node:readline"

export interface HttpRequest {
  url: string
  method: "GET" | "POST" | "PUT" | "DELETE"
  headers?: Record<string, string>
  body?: string
}

export interface HttpResponse {
  status: number
  headers: Record<string, string>
  body: string
}

export interface HttpLineStream {
  status: number
  headers: Record<string, string>
  /** Response body split into lines; CRLF and LF both end a line */
  lines: AsyncIterable<string>
}

export interface IHttpClient {
  request(req: HttpRequest): Promise<HttpResponse>
  /** Like request(), but a 2xx body is handed over as a line stream. */
  streamLines(req: HttpRequest): Promise<HttpLineStream>
}

export interface ResilientHttpConfig {
  maxRetries: number
  baseDelayMs: number
  /** Applied to every error message this client produces */
  redactPatterns: RegExp[]
}

export class ResilientHttpClient implements IHttpClient {
  constructor(
    private readonly config: ResilientHttpConfig,
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise(r => setTimeout(r, ms)),
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async request(req: HttpRequest): Promise<HttpResponse> {
    const resp = await this.send(req)
    return {
      status: resp.status,
      headers: headersOf(resp),
      body: await resp.text(),
    }
  }

  async streamLines(req: HttpRequest): Promise<HttpLineStream> {
    const resp = await this.send(req)
    const headers = headersOf(resp)

    if (resp.status < 200 || resp.status >= 300 || !resp.body) {
      const body = await resp.text()
      return { status: resp.status, headers, lines: linesOf(body) }
    }

    // Retries end here: once the body streams, a failure surfaces to the consumer
    const source = Readable.fromWeb(resp.body)
    const lines = createInterface({ input: source, crlfDelay: Infinity })
    return { status: resp.status, headers, lines }
  }

  redact(text: string): string {
    return this.config.redactPatterns.reduce((acc, re) => acc.replace(re, "[REDACTED]"), text)
  }

  private async send(req: HttpRequest): Promise<Response> {
    let lastError: Error | undefined

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.config.baseDelayMs * Math.pow(2, attempt - 1)
        await this.sleep(delay)
      }

      try {
        const resp = await this.fetchImpl(req.url, {
          method: req.method,
          headers: req.headers,
          body: req.body,
        })

        if (resp.status >= 500 && attempt < this.config.maxRetries) {
          const body = await resp.text()
          lastError = new Error(this.redact(`HTTP ${resp.status}: ${body.slice(0, 200)}`))
          continue
        }

        return resp
      } catch (err) {
        lastError = new Error(this.redact(err instanceof Error ? err.message : String(err)))
        if (attempt >= this.config.maxRetries) break
      }
    }

    throw lastError ?? new Error("Request failed after retries")
  }
}

function headersOf(resp: Response): Record<string, string> {
  const headers: Record<string, string> = {}
  resp.headers.forEach((v, k) => { headers[k] = v })
  return headers
}

async function* linesOf(text: string): AsyncGenerator<string> {
  for (const line of text.split(/\r?\n/)) yield line
}
