// src/store/influx.ts — InfluxDB 2.x HTTP adapter for the source store port

import { ResilientHttpClient, type IHttpClient } from "../shared/http-client.js"
import { SourceStoreError, type DeleteRequest, type SourceStore } from "./types.js"

export interface InfluxSourceConfig {
  url: string
  token: string
  org: string
  bucket: string
  /** Tag key carrying the retirement period */
  tag: string
  /** Flux range start, e.g. "-5y" */
  queryRange: string
  maxRetries: number
}

const FLUX_DURATION_RE = /^-?\d+(ns|us|ms|s|m|h|d|w|mo|y)$/
const PERIOD_RE = /^\d{4}-\d{2}$/
const TAG_RE = /^[A-Za-z_][A-Za-z0-9_]*$/

/** Flux query selecting every point retired in `period`. */
export function buildRetiredQuery(bucket: string, tag: string, period: string, range: string): string {
  if (!PERIOD_RE.test(period)) throw new Error(`Invalid period: "${period}"`)
  if (!TAG_RE.test(tag)) throw new Error(`Invalid tag key: "${tag}"`)
  if (!FLUX_DURATION_RE.test(range)) throw new Error(`Invalid query range: "${range}"`)
  return [
    `from(bucket: ${JSON.stringify(bucket)})`,
    `  |> range(start: ${range})`,
    `  |> filter(fn: (r) => r[${JSON.stringify(tag)}] == ${JSON.stringify(period)})`,
  ].join("\n")
}

/** Delete predicate in the store's predicate syntax, e.g. RetDate="2024-09". */
export function buildRetiredPredicate(tag: string, period: string): string {
  if (!PERIOD_RE.test(period)) throw new Error(`Invalid period: "${period}"`)
  if (!TAG_RE.test(tag)) throw new Error(`Invalid tag key: "${tag}"`)
  return `${tag}="${period}"`
}

export class InfluxSourceStore implements SourceStore {
  private readonly http: IHttpClient

  constructor(private readonly config: InfluxSourceConfig, http?: IHttpClient) {
    this.http = http ?? new ResilientHttpClient({
      maxRetries: config.maxRetries,
      baseDelayMs: 1_000,
      redactPatterns: config.token ? [new RegExp(escapeRegExp(config.token), "g")] : [],
    })
  }

  async queryRetired(period: string): Promise<AsyncIterable<string>> {
    const query = buildRetiredQuery(this.config.bucket, this.config.tag, period, this.config.queryRange)
    const resp = await this.http.streamLines({
      url: `${this.baseUrl()}/api/v2/query?${new URLSearchParams({ org: this.config.org })}`,
      method: "POST",
      headers: {
        ...this.authHeaders(),
        "Content-Type": "application/json",
        Accept: "application/csv",
      },
      body: JSON.stringify({
        query,
        type: "flux",
        dialect: {
          header: true,
          delimiter: ",",
          annotations: ["group", "datatype", "default"],
          dateTimeFormat: "RFC3339",
        },
      }),
    })

    if (resp.status !== 200) {
      throw new SourceStoreError("query", resp.status, await firstLines(resp.lines))
    }
    return resp.lines
  }

  async delete(request: DeleteRequest): Promise<void> {
    const resp = await this.http.request({
      url: `${this.baseUrl()}/api/v2/delete?${new URLSearchParams({ org: this.config.org, bucket: this.config.bucket })}`,
      method: "POST",
      headers: {
        ...this.authHeaders(),
        "Content-Type": "application/json",
      },
      body: JSON.stringify(request),
    })

    if (resp.status !== 204 && resp.status !== 200) {
      throw new SourceStoreError("delete", resp.status, resp.body.slice(0, 500))
    }
  }

  private baseUrl(): string {
    return this.config.url.replace(/\/+$/, "")
  }

  private authHeaders(): Record<string, string> {
    return this.config.token ? { Authorization: `Token ${this.config.token}` } : {}
  }
}

async function firstLines(lines: AsyncIterable<string>, max = 5): Promise<string> {
  const collected: string[] = []
  for await (const line of lines) {
    if (collected.length >= max) break
    collected.push(line)
  }
  return collected.join("\n").trim()
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}
