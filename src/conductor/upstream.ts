// src/conductor/upstream.ts — Shared HTTP plumbing for provider adapters

import { ConductorError, toError } from "./errors.js"
import type { RequestParams } from "./schema.js"

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

/** One provider call, after prompt composition and parameter merging */
export interface ProviderInvocation {
  /** Concrete upstream model identifier */
  model: string
  prompt: string
  systemPrompt: string
  params: RequestParams
}

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 300_000

// Credentials rejected upstream stay rejected on the next attempt
function isRetryableStatus(status: number): boolean {
  return status !== 401 && status !== 403
}

export interface PostJsonRequest {
  provider: string
  url: string
  payload: unknown
  headers: Record<string, string>
  timeoutMs: number
}

/**
 * POST a JSON payload and return the raw response body.
 * Network failures and non-2xx statuses become retryable UPSTREAM_ERRORs,
 * except 401 and 403.
 */
export async function postJson(fetchImpl: FetchLike, req: PostJsonRequest): Promise<string> {
  let res: Response
  let body: string
  try {
    res = await fetchImpl(req.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...req.headers },
      body: JSON.stringify(req.payload),
      signal: AbortSignal.timeout(req.timeoutMs),
    })
    body = await res.text()
  } catch (err) {
    throw new ConductorError(
      "UPSTREAM_ERROR",
      `Request to provider "${req.provider}" failed: ${toError(err).message}`,
      { provider: req.provider },
      { retryable: true, cause: err },
    )
  }

  if (!res.ok) {
    throw new ConductorError(
      "UPSTREAM_ERROR",
      `Provider "${req.provider}" returned HTTP ${res.status}: ${body.slice(0, 200)}`,
      { provider: req.provider, status: res.status },
      { retryable: isRetryableStatus(res.status), statusCode: res.status },
    )
  }

  return body
}
