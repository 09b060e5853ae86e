// tests/sdk/conductor-sdk.test.ts — Conductor SDK client

import { describe, it, expect, vi } from "vitest"
import { ConductorApiError, ConductorClient } from "../../packages/conductor-sdk/src/index.js"

// ---------------------------------------------------------------------------
// Mock Fetch Helper
// ---------------------------------------------------------------------------

function mockFetch(responses: Array<{ status: number; body: unknown }>) {
  let callIndex = 0
  const calls: Array<{ url: string; init: RequestInit }> = []

  const fetchFn = vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
    const response = responses[callIndex++]
    if (!response) throw new Error("No more mock responses")

    calls.push({ url: url.toString(), init: init ?? {} })
    const text = typeof response.body === "string" ? response.body : JSON.stringify(response.body)
    return new Response(text, { status: response.status })
  })

  return { fetchFn, calls }
}

function sentBody(init: RequestInit): unknown {
  if (typeof init.body !== "string") throw new Error("expected a JSON string body")
  return JSON.parse(init.body)
}

describe("ConductorClient", () => {
  it("posts chat messages as JSON", async () => {
    const { fetchFn, calls } = mockFetch([{
      status: 200,
      body: { session_id: "s-1", response: "Hi!", category: "M", model_used: "general", timestamp: "t" },
    }])
    const client = new ConductorClient({ baseUrl: "https://conductor.test/", fetch: fetchFn })

    const result = await client.chat({ message: "Hello", session_id: "s-1" })
    expect(result.response).toBe("Hi!")
    expect(result.category).toBe("M")
    expect(calls[0].url).toBe("https://conductor.test/chat")
    expect(calls[0].init.method).toBe("POST")
    expect(sentBody(calls[0].init)).toEqual({ message: "Hello", session_id: "s-1" })
  })

  it("sends no body on GET", async () => {
    const { fetchFn, calls } = mockFetch([{ status: 200, body: { models: [], count: 0 } }])
    const client = new ConductorClient({ baseUrl: "https://conductor.test", fetch: fetchFn })

    await expect(client.listModels()).resolves.toEqual({ models: [], count: 0 })
    expect(calls[0].init.method).toBe("GET")
    expect(calls[0].init.body).toBeUndefined()
  })

  it("runs workflows and templates", async () => {
    const run = { run_id: "r", status: "completed", result: { a: "1" }, execution_time: 0.5 }
    const { fetchFn, calls } = mockFetch([{ status: 200, body: run }, { status: 200, body: run }])
    const client = new ConductorClient({ baseUrl: "https://conductor.test", fetch: fetchFn })

    const workflow = [{ tasks: [{ model: "general", prompt: "{q}", output_variable: "a" }] }]
    await client.runWorkflow({ workflow, variables: { q: "x" } })
    await client.runTemplate("deep dive", { topic: "tides" })

    expect(sentBody(calls[0].init)).toEqual({ workflow, variables: { q: "x" } })
    expect(calls[1].url).toBe("https://conductor.test/template/deep%20dive")
    expect(sentBody(calls[1].init)).toEqual({ topic: "tides" })
  })

  it("encodes session ids and uses DELETE to end a session", async () => {
    const { fetchFn, calls } = mockFetch([{ status: 200, body: { status: "deleted", session_id: "a/b" } }])
    const client = new ConductorClient({ baseUrl: "https://conductor.test", fetch: fetchFn })

    await client.deleteSession("a/b")
    expect(calls[0].url).toBe("https://conductor.test/session/a%2Fb")
    expect(calls[0].init.method).toBe("DELETE")
  })

  it("throws ConductorApiError with the server's code and message", async () => {
    const { fetchFn } = mockFetch([{
      status: 413,
      body: { error: "ConductorError", code: "REQUEST_TOO_LARGE", message: "too big" },
    }])
    const client = new ConductorClient({ baseUrl: "https://conductor.test", fetch: fetchFn })

    const err = await client.chat({ message: "x" }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ConductorApiError)
    if (!(err instanceof ConductorApiError)) return
    expect(err.message).toBe("too big")
    expect(err.code).toBe("REQUEST_TOO_LARGE")
    expect(err.status).toBe(413)
  })

  it("falls back to the HTTP status for non-JSON error bodies", async () => {
    const { fetchFn } = mockFetch([{ status: 502, body: "<html>bad gateway</html>" }])
    const client = new ConductorClient({ baseUrl: "https://conductor.test", fetch: fetchFn })

    const err = await client.health().catch((e: unknown) => e)
    if (!(err instanceof ConductorApiError)) throw new Error("expected ConductorApiError")
    expect(err.message).toBe("HTTP 502")
    expect(err.code).toBe("UNKNOWN")
  })
})
