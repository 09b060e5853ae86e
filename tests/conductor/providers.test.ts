// tests/conductor/providers.test.ts — Chat and media provider adapters over a stub fetch

import { describe, it, expect, vi } from "vitest"
import { ChatProvider } from "../../src/conductor/chat-provider.js"
import { isConductorError } from "../../src/conductor/errors.js"
import { MediaProvider, mediaKindFor } from "../../src/conductor/media-provider.js"
import { createProvider, createProviders } from "../../src/conductor/providers.js"
import type { ProviderInvocation } from "../../src/conductor/upstream.js"
import { CHAT_URL, IMAGE_URL, VIDEO_URL, chatCompletion, errorResponse } from "../helpers/conductor-fixtures.js"

function invocation(overrides: Partial<ProviderInvocation> = {}): ProviderInvocation {
  return { model: "id-general", prompt: "Hello", systemPrompt: "", params: {}, ...overrides }
}

function capture(response: () => Response) {
  const requests: Array<{ url: string; init: RequestInit }> = []
  const fetchFn = vi.fn(async (url: string, init: RequestInit) => {
    requests.push({ url, init })
    return response()
  })
  const bodyOf = (i = 0): unknown => {
    const body = requests[i]?.init.body
    return typeof body === "string" ? JSON.parse(body) : undefined
  }
  const headersOf = (i = 0) => new Headers(requests[i]?.init.headers)
  return { fetchFn, requests, bodyOf, headersOf }
}

describe("ChatProvider", () => {
  it("posts an OpenAI-style request with default sampling parameters", async () => {
    const { fetchFn, requests, bodyOf } = capture(() => chatCompletion("Hi there"))
    const provider = new ChatProvider("chat", { kind: "chat", endpoint: CHAT_URL }, fetchFn)

    await expect(provider.invoke(invocation())).resolves.toBe("Hi there")
    expect(requests[0].url).toBe(CHAT_URL)
    expect(requests[0].init.method).toBe("POST")
    expect(bodyOf()).toEqual({
      model: "id-general",
      messages: [{ role: "user", content: "Hello" }],
      temperature: 0.7,
      max_tokens: 2000,
      top_p: 0.95,
    })
  })

  it("puts a non-empty system prompt first and applies overrides", async () => {
    const { fetchFn, bodyOf } = capture(() => chatCompletion("ok"))
    const provider = new ChatProvider("chat", { kind: "chat", endpoint: CHAT_URL }, fetchFn)

    await provider.invoke(invocation({
      systemPrompt: "Be brief.",
      params: { temperature: 0.3, max_tokens: 5, top_p: 0.5 },
    }))
    expect(bodyOf()).toEqual({
      model: "id-general",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hello" },
      ],
      temperature: 0.3,
      max_tokens: 5,
      top_p: 0.5,
    })
  })

  it("sends the API key as a bearer token", async () => {
    const { fetchFn, headersOf } = capture(() => chatCompletion("ok"))
    const provider = new ChatProvider("chat", { kind: "chat", endpoint: CHAT_URL, api_key: "test-secret" }, fetchFn)
    await provider.invoke(invocation())
    expect(headersOf().get("Authorization")).toBe("Bearer test-secret")
    expect(headersOf().get("Content-Type")).toBe("application/json")
  })

  it("maps 4xx and 5xx statuses to retryable upstream errors", async () => {
    for (const status of [400, 404, 429, 500, 503]) {
      const { fetchFn } = capture(() => errorResponse(status, "slow down"))
      const provider = new ChatProvider("chat", { kind: "chat", endpoint: CHAT_URL }, fetchFn)
      const err = await provider.invoke(invocation()).catch((e: unknown) => e)
      if (!isConductorError(err, "UPSTREAM_ERROR")) throw new Error("expected UPSTREAM_ERROR")
      expect(err.retryable).toBe(true)
      expect(err.statusCode).toBe(status)
      expect(err.message).toBe(`[conductor] UPSTREAM_ERROR: Provider "chat" returned HTTP ${status}: slow down`)
    }
  })

  it("maps auth failures to non-retryable upstream errors", async () => {
    for (const status of [401, 403]) {
      const { fetchFn } = capture(() => errorResponse(status, "bad key"))
      const provider = new ChatProvider("chat", { kind: "chat", endpoint: CHAT_URL }, fetchFn)
      const err = await provider.invoke(invocation()).catch((e: unknown) => e)
      if (!isConductorError(err, "UPSTREAM_ERROR")) throw new Error("expected UPSTREAM_ERROR")
      expect(err.retryable).toBe(false)
      expect(err.statusCode).toBe(status)
    }
  })

  it("treats network failures as retryable", async () => {
    const fetchFn = vi.fn(async (): Promise<Response> => {
      throw new TypeError("fetch failed")
    })
    const provider = new ChatProvider("chat", { kind: "chat", endpoint: CHAT_URL }, fetchFn)
    const err = await provider.invoke(invocation()).catch((e: unknown) => e)
    if (!isConductorError(err, "UPSTREAM_ERROR")) throw new Error("expected UPSTREAM_ERROR")
    expect(err.retryable).toBe(true)
    expect(err.message).toBe("[conductor] UPSTREAM_ERROR: Request to provider \"chat\" failed: fetch failed")
  })

  it("rejects bodies without choices[0].message.content", async () => {
    const { fetchFn } = capture(() => new Response(JSON.stringify({ choices: [] }), { status: 200 }))
    const provider = new ChatProvider("chat", { kind: "chat", endpoint: CHAT_URL }, fetchFn)
    const err = await provider.invoke(invocation()).catch((e: unknown) => e)
    if (!isConductorError(err, "UPSTREAM_ERROR")) throw new Error("expected UPSTREAM_ERROR")
    expect(err.message).toBe(
      "[conductor] UPSTREAM_ERROR: Provider \"chat\" sent an unusable response for id-general: missing choices[0].message.content",
    )
    expect(err.retryable).toBe(true)
  })
})

describe("MediaProvider", () => {
  const config = { kind: "media" as const, endpoints: { image: IMAGE_URL, video: VIDEO_URL }, api_key: "test-secret" }

  it("selects the payload shape from the model id", () => {
    expect(mediaKindFor("imagen-3.0-generate-002")).toBe("image")
    expect(mediaKindFor("Veo-2")).toBe("video")
    expect(mediaKindFor("gpt-4o")).toBeNull()
  })

  it("posts an image payload with defaults and returns the body verbatim", async () => {
    const raw = "{\"predictions\":[{\"bytesBase64Encoded\":\"AAAA\"}]}"
    const { fetchFn, requests, bodyOf, headersOf } = capture(() => new Response(raw, { status: 200 }))
    const provider = new MediaProvider("media", config, fetchFn)

    await expect(provider.invoke(invocation({ model: "imagen-test", prompt: "a red fox" }))).resolves.toBe(raw)
    expect(requests[0].url).toBe(IMAGE_URL)
    expect(headersOf().get("x-goog-api-key")).toBe("test-secret")
    expect(bodyOf()).toEqual({ prompt: "a red fox", aspectRatio: "1:1", negativePrompt: "", numberOfImages: 1 })
  })

  it("posts a video payload with overrides", async () => {
    const { fetchFn, requests, bodyOf } = capture(() => new Response("{}", { status: 200 }))
    const provider = new MediaProvider("media", config, fetchFn)

    await provider.invoke(invocation({
      model: "veo-test",
      prompt: "waves",
      params: { duration: 4, generate_audio: false },
    }))
    expect(requests[0].url).toBe(VIDEO_URL)
    expect(bodyOf()).toEqual({
      prompt: "waves",
      duration: 4,
      aspectRatio: "16:9",
      resolution: "1080p",
      generateAudio: false,
    })
  })

  it("rejects models that are neither image nor video", async () => {
    const { fetchFn } = capture(() => new Response("{}"))
    const provider = new MediaProvider("media", config, fetchFn)
    const err = await provider.invoke(invocation({ model: "text-model" })).catch((e: unknown) => e)
    expect(isConductorError(err, "UNKNOWN_MODEL")).toBe(true)
    expect(fetchFn).not.toHaveBeenCalled()
  })

  it("fails when the needed endpoint is not configured", async () => {
    const { fetchFn } = capture(() => new Response("{}"))
    const provider = new MediaProvider("media", { kind: "media", endpoints: { image: IMAGE_URL } }, fetchFn)
    const err = await provider.invoke(invocation({ model: "veo-test" })).catch((e: unknown) => e)
    expect(isConductorError(err, "CONFIG_INVALID")).toBe(true)
  })
})

describe("createProvider", () => {
  it("builds the variant named by the config kind", () => {
    expect(createProvider("c", { kind: "chat", endpoint: CHAT_URL }).kind).toBe("chat")
    expect(createProvider("m", { kind: "media", endpoints: {} }).kind).toBe("media")
  })

  it("builds one provider per configured name", () => {
    const providers = createProviders({
      chat: { kind: "chat", endpoint: CHAT_URL },
      media: { kind: "media", endpoints: {} },
    })
    expect([...providers.keys()]).toEqual(["chat", "media"])
    expect(providers.get("chat")?.name).toBe("chat")
  })
})
