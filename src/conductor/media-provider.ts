// src/conductor/media-provider.ts — Image/video generation provider adapter
// Payload shape is chosen from the model identifier (Imagen → image, Veo → video).
// The response body is handed back verbatim as the task's text result.

import { ConductorError } from "./errors.js"
import type { MediaProviderConfig } from "./schema.js"
import { DEFAULT_UPSTREAM_TIMEOUT_MS, postJson } from "./upstream.js"
import type { FetchLike, ProviderInvocation } from "./upstream.js"

export type MediaKind = "image" | "video"

interface ImagePayload {
  prompt: string
  aspectRatio: string
  negativePrompt: string
  numberOfImages: number
}

interface VideoPayload {
  prompt: string
  duration: number
  aspectRatio: string
  resolution: string
  generateAudio: boolean
}

export function mediaKindFor(model: string): MediaKind | null {
  const id = model.toLowerCase()
  if (id.includes("imagen")) return "image"
  if (id.includes("veo")) return "video"
  return null
}

export class MediaProvider {
  readonly kind = "media"
  private readonly timeoutMs: number

  constructor(
    readonly name: string,
    private readonly config: MediaProviderConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.timeoutMs = config.timeout_ms ?? DEFAULT_UPSTREAM_TIMEOUT_MS
  }

  buildPayload(kind: MediaKind, call: ProviderInvocation): ImagePayload | VideoPayload {
    const p = call.params
    switch (kind) {
      case "image":
        return {
          prompt: call.prompt,
          aspectRatio: p.aspect_ratio ?? "1:1",
          negativePrompt: p.negative_prompt ?? "",
          numberOfImages: p.num_images ?? 1,
        }
      case "video":
        return {
          prompt: call.prompt,
          duration: p.duration ?? 8,
          aspectRatio: p.aspect_ratio ?? "16:9",
          resolution: p.resolution ?? "1080p",
          generateAudio: p.generate_audio ?? true,
        }
    }
  }

  async invoke(call: ProviderInvocation): Promise<string> {
    const kind = mediaKindFor(call.model)
    if (!kind) {
      throw new ConductorError("UNKNOWN_MODEL", `Provider "${this.name}" cannot generate media with "${call.model}"`, {
        provider: this.name,
        model: call.model,
      })
    }

    const url = this.config.endpoints[kind]
    if (!url) {
      throw new ConductorError("CONFIG_INVALID", `Provider "${this.name}" has no ${kind} endpoint configured`, {
        provider: this.name,
        kind,
      })
    }

    const headers: Record<string, string> = {}
    if (this.config.api_key) {
      headers["x-goog-api-key"] = this.config.api_key
    }

    return postJson(this.fetchImpl, {
      provider: this.name,
      url,
      payload: this.buildPayload(kind, call),
      headers,
      timeoutMs: this.timeoutMs,
    })
  }
}
