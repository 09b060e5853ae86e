// src/conductor/chat-provider.ts — Chat-completion provider adapter
// Speaks the OpenAI-style /chat/completions wire format (OpenRouter and compatibles).

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { ConductorError } from "./errors.js"
import type { ChatProviderConfig } from "./schema.js"
import { DEFAULT_UPSTREAM_TIMEOUT_MS, postJson } from "./upstream.js"
import type { FetchLike, ProviderInvocation } from "./upstream.js"

const DEFAULT_TEMPERATURE = 0.7
const DEFAULT_MAX_TOKENS = 2000
const DEFAULT_TOP_P = 0.95

interface ChatMessage {
  role: "system" | "user"
  content: string
}

interface ChatCompletionRequest {
  model: string
  messages: ChatMessage[]
  temperature: number
  max_tokens: number
  top_p: number
}

const ChatCompletionResponseSchema = Type.Object({
  choices: Type.Array(
    Type.Object({
      message: Type.Object({ content: Type.String() }),
    }),
    { minItems: 1 },
  ),
})

export class ChatProvider {
  readonly kind = "chat"
  private readonly timeoutMs: number

  constructor(
    readonly name: string,
    private readonly config: ChatProviderConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.timeoutMs = config.timeout_ms ?? DEFAULT_UPSTREAM_TIMEOUT_MS
  }

  buildRequest(call: ProviderInvocation): ChatCompletionRequest {
    const messages: ChatMessage[] = []
    if (call.systemPrompt) {
      messages.push({ role: "system", content: call.systemPrompt })
    }
    messages.push({ role: "user", content: call.prompt })

    return {
      model: call.model,
      messages,
      temperature: call.params.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: call.params.max_tokens ?? DEFAULT_MAX_TOKENS,
      top_p: call.params.top_p ?? DEFAULT_TOP_P,
    }
  }

  async invoke(call: ProviderInvocation): Promise<string> {
    const headers: Record<string, string> = {}
    if (this.config.api_key) {
      headers["Authorization"] = `Bearer ${this.config.api_key}`
    }

    const body = await postJson(this.fetchImpl, {
      provider: this.name,
      url: this.config.endpoint,
      payload: this.buildRequest(call),
      headers,
      timeoutMs: this.timeoutMs,
    })

    let parsed: unknown
    try {
      parsed = JSON.parse(body)
    } catch {
      throw this.invalidResponse(call.model, "response body is not JSON")
    }
    if (!Value.Check(ChatCompletionResponseSchema, parsed)) {
      throw this.invalidResponse(call.model, "missing choices[0].message.content")
    }
    return parsed.choices[0].message.content
  }

  private invalidResponse(model: string, reason: string): ConductorError {
    return new ConductorError(
      "UPSTREAM_ERROR",
      `Provider "${this.name}" sent an unusable response for ${model}: ${reason}`,
      { provider: this.name, model },
    )
  }
}
