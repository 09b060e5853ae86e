// src/conductor/invoker.ts — Model invocation with rate limiting, circuit breaking, retry and fallback
//
// Per attempt: provider admission (token bucket) → model breaker → provider call.
// Attempts are driven by the retry controller. When a model is exhausted, its
// fallback chain is walked depth-first as an explicit, bounded iteration.

import type { BreakerRegistry } from "./circuit-breaker.js"
import { ConductorError, toError } from "./errors.js"
import type { ConductorLogger } from "./logger.js"
import type { ModelProvider } from "./providers.js"
import type { ProviderRateLimiter } from "./rate-limiter.js"
import type { ModelRegistry } from "./registry.js"
import type { RetryController } from "./retry.js"
import type { CallConfig, ModelConfig, RequestParams } from "./schema.js"

export const DEFAULT_MAX_FALLBACK_DEPTH = 3

export interface ModelInvokerOptions {
  registry: ModelRegistry
  providers: Map<string, ModelProvider>
  rateLimiter: ProviderRateLimiter
  breakers: BreakerRegistry
  retry: RetryController
  logger?: ConductorLogger
  /** How many fallback levels below the requested model are explored (default: 3) */
  maxFallbackDepth?: number
}

/** The model-calling capability other components depend on */
export interface ModelCaller {
  call(modelName: string, prompt: string, config?: CallConfig, systemPromptOverride?: string): Promise<string>
}

function requestParams(config: CallConfig | undefined): RequestParams {
  if (!config) return {}
  const { addons, ...params } = config
  return params
}

export class ModelInvoker implements ModelCaller {
  private readonly registry: ModelRegistry
  private readonly providers: Map<string, ModelProvider>
  private readonly rateLimiter: ProviderRateLimiter
  private readonly breakers: BreakerRegistry
  private readonly retry: RetryController
  private readonly logger: ConductorLogger
  private readonly maxFallbackDepth: number

  constructor(options: ModelInvokerOptions) {
    this.registry = options.registry
    this.providers = options.providers
    this.rateLimiter = options.rateLimiter
    this.breakers = options.breakers
    this.retry = options.retry
    this.logger = options.logger ?? console
    this.maxFallbackDepth = options.maxFallbackDepth ?? DEFAULT_MAX_FALLBACK_DEPTH
  }

  /**
   * Call a logical model. Throws UNKNOWN_MODEL at once for an unconfigured name;
   * any other failure is retried, then handed to the fallback chain, and the
   * original error is re-thrown if every fallback fails too.
   */
  async call(modelName: string, prompt: string, config?: CallConfig, systemPromptOverride?: string): Promise<string> {
    this.resolveModel(modelName)

    try {
      return await this.attempt(modelName, prompt, config, systemPromptOverride)
    } catch (err) {
      const error = toError(err)
      this.logger.error(`[invoker] Error calling ${modelName}: ${error.message}`, { model: modelName })

      for (const fallback of this.fallbackChain(modelName)) {
        try {
          this.logger.info(`[invoker] Trying fallback model: ${fallback}`, { model: modelName, fallback })
          return await this.attempt(fallback, prompt, config, systemPromptOverride)
        } catch (fallbackErr) {
          this.logger.error(`[invoker] Fallback ${fallback} also failed: ${toError(fallbackErr).message}`, {
            model: modelName,
            fallback,
          })
        }
      }

      throw error
    }
  }

  /**
   * Fallback models in the order they are tried: depth-first through each
   * fallback's own chain, bounded by maxFallbackDepth, each model at most once.
   */
  fallbackChain(modelName: string): string[] {
    const chain: string[] = []
    const seen = new Set<string>([modelName])
    const stack: Array<{ name: string; depth: number }> = []

    const pushChildren = (parent: string, depth: number) => {
      const children = this.registry.getFallbacks(parent)
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ name: children[i], depth })
      }
    }

    pushChildren(modelName, 1)
    while (stack.length > 0) {
      const next = stack.pop()
      if (!next || seen.has(next.name)) continue
      seen.add(next.name)
      chain.push(next.name)
      if (next.depth < this.maxFallbackDepth) {
        pushChildren(next.name, next.depth + 1)
      }
    }

    return chain
  }

  /**
   * System prompt for a call: the override (or the model's base prompt),
   * followed by each requested addon labelled with its name, in request order.
   */
  composeSystemPrompt(modelName: string, addons: readonly string[], override?: string): string {
    const base = override ?? this.registry.getSystemPrompt(modelName)
    const blocks: string[] = []
    for (const name of addons) {
      const text = this.registry.getAddon(name)
      if (!text) {
        this.logger.warn(`[invoker] Unknown prompt addon "${name}" skipped`, { model: modelName, addon: name })
        continue
      }
      blocks.push(`[${name.toUpperCase()} ADDON]: ${text}`)
    }
    return [base, ...blocks].filter(part => part.length > 0).join("\n\n")
  }

  /** Resolve params, prompt and provider for one model, then run it through the resilience stack */
  private async attempt(
    modelName: string,
    prompt: string,
    config: CallConfig | undefined,
    systemPromptOverride: string | undefined,
  ): Promise<string> {
    const model = this.resolveModel(modelName)
    const provider = this.providers.get(model.provider)
    if (!provider) {
      throw new ConductorError("UNKNOWN_PROVIDER", `Unknown provider "${model.provider}" for model "${modelName}"`, {
        model: modelName,
        provider: model.provider,
      })
    }

    const params: RequestParams = { ...requestParams(model.defaults), ...requestParams(config) }
    const addons = config?.addons ?? model.defaults?.addons ?? []
    const systemPrompt = this.composeSystemPrompt(modelName, addons, systemPromptOverride)
    const breaker = this.breakers.get(modelName)

    return this.retry.execute(async () => {
      await this.rateLimiter.acquire(model.provider)
      return breaker.execute(() => provider.invoke({
        model: model.model,
        prompt,
        systemPrompt,
        params,
      }))
    })
  }

  private resolveModel(modelName: string): ModelConfig {
    const model = this.registry.getModel(modelName)
    if (!model) {
      throw new ConductorError("UNKNOWN_MODEL", `Unknown model: ${modelName}`, { model: modelName })
    }
    return model
  }
}
