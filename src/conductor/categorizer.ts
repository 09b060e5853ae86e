// src/conductor/categorizer.ts — Complexity tier selection for inbound requests

import { ConductorError } from "./errors.js"
import type { ModelCaller } from "./invoker.js"
import type { ConductorLogger } from "./logger.js"
import type { Category, RoutingConfig } from "./types.js"
import { isCategory } from "./types.js"

const IMAGE_MARKERS = ["image:", "img:"]

export const CATEGORIZER_TEMPERATURE = 0.3

export function hasImageMarker(message: string): boolean {
  const lower = message.toLowerCase()
  return IMAGE_MARKERS.some(marker => lower.includes(marker))
}

export class Categorizer {
  constructor(
    private readonly invoker: ModelCaller,
    private readonly routing: RoutingConfig,
    private readonly logger: ConductorLogger = console,
  ) {}

  /**
   * Deny cap → REQUEST_TOO_LARGE, force threshold → H, image marker → H,
   * otherwise the categorizer model decides. Unparseable answers fall to H.
   */
  async categorize(message: string, contextTokens = 0): Promise<Category> {
    const limits = this.routing.context_limits

    if (contextTokens > limits.deny_request) {
      throw new ConductorError(
        "REQUEST_TOO_LARGE",
        `Request of ${contextTokens} context tokens exceeds the limit of ${limits.deny_request}`,
        { contextTokens, limit: limits.deny_request },
      )
    }

    if (contextTokens > limits.force_high_tier) return "H"
    if (hasImageMarker(message)) return "H"

    const answer = await this.invoker.call(this.routing.categorizer_model, message, {
      temperature: CATEGORIZER_TEMPERATURE,
    })
    const category = answer.trim().toUpperCase()
    if (isCategory(category)) return category

    this.logger.warn(`[router] Invalid category "${answer.trim().slice(0, 50)}", defaulting to H`, {
      model: this.routing.categorizer_model,
    })
    return "H"
  }
}
