// src/conductor/providers.ts — Closed provider variant and factory
// Adding a provider kind means adding a variant here, never a string branch at call sites.

import { ChatProvider } from "./chat-provider.js"
import { MediaProvider } from "./media-provider.js"
import type { ProviderConfig } from "./schema.js"
import type { FetchLike } from "./upstream.js"

export type ModelProvider = ChatProvider | MediaProvider

export type ProviderKind = ModelProvider["kind"]

export function createProvider(name: string, config: ProviderConfig, fetchImpl?: FetchLike): ModelProvider {
  switch (config.kind) {
    case "chat":
      return new ChatProvider(name, config, fetchImpl)
    case "media":
      return new MediaProvider(name, config, fetchImpl)
  }
}

/** Build one provider instance per configured provider name */
export function createProviders(
  configs: Record<string, ProviderConfig>,
  fetchImpl?: FetchLike,
): Map<string, ModelProvider> {
  const providers = new Map<string, ModelProvider>()
  for (const [name, config] of Object.entries(configs)) {
    providers.set(name, createProvider(name, config, fetchImpl))
  }
  return providers
}
