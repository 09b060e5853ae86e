// src/conductor/registry.ts — Immutable model registry built from the orchestration document

import { readFileSync } from "node:fs"
import { Value } from "@sinclair/typebox/value"
import { ConductorError } from "./errors.js"
import type { ConductorLogger } from "./logger.js"
import { OrchestrationDocumentSchema } from "./schema.js"
import type {
  ModelConfig,
  OrchestrationDocument,
  ProviderConfig,
  RoutingConfig,
} from "./schema.js"
import type { CircuitBreakerConfig } from "./circuit-breaker.js"
import type { ProviderRateLimit } from "./rate-limiter.js"
import type { ModelSummary, RetryPolicy, TemplateSummary, WorkflowTemplate } from "./types.js"
import { firstSchemaError, normalizeWorkflow } from "./workflow-parser.js"

/** Allowlist patterns for {env:VAR} interpolation */
const ENV_ALLOWLIST_PATTERNS = [
  /^[A-Z0-9_]+_API_KEY$/,   // *_API_KEY
]

function isEnvVarAllowed(name: string): boolean {
  return ENV_ALLOWLIST_PATTERNS.some(p => p.test(name))
}

export interface RegistryOptions {
  env?: Record<string, string | undefined>
  logger?: ConductorLogger
}

/** Resolve {env:VAR_NAME} patterns in a string */
export function interpolateEnvVar(
  value: string,
  env: Record<string, string | undefined> = process.env,
  logger: ConductorLogger = console,
): string {
  const match = value.match(/^\{env:([^}]+)\}$/)
  if (!match) return value
  const varName = match[1]
  if (!isEnvVarAllowed(varName)) {
    logger.warn(`[conductor] Env var "${varName}" does not match allowlist pattern. Rejecting interpolation.`)
    return ""
  }
  return env[varName] ?? ""
}

/** Read and schema-check an orchestration document from disk */
export function loadOrchestrationDocument(path: string): OrchestrationDocument {
  let raw: string
  try {
    raw = readFileSync(path, "utf8")
  } catch (err) {
    throw new ConductorError("CONFIG_INVALID", `Cannot read orchestration config: ${path}`, { path }, { cause: err })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ConductorError("CONFIG_INVALID", `Orchestration config is not valid JSON: ${path}`, { path }, { cause: err })
  }

  return validateOrchestrationDocument(parsed)
}

export function validateOrchestrationDocument(value: unknown): OrchestrationDocument {
  if (!Value.Check(OrchestrationDocumentSchema, value)) {
    throw new ConductorError(
      "CONFIG_INVALID",
      `Orchestration config failed validation at ${firstSchemaError(OrchestrationDocumentSchema, value)}`,
    )
  }
  return value
}

export class ModelRegistry {
  private constructor(
    private readonly models: Map<string, ModelConfig>,
    private readonly providers: Map<string, ProviderConfig>,
    private readonly systemPrompts: Map<string, string>,
    private readonly addons: Map<string, string>,
    private readonly fallbacks: Map<string, readonly string[]>,
    private readonly templates: Map<string, WorkflowTemplate>,
    private readonly doc: OrchestrationDocument,
  ) {}

  /** Factory: resolves {env:VAR} API keys, validates fallback chains and templates */
  static fromDocument(doc: OrchestrationDocument, options: RegistryOptions = {}): ModelRegistry {
    const env = options.env ?? process.env
    const logger = options.logger ?? console

    const providers = new Map<string, ProviderConfig>()
    for (const [name, provider] of Object.entries(doc.providers)) {
      providers.set(name, provider.api_key === undefined
        ? provider
        : { ...provider, api_key: interpolateEnvVar(provider.api_key, env, logger) })
    }

    const fallbacks = new Map<string, readonly string[]>(Object.entries(doc.fallbacks ?? {}))
    detectCycles(doc.fallbacks ?? {})
    checkRoutingModels(doc)

    const templates = new Map<string, WorkflowTemplate>()
    for (const [name, template] of Object.entries(doc.workflow_templates ?? {})) {
      try {
        templates.set(name, {
          name,
          description: template.description ?? "",
          workflow: normalizeWorkflow(template.workflow),
        })
      } catch (err) {
        throw new ConductorError("CONFIG_INVALID", `Workflow template "${name}" is invalid`, { template: name }, { cause: err })
      }
    }

    return new ModelRegistry(
      new Map(Object.entries(doc.models)),
      providers,
      new Map(Object.entries(doc.system_prompts ?? {})),
      new Map(Object.entries(doc.prompt_addons ?? {})),
      fallbacks,
      templates,
      doc,
    )
  }

  getModel(name: string): ModelConfig | undefined {
    return this.models.get(name)
  }

  getProvider(name: string): ProviderConfig | undefined {
    return this.providers.get(name)
  }

  /** Configured base system prompt for a model ("" when none) */
  getSystemPrompt(model: string): string {
    return this.systemPrompts.get(model) ?? ""
  }

  getAddon(name: string): string | undefined {
    return this.addons.get(name)
  }

  getFallbacks(model: string): readonly string[] {
    return this.fallbacks.get(model) ?? []
  }

  getTemplate(name: string): WorkflowTemplate | undefined {
    return this.templates.get(name)
  }

  get routing(): RoutingConfig {
    return this.doc.routing
  }

  get rateLimits(): Record<string, ProviderRateLimit> {
    return this.doc.rate_limits ?? {}
  }

  get providerConfigs(): Record<string, ProviderConfig> {
    return Object.fromEntries(this.providers)
  }

  retryPolicy(): RetryPolicy {
    const r = this.doc.retry
    return {
      baseDelayMs: r.base_delay_ms,
      maxDelayMs: r.max_delay_ms,
      multiplier: r.exponential_base,
      jitter: r.jitter_enabled,
      maxAttempts: r.max_attempts,
    }
  }

  breakerConfig(): CircuitBreakerConfig {
    return {
      failureThreshold: this.doc.circuit_breaker.failure_threshold,
      timeoutMs: this.doc.circuit_breaker.timeout_ms,
    }
  }

  listModels(): ModelSummary[] {
    return Array.from(this.models, ([name, m]) => ({
      name,
      provider: m.provider,
      model: m.model,
      purpose: m.purpose ?? "",
    }))
  }

  listAddons(): string[] {
    return Array.from(this.addons.keys())
  }

  listTemplates(): TemplateSummary[] {
    return Array.from(this.templates.values(), t => ({
      name: t.name,
      description: t.description,
      steps: t.workflow.length,
    }))
  }
}

/** Every model the router names must be configured */
function checkRoutingModels(doc: OrchestrationDocument): void {
  const { routing } = doc
  const referenced: Array<[string, string | undefined]> = [
    ["categorizer_model", routing.categorizer_model],
    ["narrator_model", routing.narrator_model],
    ["categories.L.model", routing.categories.L.model],
    ["categories.M.model", routing.categories.M.model],
    ["categories.H.planner_model", routing.categories.H.planner_model],
    ["categories.H.fast_response_model", routing.categories.H.fast_response_model],
  ]
  for (const [key, model] of referenced) {
    if (model !== undefined && !(model in doc.models)) {
      throw new ConductorError("CONFIG_INVALID", `routing.${key} names unknown model "${model}"`, { key, model })
    }
  }
}

/** DFS cycle detection on the fallback chain graph */
function detectCycles(chains: Record<string, string[]>): void {
  const visiting = new Set<string>()
  const visited = new Set<string>()

  function dfs(node: string): void {
    if (visited.has(node)) return
    if (visiting.has(node)) {
      throw new ConductorError("CONFIG_INVALID", `Cycle detected in fallback chain at "${node}"`, { node })
    }

    visiting.add(node)
    for (const neighbor of chains[node] ?? []) {
      dfs(neighbor)
    }
    visiting.delete(node)
    visited.add(node)
  }

  for (const node of Object.keys(chains)) {
    dfs(node)
  }
}
