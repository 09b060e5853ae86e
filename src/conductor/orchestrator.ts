// src/conductor/orchestrator.ts — Composition root for the conductor
//
// Owns the registry, provider rate limiter, breaker registry, retry controller,
// providers and the components built on them. One instance per process.

import { ulid } from "ulid"
import { Categorizer } from "./categorizer.js"
import { BreakerRegistry } from "./circuit-breaker.js"
import type { CircuitBreakerStats } from "./circuit-breaker.js"
import { ConductorError } from "./errors.js"
import { ModelInvoker } from "./invoker.js"
import type { ConductorLogger } from "./logger.js"
import { createProviders } from "./providers.js"
import { ProviderRateLimiter } from "./rate-limiter.js"
import type { RateLimitStatus } from "./rate-limiter.js"
import { loadOrchestrationDocument, ModelRegistry } from "./registry.js"
import { RetryController } from "./retry.js"
import { RequestRouter } from "./router.js"
import type { OrchestrationDocument } from "./schema.js"
import type {
  ModelSummary,
  RoutedResponse,
  TemplateSummary,
  WorkflowRunResult,
  WorkflowStep,
} from "./types.js"
import type { FetchLike } from "./upstream.js"
import { WorkflowExecutor } from "./workflow-executor.js"
import { normalizeWorkflow } from "./workflow-parser.js"

export interface OrchestratorOptions {
  fetch?: FetchLike
  clock?: () => number
  sleep?: (ms: number) => Promise<void>
  random?: () => number
  logger?: ConductorLogger
  env?: Record<string, string | undefined>
  maxFallbackDepth?: number
  /** Poll interval while waiting on a provider rate limit (default: 100) */
  rateLimitPollMs?: number
}

export interface OrchestratorStats {
  breakers: Record<string, CircuitBreakerStats>
  rate_limits: Record<string, RateLimitStatus>
}

export class Orchestrator {
  readonly registry: ModelRegistry
  readonly invoker: ModelInvoker
  readonly router: RequestRouter
  readonly executor: WorkflowExecutor
  private readonly breakers: BreakerRegistry
  private readonly rateLimiter: ProviderRateLimiter
  private readonly clock: () => number
  private readonly logger: ConductorLogger

  constructor(registry: ModelRegistry, options: OrchestratorOptions = {}) {
    this.registry = registry
    this.clock = options.clock ?? Date.now
    this.logger = options.logger ?? console

    this.rateLimiter = new ProviderRateLimiter(registry.rateLimits, {
      clock: this.clock,
      sleep: options.sleep,
      pollIntervalMs: options.rateLimitPollMs,
    })
    this.breakers = new BreakerRegistry(registry.breakerConfig(), { clock: this.clock, logger: this.logger })
    const retry = new RetryController(registry.retryPolicy(), {
      sleep: options.sleep,
      random: options.random,
      logger: this.logger,
    })

    this.invoker = new ModelInvoker({
      registry,
      providers: createProviders(registry.providerConfigs, options.fetch),
      rateLimiter: this.rateLimiter,
      breakers: this.breakers,
      retry,
      logger: this.logger,
      maxFallbackDepth: options.maxFallbackDepth,
    })

    const routing = registry.routing
    this.executor = new WorkflowExecutor(this.invoker, {
      narratorModel: routing.narrator_model,
      logger: this.logger,
    })
    const categorizer = new Categorizer(this.invoker, routing, this.logger)
    this.router = new RequestRouter(this.invoker, categorizer, this.executor, routing, this.logger)
  }

  static fromDocument(doc: OrchestrationDocument, options: OrchestratorOptions = {}): Orchestrator {
    const registry = ModelRegistry.fromDocument(doc, { env: options.env, logger: options.logger })
    return new Orchestrator(registry, options)
  }

  static fromFile(path: string, options: OrchestratorOptions = {}): Orchestrator {
    return Orchestrator.fromDocument(loadOrchestrationDocument(path), options)
  }

  processRequest(message: string, contextTokens = 0): Promise<string> {
    return this.router.processRequest(message, contextTokens)
  }

  route(message: string, contextTokens = 0): Promise<RoutedResponse> {
    return this.router.route(message, contextTokens)
  }

  /** Run a caller-supplied workflow definition (array of steps) with seed variables */
  async executeWorkflow(definition: unknown, variables: Record<string, unknown> = {}): Promise<WorkflowRunResult> {
    return this.runWorkflow(normalizeWorkflow(definition), variables)
  }

  async executeTemplate(name: string, variables: Record<string, unknown> = {}): Promise<WorkflowRunResult> {
    const template = this.registry.getTemplate(name)
    if (!template) {
      throw new ConductorError("TEMPLATE_NOT_FOUND", `Template not found: ${name}`, { template: name })
    }
    return this.runWorkflow(template.workflow, variables)
  }

  listModels(): ModelSummary[] {
    return this.registry.listModels()
  }

  listAddons(): string[] {
    return this.registry.listAddons()
  }

  listTemplates(): TemplateSummary[] {
    return this.registry.listTemplates()
  }

  getStats(): OrchestratorStats {
    return {
      breakers: this.breakers.snapshot(),
      rate_limits: this.rateLimiter.getStatus(),
    }
  }

  private async runWorkflow(workflow: WorkflowStep[], variables: Record<string, unknown>): Promise<WorkflowRunResult> {
    const runId = ulid()
    const start = this.clock()
    this.logger.info(`[conductor] Workflow run ${runId}: ${workflow.length} steps`, { run_id: runId })

    const state = await this.executor.run(workflow, variables)
    const executionTime = (this.clock() - start) / 1000

    this.logger.info(`[conductor] Workflow run ${runId} completed in ${executionTime}s`, { run_id: runId })
    return {
      run_id: runId,
      status: "completed",
      result: state.variables(),
      execution_time: executionTime,
    }
  }
}
