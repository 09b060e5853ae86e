// src/conductor/schema.ts — TypeBox schemas for the orchestration document and workflow definitions
// Static types are derived from the schemas so the validated document and the code never drift.

import { Type } from "@sinclair/typebox"
import type { Static } from "@sinclair/typebox"

// --- Per-call configuration ---

export const CallConfigSchema = Type.Object({
  // Chat sampling
  temperature: Type.Optional(Type.Number({ minimum: 0, maximum: 2 })),
  max_tokens: Type.Optional(Type.Integer({ minimum: 1 })),
  top_p: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
  // Media generation
  aspect_ratio: Type.Optional(Type.String()),
  negative_prompt: Type.Optional(Type.String()),
  num_images: Type.Optional(Type.Integer({ minimum: 1 })),
  duration: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  resolution: Type.Optional(Type.String()),
  generate_audio: Type.Optional(Type.Boolean()),
  // Named system prompt addons, applied in order
  addons: Type.Optional(Type.Array(Type.String())),
})

export type CallConfig = Static<typeof CallConfigSchema>

/** Provider request parameters: a CallConfig with addons resolved away */
export type RequestParams = Omit<CallConfig, "addons">

// --- Workflow definitions ---

export const StepTypeSchema = Type.Union([Type.Literal("sequential"), Type.Literal("parallel")])

export type StepType = Static<typeof StepTypeSchema>

export const WorkflowTaskSchema = Type.Object({
  model: Type.String({ minLength: 1 }),
  prompt: Type.String(),
  output_variable: Type.Optional(Type.String({ minLength: 1 })),
  config: Type.Optional(CallConfigSchema),
})

export type WorkflowTask = Static<typeof WorkflowTaskSchema>

export const WorkflowStepSchema = Type.Object({
  type: StepTypeSchema,
  tasks: Type.Array(WorkflowTaskSchema),
})

export type WorkflowStep = Static<typeof WorkflowStepSchema>

export const WorkflowSchema = Type.Array(WorkflowStepSchema)

// --- Orchestration document ---

export const ModelConfigSchema = Type.Object({
  provider: Type.String({ minLength: 1 }),
  model: Type.String({ minLength: 1 }),
  purpose: Type.Optional(Type.String()),
  defaults: Type.Optional(CallConfigSchema),
})

export type ModelConfig = Static<typeof ModelConfigSchema>

export const ChatProviderConfigSchema = Type.Object({
  kind: Type.Literal("chat"),
  endpoint: Type.String({ minLength: 1 }),
  api_key: Type.Optional(Type.String()),
  timeout_ms: Type.Optional(Type.Integer({ minimum: 1 })),
})

export const MediaProviderConfigSchema = Type.Object({
  kind: Type.Literal("media"),
  endpoints: Type.Object({
    image: Type.Optional(Type.String({ minLength: 1 })),
    video: Type.Optional(Type.String({ minLength: 1 })),
  }),
  api_key: Type.Optional(Type.String()),
  timeout_ms: Type.Optional(Type.Integer({ minimum: 1 })),
})

export const ProviderConfigSchema = Type.Union([ChatProviderConfigSchema, MediaProviderConfigSchema])

export type ChatProviderConfig = Static<typeof ChatProviderConfigSchema>
export type MediaProviderConfig = Static<typeof MediaProviderConfigSchema>
export type ProviderConfig = Static<typeof ProviderConfigSchema>

export const RetryConfigSchema = Type.Object({
  base_delay_ms: Type.Number({ minimum: 0 }),
  max_delay_ms: Type.Number({ minimum: 0 }),
  exponential_base: Type.Number({ minimum: 1 }),
  jitter_enabled: Type.Boolean(),
  max_attempts: Type.Integer({ minimum: 1 }),
})

export const CircuitBreakerConfigSchema = Type.Object({
  failure_threshold: Type.Integer({ minimum: 1 }),
  timeout_ms: Type.Integer({ minimum: 0 }),
})

export const RoutingConfigSchema = Type.Object({
  context_limits: Type.Object({
    deny_request: Type.Integer({ minimum: 0 }),
    force_high_tier: Type.Integer({ minimum: 0 }),
  }),
  categorizer_model: Type.String({ minLength: 1 }),
  narrator_model: Type.Optional(Type.String({ minLength: 1 })),
  categories: Type.Object({
    L: Type.Object({ model: Type.String({ minLength: 1 }) }),
    M: Type.Object({ model: Type.String({ minLength: 1 }) }),
    H: Type.Object({
      planner_model: Type.String({ minLength: 1 }),
      fast_response_model: Type.String({ minLength: 1 }),
    }),
  }),
})

export type RoutingConfig = Static<typeof RoutingConfigSchema>

export const WorkflowTemplateSchema = Type.Object({
  description: Type.Optional(Type.String()),
  // Validated through the workflow parser so legacy step spellings are accepted
  workflow: Type.Array(Type.Unknown()),
})

export const OrchestrationDocumentSchema = Type.Object({
  models: Type.Record(Type.String(), ModelConfigSchema),
  providers: Type.Record(Type.String(), ProviderConfigSchema),
  system_prompts: Type.Optional(Type.Record(Type.String(), Type.String())),
  prompt_addons: Type.Optional(Type.Record(Type.String(), Type.String())),
  fallbacks: Type.Optional(Type.Record(Type.String(), Type.Array(Type.String()))),
  rate_limits: Type.Optional(Type.Record(Type.String(), Type.Object({
    requests_per_minute: Type.Integer({ minimum: 1 }),
  }))),
  circuit_breaker: CircuitBreakerConfigSchema,
  retry: RetryConfigSchema,
  routing: RoutingConfigSchema,
  workflow_templates: Type.Optional(Type.Record(Type.String(), WorkflowTemplateSchema)),
})

export type OrchestrationDocument = Static<typeof OrchestrationDocumentSchema>
