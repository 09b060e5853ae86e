// packages/conductor-sdk/src/types.ts — Conductor SDK Type Definitions

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface ConductorClientConfig {
  baseUrl: string
  /** Custom fetch (default: globalThis.fetch) */
  fetch?: typeof globalThis.fetch
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: string
  timestamp: string
  version: string
  models_available: number
}

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

export type Category = "L" | "M" | "H"

export interface ChatRequest {
  message: string
  session_id?: string
  context_tokens?: number
}

export interface ChatResponse {
  session_id: string
  response: string
  category: Category
  model_used: string
  timestamp: string
}

// ---------------------------------------------------------------------------
// Workflows
// ---------------------------------------------------------------------------

export interface WorkflowTask {
  model: string
  prompt: string
  output_variable?: string
  config?: Record<string, unknown>
}

export interface WorkflowStep {
  type?: "sequential" | "parallel"
  tasks: WorkflowTask[]
}

export interface WorkflowRequest {
  workflow: WorkflowStep[]
  variables?: Record<string, unknown>
}

export interface WorkflowRunResponse {
  run_id: string
  status: "completed"
  result: Record<string, unknown>
  /** Seconds */
  execution_time: number
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export interface ModelInfo {
  name: string
  provider: string
  model: string
  purpose: string
}

export interface ModelsResponse {
  models: ModelInfo[]
  count: number
}

export interface AddonsResponse {
  addons: string[]
  count: number
}

export interface TemplateInfo {
  name: string
  description: string
  steps: number
}

export interface TemplatesResponse {
  templates: TemplateInfo[]
  count: number
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export interface SessionMessage {
  role: "user" | "assistant"
  content: string
  timestamp: string
}

export interface SessionResponse {
  session_id: string
  created_at: string
  messages: SessionMessage[]
}

export interface DeleteSessionResponse {
  status: "deleted"
  session_id: string
}

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

export interface BreakerStats {
  state: "closed" | "open" | "half_open"
  failureCount: number
  successCount: number
  lastFailure?: number
  lastSuccess?: number
  probes: number
}

export interface StatsResponse {
  active_sessions: number
  total_messages: number
  uptime_seconds: number
  breakers: Record<string, BreakerStats>
  rate_limits: Record<string, { capacity: number; remaining: number }>
  timestamp: string
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ApiError {
  error: string
  code: string
  message?: string
}
