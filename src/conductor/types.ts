// src/conductor/types.ts — Conductor shared types
// Wire and document shapes live in schema.ts; this file holds the runtime-side types.

export type {
  CallConfig,
  RequestParams,
  StepType,
  WorkflowTask,
  WorkflowStep,
  ModelConfig,
  ProviderConfig,
  ChatProviderConfig,
  MediaProviderConfig,
  RoutingConfig,
  OrchestrationDocument,
} from "./schema.js"

import type { WorkflowStep } from "./schema.js"

// --- Categories ---

/**
 * Complexity tier of a request.
 *   L: direct call to the deep-reasoning model
 *   M: direct call to the general-purpose mid-tier model
 *   H: planner model emits a workflow, which is executed
 */
export type Category = "L" | "M" | "H"

export function isCategory(value: string): value is Category {
  return value === "L" || value === "M" || value === "H"
}

// --- Resilience ---

export interface RetryPolicy {
  baseDelayMs: number
  maxDelayMs: number
  multiplier: number
  jitter: boolean
  maxAttempts: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitter: true,
  maxAttempts: 3,
}

// --- Templates ---

export interface WorkflowTemplate {
  name: string
  description: string
  workflow: WorkflowStep[]
}

// --- Results handed back to the transport ---

export interface RoutedResponse {
  category: Category
  /** Logical model that produced the user-facing text */
  model: string
  response: string
}

export interface WorkflowRunResult {
  run_id: string
  status: "completed"
  result: Record<string, unknown>
  /** Seconds */
  execution_time: number
}

export interface ModelSummary {
  name: string
  provider: string
  model: string
  purpose: string
}

export interface TemplateSummary {
  name: string
  description: string
  steps: number
}
