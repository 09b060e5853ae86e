// src/conductor/workflow-parser.ts — Workflow definition extraction, normalization and validation

import { Value } from "@sinclair/typebox/value"
import type { TSchema } from "@sinclair/typebox"
import { ConductorError } from "./errors.js"
import { WorkflowSchema } from "./schema.js"
import type { StepType, WorkflowStep } from "./schema.js"

/** Older planner prompts spell step types this way */
const LEGACY_STEP_TYPES: Record<string, StepType> = {
  inline: "sequential",
  linear: "parallel",
}

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/
const BARE_OBJECT = /\{[\s\S]*\}/

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Pull the JSON object out of model output: a fenced code block first,
 * then the span from the first "{" to the last "}", else the text as-is.
 */
export function extractJson(text: string): string {
  const fenced = FENCED_JSON.exec(text)
  if (fenced) return fenced[1]

  const bare = BARE_OBJECT.exec(text)
  if (bare) return bare[0]

  return text
}

/** First schema violation as "path: message", for error reporting */
export function firstSchemaError(schema: TSchema, value: unknown): string {
  const first = Value.Errors(schema, value).First()
  if (!first) return "invalid value"
  return `${first.path || "/"}: ${first.message}`
}

/** Optional task fields a planner may emit as null instead of leaving out */
const NULLABLE_TASK_FIELDS = new Set(["output_variable", "config"])

function normalizeTask(task: unknown): unknown {
  if (!isRecord(task)) return task
  return Object.fromEntries(
    Object.entries(task).filter(([key, value]) => !(value === null && NULLABLE_TASK_FIELDS.has(key))),
  )
}

function normalizeStep(step: unknown): unknown {
  if (!isRecord(step)) return step
  const rawType = step.type ?? "sequential"
  const type = typeof rawType === "string" ? (LEGACY_STEP_TYPES[rawType] ?? rawType) : rawType
  if (!Array.isArray(step.tasks)) return { ...step, type }
  return { ...step, type, tasks: step.tasks.map(normalizeTask) }
}

/**
 * Validate a pre-parsed workflow definition (array of steps).
 * Missing step types default to sequential; legacy spellings are mapped.
 * Null `output_variable` and `config` on a task count as absent.
 */
export function normalizeWorkflow(value: unknown): WorkflowStep[] {
  if (!Array.isArray(value)) {
    throw new ConductorError("WORKFLOW_PARSE_ERROR", "Workflow must be an array of steps", {
      received: typeof value,
    })
  }

  const normalized: unknown = value.map(normalizeStep)
  if (!Value.Check(WorkflowSchema, normalized)) {
    throw new ConductorError("WORKFLOW_PARSE_ERROR", `Invalid workflow: ${firstSchemaError(WorkflowSchema, normalized)}`)
  }
  return normalized
}

/** Parse planner model output into workflow steps */
export function parsePlannerOutput(raw: string): WorkflowStep[] {
  const candidate = extractJson(raw)

  let parsed: unknown
  try {
    parsed = JSON.parse(candidate)
  } catch (err) {
    throw new ConductorError(
      "WORKFLOW_PARSE_ERROR",
      `Planner output is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { excerpt: candidate.slice(0, 200) },
      { cause: err },
    )
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.workflow)) {
    throw new ConductorError("WORKFLOW_PARSE_ERROR", "Planner output has no \"workflow\" array", {
      excerpt: candidate.slice(0, 200),
    })
  }

  return normalizeWorkflow(parsed.workflow)
}
