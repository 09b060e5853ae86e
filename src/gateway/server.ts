// src/gateway/server.ts — Hono HTTP server exposing the conductor

import { Hono } from "hono"
import type { Context } from "hono"
import { HTTPException } from "hono/http-exception"
import { timeout } from "hono/timeout"
import { Type } from "@sinclair/typebox"
import type { Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { ConductorConfig } from "../config.js"
import { ConductorError, toError } from "../conductor/errors.js"
import type { ConductorErrorCode } from "../conductor/errors.js"
import type { ConductorLogger } from "../conductor/logger.js"
import type { Orchestrator } from "../conductor/orchestrator.js"
import { firstSchemaError, isRecord } from "../conductor/workflow-parser.js"
import { corsMiddleware } from "./cors.js"
import { SessionStore } from "./sessions.js"

export const VERSION = "1.0.0"

/** The orchestrator operations the gateway calls */
export type ConductorService = Pick<
  Orchestrator,
  "route" | "executeWorkflow" | "executeTemplate" | "listModels" | "listAddons" | "listTemplates" | "getStats"
>

export interface AppOptions {
  conductor: ConductorService
  sessions?: SessionStore
  clock?: () => number
  logger?: ConductorLogger
}

const ChatRequestSchema = Type.Object({
  message: Type.String({ minLength: 1 }),
  session_id: Type.Optional(Type.String({ minLength: 1 })),
  context_tokens: Type.Optional(Type.Integer({ minimum: 0 })),
})

const WorkflowRequestSchema = Type.Object({
  workflow: Type.Array(Type.Unknown()),
  variables: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
})

type ErrorStatus = 400 | 404 | 413 | 500 | 502 | 503

const STATUS_BY_CODE: Record<ConductorErrorCode, ErrorStatus> = {
  REQUEST_TOO_LARGE: 413,
  WORKFLOW_PARSE_ERROR: 400,
  UNKNOWN_MODEL: 400,
  TEMPLATE_NOT_FOUND: 404,
  BREAKER_OPEN: 503,
  UPSTREAM_ERROR: 502,
  TASK_FAILURE: 502,
  UNKNOWN_PROVIDER: 500,
  CONFIG_INVALID: 500,
}

export function statusForCode(code: ConductorErrorCode): ErrorStatus {
  return STATUS_BY_CODE[code]
}

class InvalidRequestError extends Error {}

/** Read a JSON body; an empty body reads as {} */
async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text()
  if (text.trim() === "") return {}
  try {
    return JSON.parse(text)
  } catch {
    throw new InvalidRequestError("Request body is not valid JSON")
  }
}

export function createApp(config: ConductorConfig, options: AppOptions) {
  const app = new Hono()
  const conductor = options.conductor
  const clock = options.clock ?? Date.now
  const logger = options.logger ?? console
  const sessions = options.sessions ?? new SessionStore({
    maxSessions: config.sessions.maxSessions,
    idleMs: config.sessions.idleMs,
    clock,
    logger,
  })
  const startedAt = clock()
  const now = () => new Date(clock()).toISOString()

  // Global middleware
  app.use("*", corsMiddleware(config.corsOrigins))
  app.use("*", timeout(config.requestTimeoutMs))

  app.onError((err, c) => {
    if (err instanceof InvalidRequestError) {
      return c.json({ error: "InvalidRequest", code: "INVALID_REQUEST", message: err.message }, 400)
    }
    if (err instanceof ConductorError) {
      const status = statusForCode(err.code)
      if (status >= 500) {
        logger.error(`[gateway] ${c.req.method} ${c.req.path} failed: ${err.message}`, { code: err.code })
      }
      return c.json({ error: err.name, code: err.code, message: err.message }, status)
    }
    if (err instanceof HTTPException) {
      return err.getResponse()
    }
    const error = toError(err)
    logger.error(`[gateway] ${c.req.method} ${c.req.path} failed: ${error.message}`)
    return c.json({ error: "InternalError", code: "INTERNAL_ERROR", message: error.message }, 500)
  })

  const health = (c: Context) => c.json({
    status: "healthy",
    timestamp: now(),
    version: VERSION,
    models_available: conductor.listModels().length,
  })
  app.get("/", health)
  app.get("/health", health)

  app.post("/chat", async (c) => {
    const body = await readJsonBody(c)
    if (!Value.Check(ChatRequestSchema, body)) {
      return c.json({
        error: "InvalidRequest",
        code: "INVALID_REQUEST",
        message: firstSchemaError(ChatRequestSchema, body),
      }, 400)
    }
    const request: Static<typeof ChatRequestSchema> = body

    const session = sessions.getOrCreate(request.session_id)
    sessions.append(session.session_id, "user", request.message)

    const routed = await conductor.route(request.message, request.context_tokens ?? 0)
    sessions.append(session.session_id, "assistant", routed.response)

    return c.json({
      session_id: session.session_id,
      response: routed.response,
      category: routed.category,
      model_used: routed.model,
      timestamp: now(),
    })
  })

  app.post("/workflow", async (c) => {
    const body = await readJsonBody(c)
    if (!Value.Check(WorkflowRequestSchema, body)) {
      return c.json({
        error: "InvalidRequest",
        code: "INVALID_REQUEST",
        message: firstSchemaError(WorkflowRequestSchema, body),
      }, 400)
    }
    const result = await conductor.executeWorkflow(body.workflow, body.variables ?? {})
    return c.json(result)
  })

  app.post("/template/:name", async (c) => {
    const body = await readJsonBody(c)
    if (!isRecord(body)) {
      return c.json({
        error: "InvalidRequest",
        code: "INVALID_REQUEST",
        message: "Template variables must be a JSON object",
      }, 400)
    }
    const result = await conductor.executeTemplate(c.req.param("name"), body)
    return c.json(result)
  })

  app.get("/session/:id", (c) => {
    const session = sessions.get(c.req.param("id"))
    if (!session) {
      return c.json({ error: "NotFound", code: "SESSION_NOT_FOUND", message: "Session not found" }, 404)
    }
    return c.json(session)
  })

  app.delete("/session/:id", (c) => {
    const id = c.req.param("id")
    if (!sessions.delete(id)) {
      return c.json({ error: "NotFound", code: "SESSION_NOT_FOUND", message: "Session not found" }, 404)
    }
    return c.json({ status: "deleted", session_id: id })
  })

  app.get("/models", (c) => {
    const models = conductor.listModels()
    return c.json({ models, count: models.length })
  })

  app.get("/addons", (c) => {
    const addons = conductor.listAddons()
    return c.json({ addons, count: addons.length })
  })

  app.get("/templates", (c) => {
    const templates = conductor.listTemplates()
    return c.json({ templates, count: templates.length })
  })

  app.get("/stats", (c) => {
    const stats = conductor.getStats()
    return c.json({
      active_sessions: sessions.getActiveCount(),
      total_messages: sessions.getMessageCount(),
      uptime_seconds: (clock() - startedAt) / 1000,
      breakers: stats.breakers,
      rate_limits: stats.rate_limits,
      timestamp: now(),
    })
  })

  return { app, sessions }
}
