// packages/conductor-sdk/src/client.ts — ConductorClient
//
// Typed client for the llm-conductor HTTP gateway. One method per route.

import type {
  ConductorClientConfig,
  HealthResponse,
  ChatRequest,
  ChatResponse,
  WorkflowRequest,
  WorkflowRunResponse,
  ModelsResponse,
  AddonsResponse,
  TemplatesResponse,
  SessionResponse,
  DeleteSessionResponse,
  StatsResponse,
  ApiError,
} from "./types.js"

// ---------------------------------------------------------------------------
// ConductorClient
// ---------------------------------------------------------------------------

export class ConductorClient {
  private readonly baseUrl: string
  private readonly _fetch: typeof globalThis.fetch

  constructor(config: ConductorClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "")
    this._fetch = config.fetch ?? globalThis.fetch
  }

  // -------------------------------------------------------------------------
  // Health
  // -------------------------------------------------------------------------

  async health(): Promise<HealthResponse> {
    return this.request<HealthResponse>("GET", "/health")
  }

  // -------------------------------------------------------------------------
  // Chat
  // -------------------------------------------------------------------------

  /**
   * Send a message. Omitting session_id starts a new session; the response
   * carries the id to pass on follow-up messages.
   */
  async chat(request: ChatRequest): Promise<ChatResponse> {
    return this.request<ChatResponse>("POST", "/chat", request)
  }

  // -------------------------------------------------------------------------
  // Workflows
  // -------------------------------------------------------------------------

  async runWorkflow(request: WorkflowRequest): Promise<WorkflowRunResponse> {
    return this.request<WorkflowRunResponse>("POST", "/workflow", request)
  }

  /** Execute a named workflow template with the given variables. */
  async runTemplate(name: string, variables: Record<string, unknown> = {}): Promise<WorkflowRunResponse> {
    return this.request<WorkflowRunResponse>("POST", `/template/${encodeURIComponent(name)}`, variables)
  }

  // -------------------------------------------------------------------------
  // Catalog
  // -------------------------------------------------------------------------

  async listModels(): Promise<ModelsResponse> {
    return this.request<ModelsResponse>("GET", "/models")
  }

  async listAddons(): Promise<AddonsResponse> {
    return this.request<AddonsResponse>("GET", "/addons")
  }

  async listTemplates(): Promise<TemplatesResponse> {
    return this.request<TemplatesResponse>("GET", "/templates")
  }

  // -------------------------------------------------------------------------
  // Sessions
  // -------------------------------------------------------------------------

  async getSession(sessionId: string): Promise<SessionResponse> {
    return this.request<SessionResponse>("GET", `/session/${encodeURIComponent(sessionId)}`)
  }

  async deleteSession(sessionId: string): Promise<DeleteSessionResponse> {
    return this.request<DeleteSessionResponse>("DELETE", `/session/${encodeURIComponent(sessionId)}`)
  }

  async stats(): Promise<StatsResponse> {
    return this.request<StatsResponse>("GET", "/stats")
  }

  // -------------------------------------------------------------------------
  // Internal Helpers
  // -------------------------------------------------------------------------

  private async request<T>(method: "GET" | "POST" | "DELETE", path: string, body?: unknown): Promise<T> {
    const res = await this._fetch(`${this.baseUrl}${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    })

    if (!res.ok) {
      await this.throwApiError(res)
    }

    return res.json() as Promise<T>
  }

  private async throwApiError(res: Response): Promise<never> {
    const body = readApiError(await res.json().catch(() => undefined))
    throw new ConductorApiError(
      body.message ?? body.error ?? `HTTP ${res.status}`,
      body.code ?? "UNKNOWN",
      res.status,
    )
  }
}

/** Pick the string fields of an error body; non-JSON bodies read as {} */
function readApiError(body: unknown): Partial<ApiError> {
  if (typeof body !== "object" || body === null) return {}
  const out: Partial<ApiError> = {}
  if ("error" in body && typeof body.error === "string") out.error = body.error
  if ("code" in body && typeof body.code === "string") out.code = body.code
  if ("message" in body && typeof body.message === "string") out.message = body.message
  return out
}

// ---------------------------------------------------------------------------
// Error Class
// ---------------------------------------------------------------------------

export class ConductorApiError extends Error {
  readonly code: string
  readonly status: number

  constructor(message: string, code: string, status: number) {
    super(message)
    this.name = "ConductorApiError"
    this.code = code
    this.status = status
  }
}
