// packages/conductor-sdk/src/index.ts — Barrel Export

export { ConductorClient, ConductorApiError } from "./client.js"

export type {
  ConductorClientConfig,
  HealthResponse,
  Category,
  ChatRequest,
  ChatResponse,
  WorkflowTask,
  WorkflowStep,
  WorkflowRequest,
  WorkflowRunResponse,
  ModelInfo,
  ModelsResponse,
  AddonsResponse,
  TemplateInfo,
  TemplatesResponse,
  SessionMessage,
  SessionResponse,
  DeleteSessionResponse,
  BreakerStats,
  StatsResponse,
  ApiError,
} from "./types.js"
