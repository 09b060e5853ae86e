// src/config.ts — Configuration loader from environment variables

export interface ConductorConfig {
  // Gateway
  port: number
  host: string
  corsOrigins: string[]
  requestTimeoutMs: number

  // Orchestration document
  configPath: string

  // Sessions
  sessions: {
    maxSessions: number
    idleMs: number
  }
}

type Env = Record<string, string | undefined>

function parseIntEnv(env: Env, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

export function loadConfig(env: Env = process.env): ConductorConfig {
  return {
    port: parseIntEnv(env, "PORT", "8000"),
    host: env.HOST ?? "0.0.0.0",
    corsOrigins: (env.CONDUCTOR_CORS_ORIGINS ?? "*")
      .split(",")
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    requestTimeoutMs: parseIntEnv(env, "CONDUCTOR_REQUEST_TIMEOUT_MS", "600000"),

    configPath: env.CONDUCTOR_CONFIG_PATH ?? "config/orchestration.json",

    sessions: {
      maxSessions: parseIntEnv(env, "CONDUCTOR_MAX_SESSIONS", "100"),
      idleMs: parseIntEnv(env, "CONDUCTOR_SESSION_IDLE_MS", String(30 * 60 * 1000)),
    },
  }
}
