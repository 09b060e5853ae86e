// src/gateway/cors.ts — CORS middleware with origin patterns

import type { Context, Next } from "hono"

export type OriginMatcher = (origin: string) => boolean

/** What a "*" in a pattern may stand for: host labels, dots and a port */
const WILDCARD_SPAN = "[a-zA-Z0-9.:-]*"

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, "\\$&")
}

function compilePattern(pattern: string): OriginMatcher {
  if (pattern === "*") return () => true
  if (!pattern.includes("*")) return (origin) => origin === pattern

  const regex = new RegExp(`^${pattern.split("*").map(escapeRegExp).join(WILDCARD_SPAN)}$`)
  return (origin) => regex.test(origin)
}

/** Browsers send a bare scheme://host[:port]; anything else never matches */
function isBareOrigin(origin: string): boolean {
  if (!URL.canParse(origin)) return false
  return new URL(origin).origin === origin
}

/**
 * Patterns are exact origins, "*" for any origin, or wildcard patterns
 * such as "http://localhost:*" or "https://*.example.com".
 */
export function createOriginMatcher(patterns: readonly string[]): OriginMatcher {
  const matchers = patterns.map(compilePattern)
  return (origin) => isBareOrigin(origin) && matchers.some(matches => matches(origin))
}

export function corsMiddleware(patterns: readonly string[]) {
  const allowOrigin = createOriginMatcher(patterns)

  return async (c: Context, next: Next) => {
    const origin = c.req.header("Origin")

    if (origin && allowOrigin(origin)) {
      c.header("Access-Control-Allow-Origin", origin)
      c.header("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS")
      c.header("Access-Control-Allow-Headers", "Content-Type, Authorization")
      c.header("Access-Control-Allow-Credentials", "true")
    }

    if (c.req.method === "OPTIONS") {
      return c.body(null, 204)
    }

    await next()
  }
}
