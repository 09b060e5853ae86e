// src/conductor/logger.ts — Logger seam shared by every conductor component

/** Logger (default: console). Messages carry a bracketed component prefix. */
export interface ConductorLogger {
  info(msg: string, meta?: Record<string, unknown>): void
  warn(msg: string, meta?: Record<string, unknown>): void
  error(msg: string, meta?: Record<string, unknown>): void
}

/** Discards everything. Used by tests and embedders that log elsewhere. */
export const silentLogger: ConductorLogger = {
  info() {},
  warn() {},
  error() {},
}
