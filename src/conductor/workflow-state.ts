// src/conductor/workflow-state.ts — Per-run variable store with {name} substitution

import type { ConductorLogger } from "./logger.js"

const PLACEHOLDER = /\{([^}]+)\}/g

export class WorkflowState {
  private readonly vars = new Map<string, unknown>()
  private readonly seeds: ReadonlySet<string>

  constructor(
    seed: Record<string, unknown> = {},
    private readonly logger: ConductorLogger = console,
  ) {
    for (const [name, value] of Object.entries(seed)) {
      this.vars.set(name, value)
    }
    this.seeds = new Set(Object.keys(seed))
  }

  setVariable(name: string, value: unknown): void {
    this.vars.set(name, value)
  }

  getVariable(name: string): unknown {
    return this.vars.get(name)
  }

  hasVariable(name: string): boolean {
    const value = this.vars.get(name)
    return value !== undefined && value !== null
  }

  /**
   * Replace each {name} with the variable's string form. Strings go in verbatim,
   * anything else JSON-encoded. Unset or null variables keep their placeholder.
   */
  replaceVariables(text: string): string {
    return text.replace(PLACEHOLDER, (placeholder, name: string) => {
      const value = this.vars.get(name)
      if (value === undefined || value === null) {
        this.logger.warn(`[workflow] Variable "${name}" not found, leaving placeholder`, { variable: name })
        return placeholder
      }
      return typeof value === "string" ? value : JSON.stringify(value)
    })
  }

  /** Every variable, seeds included, as a plain object */
  variables(): Record<string, unknown> {
    return Object.fromEntries(this.vars)
  }

  /** Variables the run produced; seeded names are left out */
  producedVariables(): Record<string, unknown> {
    const produced: Record<string, unknown> = {}
    for (const [name, value] of this.vars) {
      if (!this.seeds.has(name)) produced[name] = value
    }
    return produced
  }
}
