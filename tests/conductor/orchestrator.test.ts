// tests/conductor/orchestrator.test.ts — Facade wiring over a scripted provider

import { describe, it, expect } from "vitest"
import { isConductorError } from "../../src/conductor/errors.js"
import { silentLogger } from "../../src/conductor/logger.js"
import { Orchestrator } from "../../src/conductor/orchestrator.js"
import type { OrchestrationDocument } from "../../src/conductor/schema.js"
import { baseDocument, instantSleep, scriptedFetch, systemPrompt, userPrompt } from "../helpers/conductor-fixtures.js"
import type { ChatHandler } from "../helpers/conductor-fixtures.js"

const ULID = /^[0-9A-HJKMNP-TV-Z]{26}$/

function setup(doc: OrchestrationDocument, handlers: Record<string, ChatHandler>) {
  let now = 1_000_000
  const scripted = scriptedFetch(handlers)
  const orchestrator = Orchestrator.fromDocument(doc, {
    fetch: scripted.fetchFn,
    clock: () => now,
    sleep: instantSleep().sleep,
    logger: silentLogger,
  })
  const advance = (ms: number) => { now += ms }
  return { orchestrator, advance, ...scripted }
}

describe("Orchestrator", () => {
  it("routes a request end to end through the chat provider", async () => {
    const { orchestrator, calls } = setup(baseDocument({ system_prompts: { general: "You are helpful." } }), {
      "id-classifier": () => "M",
      "id-general": () => "Hello there",
    })

    await expect(orchestrator.route("Hi")).resolves.toEqual({ category: "M", model: "general", response: "Hello there" })
    expect(calls.map(call => call.body.model)).toEqual(["id-classifier", "id-general"])
    expect(calls[1].body.temperature).toBe(0.7)
    expect(systemPrompt(calls[1])).toBe("You are helpful.")
    expect(calls[1].headers.authorization).toBe("Bearer test-secret")
  })

  it("plans and executes a high-tier request", async () => {
    const workflow = [
      { type: "parallel", tasks: [
        { model: "general", prompt: "Outline {user_message}", output_variable: "outline" },
        { model: "reasoner", prompt: "Facts about {user_message}", output_variable: "facts" },
      ] },
      { type: "sequential", tasks: [
        { model: "general", prompt: "Write from {outline} and {facts}", output_variable: "completion_message" },
      ] },
    ]
    const { orchestrator, callsFor } = setup(baseDocument(), {
      "id-classifier": () => "H",
      "id-fast": () => "Working on it.",
      "id-planner": () => JSON.stringify({ workflow }),
      "id-general": req => `general(${req.messages[req.messages.length - 1].content})`,
      "id-reasoner": () => "facts!",
    })

    const response = await orchestrator.processRequest("tides")
    expect(response).toBe("Working on it.\n\ngeneral(Write from general(Outline tides) and facts!)")
    expect(callsFor("id-general").map(userPrompt)).toEqual([
      "Outline tides",
      "Write from general(Outline tides) and facts!",
    ])
  })

  it("executes a caller-supplied workflow and reports the run", async () => {
    const { orchestrator, advance } = setup(baseDocument(), {
      "id-general": req => {
        advance(1500)
        return `echo ${req.messages[req.messages.length - 1].content}`
      },
    })

    const run = await orchestrator.executeWorkflow(
      [{ type: "inline", tasks: [{ model: "general", prompt: "{topic}", output_variable: "answer" }] }],
      { topic: "rivers" },
    )
    expect(run.run_id).toMatch(ULID)
    expect(run.status).toBe("completed")
    expect(run.result).toEqual({ topic: "rivers", answer: "echo rivers" })
    expect(run.execution_time).toBe(1.5)
  })

  it("rejects an invalid workflow definition before any call", async () => {
    const { orchestrator, fetchFn } = setup(baseDocument(), {})
    const err = await orchestrator.executeWorkflow([{ type: "sideways", tasks: [] }]).catch((e: unknown) => e)
    expect(isConductorError(err, "WORKFLOW_PARSE_ERROR")).toBe(true)
    expect(fetchFn).not.toHaveBeenCalled()
  })

  it("runs named templates", async () => {
    const doc = baseDocument({
      workflow_templates: {
        summarize: {
          description: "One-line summary",
          workflow: [{ tasks: [{ model: "general", prompt: "Summarize {text}", output_variable: "summary" }] }],
        },
      },
    })
    const { orchestrator } = setup(doc, { "id-general": () => "short" })

    const run = await orchestrator.executeTemplate("summarize", { text: "a long story" })
    expect(run.result).toEqual({ text: "a long story", summary: "short" })
    expect(orchestrator.listTemplates()).toEqual([{ name: "summarize", description: "One-line summary", steps: 1 }])
  })

  it("fails with TEMPLATE_NOT_FOUND for an unknown template", async () => {
    const { orchestrator } = setup(baseDocument(), {})
    await expect(orchestrator.executeTemplate("nope")).rejects.toThrow("[conductor] TEMPLATE_NOT_FOUND: Template not found: nope")
  })

  it("reports breaker and rate limit state", async () => {
    const doc = baseDocument({ rate_limits: { chat: { requests_per_minute: 60 } } })
    const { orchestrator } = setup(doc, { "id-general": () => "ok" })

    await orchestrator.executeWorkflow([{ tasks: [{ model: "general", prompt: "p" }] }])
    const stats = orchestrator.getStats()
    expect(stats.rate_limits).toEqual({ chat: { capacity: 60, remaining: 59 } })
    expect(stats.breakers.general.state).toBe("closed")
    expect(stats.breakers.general.failureCount).toBe(0)
  })

  it("lists models and addons from the document", () => {
    const { orchestrator } = setup(baseDocument({ prompt_addons: { concise: "Be concise." } }), {})
    expect(orchestrator.listAddons()).toEqual(["concise"])
    expect(orchestrator.listModels().map(model => model.name)).toEqual([
      "reasoner", "general", "planner", "fast", "classifier", "narrator", "painter",
    ])
  })
})
