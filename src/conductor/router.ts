// src/conductor/router.ts — Request router: categorize, then answer directly or plan and execute
//
// High tier flow: acknowledgement → planner → JSON extraction → workflow execution.
// Once the acknowledgement exists, planning and execution failures degrade to text.

import type { Categorizer } from "./categorizer.js"
import { toError } from "./errors.js"
import type { ModelCaller } from "./invoker.js"
import type { ConductorLogger } from "./logger.js"
import type { Category, RoutedResponse, RoutingConfig, WorkflowStep } from "./types.js"
import type { WorkflowExecutor } from "./workflow-executor.js"
import { parsePlannerOutput } from "./workflow-parser.js"

export const DIRECT_TEMPERATURE = 0.7

/** Seed variable carrying the user's message into planned workflows */
export const USER_MESSAGE_VARIABLE = "user_message"

/** Variable a workflow sets to replace the raw results dump */
export const COMPLETION_VARIABLE = "completion_message"

export function acknowledgementPrompt(message: string): string {
  return `User requested: ${message}. Acknowledge that you're working on it.`
}

export function plannerPrompt(message: string): string {
  return `User request: ${message}\n\n`
    + "Create a JSON workflow to fulfill this request. Output ONLY valid JSON in the format specified in your system prompt."
}

export class RequestRouter {
  constructor(
    private readonly invoker: ModelCaller,
    private readonly categorizer: Categorizer,
    private readonly executor: WorkflowExecutor,
    private readonly routing: RoutingConfig,
    private readonly logger: ConductorLogger = console,
  ) {}

  async processRequest(message: string, contextTokens = 0): Promise<string> {
    const routed = await this.route(message, contextTokens)
    return routed.response
  }

  async route(message: string, contextTokens = 0): Promise<RoutedResponse> {
    this.logger.info(`[router] Processing request: ${message.slice(0, 100)}`, { contextTokens })

    const category = await this.categorizer.categorize(message, contextTokens)
    this.logger.info(`[router] Category: ${category}`, { category })

    switch (category) {
      case "L":
      case "M":
        return this.direct(category, message)
      case "H":
        return this.orchestrate(message)
    }
  }

  private async direct(category: Exclude<Category, "H">, message: string): Promise<RoutedResponse> {
    const model = this.routing.categories[category].model
    const response = await this.invoker.call(model, message, { temperature: DIRECT_TEMPERATURE })
    return { category, model, response }
  }

  private async orchestrate(message: string): Promise<RoutedResponse> {
    const { planner_model: planner, fast_response_model: fast } = this.routing.categories.H

    const ack = await this.invoker.call(fast, acknowledgementPrompt(message), { temperature: DIRECT_TEMPERATURE })
    this.logger.info(`[router] Acknowledgement sent`, { model: fast })

    let workflow: WorkflowStep[]
    try {
      const plan = await this.invoker.call(planner, plannerPrompt(message), { temperature: DIRECT_TEMPERATURE })
      workflow = parsePlannerOutput(plan)
    } catch (err) {
      const error = toError(err)
      this.logger.error(`[router] Planning failed: ${error.message}`, { model: planner })
      return { category: "H", model: fast, response: `${ack}\n\nError: Could not create workflow. ${error.message}` }
    }

    try {
      const state = await this.executor.run(workflow, { [USER_MESSAGE_VARIABLE]: message })
      const completion = state.getVariable(COMPLETION_VARIABLE)
      if (typeof completion === "string" && completion.length > 0) {
        return { category: "H", model: planner, response: `${ack}\n\n${completion}` }
      }
      const results = JSON.stringify(state.producedVariables(), null, 2)
      return { category: "H", model: planner, response: `${ack}\n\nResults:\n${results}` }
    } catch (err) {
      const error = toError(err)
      this.logger.error(`[router] Workflow execution failed: ${error.message}`, { model: planner })
      return { category: "H", model: fast, response: `${ack}\n\nError during execution: ${error.message}` }
    }
  }
}
