// src/conductor/workflow-executor.ts — Runs workflow steps over shared per-run state
//
// Steps run strictly in order. A sequential step runs its tasks one at a time;
// a parallel step launches every task against the state as it stood before the
// step and joins on all of them. Failed tasks get one narration attempt.

import { ConductorError, toError } from "./errors.js"
import type { ModelCaller } from "./invoker.js"
import type { ConductorLogger } from "./logger.js"
import type { WorkflowStep, WorkflowTask } from "./schema.js"
import { WorkflowState } from "./workflow-state.js"

export const NARRATOR_TEMPERATURE = 0.7

export interface WorkflowExecutorOptions {
  /** Model that explains a failed task to the user. Without one, task failures abort the run. */
  narratorModel?: string
  logger?: ConductorLogger
}

export class WorkflowExecutor {
  private readonly narratorModel: string | undefined
  private readonly logger: ConductorLogger

  constructor(
    private readonly invoker: ModelCaller,
    options: WorkflowExecutorOptions = {},
  ) {
    this.narratorModel = options.narratorModel
    this.logger = options.logger ?? console
  }

  /** Run a workflow from seed variables and return the final state */
  async run(workflow: readonly WorkflowStep[], seed: Record<string, unknown> = {}): Promise<WorkflowState> {
    const state = new WorkflowState(seed, this.logger)
    await this.execute(workflow, state)
    return state
  }

  async execute(workflow: readonly WorkflowStep[], state: WorkflowState): Promise<void> {
    for (const [index, step] of workflow.entries()) {
      this.logger.info(
        `[workflow] Step ${index + 1}/${workflow.length}: ${step.type} (${step.tasks.length} tasks)`,
        { step: index, type: step.type },
      )
      switch (step.type) {
        case "sequential":
          await this.runSequential(step.tasks, state)
          break
        case "parallel":
          await this.runParallel(step.tasks, state)
          break
      }
    }
  }

  private async runSequential(tasks: readonly WorkflowTask[], state: WorkflowState): Promise<void> {
    for (const task of tasks) {
      await this.runTask(task, state.replaceVariables(task.prompt), state)
    }
  }

  private async runParallel(tasks: readonly WorkflowTask[], state: WorkflowState): Promise<void> {
    // Interpolate every prompt before any task starts, so siblings never see each other's writes
    const prompts = tasks.map(task => state.replaceVariables(task.prompt))
    const settled = await Promise.allSettled(tasks.map((task, i) => this.runTask(task, prompts[i], state)))

    for (const outcome of settled) {
      if (outcome.status === "rejected") throw toError(outcome.reason)
    }
  }

  /** Call the task's model and store the result. Returns the task's text result. */
  private async runTask(task: WorkflowTask, prompt: string, state: WorkflowState): Promise<string> {
    let result: string
    try {
      result = await this.invoker.call(task.model, prompt, task.config)
    } catch (err) {
      return this.narrateFailure(task, prompt, toError(err))
    }

    if (task.output_variable) {
      state.setVariable(task.output_variable, result)
    }
    return result
  }

  /** One narrator call describing the failure. The narration is not written to the output variable. */
  private async narrateFailure(task: WorkflowTask, prompt: string, error: Error): Promise<string> {
    this.logger.error(`[workflow] Task on ${task.model} failed: ${error.message}`, {
      model: task.model,
      output_variable: task.output_variable,
    })

    if (!this.narratorModel) {
      throw new ConductorError("TASK_FAILURE", `Task on ${task.model} failed: ${error.message}`, {
        model: task.model,
      }, { cause: error })
    }

    const narratorPrompt = `Task failed: ${error.message}. Model: ${task.model}. Prompt: ${prompt.slice(0, 200)}...`
    try {
      return await this.invoker.call(this.narratorModel, narratorPrompt, { temperature: NARRATOR_TEMPERATURE })
    } catch (narratorErr) {
      this.logger.error(`[workflow] Narrator ${this.narratorModel} failed: ${toError(narratorErr).message}`, {
        model: this.narratorModel,
      })
      throw new ConductorError("TASK_FAILURE", `Task on ${task.model} failed: ${error.message}`, {
        model: task.model,
        narrator: this.narratorModel,
      }, { cause: error })
    }
  }
}
