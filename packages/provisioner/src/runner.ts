import { toProvisioningError } from "./errors.js"
import type { ProvisioningError } from "./errors.js"
import type { ProvisioningStep, RunReport, StepContext, StepOutcome } from "./types.js"

/**
 * Run steps in order. The first failing step whose policy is `abort` ends the
 * run; nothing already applied is undone. Failures under `continue` are
 * logged as warnings and the run ends `degraded`. A step whose `dependsOn`
 * did not succeed is skipped.
 */
export async function runSteps(steps: readonly ProvisioningStep[], context: StepContext): Promise<RunReport> {
  const { logger } = context
  const outcomes: StepOutcome[] = []
  const warnings: ProvisioningError[] = []
  const succeeded = new Set<string>()

  for (const [index, step] of steps.entries()) {
    const unmet = (step.dependsOn ?? []).filter(name => !succeeded.has(name))
    if (unmet.length > 0) {
      logger.warning(`Skipping step ${index + 1}/${steps.length}: ${step.description} (needs ${unmet.join(", ")})`, {
        step: step.name,
      })
      outcomes.push({ step: step.name, status: "skipped" })
      continue
    }

    logger.info(`Step ${index + 1}/${steps.length}: ${step.description}...`, { step: step.name })

    try {
      await step.run(context)
    } catch (caught) {
      const error = toProvisioningError(caught)
      outcomes.push({ step: step.name, status: "failed", error })

      if (step.onFailure === "continue") {
        logger.warning(error.message, { step: step.name })
        if (error.hint) logger.warning(error.hint, { step: step.name })
        warnings.push(error)
        continue
      }

      logger.error(error.message, { step: step.name })
      if (error.hint) logger.error(error.hint, { step: step.name })

      for (const remaining of steps.slice(index + 1)) {
        outcomes.push({ step: remaining.name, status: "skipped" })
      }

      return { status: "failed", outcomes, failedStep: step, exitCode: error.exitCode, warnings }
    }

    succeeded.add(step.name)
    outcomes.push({ step: step.name, status: "succeeded" })
    if (step.successMessage) logger.success(step.successMessage, { step: step.name })
  }

  return { status: warnings.length > 0 ? "degraded" : "success", outcomes, exitCode: 0, warnings }
}
