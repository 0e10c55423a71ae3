import type { StatusLogger } from "@hostkit/status-logger"
import type { CommandRunner } from "./executors/common.js"
import type { ProvisioningError } from "./errors.js"

/**
 * Fully resolved deployment configuration. Built once by the resolver and
 * frozen; every step receives the same instance.
 */
export interface DeploymentConfig {
  /** Public hostname, e.g. n8n.example.org */
  readonly targetHost: string
  /** n8n basic-auth user */
  readonly adminUser: string
  /** Directory holding .env and docker-compose.yml */
  readonly installDir: string
  /** Generated per run; a rerun rotates it */
  readonly dbPassword: string
  /** Generated per run; a rerun rotates it */
  readonly appPassword: string
}

/**
 * Filesystem locations the orchestrator writes to. Defaults come from PATHS;
 * tests point them at a temporary directory.
 */
export interface HostPaths {
  nginxSitesAvailable: string
  nginxSitesEnabled: string
  aptKeyringsDir: string
  dockerKeyring: string
  dockerSourcesList: string
}

export type Idempotency = "safe-to-rerun" | "destructive-once"

export type FailurePolicy = "abort" | "continue"

/**
 * Issue one readiness probe. Resolves with the HTTP status; rejects when no
 * response arrives (connection refused, timeout).
 */
export type Probe = (url: string) => Promise<number>

export interface StepContext {
  config: DeploymentConfig
  runner: CommandRunner
  logger: StatusLogger
  paths: HostPaths
  probe: Probe
  sleep: (ms: number) => Promise<void>
}

export interface ProvisioningStep {
  name: string
  /** Shown in the `Step i/N:` line */
  description: string
  idempotency: Idempotency
  onFailure: FailurePolicy
  /** Steps that must have succeeded; otherwise this one is skipped */
  dependsOn?: readonly string[]
  /** Printed after the step completes */
  successMessage?: string
  run(context: StepContext): Promise<void>
}

export type StepStatus = "succeeded" | "failed" | "skipped"

export interface StepOutcome {
  step: string
  status: StepStatus
  error?: ProvisioningError
}

export type RunStatus = "success" | "degraded" | "failed"

/**
 * Result of a provisioning run
 */
export interface RunReport {
  status: RunStatus
  outcomes: StepOutcome[]
  /** The step that aborted the run */
  failedStep?: ProvisioningStep
  /** Process exit code for the CLI */
  exitCode: number
  /** Non-fatal failures, in order */
  warnings: ProvisioningError[]
}

/**
 * Result of a successful readiness poll
 */
export interface ReadinessResult {
  /** Probes issued, including the successful one */
  attempts: number
  /** Status code of the accepted response */
  status: number
}
