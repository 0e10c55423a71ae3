/**
 * Host Provisioner - fail-fast provisioning of an n8n production host
 *
 * Node.js orchestrates; apt-get, ufw, docker, nginx and certbot do the work.
 * Each step is idempotent except container start, which leans on the engine's
 * restart policy.
 *
 * @packageDocumentation
 */

export { HostOrchestrator, PROVISIONING_STEPS, DEFAULT_HOST_PATHS, APP_LOCAL_URL } from "./orchestrator.js"
export type { ProvisionOptions } from "./orchestrator.js"
export type {
  DeploymentConfig,
  HostPaths,
  Probe,
  ProvisioningStep,
  ReadinessResult,
  RunReport,
  RunStatus,
  StepContext,
  StepOutcome,
} from "./types.js"

export { defaultDeploymentInput, generateSecret, resolveDeploymentConfig } from "./config/resolver.js"
export type { ResolveOptions, SecretGenerator } from "./config/resolver.js"

export { runSteps } from "./runner.js"
export { accessUrl, managementCommands, printSummary, renderAccessBlock } from "./reporter.js"

// Artifact rendering
export { renderEnvFile, envSections } from "./artifacts/env-file.js"
export { renderComposeFile, APP_ENVIRONMENT_KEYS, APP_PORT_BINDING } from "./artifacts/compose-file.js"
export { renderNginxSite, PROXY_HEADERS } from "./artifacts/nginx-site.js"

// Executors for advanced usage
export { SpawnCommandRunner, runCommand, runCommandSafe } from "./executors/common.js"
export type { CommandOptions, CommandResult, CommandRunner } from "./executors/common.js"
export { waitForService, httpProbe } from "./executors/readiness.js"
export { validateNginxConfig, validateAndReloadNginx, reloadNginx, nginxActive } from "./executors/nginx.js"
export type { NginxValidation } from "./executors/nginx.js"
export { obtainCertificate, certbotArgs } from "./executors/certbot.js"
export { configureFirewall, FIREWALL_RULES } from "./executors/firewall.js"
export { installDockerEngine, startContainers, containersRunning } from "./executors/docker.js"
export { installNginxSite, writeDeploymentArtifacts } from "./executors/filesystem.js"

export {
  ArtifactRenderError,
  CertificateAcquisitionError,
  ConfigurationError,
  ContainerStartError,
  ProvisioningError,
  ReadinessTimeoutError,
  ReverseProxyValidationError,
  ToolInvocationError,
} from "./errors.js"
export type { ProvisioningErrorCode } from "./errors.js"
