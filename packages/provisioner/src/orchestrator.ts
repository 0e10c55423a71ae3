import { LOOPBACK_HOST, PATHS, PORTS, sleep } from "@hostkit/shared"
import { type StatusLogger, statusLogger } from "@hostkit/status-logger"
import { renderNginxSite } from "./artifacts/nginx-site.js"
import { installPrerequisites, updateSystem } from "./executors/apt.js"
import { obtainCertificate } from "./executors/certbot.js"
import { type CommandRunner, SpawnCommandRunner } from "./executors/common.js"
import { containersRunning, installDockerEngine, startContainers } from "./executors/docker.js"
import { installNginxSite, writeDeploymentArtifacts } from "./executors/filesystem.js"
import { configureFirewall } from "./executors/firewall.js"
import { nginxActive, validateAndReloadNginx } from "./executors/nginx.js"
import { httpProbe, waitForService } from "./executors/readiness.js"
import { type LinePrinter, printSummary } from "./reporter.js"
import { runSteps } from "./runner.js"
import type { DeploymentConfig, HostPaths, Probe, ProvisioningStep, RunReport, StepContext } from "./types.js"

export const DEFAULT_HOST_PATHS: HostPaths = {
  nginxSitesAvailable: PATHS.NGINX_SITES_AVAILABLE,
  nginxSitesEnabled: PATHS.NGINX_SITES_ENABLED,
  aptKeyringsDir: PATHS.APT_KEYRINGS_DIR,
  dockerKeyring: PATHS.DOCKER_KEYRING,
  dockerSourcesList: PATHS.DOCKER_SOURCES_LIST,
}

/** Loopback URL the readiness poller probes */
export const APP_LOCAL_URL = `http://${LOOPBACK_HOST}:${PORTS.APP}`

/**
 * The provisioning sequence. Order is a dependency chain: the engine exists
 * before containers start, containers answer before nginx forwards to them,
 * and the HTTP site exists before certbot rewrites it.
 */
export const PROVISIONING_STEPS: readonly ProvisioningStep[] = [
  {
    name: "system-update",
    description: "Updating system and installing prerequisites",
    idempotency: "safe-to-rerun",
    onFailure: "abort",
    successMessage: "System updated and prerequisites installed",
    async run({ runner }) {
      await updateSystem(runner)
      await installPrerequisites(runner)
    },
  },
  {
    name: "firewall",
    description: "Configuring UFW firewall",
    idempotency: "safe-to-rerun",
    onFailure: "abort",
    successMessage: "UFW firewall configured and enabled",
    async run({ runner }) {
      await configureFirewall(runner)
    },
  },
  {
    name: "container-engine",
    description: "Installing Docker Engine and Docker Compose",
    idempotency: "safe-to-rerun",
    onFailure: "abort",
    successMessage: "Docker Engine and Docker Compose installed successfully",
    async run({ runner, paths }) {
      await installDockerEngine(runner, paths)
    },
  },
  {
    name: "artifacts",
    description: "Setting up Docker configuration",
    idempotency: "safe-to-rerun",
    onFailure: "abort",
    successMessage: "Docker configuration files created",
    async run({ config, logger }) {
      const written = await writeDeploymentArtifacts(config)
      logger.info(`Wrote ${written.envFile} and ${written.composeFile}`)
    },
  },
  {
    name: "containers",
    description: "Starting Docker services",
    // The engine's restart policy makes a rerun tolerable; the orchestrator does not
    idempotency: "destructive-once",
    onFailure: "abort",
    successMessage: "Docker services started successfully",
    async run({ runner, config, logger, sleep }) {
      await startContainers({ runner, installDir: config.installDir, logger, sleep })
    },
  },
  {
    name: "readiness",
    description: "Waiting for n8n to be fully ready",
    idempotency: "safe-to-rerun",
    onFailure: "abort",
    async run({ probe, sleep, logger }) {
      await waitForService(APP_LOCAL_URL, { probe, sleep, logger })
    },
  },
  {
    name: "reverse-proxy",
    description: "Configuring Nginx reverse proxy",
    idempotency: "safe-to-rerun",
    onFailure: "continue",
    successMessage: "Nginx HTTP configuration applied",
    async run({ runner, config, paths }) {
      await installNginxSite(paths, renderNginxSite(config))
      await validateAndReloadNginx(runner)
    },
  },
  {
    name: "certificate",
    description: "Setting up SSL certificate with Let's Encrypt",
    idempotency: "safe-to-rerun",
    onFailure: "continue",
    dependsOn: ["reverse-proxy"],
    successMessage: "SSL configuration completed",
    async run({ runner, config, logger }) {
      logger.warning(`Make sure your domain ${config.targetHost} points to this server's IP address`)
      await obtainCertificate(runner, config.targetHost)
      logger.success("SSL certificate obtained and Nginx configured for HTTPS")
      await validateAndReloadNginx(runner)
    },
  },
  {
    name: "verification",
    description: "Performing final verification",
    idempotency: "safe-to-rerun",
    onFailure: "continue",
    async run({ runner, config, logger }) {
      if (await containersRunning(runner, config.installDir)) {
        logger.success("All Docker containers are running")
      } else {
        logger.warning("Some Docker containers may not be running properly")
        await runner.exec("docker", ["compose", "ps"], { cwd: config.installDir })
      }

      if (await nginxActive(runner)) {
        logger.success("Nginx is running")
      } else {
        logger.error("Nginx is not running properly")
      }
    },
  },
]

export interface ProvisionOptions {
  runner?: CommandRunner
  logger?: StatusLogger
  paths?: HostPaths
  probe?: Probe
  sleep?: (ms: number) => Promise<void>
  steps?: readonly ProvisioningStep[]
  /** Receives the summary's access block */
  print?: LinePrinter
  /** Colorize the summary; defaults to whether stdout is a terminal */
  color?: boolean
}

/**
 * Host provisioning orchestrator
 * Runs the step sequence once, fail-fast, and prints the summary
 */
export class HostOrchestrator {
  /**
   * Provision the host for `config`.
   *
   * @param config - Resolved deployment configuration
   * @returns Run report; `exitCode` is what the CLI exits with
   */
  static async provision(config: DeploymentConfig, options: ProvisionOptions = {}): Promise<RunReport> {
    const context: StepContext = {
      config,
      runner: options.runner ?? new SpawnCommandRunner(),
      logger: options.logger ?? statusLogger,
      paths: options.paths ?? DEFAULT_HOST_PATHS,
      probe: options.probe ?? httpProbe,
      sleep: options.sleep ?? sleep,
    }

    context.logger.info(`Starting n8n deployment for ${config.targetHost}`)
    context.logger.info("This will set up a production-ready n8n instance with PostgreSQL and HTTPS")

    const report = await runSteps(options.steps ?? PROVISIONING_STEPS, context)
    printSummary(report, config, context.logger, options.print, options.color)
    return report
  }
}
