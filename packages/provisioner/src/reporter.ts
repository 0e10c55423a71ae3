import { APP, LOOPBACK_HOST, PATHS, PORTS } from "@hostkit/shared"
import { COLORS, type StatusLogger } from "@hostkit/status-logger"
import type { DeploymentConfig, RunReport } from "./types.js"

export type LinePrinter = (line: string) => void

const consolePrinter: LinePrinter = line => console.log(line)

/**
 * Management commands shown after a successful run
 */
export function managementCommands(installDir: string): string[] {
  return [
    `View logs: cd ${installDir} && docker compose logs -f`,
    `Restart services: cd ${installDir} && docker compose restart`,
    `Update n8n: cd ${installDir} && docker compose pull && docker compose up -d`,
  ]
}

/**
 * Where the operator can reach the application after a run. Only a run whose
 * reverse proxy and certificate steps both succeeded serves HTTPS.
 */
export function accessUrl(report: RunReport, config: DeploymentConfig): string {
  const failed = (step: string) => report.outcomes.some(outcome => outcome.step === step && outcome.status !== "succeeded")

  if (failed("reverse-proxy")) {
    return `not served yet (nginx site was not applied); n8n listens on http://${LOOPBACK_HOST}:${PORTS.APP}`
  }
  if (failed("certificate")) {
    return `http://${config.targetHost} (no certificate yet)`
  }
  return `https://${config.targetHost}`
}

/**
 * Lines of the access block. Credentials are not stored anywhere else except
 * the generated .env.
 */
export function renderAccessBlock(config: DeploymentConfig, color = false, url = `https://${config.targetHost}`): string[] {
  const c = (tint: string, text: string) => (color ? `${tint}${text}${COLORS.reset}` : text)
  const envFile = `${config.installDir}/${PATHS.ENV_FILE_NAME}`

  return [
    "",
    c(COLORS.blue, "Access Information:"),
    `URL: ${c(COLORS.green, url)}`,
    `Username: ${c(COLORS.green, config.adminUser)}`,
    `Password: ${c(COLORS.green, config.appPassword)}`,
    "",
    c(COLORS.yellow, "Important Notes:"),
    `• Save your credentials securely - they are also stored in ${envFile}`,
    "• Your data is persisted in Docker volumes",
    "• SSL certificate will auto-renew via systemd timer",
    "• Firewall (UFW) is active - only SSH, HTTP, and HTTPS are allowed",
    "",
    c(COLORS.blue, "Management Commands:"),
    ...managementCommands(config.installDir).map(command => `• ${command}`),
    "",
  ]
}

/**
 * Print the final status block for a run
 */
export function printSummary(
  report: RunReport,
  config: DeploymentConfig,
  logger: StatusLogger,
  print: LinePrinter = consolePrinter,
  color = process.stdout.isTTY === true,
): void {
  if (report.status === "failed") {
    const step = report.failedStep
    const error = report.outcomes.find(outcome => outcome.status === "failed" && outcome.step === step?.name)?.error

    logger.error(`=== ${APP.NAME} Deployment Failed ===`)
    if (step) {
      logger.error(`Failed step: ${step.name} (${step.description})`)
      if (error) logger.error(error.message)
      if (error?.hint) logger.info(error.hint)
      logger.info(
        step.idempotency === "safe-to-rerun"
          ? "This step is safe to rerun. Fix the problem above and run the provisioner again."
          : "This step is not idempotent. Inspect the host before running the provisioner again.",
      )
    }
    logger.info("Steps already applied were left in place for inspection.")
    return
  }

  logger.success(`=== ${APP.NAME} Deployment Complete ===`)
  for (const line of renderAccessBlock(config, color, accessUrl(report, config))) {
    print(line)
  }

  if (report.status === "degraded") {
    logger.warning(`Deployment completed with ${report.warnings.length} warning(s):`)
    for (const warning of report.warnings) {
      logger.warning(`• ${warning.message}`)
      if (warning.hint) logger.warning(`  ${warning.hint}`)
    }
    return
  }

  print(color ? `${COLORS.green}Deployment completed successfully!${COLORS.reset}` : "Deployment completed successfully!")
}
