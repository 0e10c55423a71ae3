import { ReverseProxyValidationError } from "../errors.js"
import type { CommandRunner } from "./common.js"
import { runCommand } from "./common.js"

/**
 * Validation result for the nginx configuration
 */
export interface NginxValidation {
  isValid: boolean
  output: string
}

/**
 * `nginx -t`: check syntax without applying changes. nginx reports on stderr.
 */
export async function validateNginxConfig(runner: CommandRunner): Promise<NginxValidation> {
  const result = await runner.exec("nginx", ["-t"], { quiet: true })
  return {
    isValid: result.exitCode === 0,
    output: [result.stdout, result.stderr].filter(Boolean).join("\n"),
  }
}

/**
 * Reload nginx (zero-downtime)
 */
export async function reloadNginx(runner: CommandRunner): Promise<void> {
  await runCommand(runner, "systemctl", ["reload", "nginx"])
}

/**
 * Validate, then reload. A failed validation never reaches the reload, so the
 * configuration nginx is currently serving stays in place.
 *
 * @throws ReverseProxyValidationError when `nginx -t` fails
 */
export async function validateAndReloadNginx(runner: CommandRunner): Promise<void> {
  const validation = await validateNginxConfig(runner)
  if (!validation.isValid) {
    throw new ReverseProxyValidationError(validation.output)
  }
  await reloadNginx(runner)
}

/**
 * Check if nginx service is active
 */
export async function nginxActive(runner: CommandRunner): Promise<boolean> {
  const result = await runner.exec("systemctl", ["is-active", "--quiet", "nginx"], { quiet: true })
  return result.exitCode === 0
}
