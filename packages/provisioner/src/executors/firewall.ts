import { APP } from "@hostkit/shared"
import { type CommandRunner, runCommand } from "./common.js"

/**
 * Rules applied after a reset, in order. The reset makes the sequence
 * idempotent: rerunning yields the same rule table.
 */
export const FIREWALL_RULES: readonly (readonly string[])[] = [
  ["--force", "reset"],
  ["default", "deny", "incoming"],
  ["default", "allow", "outgoing"],
  ["allow", "ssh"],
  ["allow", APP.FIREWALL_PROFILE],
  ["--force", "enable"],
]

/**
 * Reset ufw, deny incoming by default and open SSH, HTTP and HTTPS
 */
export async function configureFirewall(runner: CommandRunner): Promise<void> {
  for (const rule of FIREWALL_RULES) {
    await runCommand(runner, "ufw", rule)
  }
}
