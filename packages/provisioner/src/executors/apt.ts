import { PACKAGES } from "@hostkit/shared"
import { type CommandRunner, runCommand, runCommandSafe } from "./common.js"

const NONINTERACTIVE = { DEBIAN_FRONTEND: "noninteractive" }

/**
 * Refresh the package index and upgrade installed packages
 */
export async function updateSystem(runner: CommandRunner): Promise<void> {
  await runCommand(runner, "apt-get", ["update", "-y"], { env: NONINTERACTIVE })
  await runCommand(runner, "apt-get", ["upgrade", "-y"], { env: NONINTERACTIVE })
}

/**
 * Install packages non-interactively
 *
 * @param packages - apt package names
 */
export async function installPackages(runner: CommandRunner, packages: readonly string[]): Promise<void> {
  await runCommand(runner, "apt-get", ["install", "-y", ...packages], { env: NONINTERACTIVE })
}

/**
 * Install the tools every later step depends on (firewall, nginx, certbot, ...)
 */
export async function installPrerequisites(runner: CommandRunner): Promise<void> {
  await installPackages(runner, PACKAGES.PREREQUISITES)
}

/**
 * Remove distribution Docker packages. Packages that are not installed make
 * apt-get exit non-zero; that is expected and reported as `false`.
 */
export async function removeLegacyDocker(runner: CommandRunner): Promise<boolean> {
  return runCommandSafe(runner, "apt-get", ["remove", "-y", ...PACKAGES.LEGACY_DOCKER], {
    env: NONINTERACTIVE,
    quiet: true,
  })
}
