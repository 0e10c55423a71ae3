import { chmod, mkdir, writeFile } from "node:fs/promises"
import { PACKAGES, TIMEOUTS } from "@hostkit/shared"
import type { StatusLogger } from "@hostkit/status-logger"
import { ContainerStartError } from "../errors.js"
import type { HostPaths } from "../types.js"
import { installPackages, removeLegacyDocker } from "./apt.js"
import { type CommandRunner, runCommand } from "./common.js"

/**
 * apt source line for Docker's repository
 */
export function dockerSourcesLine(arch: string, codename: string, keyring: string): string {
  return `deb [arch=${arch} signed-by=${keyring}] ${PACKAGES.DOCKER_REPO_URL} ${codename} stable\n`
}

/**
 * Add Docker's apt repository and signing key, install Docker Engine with the
 * compose plugin, and start the daemon.
 */
export async function installDockerEngine(runner: CommandRunner, paths: HostPaths): Promise<void> {
  await removeLegacyDocker(runner)

  await mkdir(paths.aptKeyringsDir, { recursive: true })
  const armoredKey = await runCommand(runner, "curl", ["-fsSL", PACKAGES.DOCKER_GPG_URL], { quiet: true })
  await runCommand(runner, "gpg", ["--dearmor", "--yes", "-o", paths.dockerKeyring], { input: `${armoredKey}\n` })
  await chmod(paths.dockerKeyring, 0o644)

  const arch = await runCommand(runner, "dpkg", ["--print-architecture"], { quiet: true })
  const codename = await runCommand(runner, "lsb_release", ["-cs"], { quiet: true })
  await writeFile(paths.dockerSourcesList, dockerSourcesLine(arch, codename, paths.dockerKeyring), "utf8")

  await runCommand(runner, "apt-get", ["update", "-y"], { env: { DEBIAN_FRONTEND: "noninteractive" } })
  await installPackages(runner, PACKAGES.DOCKER)

  await runCommand(runner, "systemctl", ["start", "docker"])
  await runCommand(runner, "systemctl", ["enable", "docker"])

  await runCommand(runner, "docker", ["--version"])
  await runCommand(runner, "docker", ["compose", "version"])
}

/**
 * Whether `docker compose ps` in the install directory reports a running container
 */
export async function containersRunning(runner: CommandRunner, installDir: string): Promise<boolean> {
  const result = await runner.exec("docker", ["compose", "ps"], { cwd: installDir, quiet: true })
  return result.exitCode === 0 && result.stdout.includes("Up")
}

export interface StartContainersParams {
  runner: CommandRunner
  installDir: string
  logger: StatusLogger
  sleep: (ms: number) => Promise<void>
}

/**
 * `docker compose up -d`, give the database time to pass its health check,
 * then confirm the containers are up.
 *
 * @throws ContainerStartError with the compose logs printed when nothing is running
 */
export async function startContainers(params: StartContainersParams): Promise<void> {
  const { runner, installDir, logger, sleep } = params

  await runCommand(runner, "docker", ["compose", "up", "-d"], { cwd: installDir })

  logger.info("Waiting for database to be ready...")
  await sleep(TIMEOUTS.CONTAINER_SETTLE_MS)

  const ps = await runner.exec("docker", ["compose", "ps"], { cwd: installDir, quiet: true })
  if (ps.exitCode !== 0 || !ps.stdout.includes("Up")) {
    await runner.exec("docker", ["compose", "logs"], { cwd: installDir })
    throw new ContainerStartError(ps.stdout)
  }
}
