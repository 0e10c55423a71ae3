import { mkdir, rm, symlink, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { PATHS } from "@hostkit/shared"
import { renderComposeFile } from "../artifacts/compose-file.js"
import { renderEnvFile } from "../artifacts/env-file.js"
import type { DeploymentConfig, HostPaths } from "../types.js"

export interface WrittenArtifacts {
  envFile: string
  composeFile: string
}

/**
 * Write .env and docker-compose.yml into the install directory, replacing any
 * previous version. Both are rendered before either is written.
 */
export async function writeDeploymentArtifacts(config: DeploymentConfig): Promise<WrittenArtifacts> {
  const env = renderEnvFile(config)
  const compose = renderComposeFile()

  const envFile = join(config.installDir, PATHS.ENV_FILE_NAME)
  const composeFile = join(config.installDir, PATHS.COMPOSE_FILE_NAME)

  await mkdir(config.installDir, { recursive: true })
  await writeFile(envFile, env, { encoding: "utf8", mode: 0o600 })
  await writeFile(composeFile, compose, { encoding: "utf8", mode: 0o644 })

  return { envFile, composeFile }
}

export function siteAvailablePath(paths: HostPaths): string {
  return join(paths.nginxSitesAvailable, PATHS.NGINX_SITE_NAME)
}

export function siteEnabledPath(paths: HostPaths): string {
  return join(paths.nginxSitesEnabled, PATHS.NGINX_SITE_NAME)
}

/**
 * Replace the nginx site file and point sites-enabled at it. The distribution's
 * default site is removed so it cannot claim port 80.
 *
 * @returns path of the written site file
 */
export async function installNginxSite(paths: HostPaths, content: string): Promise<string> {
  await rm(join(paths.nginxSitesEnabled, PATHS.NGINX_DEFAULT_SITE), { force: true })

  const available = siteAvailablePath(paths)
  const enabled = siteEnabledPath(paths)

  await mkdir(paths.nginxSitesAvailable, { recursive: true })
  await mkdir(paths.nginxSitesEnabled, { recursive: true })
  await writeFile(available, content, { encoding: "utf8", mode: 0o644 })

  await rm(enabled, { force: true })
  await symlink(available, enabled)

  return available
}
