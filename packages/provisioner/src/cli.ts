#!/usr/bin/env tsx
/**
 * Provision this host for n8n.
 *
 * Edit DEPLOYMENT in @hostkit/shared (packages/shared/src/config.ts), then:
 *
 * Usage: sudo npm run provision
 */

import { realpathSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { statusLogger } from "@hostkit/status-logger"
import { resolveDeploymentConfig } from "./config/resolver.js"
import { ConfigurationError, ProvisioningError } from "./errors.js"
import { HostOrchestrator } from "./orchestrator.js"

/**
 * Resolve configuration, run the provisioning sequence, return the exit code.
 *
 * @param uid - effective user id; defaults to the current process's
 */
export async function main(uid: number | undefined = process.getuid?.()): Promise<number> {
  try {
    if (uid !== 0) {
      throw ConfigurationError.notRoot()
    }

    const config = resolveDeploymentConfig()
    const report = await HostOrchestrator.provision(config)
    return report.exitCode
  } catch (error) {
    if (error instanceof ProvisioningError) {
      statusLogger.error(error.message)
      if (error.hint) statusLogger.error(error.hint)
      return error.exitCode
    }
    statusLogger.error(`Unexpected error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`)
    return 1
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1]
  return script !== undefined && realpathSync(script) === fileURLToPath(import.meta.url)
}

if (isEntryPoint()) {
  main().then(code => {
    process.exitCode = code
  })
}
