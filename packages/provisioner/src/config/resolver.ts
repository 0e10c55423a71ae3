import { randomBytes } from "node:crypto"
import {
  DEFAULT_ADMIN_USER,
  DEPLOYMENT,
  type DeploymentInput,
  PLACEHOLDER_HOST,
  parseDeploymentInput,
  SECRETS,
} from "@hostkit/shared"
import { type StatusLogger, statusLogger } from "@hostkit/status-logger"
import { ConfigurationError } from "../errors.js"
import type { DeploymentConfig } from "../types.js"

/** Produces a base64 secret from `bytes` random bytes */
export type SecretGenerator = (bytes: number) => string

export const generateSecret: SecretGenerator = bytes => randomBytes(bytes).toString("base64")

export interface ResolveOptions {
  logger?: StatusLogger
  generateSecret?: SecretGenerator
}

/** The compiled-in DEPLOYMENT values as resolver input */
export function defaultDeploymentInput(): DeploymentInput {
  return {
    targetHost: DEPLOYMENT.TARGET_HOST,
    adminUser: DEPLOYMENT.ADMIN_USER,
    installDir: DEPLOYMENT.INSTALL_DIR,
  }
}

/**
 * Build the immutable DeploymentConfig for one run, or fail before anything
 * on the host is touched.
 *
 * Secrets are drawn fresh on every call, so a rerun rotates credentials.
 *
 * @throws ConfigurationError when the host is the placeholder or the input is malformed
 */
export function resolveDeploymentConfig(
  input: DeploymentInput = defaultDeploymentInput(),
  options: ResolveOptions = {},
): DeploymentConfig {
  const logger = options.logger ?? statusLogger
  const secret = options.generateSecret ?? generateSecret

  if (input.targetHost === PLACEHOLDER_HOST) {
    throw ConfigurationError.placeholderHost(PLACEHOLDER_HOST)
  }

  const parsed = parseDeploymentInput(input)
  if (!parsed.success) {
    throw ConfigurationError.invalidInput(parsed.issues)
  }

  if (parsed.data.adminUser === DEFAULT_ADMIN_USER) {
    logger.warning(
      `Using default username '${DEFAULT_ADMIN_USER}'. Consider changing DEPLOYMENT.ADMIN_USER for better security.`,
    )
  }

  const dbPassword = secret(SECRETS.DB_PASSWORD_BYTES)
  let appPassword = secret(SECRETS.APP_PASSWORD_BYTES)
  while (appPassword === dbPassword) {
    appPassword = secret(SECRETS.APP_PASSWORD_BYTES)
  }

  return Object.freeze({
    targetHost: parsed.data.targetHost,
    adminUser: parsed.data.adminUser,
    installDir: parsed.data.installDir,
    dbPassword,
    appPassword,
  })
}
