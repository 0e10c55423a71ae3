/**
 * @hostkit/shared
 *
 * Compiled-in deployment values, infrastructure constants and the schema
 * that validates them.
 *
 * @example
 * ```typescript
 * import { DEPLOYMENT, PATHS, PORTS } from "@hostkit/shared"
 *
 * const sitesAvailable = PATHS.NGINX_SITES_AVAILABLE // "/etc/nginx/sites-available"
 * const appPort = PORTS.APP // 5678
 * ```
 */

export {
  APP,
  DEFAULT_ADMIN_USER,
  DEPLOYMENT,
  LOOPBACK_HOST,
  PACKAGES,
  PATHS,
  PLACEHOLDER_HOST,
  PORTS,
  READINESS,
  SECRETS,
  TIMEOUTS,
} from "./config.js"
export {
  absolutePath,
  adminUser,
  type DeploymentInput,
  type DeploymentInputParseResult,
  deploymentInputSchema,
  domainName,
  parseDeploymentInput,
} from "./deployment-schema.js"
export { sleep } from "./sleep.js"
