import { APP, PORTS } from "@hostkit/shared"
import { ArtifactRenderError } from "../errors.js"
import type { DeploymentConfig } from "../types.js"

export type EnvEntry = readonly [key: string, value: string]

export interface EnvSection {
  comment: string
  entries: readonly EnvEntry[]
}

const UNSAFE_VALUE = /[\r\n$#"'\\]/

function assertSafeValue(key: string, value: string): void {
  if (UNSAFE_VALUE.test(value)) {
    throw new ArtifactRenderError(".env", key, "contains a newline, quote, backslash, '$' or '#'")
  }
  if (value !== value.trim()) {
    throw new ArtifactRenderError(".env", key, "has leading or trailing whitespace")
  }
}

/**
 * Sections of the n8n environment file, in output order.
 */
export function envSections(config: DeploymentConfig): EnvSection[] {
  return [
    {
      comment: "Database Configuration",
      entries: [
        ["POSTGRES_DB", APP.DATABASE_NAME],
        ["POSTGRES_USER", APP.DATABASE_USER],
        ["POSTGRES_PASSWORD", config.dbPassword],
      ],
    },
    {
      comment: "n8n Configuration",
      entries: [
        ["N8N_BASIC_AUTH_ACTIVE", "true"],
        ["N8N_BASIC_AUTH_USER", config.adminUser],
        ["N8N_BASIC_AUTH_PASSWORD", config.appPassword],
        ["N8N_HOST", config.targetHost],
        ["N8N_PORT", String(PORTS.APP)],
        ["N8N_PROTOCOL", "https"],
        ["WEBHOOK_URL", `https://${config.targetHost}/`],
      ],
    },
    {
      comment: "Database Connection",
      entries: [
        ["DB_TYPE", "postgresdb"],
        ["DB_POSTGRESDB_HOST", APP.DATABASE_SERVICE],
        ["DB_POSTGRESDB_PORT", String(PORTS.POSTGRES)],
        ["DB_POSTGRESDB_DATABASE", APP.DATABASE_NAME],
        ["DB_POSTGRESDB_USER", APP.DATABASE_USER],
        ["DB_POSTGRESDB_PASSWORD", config.dbPassword],
      ],
    },
    {
      comment: "Disable user management via email",
      entries: [
        ["N8N_USER_MANAGEMENT_DISABLED", "true"],
        ["N8N_PERSONALIZATION_ENABLED", "false"],
      ],
    },
  ]
}

/**
 * Render the `.env` consumed by docker compose variable substitution.
 * Values are written unquoted, so anything compose would reinterpret is rejected.
 */
export function renderEnvFile(config: DeploymentConfig): string {
  const blocks = envSections(config).map(section => {
    const lines = section.entries.map(([key, value]) => {
      assertSafeValue(key, value)
      return `${key}=${value}`
    })
    return [`# ${section.comment}`, ...lines].join("\n")
  })
  return `${blocks.join("\n\n")}\n`
}

