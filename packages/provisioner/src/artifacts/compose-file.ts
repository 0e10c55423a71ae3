import { APP, LOOPBACK_HOST, PORTS } from "@hostkit/shared"

/**
 * Variables forwarded into the n8n container. Each one is substituted by
 * docker compose from the `.env` written beside the compose file.
 */
export const APP_ENVIRONMENT_KEYS = [
  "N8N_BASIC_AUTH_ACTIVE",
  "N8N_BASIC_AUTH_USER",
  "N8N_BASIC_AUTH_PASSWORD",
  "N8N_HOST",
  "N8N_PORT",
  "N8N_PROTOCOL",
  "WEBHOOK_URL",
  "DB_TYPE",
  "DB_POSTGRESDB_HOST",
  "DB_POSTGRESDB_PORT",
  "DB_POSTGRESDB_DATABASE",
  "DB_POSTGRESDB_USER",
  "DB_POSTGRESDB_PASSWORD",
  "N8N_USER_MANAGEMENT_DISABLED",
  "N8N_PERSONALIZATION_ENABLED",
] as const

export const DATABASE_ENVIRONMENT_KEYS = ["POSTGRES_DB", "POSTGRES_USER", "POSTGRES_PASSWORD"] as const

export const VOLUMES = {
  DATABASE: "postgres_data",
  APP: "n8n_data",
} as const

/** The only published port: loopback, so nginx is the public entry point */
export const APP_PORT_BINDING = `${LOOPBACK_HOST}:${PORTS.APP}:${PORTS.APP}`

function environmentBlock(keys: readonly string[]): string {
  return keys.map(key => `      - ${key}=\${${key}}`).join("\n")
}

/**
 * Render docker-compose.yml. The document holds no secrets, so the output is
 * identical on every call.
 */
export function renderComposeFile(): string {
  const db = APP.DATABASE_SERVICE
  const network = APP.NETWORK

  return `services:
  ${db}:
    image: ${APP.DATABASE_IMAGE}
    restart: unless-stopped
    environment:
${environmentBlock(DATABASE_ENVIRONMENT_KEYS)}
    volumes:
      - ${VOLUMES.DATABASE}:/var/lib/postgresql/data
    networks:
      - ${network}
    healthcheck:
      test: ["CMD-SHELL", "pg_isready -U \${POSTGRES_USER} -d \${POSTGRES_DB}"]
      interval: 10s
      timeout: 5s
      retries: 5

  ${APP.NAME}:
    image: ${APP.IMAGE}
    restart: unless-stopped
    ports:
      - "${APP_PORT_BINDING}"
    environment:
${environmentBlock(APP_ENVIRONMENT_KEYS)}
    volumes:
      - ${VOLUMES.APP}:/home/node/.n8n
    networks:
      - ${network}
    depends_on:
      ${db}:
        condition: service_healthy

networks:
  ${network}:
    driver: bridge

volumes:
  ${VOLUMES.DATABASE}:
    driver: local
  ${VOLUMES.APP}:
    driver: local
`
}
