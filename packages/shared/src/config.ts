/**
 * ============================================================================
 * HOST CONFIGURATION - SINGLE SOURCE OF TRUTH
 * ============================================================================
 *
 * Every path, port, timeout and package list the provisioner touches lives
 * here. Always import from this file - never hardcode values.
 *
 * DEPLOYMENT is edited by the operator before a run. The provisioner refuses
 * to start while DEPLOYMENT.TARGET_HOST still holds the placeholder.
 *
 * Organization:
 * - DEPLOYMENT: Operator-edited values
 * - PATHS: Filesystem paths
 * - PORTS: Port numbers
 * - TIMEOUTS: Timing constants
 * - READINESS: Readiness probe settings
 * - SECRETS: Secret generation
 * - PACKAGES: apt package lists
 * - APP: Names used by the generated artifacts
 */

// =============================================================================
// Operator Configuration
// =============================================================================

/** Documented placeholder; a run is refused while the target host equals it */
export const PLACEHOLDER_HOST = "your-domain.com"

/** Default admin user; accepted with a warning */
export const DEFAULT_ADMIN_USER = "admin"

/**
 * Compiled-in deployment values. MODIFY THESE BEFORE RUNNING.
 */
export const DEPLOYMENT = {
  /** Public hostname pointing at this server, e.g. "n8n.example.org" */
  TARGET_HOST: PLACEHOLDER_HOST,
  ADMIN_USER: DEFAULT_ADMIN_USER,
  INSTALL_DIR: "/root/n8n-docker",
} as const

// =============================================================================
// Path Constants
// =============================================================================

export const PATHS = {
  ENV_FILE_NAME: ".env",
  COMPOSE_FILE_NAME: "docker-compose.yml",

  NGINX_SITES_AVAILABLE: "/etc/nginx/sites-available",
  NGINX_SITES_ENABLED: "/etc/nginx/sites-enabled",
  NGINX_SITE_NAME: "n8n",
  NGINX_DEFAULT_SITE: "default",

  APT_KEYRINGS_DIR: "/etc/apt/keyrings",
  DOCKER_KEYRING: "/etc/apt/keyrings/docker.gpg",
  DOCKER_SOURCES_LIST: "/etc/apt/sources.list.d/docker.list",
} as const

// =============================================================================
// Port Constants
// =============================================================================

export const PORTS = {
  APP: 5678,
  POSTGRES: 5432,
  HTTP: 80,
  HTTPS: 443,
} as const

/** Only the local reverse proxy reaches the application directly */
export const LOOPBACK_HOST = "127.0.0.1"

// =============================================================================
// Timeout Constants
// =============================================================================

export const TIMEOUTS = {
  /** Pause after `docker compose up -d` before checking container state */
  CONTAINER_SETTLE_MS: 10_000,
  /** Upper bound for a single readiness probe */
  PROBE_MS: 5_000,
  /** nginx proxy_connect/send/read timeouts, seconds */
  PROXY_SECONDS: 60,
} as const

// =============================================================================
// Readiness Probe
// =============================================================================

export const READINESS = {
  MAX_ATTEMPTS: 60,
  INTERVAL_MS: 5_000,
  /** 401 counts: the application is up and guarding access */
  ACCEPTED_STATUS: [200, 302, 401],
} as const

// =============================================================================
// Secrets
// =============================================================================

export const SECRETS = {
  DB_PASSWORD_BYTES: 32,
  APP_PASSWORD_BYTES: 24,
} as const

// =============================================================================
// Packages
// =============================================================================

export const PACKAGES = {
  PREREQUISITES: [
    "curl",
    "wget",
    "gnupg",
    "lsb-release",
    "ca-certificates",
    "software-properties-common",
    "ufw",
    "nginx",
    "certbot",
    "python3-certbot-nginx",
    "openssl",
  ],
  LEGACY_DOCKER: ["docker", "docker-engine", "docker.io", "containerd", "runc"],
  DOCKER: ["docker-ce", "docker-ce-cli", "containerd.io", "docker-buildx-plugin", "docker-compose-plugin"],
  DOCKER_GPG_URL: "https://download.docker.com/linux/ubuntu/gpg",
  DOCKER_REPO_URL: "https://download.docker.com/linux/ubuntu",
} as const

// =============================================================================
// Application
// =============================================================================

export const APP = {
  NAME: "n8n",
  IMAGE: "n8nio/n8n:latest",
  DATABASE_IMAGE: "postgres:15",
  DATABASE_SERVICE: "postgres",
  DATABASE_NAME: "n8n",
  DATABASE_USER: "n8n",
  NETWORK: "n8n_network",
  FIREWALL_PROFILE: "Nginx Full",
  CLIENT_MAX_BODY_SIZE: "50M",
} as const
