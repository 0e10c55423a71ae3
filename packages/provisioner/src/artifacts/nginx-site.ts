import { APP, LOOPBACK_HOST, PORTS, TIMEOUTS } from "@hostkit/shared"
import { ArtifactRenderError } from "../errors.js"
import type { DeploymentConfig } from "../types.js"

const SERVER_NAME = /^[a-z0-9.-]+$/i

/**
 * Headers forwarded to the application. `$`-prefixed values are nginx variables.
 */
export const PROXY_HEADERS: readonly (readonly [header: string, value: string])[] = [
  ["Host", "$host"],
  ["X-Real-IP", "$remote_addr"],
  ["X-Forwarded-For", "$proxy_add_x_forwarded_for"],
  ["X-Forwarded-Proto", "$scheme"],
  ["X-Forwarded-Host", "$host"],
  ["X-Forwarded-Port", "$server_port"],
]

/**
 * Render the HTTP-only site file (stage A). certbot later rewrites this same
 * file in place to add TLS and the HTTP to HTTPS redirect.
 */
export function renderNginxSite(config: Pick<DeploymentConfig, "targetHost">): string {
  if (!SERVER_NAME.test(config.targetHost)) {
    throw new ArtifactRenderError("nginx site", "server_name", `"${config.targetHost}" is not a valid host`)
  }

  const headers = PROXY_HEADERS.map(([name, value]) => `        proxy_set_header ${name} ${value};`).join("\n")
  const timeout = `${TIMEOUTS.PROXY_SECONDS}s`

  return `server {
    listen ${PORTS.HTTP};
    server_name ${config.targetHost};

    client_max_body_size ${APP.CLIENT_MAX_BODY_SIZE};

    location / {
        proxy_pass http://${LOOPBACK_HOST}:${PORTS.APP};
${headers}

        # WebSocket support
        proxy_http_version 1.1;
        proxy_set_header Upgrade $http_upgrade;
        proxy_set_header Connection "upgrade";

        proxy_connect_timeout ${timeout};
        proxy_send_timeout ${timeout};
        proxy_read_timeout ${timeout};
    }
}
`
}
