import { describe, expect, it } from "vitest"
import { DEPLOYMENT, LOOPBACK_HOST, PATHS, PLACEHOLDER_HOST, PORTS, READINESS, SECRETS, TIMEOUTS } from "../config"

describe("DEPLOYMENT", () => {
  it("ships with the placeholder host so an unedited run is refused", () => {
    expect(DEPLOYMENT.TARGET_HOST).toBe(PLACEHOLDER_HOST)
    expect(PLACEHOLDER_HOST).toBe("your-domain.com")
  })

  it("installs under an absolute directory", () => {
    expect(DEPLOYMENT.INSTALL_DIR).toMatch(/^\//)
  })
})

describe("READINESS", () => {
  it("polls 60 times at 5 second intervals", () => {
    expect(READINESS.MAX_ATTEMPTS).toBe(60)
    expect(READINESS.INTERVAL_MS).toBe(5000)
  })

  it("accepts 200, 302 and 401", () => {
    expect(READINESS.ACCEPTED_STATUS).toEqual([200, 302, 401])
  })
})

describe("Network", () => {
  it("binds the application to loopback on 5678", () => {
    expect(LOOPBACK_HOST).toBe("127.0.0.1")
    expect(PORTS.APP).toBe(5678)
  })

  it("uses 60 second proxy timeouts", () => {
    expect(TIMEOUTS.PROXY_SECONDS).toBe(60)
  })
})

describe("PATHS", () => {
  it("keeps nginx sites under /etc/nginx", () => {
    expect(PATHS.NGINX_SITES_AVAILABLE).toBe("/etc/nginx/sites-available")
    expect(PATHS.NGINX_SITES_ENABLED).toBe("/etc/nginx/sites-enabled")
  })
})

describe("SECRETS", () => {
  it("draws at least 24 bytes for every secret", () => {
    expect(SECRETS.DB_PASSWORD_BYTES).toBeGreaterThanOrEqual(24)
    expect(SECRETS.APP_PASSWORD_BYTES).toBeGreaterThanOrEqual(24)
  })
})
