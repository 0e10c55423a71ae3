import { describe, expect, it } from "vitest"
import { APP_LOCAL_URL, DEFAULT_HOST_PATHS, HostOrchestrator, PROVISIONING_STEPS } from "../src/index"

/**
 * Smoke tests for the package surface. Runs against a real host belong in a
 * disposable VM, not here.
 */

describe("HostOrchestrator", () => {
  it("should export HostOrchestrator class", () => {
    expect(HostOrchestrator).toBeDefined()
    expect(typeof HostOrchestrator.provision).toBe("function")
  })

  it("should probe the application over loopback", () => {
    expect(APP_LOCAL_URL).toBe("http://127.0.0.1:5678")
  })
})

describe("PROVISIONING_STEPS", () => {
  it("should run in dependency order", () => {
    expect(PROVISIONING_STEPS.map(step => step.name)).toEqual([
      "system-update",
      "firewall",
      "container-engine",
      "artifacts",
      "containers",
      "readiness",
      "reverse-proxy",
      "certificate",
      "verification",
    ])
  })

  it("should only tolerate failures after the application is up", () => {
    const tolerated = PROVISIONING_STEPS.filter(step => step.onFailure === "continue").map(step => step.name)
    expect(tolerated).toEqual(["reverse-proxy", "certificate", "verification"])
  })

  it("should mark container start as the only destructive step", () => {
    const destructive = PROVISIONING_STEPS.filter(step => step.idempotency === "destructive-once").map(step => step.name)
    expect(destructive).toEqual(["containers"])
  })

  it("should gate the certificate on the reverse proxy", () => {
    expect(PROVISIONING_STEPS.find(step => step.name === "certificate")?.dependsOn).toEqual(["reverse-proxy"])
  })
})

describe("Configuration", () => {
  it("should use the standard host paths", () => {
    expect(DEFAULT_HOST_PATHS).toEqual({
      nginxSitesAvailable: "/etc/nginx/sites-available",
      nginxSitesEnabled: "/etc/nginx/sites-enabled",
      aptKeyringsDir: "/etc/apt/keyrings",
      dockerKeyring: "/etc/apt/keyrings/docker.gpg",
      dockerSourcesList: "/etc/apt/sources.list.d/docker.list",
    })
  })
})
