import { createMemoryStatusLogger } from "@hostkit/status-logger"
import { describe, expect, it, vi } from "vitest"
import { defaultDeploymentInput, generateSecret, resolveDeploymentConfig } from "../src/config/resolver"
import { ConfigurationError } from "../src/errors"

const input = { targetHost: "demo.example.org", adminUser: "ops", installDir: "/root/n8n-docker" }

describe("resolveDeploymentConfig", () => {
  it("refuses the compiled-in placeholder host", () => {
    const { logger } = createMemoryStatusLogger()
    expect(defaultDeploymentInput().targetHost).toBe("your-domain.com")
    expect(() => resolveDeploymentConfig(undefined, { logger })).toThrow(ConfigurationError)
  })

  it("reports the placeholder with its own message", () => {
    const { logger } = createMemoryStatusLogger()
    expect(() => resolveDeploymentConfig({ ...input, targetHost: "your-domain.com" }, { logger })).toThrow(
      'Target host is still the placeholder "your-domain.com". Set DEPLOYMENT.TARGET_HOST before running.',
    )
  })

  it("does not draw secrets when validation fails", () => {
    const secret = vi.fn(() => "test-secret")
    const { logger } = createMemoryStatusLogger()
    expect(() => resolveDeploymentConfig({ ...input, targetHost: "your-domain.com" }, { logger, generateSecret: secret })).toThrow()
    expect(secret).not.toHaveBeenCalled()
  })

  it("rejects malformed input with the schema issues", () => {
    const { logger } = createMemoryStatusLogger()
    expect(() => resolveDeploymentConfig({ ...input, installDir: "relative/dir" }, { logger })).toThrow(
      "Invalid deployment configuration: installDir: Must be an absolute path without whitespace",
    )
  })

  it("warns about the default admin user but proceeds", () => {
    const { logger, entries } = createMemoryStatusLogger()
    const config = resolveDeploymentConfig({ ...input, adminUser: "admin" }, { logger })

    expect(config.adminUser).toBe("admin")
    expect(entries).toHaveLength(1)
    expect(entries[0].level).toBe("warning")
    expect(entries[0].message).toBe(
      "Using default username 'admin'. Consider changing DEPLOYMENT.ADMIN_USER for better security.",
    )
  })

  it("stays quiet for a custom admin user", () => {
    const { logger, entries } = createMemoryStatusLogger()
    resolveDeploymentConfig(input, { logger })
    expect(entries).toEqual([])
  })

  it("draws a 32-byte database secret and a 24-byte application secret", () => {
    const secret = vi.fn((bytes: number) => `test-secret-${bytes}`)
    const { logger } = createMemoryStatusLogger()
    const config = resolveDeploymentConfig(input, { logger, generateSecret: secret })

    expect(secret.mock.calls.map(call => call[0])).toEqual([32, 24])
    expect(config.dbPassword).toBe("test-secret-32")
    expect(config.appPassword).toBe("test-secret-24")
  })

  it("redraws the application secret on a collision", () => {
    const secret = vi
      .fn<(bytes: number) => string>()
      .mockReturnValueOnce("same")
      .mockReturnValueOnce("same")
      .mockReturnValueOnce("different")
    const { logger } = createMemoryStatusLogger()
    const config = resolveDeploymentConfig(input, { logger, generateSecret: secret })

    expect(config.dbPassword).toBe("same")
    expect(config.appPassword).toBe("different")
    expect(secret).toHaveBeenCalledTimes(3)
  })

  it("produces two distinct secrets, rotated on every run", () => {
    const { logger } = createMemoryStatusLogger()
    const first = resolveDeploymentConfig(input, { logger })
    const second = resolveDeploymentConfig(input, { logger })

    expect(first.dbPassword).not.toBe(first.appPassword)
    expect(second.dbPassword).not.toBe(first.dbPassword)
    expect(second.appPassword).not.toBe(first.appPassword)
  })

  it("returns a frozen config", () => {
    const { logger } = createMemoryStatusLogger()
    const config = resolveDeploymentConfig(input, { logger })
    expect(Object.isFrozen(config)).toBe(true)
    expect(config).toMatchObject(input)
  })
})

describe("generateSecret", () => {
  it("base64-encodes the requested number of bytes", () => {
    expect(Buffer.from(generateSecret(32), "base64")).toHaveLength(32)
    expect(generateSecret(24)).toMatch(/^[A-Za-z0-9+/]{32}$/)
  })
})
