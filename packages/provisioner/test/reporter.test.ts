import { COLORS, createMemoryStatusLogger } from "@hostkit/status-logger"
import { describe, expect, it } from "vitest"
import { CertificateAcquisitionError, ToolInvocationError } from "../src/errors"
import { accessUrl, managementCommands, printSummary, renderAccessBlock } from "../src/reporter"
import type { DeploymentConfig, ProvisioningStep, RunReport } from "../src/types"

const config: DeploymentConfig = {
  targetHost: "demo.example.org",
  adminUser: "ops",
  installDir: "/opt/n8n",
  dbPassword: "test-db-secret",
  appPassword: "test-app-secret",
}

function failedReport(idempotency: ProvisioningStep["idempotency"]): RunReport {
  const step: ProvisioningStep = {
    name: "firewall",
    description: "Configuring UFW firewall",
    idempotency,
    onFailure: "abort",
    run: async () => {},
  }
  return {
    status: "failed",
    failedStep: step,
    exitCode: 3,
    warnings: [],
    outcomes: [
      { step: "system-update", status: "succeeded" },
      { step: "firewall", status: "failed", error: new ToolInvocationError("ufw", ["--force", "enable"], 3, "", "") },
    ],
  }
}

describe("managementCommands", () => {
  it("runs every command from the install directory", () => {
    expect(managementCommands("/opt/n8n")).toEqual([
      "View logs: cd /opt/n8n && docker compose logs -f",
      "Restart services: cd /opt/n8n && docker compose restart",
      "Update n8n: cd /opt/n8n && docker compose pull && docker compose up -d",
    ])
  })
})

describe("renderAccessBlock", () => {
  it("points at the env file for the stored credentials", () => {
    expect(renderAccessBlock(config)).toContain(
      "• Save your credentials securely - they are also stored in /opt/n8n/.env",
    )
  })

  it("tints the values when color is on", () => {
    expect(renderAccessBlock(config, true)).toContain(`URL: ${COLORS.green}https://demo.example.org${COLORS.reset}`)
  })
})

describe("accessUrl", () => {
  const report = (outcomes: RunReport["outcomes"]): RunReport => ({ status: "degraded", exitCode: 0, warnings: [], outcomes })

  it("promises HTTPS only when the proxy and certificate succeeded", () => {
    expect(
      accessUrl(
        report([
          { step: "reverse-proxy", status: "succeeded" },
          { step: "certificate", status: "succeeded" },
        ]),
        config,
      ),
    ).toBe("https://demo.example.org")
  })

  it("falls back to HTTP when the certificate failed", () => {
    expect(
      accessUrl(
        report([
          { step: "reverse-proxy", status: "succeeded" },
          { step: "certificate", status: "failed" },
        ]),
        config,
      ),
    ).toBe("http://demo.example.org (no certificate yet)")
  })

  it("points at the loopback port when nginx never served the site", () => {
    expect(
      accessUrl(
        report([
          { step: "reverse-proxy", status: "failed" },
          { step: "certificate", status: "skipped" },
        ]),
        config,
      ),
    ).toBe("not served yet (nginx site was not applied); n8n listens on http://127.0.0.1:5678")
  })
})

describe("printSummary", () => {
  it("names the failed step and says it can be rerun", () => {
    const { logger, entries } = createMemoryStatusLogger()
    const printed: string[] = []

    printSummary(failedReport("safe-to-rerun"), config, logger, line => printed.push(line), false)

    expect(printed).toEqual([])
    expect(entries.map(e => e.message)).toEqual([
      "=== n8n Deployment Failed ===",
      "Failed step: firewall (Configuring UFW firewall)",
      "ufw --force enable failed with exit code 3",
      "This step is safe to rerun. Fix the problem above and run the provisioner again.",
      "Steps already applied were left in place for inspection.",
    ])
  })

  it("asks for inspection before rerunning a destructive step", () => {
    const { logger, entries } = createMemoryStatusLogger()
    printSummary(failedReport("destructive-once"), config, logger, () => {}, false)

    expect(entries.map(e => e.message)).toContain(
      "This step is not idempotent. Inspect the host before running the provisioner again.",
    )
  })

  it("never prints credentials for a failed run", () => {
    const { logger, entries } = createMemoryStatusLogger()
    const printed: string[] = []
    printSummary(failedReport("safe-to-rerun"), config, logger, line => printed.push(line), false)

    expect([...printed, ...entries.map(e => e.message)].some(line => line.includes("test-app-secret"))).toBe(false)
  })

  it("lists warnings after the access block of a degraded run", () => {
    const { logger, entries } = createMemoryStatusLogger()
    const printed: string[] = []
    const report: RunReport = {
      status: "degraded",
      exitCode: 0,
      outcomes: [],
      warnings: [new CertificateAcquisitionError("demo.example.org")],
    }

    printSummary(report, config, logger, line => printed.push(line), false)

    expect(printed).toContain("Password: test-app-secret")
    expect(printed).not.toContain("Deployment completed successfully!")
    expect(entries.map(e => `${e.level}:${e.message}`)).toEqual([
      "success:=== n8n Deployment Complete ===",
      "warning:Deployment completed with 1 warning(s):",
      "warning:• Failed to obtain SSL certificate for demo.example.org",
      "warning:  Make sure demo.example.org points to this server, then run manually: certbot --nginx -d demo.example.org",
    ])
  })
})
