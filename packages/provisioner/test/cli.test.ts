import { afterEach, describe, expect, it, vi } from "vitest"
import { main } from "../src/cli"
import { HostOrchestrator } from "../src/orchestrator"

describe("main", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("refuses to run as a regular user before resolving anything", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {})
    const provision = vi.spyOn(HostOrchestrator, "provision")

    await expect(main(1000)).resolves.toBe(1)

    expect(provision).not.toHaveBeenCalled()
    expect(errors).toHaveBeenCalledWith(expect.stringContaining("This provisioner must be run as root"))
    expect(errors).toHaveBeenCalledWith(expect.stringContaining("Re-run with sudo"))
  })

  it("runs no step while the target host is still the placeholder", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {})
    vi.spyOn(console, "log").mockImplementation(() => {})
    const provision = vi.spyOn(HostOrchestrator, "provision")

    await expect(main(0)).resolves.toBe(1)

    expect(provision).not.toHaveBeenCalled()
    expect(errors).toHaveBeenCalledWith(
      expect.stringContaining('Target host is still the placeholder "your-domain.com".'),
    )
  })
})
