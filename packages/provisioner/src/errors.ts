export type ProvisioningErrorCode =
  | "CONFIGURATION_INVALID"
  | "TOOL_INVOCATION_FAILED"
  | "READINESS_TIMEOUT"
  | "CERTIFICATE_ACQUISITION_FAILED"
  | "REVERSE_PROXY_INVALID"
  | "CONTAINERS_NOT_RUNNING"
  | "ARTIFACT_INVALID"

export class ProvisioningError extends Error {
  readonly code: ProvisioningErrorCode
  readonly exitCode: number
  /** Operator-facing remediation, printed after the error */
  readonly hint?: string

  constructor(code: ProvisioningErrorCode, message: string, options: { exitCode?: number; hint?: string } = {}) {
    super(message)
    this.name = "ProvisioningError"
    this.code = code
    this.exitCode = options.exitCode ?? 1
    this.hint = options.hint
  }
}

export class ConfigurationError extends ProvisioningError {
  constructor(message: string, hint?: string) {
    super("CONFIGURATION_INVALID", message, { hint })
    this.name = "ConfigurationError"
  }

  static placeholderHost(placeholder: string): ConfigurationError {
    return new ConfigurationError(
      `Target host is still the placeholder "${placeholder}". Set DEPLOYMENT.TARGET_HOST before running.`,
      "Set the target host to your actual domain name (e.g. 'n8n.yourdomain.com')",
    )
  }

  static invalidInput(issues: string[]): ConfigurationError {
    return new ConfigurationError(`Invalid deployment configuration: ${issues.join("; ")}`)
  }

  static notRoot(): ConfigurationError {
    return new ConfigurationError("This provisioner must be run as root", "Re-run with sudo")
  }
}

/**
 * Thrown when an external tool exits non-zero. The tool's exit code becomes the
 * process exit code when the failing step aborts the run.
 */
export class ToolInvocationError extends ProvisioningError {
  constructor(
    public command: string,
    public args: readonly string[],
    exitCode: number,
    public stderr: string,
    public stdout: string,
    hint?: string,
  ) {
    super("TOOL_INVOCATION_FAILED", `${[command, ...args].join(" ")} failed with exit code ${exitCode}`, {
      exitCode,
      hint,
    })
    this.name = "ToolInvocationError"
  }

  static spawnFailed(command: string, args: readonly string[], reason: string): ToolInvocationError {
    const error = new ToolInvocationError(command, args, 127, reason, "", `Is ${command} installed and on PATH?`)
    error.message = `Failed to spawn ${command}: ${reason}`
    return error
  }
}

export class ReadinessTimeoutError extends ProvisioningError {
  constructor(
    public url: string,
    public attempts: number,
    public lastStatus?: number,
  ) {
    super(
      "READINESS_TIMEOUT",
      `Service at ${url} did not become ready after ${attempts} attempts` +
        (lastStatus === undefined ? " (no response)" : ` (last status ${lastStatus})`),
      { hint: "Inspect the containers with: docker compose logs" },
    )
    this.name = "ReadinessTimeoutError"
  }
}

export class CertificateAcquisitionError extends ProvisioningError {
  constructor(host: string, cause?: string) {
    super("CERTIFICATE_ACQUISITION_FAILED", `Failed to obtain SSL certificate for ${host}${cause ? `: ${cause}` : ""}`, {
      hint: `Make sure ${host} points to this server, then run manually: certbot --nginx -d ${host}`,
    })
    this.name = "CertificateAcquisitionError"
  }
}

export class ReverseProxyValidationError extends ProvisioningError {
  constructor(public output: string) {
    super("REVERSE_PROXY_INVALID", "nginx configuration test failed; reload skipped", {
      hint: "Run nginx -t to see the offending directive. The previously loaded configuration stays active.",
    })
    this.name = "ReverseProxyValidationError"
  }
}

export class ContainerStartError extends ProvisioningError {
  constructor(public psOutput: string) {
    super("CONTAINERS_NOT_RUNNING", "Docker containers failed to start properly", {
      hint: "Inspect the containers with: docker compose logs",
    })
    this.name = "ContainerStartError"
  }
}

export class ArtifactRenderError extends ProvisioningError {
  constructor(artifact: string, key: string, reason: string) {
    super("ARTIFACT_INVALID", `Cannot render ${artifact}: ${key} ${reason}`)
    this.name = "ArtifactRenderError"
  }
}

/**
 * Normalize anything a step throws into a ProvisioningError.
 */
export function toProvisioningError(error: unknown): ProvisioningError {
  if (error instanceof ProvisioningError) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new ProvisioningError("TOOL_INVOCATION_FAILED", message)
}
