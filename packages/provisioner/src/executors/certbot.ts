import { CertificateAcquisitionError } from "../errors.js"
import type { CommandRunner } from "./common.js"

/**
 * certbot arguments: edit the nginx site for `host` in place, add TLS and an
 * HTTP to HTTPS redirect, with no prompts and no contact address.
 */
export function certbotArgs(host: string): string[] {
  return [
    "--nginx",
    "-d",
    host,
    "--non-interactive",
    "--agree-tos",
    "--register-unsafely-without-email",
    "--redirect",
  ]
}

/**
 * Obtain a certificate and let certbot rewrite the site file for HTTPS
 *
 * @throws CertificateAcquisitionError when certbot exits non-zero
 */
export async function obtainCertificate(runner: CommandRunner, host: string): Promise<void> {
  const result = await runner.exec("certbot", certbotArgs(host))
  if (result.exitCode !== 0) {
    const reason = result.stderr.split("\n").find(line => line.trim().length > 0)
    throw new CertificateAcquisitionError(host, reason)
  }
}
