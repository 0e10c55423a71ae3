/**
 * Deployment Input Zod Schema
 *
 * Validates the operator-edited DEPLOYMENT values before any step runs.
 * One schema, one type, one parse function. Unknown keys cause errors.
 */

import { z } from "zod"

// ---------------------------------------------------------------------------
// Reusable validators
// ---------------------------------------------------------------------------

export const domainName = z
  .string()
  .min(1)
  .max(253)
  .regex(/^[a-z0-9-]+(\.[a-z0-9-]+)*$/i, "Must be a valid domain name")

export const adminUser = z
  .string()
  .min(1)
  .regex(/^[^\s=#$"'\\]+$/, "Must not contain whitespace, quotes, backslashes, '=', '#' or '$'")

export const absolutePath = z.string().regex(/^\/[^\s]*$/, "Must be an absolute path without whitespace")

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const deploymentInputSchema = z
  .object({
    targetHost: domainName,
    adminUser,
    installDir: absolutePath,
  })
  .strict()

// ---------------------------------------------------------------------------
// Derived type
// ---------------------------------------------------------------------------

export type DeploymentInput = z.infer<typeof deploymentInputSchema>

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export type DeploymentInputParseResult =
  | { success: true; data: DeploymentInput }
  | { success: false; issues: string[] }

/**
 * Validate deployment input. Issues are flattened to `path: message` strings.
 */
export function parseDeploymentInput(input: unknown): DeploymentInputParseResult {
  const result = deploymentInputSchema.safeParse(input)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return {
    success: false,
    issues: result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
  }
}
