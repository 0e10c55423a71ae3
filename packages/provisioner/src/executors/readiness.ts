import { READINESS, sleep as defaultSleep, TIMEOUTS } from "@hostkit/shared"
import { type StatusLogger, statusLogger } from "@hostkit/status-logger"
import { ReadinessTimeoutError } from "../errors.js"
import type { Probe, ReadinessResult } from "../types.js"

export interface WaitForServiceOptions {
  maxAttempts?: number
  intervalMs?: number
  acceptedStatus?: readonly number[]
  probe?: Probe
  sleep?: (ms: number) => Promise<void>
  logger?: StatusLogger
}

/**
 * GET the URL without following redirects, so a login redirect counts as a
 * 302 rather than whatever it points to.
 */
export const httpProbe: Probe = async url => {
  const response = await fetch(url, {
    method: "GET",
    redirect: "manual",
    signal: AbortSignal.timeout(TIMEOUTS.PROBE_MS),
  })
  await response.body?.cancel()
  return response.status
}

/**
 * Block until `url` answers with an accepted status, probing at a fixed
 * interval. No sleep follows the last attempt.
 *
 * @throws ReadinessTimeoutError after `maxAttempts` unsuccessful probes
 */
export async function waitForService(url: string, options: WaitForServiceOptions = {}): Promise<ReadinessResult> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? READINESS.MAX_ATTEMPTS)
  const intervalMs = options.intervalMs ?? READINESS.INTERVAL_MS
  const accepted = new Set(options.acceptedStatus ?? READINESS.ACCEPTED_STATUS)
  const probe = options.probe ?? httpProbe
  const sleep = options.sleep ?? defaultSleep
  const logger = options.logger ?? statusLogger

  logger.info(`Waiting for service at ${url} to be ready...`)

  let lastStatus: number | undefined
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const status = await probe(url)
      lastStatus = status
      if (accepted.has(status)) {
        logger.success(`Service is ready! (HTTP ${status} after ${attempt} attempt${attempt === 1 ? "" : "s"})`)
        return { attempts: attempt, status }
      }
    } catch {
      // No response yet; the container is still starting
      lastStatus = undefined
    }

    if (attempt < maxAttempts) {
      await sleep(intervalMs)
    }
  }

  throw new ReadinessTimeoutError(url, maxAttempts, lastStatus)
}
