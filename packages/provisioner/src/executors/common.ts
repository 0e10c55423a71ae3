import { spawn } from "node:child_process"
import { ToolInvocationError } from "../errors.js"

export interface CommandOptions {
  /** Working directory for the child process */
  cwd?: string
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>
  /** Written to the child's stdin; without it stdin is /dev/null */
  input?: string
  /** Don't echo output to the console */
  quiet?: boolean
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Seam between the orchestrator and the host. Every external tool is reached
 * through this interface so tests can substitute a recording fake.
 */
export interface CommandRunner {
  /** Run a command; resolves with the exit code instead of throwing on non-zero */
  exec(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>
}

/**
 * Spawn a process and stream its output with a `[command]` prefix.
 */
export class SpawnCommandRunner implements CommandRunner {
  exec(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
        env: { ...process.env, ...options.env },
      })

      let stdout = ""
      let stderr = ""

      proc.stdout?.on("data", (data: Buffer) => {
        const text = data.toString()
        stdout += text
        if (!options.quiet) process.stdout.write(`[${command}] ${text}`)
      })

      proc.stderr?.on("data", (data: Buffer) => {
        const text = data.toString()
        stderr += text
        if (!options.quiet) process.stderr.write(`[${command}] ${text}`)
      })

      proc.on("close", code => {
        resolve({ exitCode: code ?? 1, stdout: stdout.trim(), stderr: stderr.trim() })
      })

      proc.on("error", err => {
        reject(ToolInvocationError.spawnFailed(command, args, err.message))
      })

      // A child may exit without reading its input; the close handler reports that
      proc.stdin?.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code !== "EPIPE" && err.code !== "ECONNRESET") {
          reject(ToolInvocationError.spawnFailed(command, args, err.message))
        }
      })
      proc.stdin?.end(options.input)
    })
  }
}

/**
 * Run a command and throw ToolInvocationError on a non-zero exit.
 *
 * @returns trimmed stdout
 */
export async function runCommand(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions,
): Promise<string> {
  const result = await runner.exec(command, args, options)
  if (result.exitCode !== 0) {
    throw new ToolInvocationError(command, args, result.exitCode, result.stderr, result.stdout)
  }
  return result.stdout
}

/**
 * Run a command and report success as a boolean. Never throws on non-zero exit.
 */
export async function runCommandSafe(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions,
): Promise<boolean> {
  const result = await runner.exec(command, args, options)
  return result.exitCode === 0
}
