import { spawn } from "node:child_process"

/**
 * Error thrown when a command exits non-zero
 */
export class CommandError extends Error {
  constructor(
    public command: string,
    public exitCode: number,
    public stderr: string,
    public stdout: string,
  ) {
    super(`Command ${command} failed with exit code ${exitCode}`)
    this.name = "CommandError"
  }
}

export interface CommandOptions {
  cwd?: string
  /** Merged over process.env */
  env?: Record<string, string>
  timeoutMs?: number
  /** Written to stdin. Keeps secrets out of the argument list and error messages. */
  input?: string
  /** Receives output chunks as they arrive */
  onOutput?: (chunk: string) => void
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * The one seam every collaborator spawns processes through.
 * Resolves on any exit status; rejects only when the process cannot start.
 */
export type CommandRunner = (command: string, args: readonly string[], options?: CommandOptions) => Promise<CommandResult>

export const spawnCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: ["pipe", "pipe", "pipe"],
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      timeout: options.timeoutMs,
    })

    // A command that exits before reading stdin reports through its exit code
    proc.stdin.on("error", () => undefined)
    proc.stdin.end(options.input)

    let stdout = ""
    let stderr = ""

    proc.stdout.on("data", (data: Buffer) => {
      const text = data.toString()
      stdout += text
      options.onOutput?.(text)
    })

    proc.stderr.on("data", (data: Buffer) => {
      const text = data.toString()
      stderr += text
      options.onOutput?.(text)
    })

    proc.on("close", code => {
      resolve({ exitCode: code ?? 1, stdout: stdout.trim(), stderr: stderr.trim() })
    })

    proc.on("error", err => {
      reject(new Error(`Failed to spawn ${command}: ${err.message}`))
    })
  })

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ")
}

/**
 * Execute a command
 *
 * @returns stdout content
 * @throws CommandError if the command exits with non-zero code
 */
export async function runCommand(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions,
): Promise<string> {
  const result = await runner(command, args, options)
  if (result.exitCode !== 0) {
    throw new CommandError(formatCommand(command, args), result.exitCode, result.stderr, result.stdout)
  }
  return result.stdout
}

/**
 * Execute a command and return both exit code and output
 * Does not throw on non-zero exit
 */
export async function runCommandSafe(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions,
): Promise<CommandResult> {
  try {
    const stdout = await runCommand(runner, command, args, options)
    return { exitCode: 0, stdout, stderr: "" }
  } catch (error) {
    if (error instanceof CommandError) {
      return {
        exitCode: error.exitCode,
        stdout: error.stdout,
        stderr: error.stderr,
      }
    }
    throw error
  }
}

/**
 * Human-readable reason for a failure: the message plus the tail of stderr
 * when a command was involved.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof CommandError) {
    const tail = (error.stderr || error.stdout).split("\n").slice(-3).join("\n").trim()
    return tail ? `${error.message}: ${tail}` : error.message
  }
  if (error instanceof Error) return error.message
  return String(error)
}

/** True when `name` resolves on PATH */
export async function hasCommand(runner: CommandRunner, name: string): Promise<boolean> {
  const result = await runner("sh", ["-c", 'command -v "$1" >/dev/null 2>&1', "sh", name])
  return result.exitCode === 0
}
