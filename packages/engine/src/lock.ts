import { closeSync, openSync, readFileSync, rmSync, writeSync } from "node:fs"
import { z } from "zod"
import { ProvisionError } from "./errors.js"

const lockInfoSchema = z.object({
  pid: z.number().int(),
  startedAt: z.string(),
})

export type LockInfo = z.infer<typeof lockInfoSchema>

export interface LockHandle {
  readonly path: string
  readonly info: LockInfo
  release(): void
}

export interface AcquireLockOptions {
  pid?: number
  now?: () => Date
}

/**
 * Read the holder recorded in a lock file. Null when the file is missing
 * or was not written by hostkit.
 */
export function readLockInfo(path: string): LockInfo | null {
  let raw: string
  try {
    raw = readFileSync(path, "utf8")
  } catch {
    return null
  }
  try {
    const parsed = lockInfoSchema.safeParse(JSON.parse(raw))
    return parsed.success ? parsed.data : null
  } catch {
    return null
  }
}

/**
 * Create the lock file with O_CREAT|O_EXCL. Advisory: only hostkit honours it.
 *
 * @throws ProvisionError ALREADY_RUNNING when the file exists
 */
export function acquireLock(path: string, options: AcquireLockOptions = {}): LockHandle {
  const info: LockInfo = {
    pid: options.pid ?? process.pid,
    startedAt: (options.now ?? (() => new Date()))().toISOString(),
  }

  let fd: number
  try {
    fd = openSync(path, "wx", 0o644)
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      const holder = readLockInfo(path)
      throw ProvisionError.alreadyRunning(path, holder ? `pid ${holder.pid} since ${holder.startedAt}` : undefined)
    }
    throw error
  }

  try {
    writeSync(fd, `${JSON.stringify(info)}\n`)
  } catch (error) {
    closeSync(fd)
    rmSync(path, { force: true })
    throw error
  }
  closeSync(fd)

  let released = false
  return {
    path,
    info,
    release() {
      if (released) return
      released = true
      rmSync(path, { force: true })
    },
  }
}

export async function withLock<T>(path: string, fn: (lock: LockHandle) => Promise<T>, options?: AcquireLockOptions): Promise<T> {
  const lock = acquireLock(path, options)
  try {
    return await fn(lock)
  } finally {
    lock.release()
  }
}
