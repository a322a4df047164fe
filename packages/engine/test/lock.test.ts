import { existsSync, readFileSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { acquireLock, readLockInfo, withLock } from "../src/lock.js"
import { captureProvisionError, makeTempDir } from "./helpers.js"

const now = () => new Date("2026-03-01T10:00:00.000Z")

describe("advisory lock", () => {
  let dir: string
  let lockPath: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = makeTempDir())
    lockPath = join(dir, "hostkit.lock")
  })

  afterEach(() => cleanup())

  it("records the holder pid and start time", () => {
    const lock = acquireLock(lockPath, { pid: 4242, now })

    expect(JSON.parse(readFileSync(lockPath, "utf8"))).toEqual({ pid: 4242, startedAt: "2026-03-01T10:00:00.000Z" })
    expect(readLockInfo(lockPath)).toEqual(lock.info)
    lock.release()
  })

  it("fails fast while another run holds it", async () => {
    const first = acquireLock(lockPath, { pid: 4242, now })

    const error = await captureProvisionError(() => acquireLock(lockPath, { pid: 5151 }))

    expect(error.code).toBe("ALREADY_RUNNING")
    expect(error.exitCode).toBe(5)
    expect(error.message).toBe(`Another hostkit run holds ${lockPath} (held by pid 4242 since 2026-03-01T10:00:00.000Z)`)
    expect(error.hint).toBe(`Wait for it to finish. If no run is active, remove ${lockPath} by hand.`)
    first.release()
  })

  it("can be taken again after release", () => {
    acquireLock(lockPath).release()
    expect(existsSync(lockPath)).toBe(false)
    acquireLock(lockPath).release()
  })

  it("treats a stale file it cannot read as held", async () => {
    writeFileSync(lockPath, "garbage")

    const error = await captureProvisionError(() => acquireLock(lockPath))

    expect(readLockInfo(lockPath)).toBeNull()
    expect(error.message).toBe(`Another hostkit run holds ${lockPath}`)
  })

  it("releases when the guarded work throws", async () => {
    await expect(
      withLock(lockPath, async () => {
        throw new Error("boom")
      }),
    ).rejects.toThrow("boom")
    expect(existsSync(lockPath)).toBe(false)
  })
})
