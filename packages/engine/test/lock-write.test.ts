import { existsSync } from "node:fs"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { acquireLock } from "../src/lock.js"
import { captureError, makeTempDir } from "./helpers.js"

vi.mock("node:fs", async importOriginal => {
  const actual = await importOriginal<typeof import("node:fs")>()
  return {
    ...actual,
    writeSync: () => {
      throw new Error("ENOSPC: no space left on device, write")
    },
  }
})

describe("advisory lock on a full disk", () => {
  let dir: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = makeTempDir())
  })

  afterEach(() => cleanup())

  it("removes the half-written lock file and rethrows", async () => {
    const lockPath = join(dir, "hostkit.lock")

    const error = await captureError(() => acquireLock(lockPath))

    expect(error).toBeInstanceOf(Error)
    expect(String(error)).toBe("Error: ENOSPC: no space left on device, write")
    expect(existsSync(lockPath)).toBe(false)
  })
})
