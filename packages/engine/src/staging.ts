import type { Stats } from "node:fs"
import { chmod, lstat, mkdir, readFile, readlink, rename, rm, stat, symlink, writeFile } from "node:fs/promises"
import { basename, dirname, join } from "node:path"
import type { StagedFile } from "./types.js"

export type Snapshot =
  | { kind: "absent" }
  | { kind: "file"; content: Buffer; mode: number }
  | { kind: "symlink"; target: string }

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

/**
 * Sibling path the target is staged at: `/etc/nginx/sites-available/.hostkit-123.shop.conf`.
 * Same directory so the final rename never crosses filesystems.
 */
export function stagedPathFor(target: string, tag: string): string {
  return join(dirname(target), `.hostkit-${tag}.${basename(target)}`)
}

/**
 * Temporary copies owned by one transaction until committed or discarded.
 */
export class StagingArea {
  private readonly staged = new Map<string, StagedFile>()

  constructor(private readonly tag: string = String(process.pid)) {}

  async stageFile(target: string, content: string | Buffer, mode?: number): Promise<StagedFile> {
    const stagedPath = stagedPathFor(target, this.tag)
    await mkdir(dirname(target), { recursive: true })
    await rm(stagedPath, { force: true })
    const finalMode = mode ?? (await currentMode(target)) ?? 0o644
    await writeFile(stagedPath, content, { mode: finalMode })
    // writeFile's mode is filtered by the umask
    await chmod(stagedPath, finalMode)
    const file: StagedFile = { target, stagedPath, kind: "file", mode: finalMode }
    this.staged.set(target, file)
    return file
  }

  async stageSymlink(target: string, linkTarget: string): Promise<StagedFile> {
    const stagedPath = stagedPathFor(target, this.tag)
    await mkdir(dirname(target), { recursive: true })
    await rm(stagedPath, { force: true })
    await symlink(linkTarget, stagedPath)
    const file: StagedFile = { target, stagedPath, kind: "symlink" }
    this.staged.set(target, file)
    return file
  }

  files(): StagedFile[] {
    return [...this.staged.values()]
  }

  /** Still waiting to be committed or discarded (not superseded by a later stage of the same target) */
  isPending(file: StagedFile): boolean {
    return this.staged.get(file.target) === file
  }

  /** Forget a file after it was committed */
  release(file: StagedFile): void {
    this.staged.delete(file.target)
  }

  async discard(files: readonly StagedFile[] = this.files()): Promise<void> {
    for (const file of files) {
      if (!this.isPending(file)) continue
      await rm(file.stagedPath, { force: true })
      this.staged.delete(file.target)
    }
  }
}

async function currentMode(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mode & 0o777
  } catch (error) {
    if (isNotFound(error)) return null
    throw error
  }
}

export async function takeSnapshot(path: string): Promise<Snapshot> {
  let info: Stats
  try {
    info = await lstat(path)
  } catch (error) {
    if (isNotFound(error)) return { kind: "absent" }
    throw error
  }
  if (info.isSymbolicLink()) {
    return { kind: "symlink", target: await readlink(path) }
  }
  if (!info.isFile()) {
    throw new Error(`Refusing to replace ${path}: not a regular file or symlink`)
  }
  return { kind: "file", content: await readFile(path), mode: info.mode & 0o777 }
}

/**
 * Snapshot the live path, then rename the staged copy over it.
 */
export async function commitStaged(file: StagedFile): Promise<Snapshot> {
  const snapshot = await takeSnapshot(file.target)
  await rename(file.stagedPath, file.target)
  return snapshot
}

/**
 * Put a snapshot back with the same stage-then-rename discipline as commit.
 */
export async function restoreSnapshot(target: string, snapshot: Snapshot, tag: string = String(process.pid)): Promise<void> {
  if (snapshot.kind === "absent") {
    await rm(target, { force: true })
    return
  }
  const area = new StagingArea(`${tag}.restore`)
  const staged =
    snapshot.kind === "file"
      ? await area.stageFile(target, snapshot.content, snapshot.mode)
      : await area.stageSymlink(target, snapshot.target)
  await rename(staged.stagedPath, target)
}
