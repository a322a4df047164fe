import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { PassThrough } from "node:stream"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { CommandError, hasCommand, runCommand, runCommandSafe, spawnCommand } from "../src/executors/common.js"
import { GitSourceFetcher } from "../src/executors/git.js"
import { DefaultsInputSource, ReadlineInputSource, ScriptedInputSource } from "../src/executors/input.js"
import { AptPackageManager } from "../src/executors/packages.js"
import { Pm2Manager, SupervisorManager, SystemdServiceManager } from "../src/executors/services.js"
import { commandValidator, nginxHarness, nginxValidator, sshdValidator } from "../src/executors/validators.js"
import type { StagedFile } from "../src/types.js"
import { captureError, captureProvisionError, commandLine, fakeRunner, makeTempDir } from "./helpers.js"

describe("command seam", () => {
  it("returns stdout and throws CommandError on non-zero exit", async () => {
    const { runner } = fakeRunner(command =>
      command === "false" ? { exitCode: 2, stderr: "nope", stdout: "partial" } : { stdout: "ok" },
    )

    await expect(runCommand(runner, "true", [])).resolves.toBe("ok")
    const error = await captureError(() => runCommand(runner, "false", ["--flag"]))
    expect(error).toBeInstanceOf(CommandError)
    expect(error).toMatchObject({ command: "false --flag", exitCode: 2, stderr: "nope", stdout: "partial" })
  })

  it("reports the exit status without throwing in safe mode", async () => {
    const { runner } = fakeRunner(() => ({ exitCode: 3, stderr: "bad" }))
    await expect(runCommandSafe(runner, "x", [])).resolves.toEqual({ exitCode: 3, stdout: "", stderr: "bad" })
  })

  it("looks commands up through the shell", async () => {
    const { runner, calls } = fakeRunner(() => ({ exitCode: 1 }))
    await expect(hasCommand(runner, "pnpm")).resolves.toBe(false)
    expect(calls[0]?.args).toEqual(["-c", 'command -v "$1" >/dev/null 2>&1', "sh", "pnpm"])
  })

  it("feeds input to the child's stdin", async () => {
    const result = await spawnCommand(process.execPath, ["-e", "process.stdin.pipe(process.stdout)"], {
      input: "SELECT 1;\n",
    })
    expect(result).toEqual({ exitCode: 0, stdout: "SELECT 1;", stderr: "" })
  })
})

describe("AptPackageManager", () => {
  it("reads dpkg status", async () => {
    const { runner } = fakeRunner((_, args) =>
      args.includes("nginx") ? { stdout: "install ok installed" } : { exitCode: 1, stderr: "no packages found" },
    )
    const apt = new AptPackageManager(runner)

    await expect(apt.isInstalled("nginx")).resolves.toBe(true)
    await expect(apt.isInstalled("redis-server")).resolves.toBe(false)
  })

  it("refreshes the index once before the first install", async () => {
    const { runner, calls } = fakeRunner()
    const apt = new AptPackageManager(runner)

    await apt.install("ufw")
    await apt.install("fail2ban")

    expect(calls.map(commandLine)).toEqual(["apt-get update", "apt-get install -y ufw", "apt-get install -y fail2ban"])
    expect(calls[1]?.options?.env).toEqual({ DEBIAN_FRONTEND: "noninteractive" })
  })
})

describe("SystemdServiceManager", () => {
  it("rejects unsafe unit names", async () => {
    const systemd = new SystemdServiceManager(fakeRunner().runner)
    const error = await captureProvisionError(() => systemd.reload("nginx; rm -rf /"))
    expect(error.message).toBe("Invalid service name: nginx; rm -rf /")
  })

  it("recovers a failed unit with reset-failed and one retry", async () => {
    let restarts = 0
    const { runner, calls } = fakeRunner((command, args) => {
      if (args[0] === "restart") {
        restarts += 1
        return restarts === 1 ? { exitCode: 1, stderr: "start request repeated too quickly" } : { exitCode: 0 }
      }
      if (args[0] === "is-failed") return { stdout: "failed" }
      return undefined
    })

    await new SystemdServiceManager(runner).restart("php8.4-fpm")

    expect(calls.map(commandLine)).toEqual([
      "systemctl restart php8.4-fpm",
      "systemctl is-failed php8.4-fpm",
      "systemctl reset-failed php8.4-fpm",
      "systemctl restart php8.4-fpm",
    ])
  })

  it("attaches the journal tail when restart keeps failing", async () => {
    const { runner } = fakeRunner((command, args) => {
      if (command === "journalctl") return { stdout: "Main process exited, code=exited" }
      if (args[0] === "restart") return { exitCode: 1, stderr: "Job failed" }
      if (args[0] === "is-failed") return { exitCode: 1, stdout: "active" }
      return undefined
    })

    const error = await captureError(() => new SystemdServiceManager(runner).restart("api"))

    expect(error).toMatchObject({
      command: "systemctl restart api",
      exitCode: 1,
      stderr: "Job failed\nMain process exited, code=exited",
    })
  })

  it("enables and starts in one call", async () => {
    const { runner, calls } = fakeRunner()
    await new SystemdServiceManager(runner).enable("fail2ban", { now: true })
    expect(calls.map(commandLine)).toEqual(["systemctl enable --now fail2ban"])
  })
})

describe("SupervisorManager", () => {
  it("is running only when every process of the group is RUNNING", async () => {
    const status = [
      "shop-worker:shop-worker_00   RUNNING   pid 101, uptime 0:01:00",
      "shop-worker:shop-worker_01   STARTING",
    ].join("\n")
    const { runner, calls } = fakeRunner(() => ({ stdout: status }))

    await expect(new SupervisorManager(runner).isRunning("shop-worker")).resolves.toBe(false)
    expect(calls.map(commandLine)).toEqual(["supervisorctl status shop-worker:*"])
  })
})

describe("Pm2Manager", () => {
  it("finds an online process in jlist output", async () => {
    const list = JSON.stringify([
      { name: "shop", pm2_env: { status: "online", pm_uptime: 1 } },
      { name: "blog", pm2_env: { status: "stopped" } },
    ])
    const pm2 = new Pm2Manager(fakeRunner(() => ({ stdout: list })).runner)

    await expect(pm2.isOnline("shop")).resolves.toBe(true)
    await expect(pm2.isOnline("blog")).resolves.toBe(false)
  })

  it("rejects output it does not understand", async () => {
    const pm2 = new Pm2Manager(fakeRunner(() => ({ stdout: '{"not":"a list"}' })).runner)
    const error = await captureProvisionError(() => pm2.isOnline("shop"))
    expect(error.code).toBe("UNKNOWN")
  })

  it("rejects unsafe process names before calling pm2", async () => {
    const { runner, calls } = fakeRunner()
    const pm2 = new Pm2Manager(runner)

    const error = await captureProvisionError(() => pm2.reload("shop && pm2 kill"))
    expect(error.code).toBe("PRECONDITION_FAILED")
    expect(error.message).toBe("Invalid service name: shop && pm2 kill")
    await expect(pm2.isOnline("shop`id`")).rejects.toThrow("Invalid service name: shop`id`")
    await expect(pm2.delete("../shop")).rejects.toThrow("Invalid service name: ../shop")
    expect(calls).toEqual([])
  })
})

describe("GitSourceFetcher", () => {
  let dir: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = makeTempDir())
  })

  afterEach(() => cleanup())

  it("refuses an unreachable remote", async () => {
    const { runner, calls } = fakeRunner(() => ({ exitCode: 128, stderr: "Repository not found" }))

    const error = await captureProvisionError(() =>
      new GitSourceFetcher(runner).clone("https://github.com/user/missing.git", join(dir, "missing")),
    )

    expect(error.code).toBe("PRECONDITION_FAILED")
    expect(error.message).toBe("Repository not reachable: https://github.com/user/missing.git")
    expect(calls).toHaveLength(1)
  })

  it("refuses a non-empty destination unless overwrite is authorised", async () => {
    const dest = join(dir, "shop")
    mkdirSync(dest)
    writeFileSync(join(dest, "index.html"), "<h1>old</h1>")
    const { runner, calls } = fakeRunner()
    const git = new GitSourceFetcher(runner)

    const error = await captureProvisionError(() => git.clone("https://github.com/user/shop.git", dest))
    expect(error.message).toBe(`Destination ${dest} exists and is not empty`)
    expect(existsSync(join(dest, "index.html"))).toBe(true)

    await git.clone("https://github.com/user/shop.git", dest, { overwrite: true })
    expect(existsSync(dest)).toBe(false)
    expect(calls.map(commandLine)).toEqual([
      "git ls-remote --heads https://github.com/user/shop.git",
      "git ls-remote --heads https://github.com/user/shop.git",
      `git clone https://github.com/user/shop.git ${dest}`,
    ])
  })

  it("reads the origin of a checkout", async () => {
    const { runner } = fakeRunner(() => ({ stdout: "git@github.com:user/shop.git" }))
    await expect(new GitSourceFetcher(runner).remoteUrl("/srv/shop")).resolves.toBe("git@github.com:user/shop.git")
    const missing = new GitSourceFetcher(fakeRunner(() => ({ exitCode: 2 })).runner)
    await expect(missing.remoteUrl("/srv/none")).resolves.toBeNull()
  })
})

describe("validators", () => {
  let dir: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = makeTempDir())
  })

  afterEach(() => cleanup())

  const staged: StagedFile[] = [
    { target: "/etc/nginx/sites-available/shop.conf", stagedPath: "/etc/nginx/sites-available/.hostkit-1.shop.conf", kind: "file" },
    { target: "/etc/nginx/sites-enabled/shop.conf", stagedPath: "/etc/nginx/sites-enabled/.hostkit-1.shop.conf", kind: "symlink" },
  ]

  it("builds an nginx harness that includes only staged regular files", () => {
    expect(nginxHarness("/etc/nginx", staged)).toBe(
      [
        "events {}",
        "http {",
        "    include /etc/nginx/mime.types;",
        "    include /etc/nginx/sites-available/.hostkit-1.shop.conf;",
        "}",
        "",
      ].join("\n"),
    )
  })

  it("runs nginx -t against the harness and removes it afterwards", async () => {
    const harnessPath = join(dir, ".hostkit-9.harness.conf")
    let harnessSeen = ""
    const { runner, calls } = fakeRunner(() => {
      harnessSeen = readFileSync(harnessPath, "utf8")
      return undefined
    })

    await nginxValidator({ nginxDir: dir, runner, tag: "9" })(staged)

    expect(calls.map(commandLine)).toEqual([`nginx -t -q -c ${harnessPath}`])
    expect(harnessSeen).toBe(nginxHarness(dir, staged))
    expect(readdirSync(dir)).toEqual([])
  })

  it("removes the harness when nginx rejects the config", async () => {
    const { runner } = fakeRunner(() => ({ exitCode: 1, stderr: "nginx: [emerg] unknown directive" }))

    await expect(nginxValidator({ nginxDir: dir, runner, tag: "9" })(staged)).rejects.toThrow(CommandError)
    expect(readdirSync(dir)).toEqual([])
  })

  it("checks each staged sshd_config with sshd -t -f", async () => {
    const { runner, calls } = fakeRunner()
    await sshdValidator(runner)([
      { target: "/etc/ssh/sshd_config", stagedPath: "/etc/ssh/.hostkit-1.sshd_config", kind: "file" },
    ])
    expect(calls.map(commandLine)).toEqual(["sshd -t -f /etc/ssh/.hostkit-1.sshd_config"])
  })

  it("runs an arbitrary checker per staged file", async () => {
    const { runner, calls } = fakeRunner()
    await commandValidator("visudo", path => ["-cf", path], runner)([
      { target: "/etc/sudoers.d/vps-user", stagedPath: "/etc/sudoers.d/.hostkit-1.vps-user", kind: "file" },
    ])
    expect(calls.map(commandLine)).toEqual(["visudo -cf /etc/sudoers.d/.hostkit-1.vps-user"])
  })
})

describe("input sources", () => {
  it("replays scripted answers and falls back to defaults on empty ones", async () => {
    const input = new ScriptedInputSource(["example.com", "", "n"])

    await expect(input.ask("Domain")).resolves.toBe("example.com")
    await expect(input.ask("SSH port", "2204")).resolves.toBe("2204")
    await expect(input.confirm("Enable SSL?", true)).resolves.toBe(false)
    expect(input.asked).toEqual(["Domain", "SSH port", "Enable SSL?"])
  })

  it("fails when the script runs out", async () => {
    const error = await captureProvisionError(() => new ScriptedInputSource([]).ask("Domain"))
    expect(error.message).toBe('No scripted answer left for "Domain"')
  })

  it("accepts defaults non-interactively and refuses prompts without one", async () => {
    const input = new DefaultsInputSource()

    await expect(input.ask("New user", "vps-user")).resolves.toBe("vps-user")
    await expect(input.confirm("Install Redis?", false)).resolves.toBe(false)
    const error = await captureProvisionError(() => input.ask("Git URL"))
    expect(error.code).toBe("PRECONDITION_FAILED")
  })

  it("reads answers from a stream", async () => {
    const stdin = new PassThrough()
    const stdout = new PassThrough()
    const input = new ReadlineInputSource(stdin, stdout)

    const answer = input.ask("Domain", "example.com")
    stdin.write("\n")
    await expect(answer).resolves.toBe("example.com")

    const confirmed = input.confirm("Overwrite?", false)
    stdin.write("yes\n")
    await expect(confirmed).resolves.toBe(true)
    input.close()
  })
})
