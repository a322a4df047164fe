import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { fileURLToPath } from "node:url"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import {
  CONFIG_ENV_VAR,
  getAppWebRoot,
  getNginxSitePath,
  getPhpFpmPoolPath,
  getPhpFpmSocket,
  loadHostConfig,
  resolveConfigPath,
} from "../config.js"
import { defaultHostConfig, parseHostConfig } from "../host-config-schema.js"

describe("parseHostConfig", () => {
  it("fills every default from an empty object", () => {
    const config = parseHostConfig("{}")
    expect(config.paths.webRoot).toBe("/var/www")
    expect(config.paths.lockFile).toBe("/run/lock/hostkit.lock")
    expect(config.paths.nginxSitesEnabled).toBe("/etc/nginx/sites-enabled")
    expect(config.paths.sshKeyDir).toBe("/root/.ssh")
    expect(config.web).toEqual({ user: "www-data", group: "www-data", phpVersion: "8.4" })
    expect(config.answers).toEqual({})
  })

  it("keeps overrides and strips _comment keys", () => {
    const config = parseHostConfig(
      JSON.stringify({
        _comment: "staging box",
        paths: { _comment: "custom web root", webRoot: "/srv/www" },
        web: { phpVersion: "8.3" },
        answers: { domain: "shop.example.com" },
      }),
    )
    expect(config.paths.webRoot).toBe("/srv/www")
    expect(config.paths.nginxDir).toBe("/etc/nginx")
    expect(config.web.phpVersion).toBe("8.3")
    expect(config.answers).toEqual({ domain: "shop.example.com" })
  })

  it("rejects unknown keys", () => {
    expect(() => parseHostConfig(JSON.stringify({ paths: { webroot: "/srv/www" } }))).toThrow()
  })

  it("rejects relative paths", () => {
    expect(() => parseHostConfig(JSON.stringify({ paths: { webRoot: "www" } }))).toThrow("Must be an absolute path")
  })

  it("reports malformed JSON", () => {
    expect(() => parseHostConfig("{ nope")).toThrow("Invalid JSON in host config")
  })
})

describe("loadHostConfig", () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "hostkit-config-"))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it("runs on defaults when no path is given", () => {
    const loaded = loadHostConfig(undefined, {})
    expect(loaded.source).toBeNull()
    expect(loaded.config).toEqual(defaultHostConfig())
  })

  it("reads the file named by the env var", () => {
    const file = join(dir, "hostkit.config.json")
    writeFileSync(file, JSON.stringify({ web: { user: "deploy", group: "deploy" } }))

    const loaded = loadHostConfig(undefined, { [CONFIG_ENV_VAR]: file })
    expect(loaded.source).toBe(file)
    expect(loaded.config.web.user).toBe("deploy")
  })

  it("prefers the explicit path over the env var", () => {
    expect(resolveConfigPath("/etc/hostkit/a.json", { [CONFIG_ENV_VAR]: "/etc/hostkit/b.json" })).toBe(
      "/etc/hostkit/a.json",
    )
  })

  it("fails fast when the named file is missing", () => {
    const missing = join(dir, "missing.json")
    expect(() => loadHostConfig(missing, {})).toThrow(`FATAL: Host config not found at ${missing}.`)
  })

  it("fails fast when the file does not parse", () => {
    const file = join(dir, "broken.json")
    writeFileSync(file, JSON.stringify({ paths: { webRoot: 42 } }))
    expect(() => loadHostConfig(file, {})).toThrow(`FATAL: Failed to parse ${file}`)
  })
})

describe("derived paths", () => {
  const config = defaultHostConfig()

  it("builds nginx and web root paths", () => {
    expect(getNginxSitePath(config, "shop")).toBe("/etc/nginx/sites-available/shop.conf")
    expect(getAppWebRoot(config, "shop")).toBe("/var/www/shop")
  })

  it("derives the php-fpm socket from the php version", () => {
    expect(getPhpFpmSocket(config)).toBe("/run/php/php8.4-fpm.sock")
    expect(getPhpFpmPoolPath(config)).toBe("/etc/php/8.4/fpm/pool.d/www.conf")
  })
})

describe("hostkit.config.example.json", () => {
  it("parses with its comments stripped", () => {
    const path = fileURLToPath(new URL("../../../../hostkit.config.example.json", import.meta.url))
    const config = parseHostConfig(readFileSync(path, "utf8"))

    expect(config.answers).toEqual({ "ssh.port.change": "yes", "ssh.port": "2204", "user.name": "deploy", "stack.postgres": "no" })
    expect(config.paths.sshdConfig).toBe("/etc/ssh/sshd_config")
    expect(config.web.phpVersion).toBe("8.4")
  })
})
