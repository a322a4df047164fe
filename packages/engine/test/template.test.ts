import { writeFileSync } from "node:fs"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { ProvisionError } from "../src/errors.js"
import { loadTemplate, parseTemplate, render, renderTemplateFile } from "../src/template.js"
import { captureError, captureProvisionError, makeTempDir } from "./helpers.js"

const SSH_TEMPLATE = "Host {DOMAIN}\n  Port {PORT}"

describe("render", () => {
  it("substitutes every placeholder", () => {
    expect(render(SSH_TEMPLATE, { DOMAIN: "example.com", PORT: "2204" })).toBe("Host example.com\n  Port 2204")
  })

  it("names the missing placeholder", async () => {
    const error = await captureError(() => render(SSH_TEMPLATE, { DOMAIN: "example.com" }))

    expect(error).toBeInstanceOf(ProvisionError)
    expect(error).toMatchObject({
      code: "MISSING_PLACEHOLDER",
      details: { placeholder: "PORT" },
      message: "Missing value for placeholder {PORT}",
    })
  })

  it("reports the first unresolved placeholder in order of appearance", async () => {
    const error = await captureError(() => render("{ROOT_PATH} {DOMAIN} {ROOT_PATH}", {}))
    expect(error).toMatchObject({ details: { placeholder: "ROOT_PATH" } })
  })

  it("replaces repeated placeholders uniformly", () => {
    expect(render("{APP}:{APP}/{APP}", { APP: "shop" })).toBe("shop:shop/shop")
  })

  it("inserts values literally without rescanning them", () => {
    expect(render("root {ROOT};", { ROOT: "{DOMAIN} $1 $&" })).toBe("root {DOMAIN} $1 $&;")
  })

  it("leaves nginx blocks and lower-case braces alone", () => {
    const source = "server {\n  location / { try_files $uri {lower}; }\n}\n"
    expect(parseTemplate(source).placeholders).toEqual([])
    expect(render(source, {})).toBe(source)
  })

  it("finds a token inside doubled braces", () => {
    expect(render("{{DOMAIN}}", { DOMAIN: "example.com" })).toBe("{example.com}")
  })

  it("ignores unused substitutions", () => {
    expect(render("{A}", { A: "1", B: "2" })).toBe("1")
  })
})

describe("parseTemplate", () => {
  it("lists distinct placeholders in first-appearance order", () => {
    expect(parseTemplate("{B} {A} {B} {A_2}").placeholders).toEqual(["B", "A", "A_2"])
  })

  it("treats an unclosed brace as text", () => {
    const template = parseTemplate("listen {PORT")
    expect(template.placeholders).toEqual([])
    expect(render(template, {})).toBe("listen {PORT")
  })
})

describe("template files", () => {
  let dir: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = makeTempDir())
  })

  afterEach(() => cleanup())

  it("renders a template from disk", async () => {
    const path = join(dir, "go.service")
    writeFileSync(path, "[Service]\nUser={USER}\nWorkingDirectory={APP_PATH}\n")

    await expect(renderTemplateFile(path, { USER: "deploy", APP_PATH: "/srv/api" })).resolves.toBe(
      "[Service]\nUser=deploy\nWorkingDirectory=/srv/api\n",
    )
  })

  it("includes the template path in a missing-placeholder error", async () => {
    const path = join(dir, "site.conf")
    writeFileSync(path, "server_name {DOMAIN};\n")

    const template = await loadTemplate(path)
    expect(template.origin).toBe(path)
    expect(() => render(template, {})).toThrow(`Missing value for placeholder {DOMAIN} in ${path}`)
  })

  it("reports a missing template as a missing prerequisite", async () => {
    const error = await captureProvisionError(() => loadTemplate(join(dir, "absent.conf")))
    expect(error.code).toBe("PREREQUISITE_MISSING")
    expect(error.exitCode).toBe(2)
  })
})
