import { readFile } from "node:fs/promises"
import { ProvisionError } from "./errors.js"

export type SubstitutionMap = Readonly<Record<string, string>>

export type TemplateSegment = { kind: "text"; text: string } | { kind: "placeholder"; name: string }

export interface Template {
  readonly source: string
  /** Distinct placeholder names in order of first appearance */
  readonly placeholders: readonly string[]
  /** File the template was loaded from */
  readonly origin?: string
  readonly segments: readonly TemplateSegment[]
}

const NAME = /^[A-Z][A-Z0-9_]*$/

/**
 * Split source into literal text and `{NAME}` tokens. Braces around anything
 * that is not an upper-case name (nginx blocks, `${var}`) stay literal.
 */
function scan(source: string): TemplateSegment[] {
  const segments: TemplateSegment[] = []
  let text = ""
  let i = 0

  while (i < source.length) {
    const open = source.indexOf("{", i)
    if (open === -1) {
      text += source.slice(i)
      break
    }
    const close = source.indexOf("}", open + 1)
    if (close === -1) {
      text += source.slice(i)
      break
    }
    const name = source.slice(open + 1, close)
    if (NAME.test(name)) {
      text += source.slice(i, open)
      if (text) segments.push({ kind: "text", text })
      text = ""
      segments.push({ kind: "placeholder", name })
      i = close + 1
    } else {
      // Not a token: keep the brace and rescan from just after it
      text += source.slice(i, open + 1)
      i = open + 1
    }
  }

  if (text) segments.push({ kind: "text", text })
  return segments
}

export function parseTemplate(source: string, origin?: string): Template {
  const segments = scan(source)
  const placeholders: string[] = []
  for (const segment of segments) {
    if (segment.kind === "placeholder" && !placeholders.includes(segment.name)) {
      placeholders.push(segment.name)
    }
  }
  return Object.freeze({ source, placeholders: Object.freeze(placeholders), origin, segments: Object.freeze(segments) })
}

/**
 * Replace every `{NAME}` with its value in one pass. Values are inserted
 * literally and never rescanned.
 *
 * @throws ProvisionError MISSING_PLACEHOLDER naming the first unresolved token
 */
export function render(template: Template | string, substitutions: SubstitutionMap): string {
  const parsed = typeof template === "string" ? parseTemplate(template) : template

  for (const name of parsed.placeholders) {
    if (!Object.hasOwn(substitutions, name)) {
      throw ProvisionError.missingPlaceholder(name, parsed.origin)
    }
  }

  let out = ""
  for (const segment of parsed.segments) {
    out += segment.kind === "text" ? segment.text : (substitutions[segment.name] ?? "")
  }
  return out
}

export async function loadTemplate(path: string): Promise<Template> {
  let source: string
  try {
    source = await readFile(path, "utf8")
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw ProvisionError.prerequisiteMissing(
        `Template not found: ${path}`,
        "Point paths.templatesRoot in the host config at the hostkit templates directory.",
      )
    }
    throw error
  }
  return parseTemplate(source, path)
}

export async function renderTemplateFile(path: string, substitutions: SubstitutionMap): Promise<string> {
  return render(await loadTemplate(path), substitutions)
}
