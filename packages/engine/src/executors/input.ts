import { createInterface, type Interface } from "node:readline/promises"
import { ProvisionError } from "../errors.js"

export interface InputSource {
  /** Empty answer means the default */
  ask(prompt: string, defaultValue?: string): Promise<string>
  confirm(prompt: string, defaultValue: boolean): Promise<boolean>
  close?(): void
}

function parseYesNo(answer: string): boolean | null {
  const normalized = answer.trim().toLowerCase()
  if (normalized === "y" || normalized === "yes") return true
  if (normalized === "n" || normalized === "no") return false
  return null
}

function withDefault(prompt: string, defaultValue?: string): string {
  return defaultValue ? `${prompt} [${defaultValue}]: ` : `${prompt}: `
}

/** Terminal prompts */
export class ReadlineInputSource implements InputSource {
  private rl: Interface | null = null

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  private readline(): Interface {
    if (!this.rl) this.rl = createInterface({ input: this.input, output: this.output })
    return this.rl
  }

  async ask(prompt: string, defaultValue?: string): Promise<string> {
    for (;;) {
      const answer = (await this.readline().question(withDefault(prompt, defaultValue))).trim()
      if (answer) return answer
      if (defaultValue !== undefined) return defaultValue
    }
  }

  async confirm(prompt: string, defaultValue: boolean): Promise<boolean> {
    const hint = defaultValue ? "Y/n" : "y/N"
    for (;;) {
      const answer = (await this.readline().question(`${prompt} (${hint}): `)).trim()
      if (!answer) return defaultValue
      const parsed = parseYesNo(answer)
      if (parsed !== null) return parsed
      this.output.write("Please answer yes or no.\n")
    }
  }

  close(): void {
    this.rl?.close()
    this.rl = null
  }
}

/** `--yes`: every prompt takes its default; a prompt without one is an error */
export class DefaultsInputSource implements InputSource {
  async ask(prompt: string, defaultValue?: string): Promise<string> {
    if (defaultValue === undefined) {
      throw ProvisionError.preconditionFailed(
        `No default for "${prompt}"`,
        "Run interactively or pre-seed the answer under `answers` in the host config.",
      )
    }
    return defaultValue
  }

  async confirm(_prompt: string, defaultValue: boolean): Promise<boolean> {
    return defaultValue
  }
}

/**
 * Answers replayed in order. An empty string takes the default. Records the
 * prompts it was asked.
 */
export class ScriptedInputSource implements InputSource {
  readonly asked: string[] = []
  private readonly queue: string[]

  constructor(answers: readonly string[]) {
    this.queue = [...answers]
  }

  private next(prompt: string): string {
    this.asked.push(prompt)
    const answer = this.queue.shift()
    if (answer === undefined) {
      throw ProvisionError.preconditionFailed(`No scripted answer left for "${prompt}"`)
    }
    return answer
  }

  async ask(prompt: string, defaultValue?: string): Promise<string> {
    const answer = this.next(prompt).trim()
    if (answer) return answer
    if (defaultValue === undefined) {
      throw ProvisionError.preconditionFailed(`Empty answer and no default for "${prompt}"`)
    }
    return defaultValue
  }

  async confirm(prompt: string, defaultValue: boolean): Promise<boolean> {
    const answer = this.next(prompt)
    if (!answer.trim()) return defaultValue
    const parsed = parseYesNo(answer)
    if (parsed === null) {
      throw ProvisionError.preconditionFailed(`Scripted answer "${answer}" is not yes/no for "${prompt}"`)
    }
    return parsed
  }
}
