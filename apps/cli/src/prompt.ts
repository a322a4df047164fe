import { type InputSource, ProvisionError } from "@hostkit/engine"
import type { Logger } from "@hostkit/logger"
import type { InputValidationResult } from "@hostkit/shared"

export type AnswerValidator = (input: string) => InputValidationResult

export interface AskOptions {
  default?: string
  validate?: AnswerValidator
}

export interface PrompterOptions {
  input: InputSource
  /** Pre-seeded answers by question id (`answers` in the host config) */
  answers?: Readonly<Record<string, string>>
  logger: Logger
  /** Invalid answers tolerated before giving up */
  maxAttempts?: number
}

const YES = new Set(["y", "yes", "true"])
const NO = new Set(["n", "no", "false"])

/**
 * Asks questions by id. A pre-seeded answer wins over the input source and
 * must validate; an invalid typed answer is asked again.
 */
export class Prompter {
  private readonly input: InputSource
  private readonly answers: Readonly<Record<string, string>>
  private readonly logger: Logger
  private readonly maxAttempts: number

  constructor(options: PrompterOptions) {
    this.input = options.input
    this.answers = options.answers ?? {}
    this.logger = options.logger
    this.maxAttempts = options.maxAttempts ?? 3
  }

  private preset(id: string): string | undefined {
    return Object.hasOwn(this.answers, id) ? this.answers[id] : undefined
  }

  async ask(id: string, question: string, options: AskOptions = {}): Promise<string> {
    const { validate } = options
    const preset = this.preset(id)

    if (preset !== undefined) {
      if (!validate) return preset
      const result = validate(preset)
      if (!result.valid) {
        throw ProvisionError.preconditionFailed(
          `Invalid pre-seeded answer for "${id}": ${result.error ?? preset}`,
          `Fix answers.${id} in the host config.`,
        )
      }
      return result.value
    }

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const raw = await this.input.ask(question, options.default)
      if (!validate) return raw
      const result = validate(raw)
      if (result.valid) return result.value
      this.logger.warn(result.error ?? `Invalid answer: ${raw}`)
    }

    throw ProvisionError.preconditionFailed(`No valid answer for "${question}" after ${this.maxAttempts} attempts`)
  }

  async confirm(id: string, question: string, defaultValue: boolean): Promise<boolean> {
    const preset = this.preset(id)
    if (preset === undefined) return this.input.confirm(question, defaultValue)

    const normalized = preset.trim().toLowerCase()
    if (YES.has(normalized)) return true
    if (NO.has(normalized)) return false
    throw ProvisionError.preconditionFailed(
      `Invalid pre-seeded answer for "${id}": expected yes or no, got "${preset}"`,
      `Fix answers.${id} in the host config.`,
    )
  }
}
