import type { Mention } from "./mention"

export type MentionGeneratorFunction = (mention: Mention) => Mention | null

export interface MentionGeneratorInterface {
  generateMention(mention: Mention): Mention | null
}

/** Accepted `generator` values: a `%s` URL template, a callback, or a generator object. */
export type MentionGeneratorInput = string | MentionGeneratorFunction | MentionGeneratorInterface

export function isMentionGeneratorInput(value: unknown): value is MentionGeneratorInput {
  if (typeof value === "string") return value !== ""
  if (typeof value === "function") return true
  return (
    typeof value === "object" &&
    value !== null &&
    "generateMention" in value &&
    typeof value.generateMention === "function"
  )
}

/** Collapses every generator form into one callback. */
export function resolveMentionGenerator(input: MentionGeneratorInput): MentionGeneratorFunction {
  if (typeof input === "string") {
    return (mention) => {
      mention.url = input.replace("%s", () => mention.identifier)
      return mention
    }
  }
  if (typeof input === "function") return input
  return (mention) => input.generateMention(mention)
}

