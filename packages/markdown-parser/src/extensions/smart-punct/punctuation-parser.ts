import type { InlineParserContext } from "@/inline-parser/context"
import type { InlineParser } from "@/plugin-system"

const ELLIPSIS = /\.( ?\.)\1/
const DASHES = /-{2,}/

const EM_DASH = "—"
const EN_DASH = "–"

/** Ellipses plus en and em dashes built from hyphen runs. */
export class PunctuationParser implements InlineParser {
  readonly characters = ["-", "."]

  parse(context: InlineParserContext): boolean {
    const { cursor } = context

    if (cursor.getCharacter() === ".") {
      if (cursor.match(ELLIPSIS) === null) return false
      context.appendText("…")
      return true
    }

    const hyphens = cursor.match(DASHES)
    if (hyphens === null) return false
    context.appendText(dashesFor(hyphens.length))
    return true
  }
}

/** Em dashes where possible, otherwise en dashes, never mixing more than needed. */
export function dashesFor(count: number): string {
  let emCount = 0
  let enCount = 0
  if (count % 3 === 0) {
    emCount = count / 3
  } else if (count % 2 === 0) {
    enCount = count / 2
  } else if (count % 3 === 2) {
    emCount = (count - 2) / 3
    enCount = 1
  } else {
    emCount = (count - 4) / 3
    enCount = 2
  }
  return EM_DASH.repeat(emCount) + EN_DASH.repeat(enCount)
}
